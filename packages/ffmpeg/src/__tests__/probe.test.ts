import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseProbeOutput, probeVideo, type CommandRunner } from "../probe";

const samplePayload = {
  streams: [
    {
      codec_type: "video",
      codec_name: "h264",
      width: 1920,
      height: 1080,
      r_frame_rate: "30/1",
      avg_frame_rate: "30/1"
    },
    { codec_type: "audio", codec_name: "aac" }
  ],
  format: { duration: "125.400000", bit_rate: "8500123" }
};

describe("parseProbeOutput", () => {
  it("maps the first video and audio streams", () => {
    expect(parseProbeOutput("/videos/talk.mp4", samplePayload)).toEqual({
      path: "/videos/talk.mp4",
      codec: "h264",
      width: 1920,
      height: 1080,
      fps: 30,
      duration: 125.4,
      bitrate: 8500,
      audioCodec: "aac",
      isVariableFrameRate: false
    });
  });

  it("returns null without a video stream", () => {
    expect(parseProbeOutput("/music/song.mp3", { streams: [{ codec_type: "audio", codec_name: "mp3" }] })).toBeNull();
  });

  it("fills defaults for missing fields", () => {
    const info = parseProbeOutput("/videos/bare.mkv", { streams: [{ codec_type: "video" }] });
    expect(info).toEqual({
      path: "/videos/bare.mkv",
      codec: "unknown",
      width: 0,
      height: 0,
      fps: 30,
      duration: 0,
      bitrate: 0,
      audioCodec: "none",
      isVariableFrameRate: false
    });
  });

  it("reports an unnamed audio codec as unknown", () => {
    const info = parseProbeOutput("/videos/odd.avi", {
      streams: [{ codec_type: "video", codec_name: "mpeg4" }, { codec_type: "audio" }]
    });
    expect(info?.audioCodec).toBe("unknown");
  });

  it("flags variable frame rate from the average rate", () => {
    const info = parseProbeOutput("/videos/phone.mov", {
      streams: [{ codec_type: "video", codec_name: "hevc", r_frame_rate: "60/1", avg_frame_rate: "30000/1001" }]
    });
    expect(info?.fps).toBe(60);
    expect(info?.isVariableFrameRate).toBe(true);
  });

  it("uses the nominal rate when the average rate is undefined", () => {
    const info = parseProbeOutput("/videos/stream.ts", {
      streams: [{ codec_type: "video", codec_name: "h264", r_frame_rate: "25/1", avg_frame_rate: "0/0" }]
    });
    expect(info?.fps).toBe(25);
    expect(info?.isVariableFrameRate).toBe(false);
  });
});

describe("probeVideo", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("invokes ffprobe with the fixed json flags", async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(JSON.stringify(samplePayload));

    const info = await probeVideo("/videos/talk.mp4", { ffprobePath: "/opt/ffprobe", run });

    expect(run).toHaveBeenCalledWith(
      "/opt/ffprobe",
      ["-v", "quiet", "-print_format", "json", "-show_format", "-show_streams", "/videos/talk.mp4"],
      { timeoutMs: 30_000 }
    );
    expect(info?.codec).toBe("h264");
    expect(info?.bitrate).toBe(8500);
  });

  it("returns null when the prober fails", async () => {
    const run = vi.fn<CommandRunner>().mockRejectedValue(new Error("ffprobe exited with code 1"));
    await expect(probeVideo("/videos/missing.mp4", { run })).resolves.toBeNull();
  });

  it("returns null on output that is not json", async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue("not json");
    await expect(probeVideo("/videos/talk.mp4", { run })).resolves.toBeNull();
  });

  it("returns null when fields have the wrong shape", async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(JSON.stringify({ streams: "none" }));
    await expect(probeVideo("/videos/talk.mp4", { run })).resolves.toBeNull();
  });
});
