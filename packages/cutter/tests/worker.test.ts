import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CancelledError, probeVideo, type PreprocessRequest } from "@quietcut/ffmpeg";
import { CANCELLED_MESSAGE, SilenceCutWorker, defaultCleanOptions, type WorkerDependencies } from "../src";
import { scriptedCutter, type ScriptedCutter } from "./fakeProcess";

const probePayload = JSON.stringify({
  streams: [
    { codec_type: "video", codec_name: "h264", width: 1920, height: 1080, r_frame_rate: "30/1", avg_frame_rate: "30/1" },
    { codec_type: "audio", codec_name: "aac" }
  ],
  format: { duration: "90.000000", bit_rate: "6000000" }
});

const TEMP_TARGET = "/tmp/quietcut-test/preprocessed.mp4";

function createDependencies(cutter: ScriptedCutter, overrides: Partial<WorkerDependencies> = {}) {
  return {
    probe: vi.fn((filePath: string) => probeVideo(filePath, { run: async () => probePayload })),
    preprocess: vi.fn(async (request: PreprocessRequest) => {
      request.onProgress?.(0.5);
    }),
    createTarget: vi.fn(async () => TEMP_TARGET),
    removeTarget: vi.fn(async () => undefined),
    resolveCommand: () => "/usr/bin/auto-editor",
    spawnProcess: cutter.spawn,
    ...overrides
  };
}

function track() {
  const progress: number[] = [];
  const statuses: string[] = [];
  const finished = vi.fn();
  return {
    progress,
    statuses,
    finished,
    onProgress: (percent: number, status: string) => {
      progress.push(percent);
      statuses.push(status);
    }
  };
}

const request = {
  inputPath: "/videos/talk.mp4",
  outputPath: "/videos/talk_cleaned.mp4",
  pollIntervalMs: 60_000
};

describe("SilenceCutWorker", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("cleans a video end to end with monotonic progress", async () => {
    const cutter = scriptedCutter(["analyze: 0.1", "10%", "50%", "render: start", "90%"]);
    const tracker = track();
    const worker = new SilenceCutWorker({
      ...request,
      options: { ...defaultCleanOptions, autoFix: false },
      onProgress: tracker.onProgress,
      onFinished: tracker.finished,
      dependencies: createDependencies(cutter)
    });

    const result = await worker.run();

    expect(result).toEqual({ success: true, message: "Video saved to:\n/videos/talk_cleaned.mp4" });
    expect(tracker.finished).toHaveBeenCalledTimes(1);
    expect(tracker.finished).toHaveBeenCalledWith(true, "Video saved to:\n/videos/talk_cleaned.mp4");
    expect(tracker.progress).toEqual([5, 35, 40, 45, 67, 67, 89, 98, 100]);
    expect(tracker.statuses.at(-1)).toBe("Complete!");
    expect(cutter.calls).toEqual([
      { command: "/usr/bin/auto-editor", args: ["/videos/talk.mp4", "-o", "/videos/talk_cleaned.mp4"] }
    ]);
  });

  it("re-encodes to a temp file first when auto-fix is on", async () => {
    const cutter = scriptedCutter(["render: start"]);
    const tracker = track();
    const dependencies = createDependencies(cutter);
    const worker = new SilenceCutWorker({
      ...request,
      options: { ...defaultCleanOptions, autoFix: true, threshold: 6 },
      onProgress: tracker.onProgress,
      onFinished: tracker.finished,
      dependencies
    });

    await worker.run();

    expect(dependencies.preprocess).toHaveBeenCalledWith(
      expect.objectContaining({
        inputPath: "/videos/talk.mp4",
        outputPath: TEMP_TARGET,
        bitrateKbps: 6000,
        duration: 90
      })
    );
    expect(tracker.progress).toEqual([5, 10, 20, 30, 35, 60, 98, 100]);
    expect(cutter.calls[0]?.args).toEqual([
      TEMP_TARGET,
      "-o",
      "/videos/talk_cleaned.mp4",
      "--edit",
      "audio:threshold=6%"
    ]);
    expect(dependencies.removeTarget).toHaveBeenCalledWith(TEMP_TARGET);
    expect(tracker.finished).toHaveBeenCalledWith(true, "Video saved to:\n/videos/talk_cleaned.mp4");
  });

  it("stops when the probe fails", async () => {
    const cutter = scriptedCutter([]);
    const tracker = track();
    const worker = new SilenceCutWorker({
      ...request,
      options: defaultCleanOptions,
      onFinished: tracker.finished,
      dependencies: createDependencies(cutter, { probe: async () => null })
    });

    await worker.run();

    expect(tracker.finished).toHaveBeenCalledWith(false, "Failed to analyze video file");
    expect(cutter.calls).toHaveLength(0);
  });

  it("reports a preprocessing failure and removes the temp file", async () => {
    const cutter = scriptedCutter([]);
    const tracker = track();
    const dependencies = createDependencies(cutter, {
      preprocess: async () => {
        throw new Error("Preprocessing failed: moov atom not found");
      }
    });
    const worker = new SilenceCutWorker({
      ...request,
      options: { ...defaultCleanOptions, autoFix: true },
      onFinished: tracker.finished,
      dependencies
    });

    await worker.run();

    expect(tracker.finished).toHaveBeenCalledWith(false, "Preprocessing failed: moov atom not found");
    expect(dependencies.removeTarget).toHaveBeenCalledWith(TEMP_TARGET);
    expect(cutter.calls).toHaveLength(0);
  });

  it("reports a failing auto-editor run", async () => {
    const cutter = scriptedCutter(["Error: no audio"], 1);
    const tracker = track();
    const worker = new SilenceCutWorker({
      ...request,
      options: defaultCleanOptions,
      onFinished: tracker.finished,
      dependencies: createDependencies(cutter)
    });

    await worker.run();

    expect(tracker.finished).toHaveBeenCalledWith(false, "auto-editor failed. Check that the video has audio.");
  });

  it("reports a cutter that cannot start", async () => {
    const tracker = track();
    const cutter = scriptedCutter([], null);
    const worker = new SilenceCutWorker({
      ...request,
      options: defaultCleanOptions,
      onFinished: tracker.finished,
      dependencies: createDependencies(cutter, {
        resolveCommand: () => "auto-editor",
        spawnProcess: (command, args) => {
          const child = cutter.spawn(command, args);
          setImmediate(() => cutter.processes[0]?.emit("error", new Error("spawn auto-editor ENOENT")));
          return child;
        }
      })
    });

    await worker.run();

    expect(tracker.finished).toHaveBeenCalledWith(false, "Error: Could not start auto-editor: spawn auto-editor ENOENT");
  });

  it("cancels a running cut and cleans up", async () => {
    const tracker = track();
    const cutter = scriptedCutter(["analyze: 0"], null, () => worker.cancel());
    const dependencies = createDependencies(cutter);
    const worker = new SilenceCutWorker({
      ...request,
      options: { ...defaultCleanOptions, autoFix: true },
      onFinished: tracker.finished,
      dependencies
    });

    const result = await worker.run();

    expect(result).toEqual({ success: false, message: CANCELLED_MESSAGE });
    expect(tracker.finished).toHaveBeenCalledTimes(1);
    expect(cutter.processes[0]?.killSignals).toEqual(["SIGTERM"]);
    expect(dependencies.removeTarget).toHaveBeenCalledWith(TEMP_TARGET);
    expect(worker.cancelled).toBe(true);
  });

  it("cancels during preprocessing", async () => {
    const tracker = track();
    const cutter = scriptedCutter([]);
    const dependencies = createDependencies(cutter, {
      preprocess: async () => {
        worker.cancel();
        throw new CancelledError();
      }
    });
    const worker = new SilenceCutWorker({
      ...request,
      options: { ...defaultCleanOptions, autoFix: true },
      onFinished: tracker.finished,
      dependencies
    });

    await worker.run();

    expect(tracker.finished).toHaveBeenCalledWith(false, CANCELLED_MESSAGE);
    expect(dependencies.removeTarget).toHaveBeenCalledWith(TEMP_TARGET);
    expect(cutter.calls).toHaveLength(0);
  });

  it("does nothing but finish when cancelled before it starts", async () => {
    const tracker = track();
    const cutter = scriptedCutter([]);
    const dependencies = createDependencies(cutter);
    const worker = new SilenceCutWorker({
      ...request,
      options: defaultCleanOptions,
      onFinished: tracker.finished,
      dependencies
    });

    worker.cancel();
    await worker.run();

    expect(tracker.finished).toHaveBeenCalledWith(false, CANCELLED_MESSAGE);
    expect(dependencies.probe).not.toHaveBeenCalled();
  });

  it("runs once however often run is called", async () => {
    const tracker = track();
    const cutter = scriptedCutter([]);
    const worker = new SilenceCutWorker({
      ...request,
      options: defaultCleanOptions,
      onFinished: tracker.finished,
      dependencies: createDependencies(cutter)
    });

    const first = worker.run();
    const second = worker.run();

    expect(second).toBe(first);
    await first;
    expect(tracker.finished).toHaveBeenCalledTimes(1);
    expect(cutter.calls).toHaveLength(1);
  });
});
