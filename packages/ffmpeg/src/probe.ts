import { spawn } from "child_process";
import { z } from "zod";
import { DEFAULT_FPS, isVariableFrameRate, parseFrameRate, type VideoInfo } from "./info";

export type CommandRunner = (command: string, args: string[], options?: { timeoutMs?: number }) => Promise<string>;

export interface ProbeOptions {
  ffprobePath?: string;
  timeoutMs?: number;
  run?: CommandRunner;
}

const numeric = z.union([z.number(), z.string()]);

const probeStreamSchema = z.object({
  codec_type: z.string().optional(),
  codec_name: z.string().optional(),
  width: numeric.optional(),
  height: numeric.optional(),
  r_frame_rate: z.string().optional(),
  avg_frame_rate: z.string().optional()
});

const probeOutputSchema = z.object({
  streams: z.array(probeStreamSchema).optional(),
  format: z
    .object({
      duration: numeric.optional(),
      bit_rate: numeric.optional()
    })
    .optional()
});

export type ProbeOutput = z.infer<typeof probeOutputSchema>;

const PROBE_ARGS = ["-v", "quiet", "-print_format", "json", "-show_format", "-show_streams"];

export async function probeVideo(filePath: string, options: ProbeOptions = {}): Promise<VideoInfo | null> {
  const { ffprobePath = "ffprobe", timeoutMs = 30_000, run = runCommand } = options;

  let raw: string;
  try {
    raw = await run(ffprobePath, [...PROBE_ARGS, filePath], { timeoutMs });
  } catch (error) {
    console.warn("video probe failed", filePath, error);
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    console.warn("video probe returned invalid json", filePath, error);
    return null;
  }

  const parsed = probeOutputSchema.safeParse(json);
  if (!parsed.success) {
    console.warn("unexpected probe output", filePath, parsed.error.issues[0]?.message);
    return null;
  }

  return parseProbeOutput(filePath, parsed.data);
}

export function parseProbeOutput(filePath: string, output: ProbeOutput): VideoInfo | null {
  const streams = output.streams ?? [];
  const videoStream = streams.find((stream) => stream.codec_type === "video");
  const audioStream = streams.find((stream) => stream.codec_type === "audio");

  if (!videoStream) {
    return null;
  }

  const fps = parseFrameRate(videoStream.r_frame_rate, DEFAULT_FPS);
  const averageFps = parseFrameRate(videoStream.avg_frame_rate ?? videoStream.r_frame_rate, fps);
  const format = output.format ?? {};

  return {
    path: filePath,
    codec: videoStream.codec_name ?? "unknown",
    width: Math.trunc(toNumber(videoStream.width)),
    height: Math.trunc(toNumber(videoStream.height)),
    fps,
    duration: toNumber(format.duration),
    bitrate: Math.floor(toNumber(format.bit_rate) / 1000),
    audioCodec: audioStream ? audioStream.codec_name ?? "unknown" : "none",
    isVariableFrameRate: isVariableFrameRate(fps, averageFps)
  };
}

function toNumber(value: number | string | undefined, fallback = 0) {
  if (value === undefined || value === "") {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function runCommand(command: string, args: string[], options: { timeoutMs?: number } = {}): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"], timeout: options.timeoutMs });
    const chunks: Buffer[] = [];
    const errors: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => chunks.push(Buffer.from(chunk)));
    child.stderr.on("data", (chunk: Buffer) => errors.push(Buffer.from(chunk)));
    child.on("error", reject);
    child.on("close", (code, signal) => {
      if (code === 0) {
        resolve(Buffer.concat(chunks).toString("utf-8"));
      } else {
        const message = Buffer.concat(errors).toString("utf-8").trim();
        reject(new Error(message || `${command} exited with ${signal ? `signal ${signal}` : `code ${code}`}`));
      }
    });
  });
}
