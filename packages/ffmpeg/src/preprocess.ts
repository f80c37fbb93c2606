import ffmpeg from "fluent-ffmpeg";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { CancelledError } from "./errors";
import { getTargetCrf } from "./info";

export interface PreprocessRequest {
  inputPath: string;
  outputPath: string;
  bitrateKbps: number;
  /** Source duration in seconds, used to turn encoder timemarks into a fraction. */
  duration?: number;
  signal?: AbortSignal;
  onProgress?: (fraction: number) => void;
}

const TEMP_PREFIX = "quietcut-";
const TEMP_FILE = "preprocessed.mp4";
const STDERR_LIMIT = 500;

export function setEncoderPath(ffmpegPath: string | undefined) {
  if (ffmpegPath) {
    ffmpeg.setFfmpegPath(ffmpegPath);
  }
}

export function buildPreprocessOptions(crf: number): string[] {
  return [
    "-c:v",
    "libx264",
    "-preset",
    "fast",
    "-crf",
    String(crf),
    "-c:a",
    "aac",
    "-colorspace",
    "bt709",
    "-color_primaries",
    "bt709",
    "-color_trc",
    "bt709",
    "-map_metadata",
    "-1",
    "-pix_fmt",
    "yuv420p"
  ];
}

export function preprocessVideo({
  inputPath,
  outputPath,
  bitrateKbps,
  duration,
  signal,
  onProgress
}: PreprocessRequest) {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const command = ffmpeg(inputPath).outputOptions(buildPreprocessOptions(getTargetCrf(bitrateKbps)));

    const onAbort = () => {
      command.kill("SIGTERM");
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    // fluent-ffmpeg probes the input before spawning; a kill in that window finds no process.
    command.on("start", () => {
      if (signal?.aborted) {
        command.kill("SIGTERM");
      }
    });

    if (onProgress) {
      command.on("progress", (progress) => {
        if (!progress.timemark || !duration || duration <= 0) {
          return;
        }
        onProgress(Math.min(1, timemarkToSeconds(progress.timemark) / duration));
      });
    }

    command
      .output(outputPath)
      .on("end", () => {
        signal?.removeEventListener("abort", onAbort);
        if (signal?.aborted) {
          reject(new CancelledError());
          return;
        }
        resolve();
      })
      .on("error", (error: Error, _stdout: string | null, stderr: string | null) => {
        signal?.removeEventListener("abort", onAbort);
        if (signal?.aborted) {
          reject(new CancelledError());
          return;
        }
        const detail = stderr?.trim() || error.message;
        reject(new Error(`Preprocessing failed: ${detail.slice(0, STDERR_LIMIT)}`));
      })
      .run();
  });
}

export function timemarkToSeconds(timemark: string) {
  const parts = timemark.split(":").map(Number);
  if (parts.length === 3) {
    const [hours, minutes, seconds] = parts;
    return hours * 3600 + minutes * 60 + seconds;
  }
  if (parts.length === 2) {
    const [minutes, seconds] = parts;
    return minutes * 60 + seconds;
  }
  return Number(parts[0]) || 0;
}

export async function createPreprocessTarget(root = tmpdir()) {
  const dir = await mkdtemp(path.join(root, TEMP_PREFIX));
  return path.join(dir, TEMP_FILE);
}

/** Removes the directory made by createPreprocessTarget. Never throws. */
export async function removePreprocessTarget(target: string) {
  const dir = path.dirname(target);
  if (path.basename(target) !== TEMP_FILE || !path.basename(dir).startsWith(TEMP_PREFIX)) {
    return;
  }
  await rm(dir, { recursive: true, force: true }).catch(() => undefined);
}
