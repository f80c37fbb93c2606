export interface VideoInfo {
  path: string;
  codec: string;
  width: number;
  height: number;
  fps: number;
  duration: number;
  /** kbps */
  bitrate: number;
  audioCodec: string;
  isVariableFrameRate: boolean;
}

export const DEFAULT_FPS = 30;

/** Nominal and average frame rates further apart than this count as variable frame rate. */
export const VFR_TOLERANCE = 2.0;

export const PROBLEMATIC_CODECS = ["av1", "mpeg2video", "mpeg1video", "wmv3", "theora"] as const;

export function parseFrameRate(value: string | undefined | null, fallback = DEFAULT_FPS): number {
  if (!value) {
    return fallback;
  }
  const parts = value.trim().split("/");
  if (parts.length === 1) {
    return parseDecimal(parts[0]) ?? fallback;
  }
  if (parts.length !== 2) {
    return fallback;
  }
  const numerator = parseDecimal(parts[0]);
  const denominator = parseDecimal(parts[1]);
  if (numerator === null || denominator === null || denominator === 0) {
    return fallback;
  }
  return numerator / denominator;
}

export function isVariableFrameRate(fps: number, averageFps: number) {
  return Math.abs(fps - averageFps) > VFR_TOLERANCE;
}

export function detectPreprocessingIssues(info: VideoInfo): string[] {
  const issues: string[] = [];

  if (info.isVariableFrameRate) {
    issues.push("Variable frame rate detected (common in phone recordings)");
  }

  if ((PROBLEMATIC_CODECS as readonly string[]).includes(info.codec.toLowerCase())) {
    issues.push(`Codec '${info.codec}' may cause compatibility issues`);
  }

  return issues;
}

export function needsPreprocessing(info: VideoInfo) {
  return detectPreprocessingIssues(info).length > 0;
}

/**
 * Constant rate factor for the compatibility re-encode, picked so the output
 * keeps roughly the quality of the source.
 */
export function getTargetCrf(bitrateKbps: number): number {
  if (bitrateKbps > 20000) {
    return 18;
  }
  if (bitrateKbps > 8000) {
    return 20;
  }
  if (bitrateKbps > 4000) {
    return 22;
  }
  return 23;
}

export function formatResolution(info: Pick<VideoInfo, "width" | "height">) {
  return `${info.width}x${info.height}`;
}

export function formatDuration(seconds: number) {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  const pad = (value: number) => value.toString().padStart(2, "0");
  if (hours > 0) {
    return `${pad(hours)}:${pad(minutes)}:${pad(secs)}`;
  }
  return `${pad(minutes)}:${pad(secs)}`;
}

function parseDecimal(input: string | undefined): number | null {
  const value = input?.trim();
  if (!value || !/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(value)) {
    return null;
  }
  return Number(value);
}
