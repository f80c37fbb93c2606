export interface ProgressUpdate {
  percent: number;
  status: string;
}

export type ProgressListener = (percent: number, status: string) => void;

export const ANALYZING_STATUS = "Analyzing audio for silence...";
export const RENDERING_STATUS = "Rendering edited video...";

/**
 * Maps one line of auto-editor output to a progress estimate. The cutter
 * owns 40..95 of the overall bar.
 */
export function parseProgressLine(raw: string): ProgressUpdate | null {
  const line = raw.trim();
  if (!line) {
    return null;
  }

  if (line.startsWith("analyze:")) {
    return { percent: 40, status: ANALYZING_STATUS };
  }

  if (line.startsWith("render:") || line.toLowerCase().includes("rendering")) {
    return { percent: 60, status: RENDERING_STATUS };
  }

  const percent = extractPercent(line);
  if (percent === null || percent < 0 || percent > 100) {
    return null;
  }

  return {
    percent: 40 + Math.floor(percent * 0.55),
    status: `Processing: ${Math.floor(percent)}%`
  };
}

function extractPercent(line: string): number | null {
  if (line.includes("%")) {
    const tokens = line.split("%")[0].trim().split(/\s+/);
    return parseDecimal(tokens[tokens.length - 1]);
  }
  if (/^[\d.]+$/.test(line)) {
    return parseDecimal(line);
  }
  return null;
}

function parseDecimal(value: string | undefined): number | null {
  if (!value || !/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(value)) {
    return null;
  }
  return Number(value);
}

/**
 * Progress extrapolated from wall-clock time when the cutter is quiet.
 * Processing is assumed to take about as long as the video plays.
 */
export function estimateFromElapsed(elapsedSeconds: number, expectedSeconds: number): number | null {
  const timePercent = Math.min(95, (elapsedSeconds / Math.max(expectedSeconds, 1)) * 100);
  if (timePercent <= 40) {
    return null;
  }
  return Math.floor(35 + timePercent * 0.6);
}

export class ProgressReporter {
  private current = 0;
  private status = "";

  constructor(private readonly listener?: ProgressListener) {}

  get percent() {
    return this.current;
  }

  get lastStatus() {
    return this.status;
  }

  report(percent: number, status?: string) {
    const clamped = Math.min(100, Math.max(0, Math.floor(percent)));
    this.current = Math.max(this.current, clamped);
    if (status) {
      this.status = status;
    }
    this.listener?.(this.current, this.status);
  }
}
