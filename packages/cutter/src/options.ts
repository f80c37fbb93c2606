export interface CleanOptions {
  /** Audio level, in percent, below which a span counts as silent. */
  threshold: number;
  /** Frames kept around loud sections. */
  margin: number;
  /** Re-encode to h264/aac before cutting. */
  autoFix: boolean;
  /** Playback speed for silent spans; 99999 cuts them out. */
  silentSpeed: number;
}

export const DEFAULT_THRESHOLD = 4;
export const DEFAULT_MARGIN = 6;
export const DEFAULT_SILENT_SPEED = 99999;

export const THRESHOLD_RANGE = { min: 1, max: 20 } as const;
export const MARGIN_RANGE = { min: 0, max: 30 } as const;

export const defaultCleanOptions: CleanOptions = {
  threshold: DEFAULT_THRESHOLD,
  margin: DEFAULT_MARGIN,
  autoFix: true,
  silentSpeed: DEFAULT_SILENT_SPEED
};
