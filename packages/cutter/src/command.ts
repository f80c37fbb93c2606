import { existsSync } from "fs";
import {
  DEFAULT_MARGIN,
  DEFAULT_SILENT_SPEED,
  DEFAULT_THRESHOLD,
  type CleanOptions
} from "./options";

export const CUTTER_BINARY = "auto-editor";

export const CUTTER_SEARCH_PATHS = ["/usr/bin/auto-editor", "/usr/local/bin/auto-editor"] as const;

export function resolveCutterCommand({
  configuredPath,
  exists = existsSync
}: {
  configuredPath?: string;
  exists?: (candidate: string) => boolean;
} = {}): string {
  if (configuredPath) {
    return configuredPath;
  }
  return CUTTER_SEARCH_PATHS.find((candidate) => exists(candidate)) ?? CUTTER_BINARY;
}

/** Flags are only passed when they differ from auto-editor's own defaults. */
export function buildCutterArgs(
  inputPath: string,
  outputPath: string,
  options: Pick<CleanOptions, "threshold" | "margin" | "silentSpeed">
): string[] {
  const args = [inputPath, "-o", outputPath];

  if (options.threshold !== DEFAULT_THRESHOLD) {
    args.push("--edit", `audio:threshold=${options.threshold}%`);
  }

  if (options.margin !== DEFAULT_MARGIN) {
    args.push("--margin", `${options.margin}f`);
  }

  if (options.silentSpeed !== DEFAULT_SILENT_SPEED) {
    args.push("--silent-speed", String(options.silentSpeed));
  }

  return args;
}
