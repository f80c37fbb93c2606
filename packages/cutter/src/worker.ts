import {
  CancelledError,
  createPreprocessTarget,
  isCancelledError,
  preprocessVideo,
  probeVideo,
  removePreprocessTarget,
  type PreprocessRequest,
  type VideoInfo
} from "@quietcut/ffmpeg";
import { buildCutterArgs, resolveCutterCommand } from "./command";
import type { CleanOptions } from "./options";
import { ProgressReporter, type ProgressListener } from "./progress";
import { runCutter, spawnCutter, type CutterSpawner } from "./runner";

export interface CleanRequest {
  inputPath: string;
  outputPath: string;
  options: CleanOptions;
}

export interface CleanResult {
  success: boolean;
  message: string;
}

export type FinishedListener = (success: boolean, message: string) => void;

export interface WorkerDependencies {
  probe: (filePath: string) => Promise<VideoInfo | null>;
  preprocess: (request: PreprocessRequest) => Promise<void>;
  createTarget: () => Promise<string>;
  removeTarget: (target: string) => Promise<void>;
  resolveCommand: () => string;
  spawnProcess: CutterSpawner;
  now: () => number;
}

export interface SilenceCutWorkerOptions extends CleanRequest {
  onProgress?: ProgressListener;
  onFinished?: FinishedListener;
  ffprobePath?: string;
  cutterPath?: string;
  pollIntervalMs?: number;
  dependencies?: Partial<WorkerDependencies>;
}

export const CANCELLED_MESSAGE = "Processing cancelled";
const PREPROCESS_STATUS = "Preprocessing video for compatibility...";

/**
 * Runs probe, optional re-encode and the silence cut in order. Reports through
 * onProgress and ends every run with exactly one onFinished call.
 */
export class SilenceCutWorker {
  private readonly controller = new AbortController();
  private readonly dependencies: WorkerDependencies;
  private readonly reporter: ProgressReporter;
  private running: Promise<CleanResult> | null = null;

  constructor(private readonly options: SilenceCutWorkerOptions) {
    this.reporter = new ProgressReporter(options.onProgress);
    this.dependencies = {
      probe: (filePath) => probeVideo(filePath, { ffprobePath: options.ffprobePath }),
      preprocess: preprocessVideo,
      createTarget: () => createPreprocessTarget(),
      removeTarget: removePreprocessTarget,
      resolveCommand: () => resolveCutterCommand({ configuredPath: options.cutterPath }),
      spawnProcess: spawnCutter,
      now: Date.now,
      ...options.dependencies
    };
  }

  get cancelled() {
    return this.controller.signal.aborted;
  }

  run(): Promise<CleanResult> {
    this.running ??= this.execute();
    return this.running;
  }

  cancel() {
    this.controller.abort();
  }

  private async execute(): Promise<CleanResult> {
    let result: CleanResult;
    try {
      result = await this.process();
    } catch (error) {
      if (isCancelledError(error) || this.cancelled) {
        result = { success: false, message: CANCELLED_MESSAGE };
      } else {
        console.error("silence cut failed", this.options.inputPath, error);
        result = { success: false, message: `Error: ${error instanceof Error ? error.message : String(error)}` };
      }
    }
    this.options.onFinished?.(result.success, result.message);
    return result;
  }

  private async process(): Promise<CleanResult> {
    const { inputPath, outputPath, options } = this.options;
    const { signal } = this.controller;
    const deps = this.dependencies;

    this.throwIfCancelled();
    this.reporter.report(5, "Analyzing video...");
    const info = await deps.probe(inputPath);
    if (!info) {
      return { success: false, message: "Failed to analyze video file" };
    }
    this.throwIfCancelled();

    let workingFile = inputPath;
    let tempFile: string | null = null;

    try {
      if (options.autoFix) {
        this.reporter.report(10, PREPROCESS_STATUS);
        tempFile = await deps.createTarget();
        try {
          await deps.preprocess({
            inputPath,
            outputPath: tempFile,
            bitrateKbps: info.bitrate,
            duration: info.duration,
            signal,
            onProgress: (fraction) => this.reporter.report(10 + Math.floor(fraction * 20), PREPROCESS_STATUS)
          });
        } catch (error) {
          if (isCancelledError(error)) {
            throw error;
          }
          console.error("preprocessing failed", inputPath, error);
          return { success: false, message: error instanceof Error ? error.message : "Preprocessing failed" };
        }
        workingFile = tempFile;
        this.reporter.report(30, "Preprocessing complete");
      }

      this.throwIfCancelled();

      this.reporter.report(35, "Running auto-editor...");
      const exitCode = await runCutter({
        command: deps.resolveCommand(),
        args: buildCutterArgs(workingFile, outputPath, options),
        reporter: this.reporter,
        expectedDuration: info.duration,
        signal,
        spawnProcess: deps.spawnProcess,
        now: deps.now,
        pollIntervalMs: this.options.pollIntervalMs
      });

      if (exitCode !== 0) {
        console.warn("auto-editor exited", exitCode, workingFile);
        return { success: false, message: "auto-editor failed. Check that the video has audio." };
      }

      this.reporter.report(98, "Cleaning up...");
    } finally {
      if (tempFile) {
        await deps.removeTarget(tempFile);
      }
    }

    this.reporter.report(100, "Complete!");
    return { success: true, message: `Video saved to:\n${outputPath}` };
  }

  private throwIfCancelled() {
    if (this.cancelled) {
      throw new CancelledError();
    }
  }
}
