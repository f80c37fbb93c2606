import { randomUUID } from "crypto";
import {
  CANCELLED_MESSAGE,
  SilenceCutWorker,
  type CleanOptions,
  type CleanRequest,
  type CleanResult,
  type SilenceCutWorkerOptions
} from "@quietcut/cutter";
import { cutterPath, ffprobePath } from "@/app/api/_lib/paths";

export type JobStatus = "running" | "completed" | "failed" | "cancelled";

export interface CleanJob {
  id: string;
  inputPath: string;
  outputPath: string;
  options: CleanOptions;
  status: JobStatus;
  progress: number;
  statusText: string;
  message: string | null;
  success: boolean | null;
  createdAt: string;
  updatedAt: string;
}

/** What the controller needs from a worker; SilenceCutWorker in production. */
export interface CleanRunner {
  run(): Promise<CleanResult>;
  cancel(): void;
}

export type RunnerFactory = (options: SilenceCutWorkerOptions) => CleanRunner;

export class JobConflictError extends Error {
  constructor(message = "A video is already being processed.") {
    super(message);
    this.name = "JobConflictError";
  }
}

declare global {
  // eslint-disable-next-line no-var
  var __quietcut_jobs: CleanJobController | undefined;
}

const createWorker: RunnerFactory = (options) => new SilenceCutWorker({ ...options, ffprobePath, cutterPath });

/**
 * Holds the one clean job the app runs at a time. The last job stays readable
 * until the next one starts.
 */
export class CleanJobController {
  private job: CleanJob | null = null;
  private runner: CleanRunner | null = null;
  private cancelRequested = false;

  constructor(private readonly createRunner: RunnerFactory = createWorker) {}

  current(): CleanJob | null {
    return this.job ? { ...this.job } : null;
  }

  get(id: string): CleanJob | null {
    return this.job?.id === id ? { ...this.job } : null;
  }

  start(request: CleanRequest): CleanJob {
    if (this.job?.status === "running") {
      throw new JobConflictError();
    }

    const now = new Date().toISOString();
    const job: CleanJob = {
      id: randomUUID(),
      inputPath: request.inputPath,
      outputPath: request.outputPath,
      options: request.options,
      status: "running",
      progress: 0,
      statusText: "Starting...",
      message: null,
      success: null,
      createdAt: now,
      updatedAt: now
    };
    this.job = job;
    this.cancelRequested = false;

    const runner = this.createRunner({
      ...request,
      onProgress: (percent, status) => this.onProgress(job.id, percent, status),
      onFinished: (success, message) => this.onFinished(job.id, success, message)
    });
    this.runner = runner;
    console.info("clean job started", job.id, job.inputPath);

    void runner.run().catch((error) => {
      console.error("clean job crashed", job.id, error);
      this.onFinished(job.id, false, `Error: ${error instanceof Error ? error.message : String(error)}`);
    });

    return { ...job };
  }

  cancel(id: string): CleanJob | null {
    const job = this.job;
    if (!job || job.id !== id) {
      return null;
    }
    if (job.status === "running" && !this.cancelRequested) {
      this.cancelRequested = true;
      this.runner?.cancel();
      this.patch(job, { statusText: "Cancelling..." });
      console.info("clean job cancelling", job.id);
    }
    return { ...job };
  }

  private onProgress(id: string, percent: number, status: string) {
    const job = this.job;
    if (!job || job.id !== id || job.status !== "running") {
      return;
    }
    this.patch(job, this.cancelRequested ? { progress: percent } : { progress: percent, statusText: status });
  }

  private onFinished(id: string, success: boolean, message: string) {
    const job = this.job;
    if (!job || job.id !== id || job.status !== "running") {
      return;
    }

    const cancelled = !success && message === CANCELLED_MESSAGE;
    this.patch(job, {
      status: success ? "completed" : cancelled ? "cancelled" : "failed",
      progress: success ? 100 : 0,
      statusText: success ? "Complete!" : cancelled ? "Cancelled" : "Failed",
      message,
      success
    });
    this.runner = null;

    if (success) {
      console.info("clean job completed", job.id, job.outputPath);
    } else {
      console.warn("clean job did not complete", job.id, message);
    }
  }

  private patch(job: CleanJob, changes: Partial<Omit<CleanJob, "id" | "createdAt">>) {
    Object.assign(job, changes, { updatedAt: new Date().toISOString() });
  }
}

export function getJobController(): CleanJobController {
  return (globalThis.__quietcut_jobs ??= new CleanJobController());
}
