import { spawn } from "child_process";
import { createInterface } from "readline";
import type { Readable } from "stream";
import { CancelledError } from "@quietcut/ffmpeg";
import {
  ANALYZING_STATUS,
  RENDERING_STATUS,
  estimateFromElapsed,
  parseProgressLine,
  type ProgressReporter
} from "./progress";

/** The slice of a child process the cutter runner relies on. */
export interface CutterProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "close", listener: (code: number | null) => void): unknown;
  once(event: "error", listener: (error: Error) => void): unknown;
}

export type CutterSpawner = (command: string, args: string[]) => CutterProcess;

export const spawnCutter: CutterSpawner = (command, args) =>
  spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

export interface RunCutterRequest {
  command: string;
  args: string[];
  reporter: ProgressReporter;
  /** Video length in seconds; drives the elapsed-time fallback. 60 s when omitted. */
  expectedDuration?: number;
  signal?: AbortSignal;
  spawnProcess?: CutterSpawner;
  now?: () => number;
  pollIntervalMs?: number;
}

export const DEFAULT_POLL_INTERVAL_MS = 500;
const FALLBACK_EXPECTED_SECONDS = 60;
const INITIAL_STATUS = "Analyzing audio...";

/**
 * Runs auto-editor to completion and resolves with its exit code. Rejects with
 * CancelledError when the signal aborts; the child is sent SIGTERM and not
 * waited for.
 */
export function runCutter({
  command,
  args,
  reporter,
  expectedDuration,
  signal,
  spawnProcess = spawnCutter,
  now = Date.now,
  pollIntervalMs = DEFAULT_POLL_INTERVAL_MS
}: RunCutterRequest): Promise<number | null> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const child = spawnProcess(command, args);
    const startedAt = now();
    const expected = expectedDuration ?? FALLBACK_EXPECTED_SECONDS;
    let status = INITIAL_STATUS;
    let heardOutput = false;
    let settled = false;
    let exitCode: number | null | undefined;
    let openReaders = 0;

    const readers = [child.stdout, child.stderr]
      .filter((stream): stream is Readable => stream !== null)
      .map((stream) => createInterface({ input: stream, crlfDelay: Infinity }));

    const timer = setInterval(() => {
      if (settled) {
        return;
      }
      if (signal?.aborted) {
        onAbort();
        return;
      }
      if (heardOutput) {
        heardOutput = false;
        return;
      }
      const estimate = estimateFromElapsed((now() - startedAt) / 1000, expected);
      if (estimate !== null) {
        reporter.report(estimate, status);
      }
    }, pollIntervalMs);

    const settle = (outcome: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      clearInterval(timer);
      signal?.removeEventListener("abort", onAbort);
      for (const reader of readers) {
        reader.close();
      }
      outcome();
    };

    const onAbort = () => {
      child.kill("SIGTERM");
      settle(() => reject(new CancelledError()));
    };

    const maybeFinish = () => {
      const code = exitCode;
      if (code !== undefined && openReaders === 0) {
        settle(() => resolve(code));
      }
    };

    const onLine = (line: string) => {
      if (settled) {
        return;
      }
      if (signal?.aborted) {
        onAbort();
        return;
      }
      heardOutput = true;
      const update = parseProgressLine(line);
      if (update) {
        // Estimates keep the phase text, never a stale percentage.
        if (update.status === ANALYZING_STATUS || update.status === RENDERING_STATUS) {
          status = update.status;
        }
        reporter.report(update.percent, update.status);
      }
    };

    for (const reader of readers) {
      openReaders += 1;
      reader.on("line", onLine);
      reader.once("close", () => {
        openReaders -= 1;
        maybeFinish();
      });
    }

    child.once("error", (error) => {
      settle(() => reject(new Error(`Could not start ${command}: ${error.message}`)));
    });
    child.once("close", (code) => {
      exitCode = code;
      maybeFinish();
    });
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
