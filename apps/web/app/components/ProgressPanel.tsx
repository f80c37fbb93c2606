"use client";

import { ProgressBar } from "@quietcut/ui";
import clsx from "clsx";
import type { CleanJob } from "@/app/api/_lib/jobs";

export function ProgressPanel({ job }: { job: CleanJob }) {
  const statusLabel = (() => {
    switch (job.status) {
      case "completed":
        return `✅ ${job.statusText}`;
      case "failed":
        return `❌ ${job.statusText}`;
      default:
        return job.statusText;
    }
  })();

  return (
    <div className="space-y-3">
      <div className="flex items-center gap-3">
        <ProgressBar value={job.progress} />
        <span className="w-12 text-right text-xs tabular-nums text-zinc-400">{job.progress}%</span>
      </div>
      <p className="text-center text-sm text-zinc-300">{statusLabel}</p>
      {job.message && job.status !== "running" && (
        <p
          className={clsx(
            "whitespace-pre-line rounded-xl border px-4 py-3 text-xs",
            job.success ? "border-emerald-500/30 bg-emerald-500/10 text-emerald-300" : "border-red-500/30 bg-red-500/10 text-red-300"
          )}
        >
          {job.message}
        </p>
      )}
    </div>
  );
}
