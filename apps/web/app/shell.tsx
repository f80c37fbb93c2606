"use client";

import { useEffect, useRef, useState } from "react";
import { useForm } from "react-hook-form";
import { zodResolver } from "@hookform/resolvers/zod";
import { useMutation, useQuery } from "@tanstack/react-query";
import { Button, Card } from "@quietcut/ui";
import { defaultCleanOptions } from "@quietcut/cutter/options";
import type { CleanJob } from "@/app/api/_lib/jobs";
import { ControlSection } from "@/components/ControlSection";
import { ConfirmDialog, FileDialog } from "@/components/FileDialog";
import { OptionsPanel } from "@/components/OptionsPanel";
import { PathField } from "@/components/PathField";
import { ProgressPanel } from "@/components/ProgressPanel";
import { ToolStatusStrip } from "@/components/ToolStatusStrip";
import { VideoInfoPanel } from "@/components/VideoInfoPanel";
import { ApiError, cancelJob, fetchCurrentJob, fetchJob, probeVideoFile, startJob } from "@/lib/api";
import { defaultOutputPath, type DialogKind } from "@/lib/dialogs";
import { cleanOptionsSchema, type CleanOptionsInput } from "@/lib/validation";

const PROBE_DEBOUNCE_MS = 300;
const POLL_INTERVAL_MS = 1000;

export function CleanerShell() {
  const [inputPath, setInputPath] = useState("");
  const [probePath, setProbePath] = useState("");
  const [outputPath, setOutputPath] = useState("");
  const [picker, setPicker] = useState<DialogKind | null>(null);
  const [confirmOverwrite, setConfirmOverwrite] = useState(false);
  const [formError, setFormError] = useState<string | null>(null);
  const [job, setJob] = useState<CleanJob | null>(null);
  const filledFor = useRef<string | null>(null);

  const form = useForm<CleanOptionsInput>({
    resolver: zodResolver(cleanOptionsSchema),
    defaultValues: {
      threshold: defaultCleanOptions.threshold,
      margin: defaultCleanOptions.margin,
      autoFix: defaultCleanOptions.autoFix
    }
  });

  useEffect(() => {
    const timeout = setTimeout(() => setProbePath(inputPath.trim()), PROBE_DEBOUNCE_MS);
    return () => clearTimeout(timeout);
  }, [inputPath]);

  const probe = useQuery({
    queryKey: ["probe", probePath],
    queryFn: () => probeVideoFile(probePath),
    enabled: probePath.length > 0,
    retry: false
  });

  const inputIsFile = probePath === inputPath.trim() && probe.data?.exists === true;

  useEffect(() => {
    if (probe.data?.exists && filledFor.current !== probePath) {
      filledFor.current = probePath;
      setOutputPath(defaultOutputPath(probePath));
    }
  }, [probe.data, probePath]);

  useEffect(() => {
    let cancelled = false;
    const restore = async () => {
      try {
        const current = await fetchCurrentJob();
        if (!cancelled && current?.status === "running") {
          setJob(current);
        }
      } catch (error) {
        console.error("failed to load current job", error);
      }
    };
    void restore();
    return () => {
      cancelled = true;
    };
  }, []);

  const jobId = job?.id;
  const running = job?.status === "running";

  useEffect(() => {
    if (!jobId || !running) {
      return;
    }

    let cancelled = false;

    const poll = async () => {
      try {
        const updated = await fetchJob(jobId);
        if (!cancelled) {
          setJob(updated);
        }
      } catch (error) {
        if (!cancelled) {
          console.error("failed to poll job", error);
        }
      }
    };

    const interval = setInterval(() => void poll(), POLL_INTERVAL_MS);
    void poll();

    return () => {
      cancelled = true;
      clearInterval(interval);
    };
  }, [jobId, running]);

  const start = useMutation({
    mutationFn: startJob,
    onSuccess: (created) => {
      setConfirmOverwrite(false);
      setJob(created);
    },
    onError: (error) => {
      if (error instanceof ApiError && error.code === "output_exists") {
        setConfirmOverwrite(true);
        return;
      }
      console.error("failed to start processing", error);
      setFormError(error.message);
    }
  });

  const cancel = useMutation({
    mutationFn: cancelJob,
    onSuccess: (updated) => setJob(updated),
    onError: (error) => console.error("failed to cancel job", error)
  });

  const submit = (overwrite: boolean) =>
    form.handleSubmit((options) => {
      setFormError(null);
      if (!inputIsFile) {
        setFormError("Please select a valid input file.");
        return;
      }
      if (!outputPath.trim()) {
        setFormError("Please specify an output file.");
        return;
      }
      start.mutate({ inputPath: inputPath.trim(), outputPath: outputPath.trim(), options, overwrite });
    });

  const info = inputIsFile ? probe.data?.info ?? null : null;

  return (
    <div className="space-y-6">
      <Card className="space-y-5">
        <PathField
          id="input-path"
          label="📁 input video"
          value={inputPath}
          placeholder="Select a video file..."
          disabled={running}
          onChange={setInputPath}
          onBrowse={() => setPicker("open")}
        />
        <PathField
          id="output-path"
          label="💾 output file"
          value={outputPath}
          placeholder="Output file path..."
          disabled={running}
          onChange={setOutputPath}
          onBrowse={() => setPicker("save")}
        />
        {probe.isFetching && <p className="text-xs text-zinc-500">reading video info…</p>}
        {probe.isError && <p className="text-xs text-red-400">{probe.error.message}</p>}
        {inputIsFile && !probe.data?.info && !probe.isFetching && (
          <p className="text-xs text-orange-400">Could not read video info. Processing may still work.</p>
        )}
      </Card>

      <ControlSection title="⚙️ options" description="Silence detection and compatibility settings.">
        <OptionsPanel form={form} disabled={running} />
      </ControlSection>

      {info && probe.data && (
        <ControlSection title="📊 video info">
          <VideoInfoPanel info={info} issues={probe.data.issues} />
        </ControlSection>
      )}

      <div className="space-y-2">
        {running && job ? (
          <Button
            variant="danger"
            className="h-12 w-full text-base"
            disabled={cancel.isPending || job.statusText === "Cancelling..."}
            onClick={() => cancel.mutate(job.id)}
          >
            ❌ Cancel
          </Button>
        ) : (
          <Button
            className="h-12 w-full text-base"
            disabled={!inputIsFile || start.isPending}
            onClick={() => void submit(false)()}
          >
            ▶️ Process Video
          </Button>
        )}
        {formError && <p className="text-center text-xs text-red-400">{formError}</p>}
      </div>

      {job && (
        <Card className="space-y-3">
          <h3 className="text-sm font-semibold text-white">📊 progress</h3>
          <ProgressPanel job={job} />
        </Card>
      )}

      <ToolStatusStrip />

      <FileDialog
        open={picker === "open"}
        dialog="open"
        title="Select Video File"
        initialPath={inputPath.trim() || undefined}
        onClose={() => setPicker(null)}
        onSelect={setInputPath}
      />
      <FileDialog
        open={picker === "save"}
        dialog="save"
        title="Save Output File"
        initialPath={outputPath.trim() || (inputIsFile ? defaultOutputPath(inputPath.trim()) : undefined)}
        onClose={() => setPicker(null)}
        onSelect={setOutputPath}
      />
      <ConfirmDialog
        open={confirmOverwrite}
        title="File Exists"
        message="Output file already exists. Overwrite?"
        onCancel={() => setConfirmOverwrite(false)}
        onConfirm={() => {
          setConfirmOverwrite(false);
          void submit(true)();
        }}
      />
    </div>
  );
}
