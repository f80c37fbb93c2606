"use client";

import { Input, Label } from "@quietcut/ui";
import type { UseFormReturn } from "react-hook-form";
import { MARGIN_RANGE, THRESHOLD_RANGE } from "@quietcut/cutter/options";
import type { CleanOptionsInput } from "@/lib/validation";

interface OptionsPanelProps {
  form: UseFormReturn<CleanOptionsInput>;
  disabled?: boolean;
}

export function OptionsPanel({ form, disabled = false }: OptionsPanelProps) {
  const {
    register,
    formState: { errors }
  } = form;

  return (
    <fieldset className="space-y-4" disabled={disabled}>
      <div className="grid gap-4 sm:grid-cols-2">
        <div className="space-y-2">
          <Label htmlFor="threshold">silence threshold (%)</Label>
          <Input
            id="threshold"
            type="number"
            min={THRESHOLD_RANGE.min}
            max={THRESHOLD_RANGE.max}
            title="Audio level below which is considered silence (default: 4%)"
            {...register("threshold", { valueAsNumber: true })}
          />
          <p className="text-xs text-zinc-500">lower = more sensitive</p>
          {errors.threshold && <p className="text-xs text-red-400">{errors.threshold.message}</p>}
        </div>
        <div className="space-y-2">
          <Label htmlFor="margin">frame margin</Label>
          <Input
            id="margin"
            type="number"
            min={MARGIN_RANGE.min}
            max={MARGIN_RANGE.max}
            title="Buffer frames around loud sections for natural cuts"
            {...register("margin", { valueAsNumber: true })}
          />
          <p className="text-xs text-zinc-500">frames kept around speech</p>
          {errors.margin && <p className="text-xs text-red-400">{errors.margin.message}</p>}
        </div>
      </div>
      <label
        className="flex items-center gap-3 rounded-xl border border-white/10 bg-black/40 px-4 py-3 text-sm text-zinc-200"
        title="Converts video to standard H.264 format before processing - fixes most compatibility issues"
      >
        <input type="checkbox" className="h-4 w-4 accent-accent" {...register("autoFix")} />
        Pre-process video with ffmpeg (recommended)
      </label>
    </fieldset>
  );
}
