"use client";

import { Button, Input, Label } from "@quietcut/ui";

interface PathFieldProps {
  id: string;
  label: string;
  value: string;
  placeholder: string;
  disabled?: boolean;
  onChange: (value: string) => void;
  onBrowse: () => void;
}

export function PathField({ id, label, value, placeholder, disabled = false, onChange, onBrowse }: PathFieldProps) {
  return (
    <div className="space-y-2">
      <Label htmlFor={id}>{label}</Label>
      <div className="flex gap-2">
        <Input
          id={id}
          value={value}
          placeholder={placeholder}
          disabled={disabled}
          spellCheck={false}
          onChange={(event) => onChange(event.target.value)}
        />
        <Button variant="secondary" disabled={disabled} onClick={onBrowse} className="shrink-0">
          Browse...
        </Button>
      </div>
    </div>
  );
}
