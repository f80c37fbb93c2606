import { ComponentProps, forwardRef } from "react";
import { twMerge } from "tailwind-merge";
import clsx from "clsx";

export const Card = forwardRef<HTMLDivElement, ComponentProps<"div">>(function Card(
  { className, ...props },
  ref
) {
  return (
    <div
      ref={ref}
      className={twMerge(
        "rounded-2xl border border-white/10 bg-white/5 p-6 shadow-[0_0_40px_rgba(102,126,234,0.12)] backdrop-blur",
        className
      )}
      {...props}
    />
  );
});

type ButtonVariant = "primary" | "secondary" | "danger";

const buttonVariants: Record<ButtonVariant, string> = {
  primary:
    "bg-gradient-to-r from-accent to-accent-deep text-white shadow-[0_0_25px_rgba(102,126,234,0.4)] hover:brightness-110",
  secondary: "border border-white/15 bg-white/5 text-zinc-100 hover:border-accent/60",
  danger: "bg-rose-500/90 text-white hover:bg-rose-500"
};

export const Button = forwardRef<HTMLButtonElement, ComponentProps<"button"> & { variant?: ButtonVariant }>(
  function Button({ className, disabled, variant = "primary", type = "button", ...props }, ref) {
    return (
      <button
        ref={ref}
        type={type}
        disabled={disabled}
        className={twMerge(
          clsx(
            "inline-flex items-center justify-center rounded-lg px-4 py-2 text-sm font-semibold transition",
            disabled ? "cursor-not-allowed bg-zinc-800 text-zinc-500 shadow-none" : buttonVariants[variant]
          ),
          className
        )}
        {...props}
      />
    );
  }
);

export const Label = forwardRef<HTMLLabelElement, ComponentProps<"label">>(function Label(
  { className, ...props },
  ref
) {
  return (
    <label
      ref={ref}
      className={twMerge("block text-xs font-semibold uppercase tracking-widest text-zinc-400", className)}
      {...props}
    />
  );
});

export const Input = forwardRef<HTMLInputElement, ComponentProps<"input">>(function Input(
  { className, ...props },
  ref
) {
  return (
    <input
      ref={ref}
      className={twMerge(
        "w-full rounded-lg border border-white/10 bg-black/60 px-3 py-2 text-sm text-white placeholder:text-zinc-500 focus:border-accent focus:outline-none disabled:opacity-60",
        className
      )}
      {...props}
    />
  );
});

export function ProgressBar({ value, className }: { value: number; className?: string }) {
  const clamped = Math.min(100, Math.max(0, value));
  return (
    <div
      role="progressbar"
      aria-valuemin={0}
      aria-valuemax={100}
      aria-valuenow={clamped}
      className={twMerge("h-3 w-full overflow-hidden rounded-full bg-white/10", className)}
    >
      <div
        className="h-full rounded-full bg-gradient-to-r from-accent to-accent-deep transition-all"
        style={{ width: `${clamped}%` }}
      />
    </div>
  );
}
