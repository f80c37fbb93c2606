import { Suspense } from "react";
import { CleanerShell } from "./shell";

export default function Page() {
  return (
    <Suspense fallback={<div className="text-zinc-500">loading…</div>}>
      <CleanerShell />
    </Suspense>
  );
}
