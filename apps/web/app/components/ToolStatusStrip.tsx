"use client";

import { useQuery } from "@tanstack/react-query";
import clsx from "clsx";
import { fetchHealth } from "@/lib/api";

export function ToolStatusStrip() {
  const health = useQuery({ queryKey: ["health"], queryFn: fetchHealth, staleTime: 60_000 });

  if (health.isPending) {
    return <p className="text-xs text-zinc-500">checking tools…</p>;
  }

  if (health.isError) {
    return <p className="text-xs text-red-400">{health.error.message}</p>;
  }

  return (
    <ul className="flex flex-wrap gap-2 text-xs">
      {health.data.tools.map((tool) => (
        <li
          key={tool.name}
          title={tool.available ? tool.version ?? tool.command : tool.error ?? "not found"}
          className={clsx(
            "rounded-full border px-3 py-1",
            tool.available ? "border-emerald-500/40 text-emerald-300" : "border-red-500/40 text-red-300"
          )}
        >
          {tool.available ? "✓" : "✗"} {tool.name}
        </li>
      ))}
    </ul>
  );
}
