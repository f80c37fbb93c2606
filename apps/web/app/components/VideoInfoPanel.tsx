"use client";

import { formatDuration, formatResolution, type VideoInfo } from "@quietcut/ffmpeg/info";

interface VideoInfoPanelProps {
  info: VideoInfo;
  issues: string[];
}

export function VideoInfoPanel({ info, issues }: VideoInfoPanelProps) {
  const rows = [
    { label: "Format", value: `${info.codec.toUpperCase()} ${formatResolution(info)} @ ${info.fps.toFixed(1)}fps` },
    { label: "Duration", value: formatDuration(info.duration) },
    { label: "Audio", value: info.audioCodec.toUpperCase() },
    { label: "Bitrate", value: `${info.bitrate} kbps` }
  ];

  return (
    <div className="space-y-3 rounded-xl border border-white/10 bg-black/40 px-4 py-3 text-sm">
      <dl className="grid grid-cols-[auto,1fr] gap-x-4 gap-y-1">
        {rows.map(({ label, value }) => (
          <div key={label} className="contents">
            <dt className="font-semibold text-zinc-300">{label}:</dt>
            <dd className="text-zinc-100">{value}</dd>
          </div>
        ))}
      </dl>
      {issues.length > 0 && (
        <ul className="space-y-1 text-xs text-orange-400">
          {issues.map((issue) => (
            <li key={issue}>⚠️ {issue}</li>
          ))}
        </ul>
      )}
    </div>
  );
}
