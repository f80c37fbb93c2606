import type { Metadata } from "next";
import "./globals.css";
import { ReactNode } from "react";
import { Providers } from "./providers";

export const metadata: Metadata = {
  title: "Video Silence Cutter",
  description: "Remove silent parts from videos with auto-editor"
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en" className="dark">
      <body className="relative min-h-screen bg-surface text-zinc-200">
        <div
          aria-hidden
          className="pointer-events-none fixed inset-0 -z-10 bg-[radial-gradient(circle_at_top,rgba(102,126,234,0.16),transparent_60%),radial-gradient(circle_at_bottom,rgba(118,75,162,0.14),transparent_65%)]"
        />
        <Providers>
          <div className="mx-auto flex min-h-screen max-w-3xl flex-col px-4 pb-16 pt-10">
            <header className="space-y-2 text-center">
              <h1 className="text-glow text-3xl font-bold text-white">Video Silence Cutter</h1>
              <p className="text-sm text-zinc-400">Remove silent parts from your videos automatically</p>
            </header>
            <main className="mt-8 flex-1">{children}</main>
          </div>
        </Providers>
      </body>
    </html>
  );
}
