import { runCommand, type CommandRunner } from "@quietcut/ffmpeg";
import { resolveCutterCommand } from "./command";

export interface ToolStatus {
  name: "ffprobe" | "ffmpeg" | "auto-editor";
  command: string;
  available: boolean;
  version: string | null;
  error: string | null;
}

export interface ToolPaths {
  ffprobePath?: string;
  ffmpegPath?: string;
  cutterPath?: string;
}

const VERSION_TIMEOUT_MS = 10_000;

export async function checkTools(paths: ToolPaths = {}, run: CommandRunner = runCommand): Promise<ToolStatus[]> {
  const targets: Array<{ name: ToolStatus["name"]; command: string; args: string[] }> = [
    { name: "ffprobe", command: paths.ffprobePath ?? "ffprobe", args: ["-version"] },
    { name: "ffmpeg", command: paths.ffmpegPath ?? "ffmpeg", args: ["-version"] },
    {
      name: "auto-editor",
      command: resolveCutterCommand({ configuredPath: paths.cutterPath }),
      args: ["--version"]
    }
  ];

  return Promise.all(
    targets.map(async ({ name, command, args }): Promise<ToolStatus> => {
      try {
        const output = await run(command, args, { timeoutMs: VERSION_TIMEOUT_MS });
        const version = output.split("\n").map((line) => line.trim()).find(Boolean) ?? null;
        return { name, command, available: true, version, error: null };
      } catch (error) {
        return {
          name,
          command,
          available: false,
          version: null,
          error: error instanceof Error ? error.message : "not available"
        };
      }
    })
  );
}
