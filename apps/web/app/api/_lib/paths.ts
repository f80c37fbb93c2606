import os from "os";
import path from "path";
import { z } from "zod";
import { setEncoderPath } from "@quietcut/ffmpeg";

const optionalPath = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || undefined);

const envSchema = z.object({
  QUIETCUT_FFPROBE_PATH: optionalPath,
  QUIETCUT_FFMPEG_PATH: optionalPath,
  QUIETCUT_AUTO_EDITOR_PATH: optionalPath,
  QUIETCUT_BROWSE_ROOT: optionalPath
});

const env = envSchema.parse(process.env);

export const ffprobePath = env.QUIETCUT_FFPROBE_PATH ?? "ffprobe";
export const ffmpegPath = env.QUIETCUT_FFMPEG_PATH;
export const cutterPath = env.QUIETCUT_AUTO_EDITOR_PATH;
export const browseRoot = path.resolve(env.QUIETCUT_BROWSE_ROOT ?? os.homedir());

setEncoderPath(ffmpegPath);
