import { z } from "zod";
import type { VideoInfo } from "@quietcut/ffmpeg/info";
import type { ToolStatus } from "@quietcut/cutter";
import type { CleanJob } from "@/app/api/_lib/jobs";
import type { DirectoryListing } from "@/app/api/_lib/browse";
import type { DialogKind, FileFilter } from "@/lib/dialogs";
import type { CleanOptionsInput } from "@/lib/validation";

export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

const errorBodySchema = z.object({
  message: z.string().optional(),
  code: z.string().optional()
});

const videoInfoSchema = z.object({
  path: z.string(),
  codec: z.string(),
  width: z.number(),
  height: z.number(),
  fps: z.number(),
  duration: z.number(),
  bitrate: z.number(),
  audioCodec: z.string(),
  isVariableFrameRate: z.boolean()
});

const jobSchema = z.object({
  id: z.string(),
  inputPath: z.string(),
  outputPath: z.string(),
  options: z.object({
    threshold: z.number(),
    margin: z.number(),
    autoFix: z.boolean(),
    silentSpeed: z.number()
  }),
  status: z.enum(["running", "completed", "failed", "cancelled"]),
  progress: z.number(),
  statusText: z.string(),
  message: z.string().nullable(),
  success: z.boolean().nullable(),
  createdAt: z.string(),
  updatedAt: z.string()
});

const jobBodySchema = z.object({ job: jobSchema });

const toolStatusSchema = z.object({
  name: z.enum(["ffprobe", "ffmpeg", "auto-editor"]),
  command: z.string(),
  available: z.boolean(),
  version: z.string().nullable(),
  error: z.string().nullable()
});

const healthSchema = z.object({
  tools: z.array(toolStatusSchema),
  ready: z.boolean()
});

const probeSchema = z.object({
  exists: z.boolean(),
  info: videoInfoSchema.nullable(),
  issues: z.array(z.string())
});

const browseSchema = z.object({
  listing: z.object({
    directory: z.string(),
    parent: z.string().nullable(),
    entries: z.array(
      z.object({
        name: z.string(),
        path: z.string(),
        kind: z.enum(["directory", "file"]),
        size: z.number().nullable()
      })
    )
  }),
  filters: z.array(z.object({ id: z.string(), label: z.string(), extensions: z.array(z.string()) })),
  filter: z.string()
});

async function request<T>(
  input: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: string,
  init?: RequestInit
): Promise<T> {
  const response = await fetch(input, init);
  const payload: unknown = await response.json().catch(() => null);

  if (!response.ok) {
    const body = errorBodySchema.safeParse(payload);
    const message = body.success && body.data.message ? body.data.message : fallback;
    throw new ApiError(message, response.status, body.success ? body.data.code : undefined);
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new ApiError(fallback, response.status);
  }
  return parsed.data;
}

function postJson(body: unknown): RequestInit {
  return {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body)
  };
}

export interface HealthResponse {
  tools: ToolStatus[];
  ready: boolean;
}

export async function fetchHealth(): Promise<HealthResponse> {
  return request("/api/health", healthSchema, "failed to check tools");
}

export interface ProbeResponse {
  exists: boolean;
  info: VideoInfo | null;
  issues: string[];
}

export async function probeVideoFile(path: string): Promise<ProbeResponse> {
  return request("/api/probe", probeSchema, "failed to analyze video", postJson({ path }));
}

export interface BrowseResponse {
  listing: DirectoryListing;
  filters: FileFilter[];
  filter: string;
}

export async function browseDirectory(params: {
  dir?: string;
  dialog: DialogKind;
  filter?: string;
}): Promise<BrowseResponse> {
  const search = new URLSearchParams({ dialog: params.dialog });
  if (params.dir) {
    search.set("dir", params.dir);
  }
  if (params.filter) {
    search.set("filter", params.filter);
  }
  return request(`/api/browse?${search.toString()}`, browseSchema, "failed to list directory");
}

export interface StartJobPayload {
  inputPath: string;
  outputPath: string;
  options: CleanOptionsInput;
  overwrite: boolean;
}

export async function startJob(payload: StartJobPayload): Promise<CleanJob> {
  const body = await request("/api/jobs", jobBodySchema, "failed to start processing", postJson(payload));
  return body.job;
}

export async function fetchCurrentJob(): Promise<CleanJob | null> {
  const body = await request("/api/jobs", z.object({ job: jobSchema.nullable() }), "failed to load job");
  return body.job;
}

export async function fetchJob(id: string): Promise<CleanJob> {
  const body = await request(`/api/jobs/${id}`, jobBodySchema, "failed to load job");
  return body.job;
}

export async function cancelJob(id: string): Promise<CleanJob> {
  const body = await request(`/api/jobs/${id}/cancel`, jobBodySchema, "failed to cancel job", { method: "POST" });
  return body.job;
}
