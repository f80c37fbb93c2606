import path from "path";
import { NextResponse } from "next/server";
import { DEFAULT_SILENT_SPEED } from "@quietcut/cutter";
import { isFile, pathExists } from "@/app/api/_lib/browse";
import { JobConflictError, getJobController } from "@/app/api/_lib/jobs";
import { badRequestResponse, conflictResponse, serverErrorResponse } from "@/app/api/_lib/responses";
import { jobRequestSchema } from "@/lib/validation";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  return NextResponse.json({ job: getJobController().current() });
}

export async function POST(request: Request) {
  try {
    const payload = await request.json();
    const parsed = jobRequestSchema.safeParse(payload);

    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return badRequestResponse(issue?.message ?? "invalid processing request");
    }

    const { inputPath, outputPath, options, overwrite } = parsed.data;
    const resolvedInput = inputPath ? path.resolve(inputPath) : "";

    if (!resolvedInput || !(await isFile(resolvedInput))) {
      return badRequestResponse("Please select a valid input file.");
    }

    if (!outputPath) {
      return badRequestResponse("Please specify an output file.");
    }

    const resolvedOutput = path.resolve(outputPath);
    if (!overwrite && (await pathExists(resolvedOutput))) {
      return conflictResponse("Output file already exists. Overwrite?", "output_exists");
    }

    const job = getJobController().start({
      inputPath: resolvedInput,
      outputPath: resolvedOutput,
      options: { ...options, silentSpeed: DEFAULT_SILENT_SPEED }
    });

    return NextResponse.json({ job }, { status: 202 });
  } catch (error) {
    if (error instanceof JobConflictError) {
      return conflictResponse(error.message, "job_running");
    }
    console.error("starting clean job failed", error);
    return serverErrorResponse("failed to start processing");
  }
}
