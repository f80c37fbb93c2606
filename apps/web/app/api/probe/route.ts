import path from "path";
import { NextResponse } from "next/server";
import { detectPreprocessingIssues, probeVideo } from "@quietcut/ffmpeg";
import { isFile } from "@/app/api/_lib/browse";
import { ffprobePath } from "@/app/api/_lib/paths";
import { badRequestResponse, serverErrorResponse } from "@/app/api/_lib/responses";
import { probeRequestSchema } from "@/lib/validation";

export const runtime = "nodejs";

export async function POST(request: Request) {
  try {
    const payload = await request.json();
    const parsed = probeRequestSchema.safeParse(payload);

    if (!parsed.success) {
      return badRequestResponse(parsed.error.issues[0]?.message ?? "invalid probe request");
    }

    const filePath = path.resolve(parsed.data.path);
    if (!(await isFile(filePath))) {
      return NextResponse.json({ exists: false, info: null, issues: [] });
    }

    const info = await probeVideo(filePath, { ffprobePath });
    return NextResponse.json({ exists: true, info, issues: info ? detectPreprocessingIssues(info) : [] });
  } catch (error) {
    console.error("probe request failed", error);
    return serverErrorResponse("failed to analyze video");
  }
}
