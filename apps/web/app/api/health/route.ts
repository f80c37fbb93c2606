import { NextResponse } from "next/server";
import { checkTools } from "@quietcut/cutter";
import { cutterPath, ffmpegPath, ffprobePath } from "@/app/api/_lib/paths";
import { serverErrorResponse } from "@/app/api/_lib/responses";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const tools = await checkTools({ ffprobePath, ffmpegPath, cutterPath });
    const missing = tools.filter((tool) => !tool.available).map((tool) => tool.name);
    if (missing.length) {
      console.warn("tools unavailable", missing);
    }
    return NextResponse.json({ tools, ready: missing.length === 0 });
  } catch (error) {
    console.error("tool check failed", error);
    return serverErrorResponse("failed to check tools");
  }
}
