import { NextResponse } from "next/server";
import { DirectoryNotFoundError, listDirectory } from "@/app/api/_lib/browse";
import { browseRoot } from "@/app/api/_lib/paths";
import { badRequestResponse, notFoundResponse, serverErrorResponse } from "@/app/api/_lib/responses";
import { filtersFor, findFilter } from "@/lib/dialogs";
import { browseQuerySchema } from "@/lib/validation";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: Request) {
  const { searchParams } = new URL(request.url);
  const parsed = browseQuerySchema.safeParse({
    dir: searchParams.get("dir") ?? undefined,
    dialog: searchParams.get("dialog") ?? undefined,
    filter: searchParams.get("filter") ?? undefined
  });

  if (!parsed.success) {
    return badRequestResponse(parsed.error.issues[0]?.message ?? "invalid browse request");
  }

  const { dir, dialog } = parsed.data;
  const filter = findFilter(dialog, parsed.data.filter);

  try {
    const listing = await listDirectory(dir ?? browseRoot, filter);
    return NextResponse.json({ listing, filters: filtersFor(dialog), filter: filter.id });
  } catch (error) {
    if (error instanceof DirectoryNotFoundError) {
      return notFoundResponse(error.message);
    }
    console.error("directory listing failed", dir, error);
    return serverErrorResponse("failed to list directory");
  }
}
