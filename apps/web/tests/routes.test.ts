import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { GET as browse } from "@/app/api/browse/route";
import { POST as startJob } from "@/app/api/jobs/route";
import { POST as probe } from "@/app/api/probe/route";

let root: string;
let inputPath: string;
let existingOutput: string;

beforeAll(async () => {
  root = await mkdtemp(path.join(tmpdir(), "routes-test-"));
  inputPath = path.join(root, "talk.mp4");
  existingOutput = path.join(root, "talk_cleaned.mp4");
  await writeFile(inputPath, "not really a video");
  await writeFile(existingOutput, "previous run");
  await mkdir(path.join(root, "clips"));
});

afterAll(async () => {
  await rm(root, { recursive: true, force: true });
});

function postJson(url: string, body: unknown) {
  return new Request(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body)
  });
}

const options = { threshold: 4, margin: 6, autoFix: true };

describe("POST /api/jobs", () => {
  it("requires an existing input file", async () => {
    const missing = await startJob(
      postJson("http://localhost/api/jobs", { inputPath: path.join(root, "nope.mp4"), outputPath: "/tmp/out.mp4", options })
    );
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({ message: "Please select a valid input file." });

    const directory = await startJob(
      postJson("http://localhost/api/jobs", { inputPath: path.join(root, "clips"), outputPath: "/tmp/out.mp4", options })
    );
    expect(directory.status).toBe(400);
  });

  it("requires an output path", async () => {
    const response = await startJob(postJson("http://localhost/api/jobs", { inputPath, outputPath: "  ", options }));
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ message: "Please specify an output file." });
  });

  it("asks before overwriting an existing output", async () => {
    const response = await startJob(
      postJson("http://localhost/api/jobs", { inputPath, outputPath: existingOutput, options, overwrite: false })
    );
    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({ message: "Output file already exists. Overwrite?", code: "output_exists" });
  });

  it("validates option ranges", async () => {
    const response = await startJob(
      postJson("http://localhost/api/jobs", { inputPath, outputPath: existingOutput, options: { ...options, threshold: 0 } })
    );
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ message: "threshold must be at least 1%" });
  });
});

describe("POST /api/probe", () => {
  it("reports paths that are not files", async () => {
    const response = await probe(postJson("http://localhost/api/probe", { path: path.join(root, "clips") }));
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ exists: false, info: null, issues: [] });
  });

  it("rejects an empty path", async () => {
    const response = await probe(postJson("http://localhost/api/probe", { path: "" }));
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ message: "path is required" });
  });
});

describe("GET /api/browse", () => {
  it("lists a directory with the dialog's filters", async () => {
    const search = new URLSearchParams({ dir: root, dialog: "save", filter: "mp4" });
    const response = await browse(new Request(`http://localhost/api/browse?${search.toString()}`));
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.filter).toBe("mp4");
    expect(body.listing.entries.map((entry: { name: string }) => entry.name)).toEqual([
      "clips",
      "talk.mp4",
      "talk_cleaned.mp4"
    ]);
  });

  it("answers 404 for a missing directory", async () => {
    const search = new URLSearchParams({ dir: path.join(root, "gone") });
    const response = await browse(new Request(`http://localhost/api/browse?${search.toString()}`));
    expect(response.status).toBe(404);
  });
});
