import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { DirectoryNotFoundError, isFile, listDirectory, pathExists } from "@/app/api/_lib/browse";
import { findFilter } from "@/lib/dialogs";

let root: string;

beforeAll(async () => {
  root = await mkdtemp(path.join(tmpdir(), "browse-test-"));
  await writeFile(path.join(root, "b-roll.MP4"), "abc");
  await writeFile(path.join(root, "Alpha.mkv"), "abcdef");
  await writeFile(path.join(root, "notes.txt"), "x");
  await writeFile(path.join(root, ".hidden.mp4"), "x");
  await mkdir(path.join(root, "Zeta"));
  await mkdir(path.join(root, "archive"));
  await mkdir(path.join(root, ".cache"));
});

afterAll(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("listDirectory", () => {
  it("lists directories first, then matching files, by name", async () => {
    const listing = await listDirectory(root, findFilter("open", "video"));

    expect(listing.directory).toBe(root);
    expect(listing.parent).toBe(path.dirname(root));
    expect(listing.entries).toEqual([
      { name: "archive", path: path.join(root, "archive"), kind: "directory", size: null },
      { name: "Zeta", path: path.join(root, "Zeta"), kind: "directory", size: null },
      { name: "Alpha.mkv", path: path.join(root, "Alpha.mkv"), kind: "file", size: 6 },
      { name: "b-roll.MP4", path: path.join(root, "b-roll.MP4"), kind: "file", size: 3 }
    ]);
  });

  it("shows every visible file under All Files", async () => {
    const listing = await listDirectory(root, findFilter("open", "all"));
    expect(listing.entries.map((entry) => entry.name)).toEqual([
      "archive",
      "Zeta",
      "Alpha.mkv",
      "b-roll.MP4",
      "notes.txt"
    ]);
  });

  it("narrows to a single extension for save filters", async () => {
    const listing = await listDirectory(root, findFilter("save", "mkv"));
    expect(listing.entries.filter((entry) => entry.kind === "file").map((entry) => entry.name)).toEqual(["Alpha.mkv"]);
  });

  it("orders names by code point regardless of locale", async () => {
    const takes = await mkdtemp(path.join(tmpdir(), "browse-order-"));
    await writeFile(path.join(takes, "talk_cleaned.mp4"), "x");
    await writeFile(path.join(takes, "talk.mp4"), "x");
    await writeFile(path.join(takes, "Talk-2.mp4"), "x");

    const listing = await listDirectory(takes, findFilter("save", "mp4"));

    expect(listing.entries.map((entry) => entry.name)).toEqual(["Talk-2.mp4", "talk.mp4", "talk_cleaned.mp4"]);
    await rm(takes, { recursive: true, force: true });
  });

  it("rejects paths that are not directories", async () => {
    await expect(listDirectory(path.join(root, "missing"), findFilter("open"))).rejects.toBeInstanceOf(
      DirectoryNotFoundError
    );
    await expect(listDirectory(path.join(root, "notes.txt"), findFilter("open"))).rejects.toBeInstanceOf(
      DirectoryNotFoundError
    );
  });
});

describe("file checks", () => {
  it("tells files from directories and missing paths", async () => {
    expect(await isFile(path.join(root, "notes.txt"))).toBe(true);
    expect(await isFile(path.join(root, "Zeta"))).toBe(false);
    expect(await isFile(path.join(root, "missing.mp4"))).toBe(false);
    expect(await pathExists(path.join(root, "Zeta"))).toBe(true);
    expect(await pathExists(path.join(root, "missing.mp4"))).toBe(false);
  });
});
