import type { Dirent } from "fs";
import { readdir, stat } from "fs/promises";
import path from "path";
import { matchesFilter, type FileFilter } from "@/lib/dialogs";

export interface BrowseEntry {
  name: string;
  path: string;
  kind: "directory" | "file";
  size: number | null;
}

export interface DirectoryListing {
  directory: string;
  parent: string | null;
  entries: BrowseEntry[];
}

export class DirectoryNotFoundError extends Error {
  constructor(directory: string) {
    super(`directory not found: ${directory}`);
    this.name = "DirectoryNotFoundError";
  }
}

async function describe(dirent: Dirent, fullPath: string): Promise<Pick<BrowseEntry, "kind" | "size"> | null> {
  if (dirent.isDirectory()) {
    return { kind: "directory", size: null };
  }
  if (dirent.isFile()) {
    const stats = await stat(fullPath).catch(() => null);
    return { kind: "file", size: stats?.size ?? null };
  }
  if (dirent.isSymbolicLink()) {
    const stats = await stat(fullPath).catch(() => null);
    if (stats?.isDirectory()) {
      return { kind: "directory", size: null };
    }
    if (stats?.isFile()) {
      return { kind: "file", size: stats.size };
    }
  }
  return null;
}

function compareEntries(a: BrowseEntry, b: BrowseEntry) {
  if (a.kind !== b.kind) {
    return a.kind === "directory" ? -1 : 1;
  }
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Subdirectories plus the files the filter accepts. Dotfiles and entries that
 * cannot be stat'ed are left out.
 */
export async function listDirectory(directory: string, filter: FileFilter): Promise<DirectoryListing> {
  const resolved = path.resolve(directory);
  const stats = await stat(resolved).catch(() => null);
  if (!stats?.isDirectory()) {
    throw new DirectoryNotFoundError(resolved);
  }

  const dirents = await readdir(resolved, { withFileTypes: true });
  const described = await Promise.all(
    dirents
      .filter((dirent) => !dirent.name.startsWith("."))
      .map(async (dirent): Promise<BrowseEntry | null> => {
        const fullPath = path.join(resolved, dirent.name);
        const details = await describe(dirent, fullPath);
        if (!details) {
          return null;
        }
        if (details.kind === "file" && !matchesFilter(dirent.name, filter)) {
          return null;
        }
        return { name: dirent.name, path: fullPath, ...details };
      })
  );

  const parent = path.dirname(resolved);
  return {
    directory: resolved,
    parent: parent === resolved ? null : parent,
    entries: described.filter((entry): entry is BrowseEntry => entry !== null).sort(compareEntries)
  };
}

export async function isFile(filePath: string) {
  const stats = await stat(filePath).catch(() => null);
  return stats?.isFile() ?? false;
}

export async function pathExists(filePath: string) {
  const stats = await stat(filePath).catch(() => null);
  return stats !== null;
}
