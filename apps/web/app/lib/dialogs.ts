export type DialogKind = "open" | "save";

export interface FileFilter {
  id: string;
  label: string;
  /** Lowercase extensions without the dot; empty matches everything. */
  extensions: string[];
}

const ALL_FILES: FileFilter = { id: "all", label: "All Files", extensions: [] };

export const INPUT_FILTERS: FileFilter[] = [
  { id: "video", label: "Video Files", extensions: ["mp4", "mkv", "avi", "mov", "webm", "m4v", "wmv", "flv"] },
  ALL_FILES
];

export const OUTPUT_FILTERS: FileFilter[] = [
  { id: "mp4", label: "MP4 Video", extensions: ["mp4"] },
  { id: "mkv", label: "MKV Video", extensions: ["mkv"] },
  ALL_FILES
];

export const OUTPUT_SUFFIX = "_cleaned";

export function filtersFor(dialog: DialogKind) {
  return dialog === "open" ? INPUT_FILTERS : OUTPUT_FILTERS;
}

export function findFilter(dialog: DialogKind, id?: string | null): FileFilter {
  const filters = filtersFor(dialog);
  return filters.find((filter) => filter.id === id) ?? filters[0] ?? ALL_FILES;
}

export function extensionOf(name: string) {
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(dot + 1).toLowerCase() : "";
}

export function matchesFilter(name: string, filter: FileFilter) {
  return filter.extensions.length === 0 || filter.extensions.includes(extensionOf(name));
}

export function splitPath(filePath: string) {
  const index = Math.max(filePath.lastIndexOf("/"), filePath.lastIndexOf("\\"));
  if (index < 0) {
    return { directory: "", name: filePath, separator: "/" };
  }
  return {
    directory: filePath.slice(0, index) || filePath.charAt(0),
    name: filePath.slice(index + 1),
    separator: filePath.charAt(index)
  };
}

export function joinPath(directory: string, name: string, separator = "/") {
  if (!directory) {
    return name;
  }
  return directory.endsWith(separator) ? `${directory}${name}` : `${directory}${separator}${name}`;
}

export function stemOf(name: string) {
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(0, dot) : name;
}

/** `<dir>/<stem>_cleaned.mp4` next to the input. */
export function defaultOutputPath(inputPath: string) {
  const { directory, name, separator } = splitPath(inputPath);
  return joinPath(directory, `${stemOf(name)}${OUTPUT_SUFFIX}.mp4`, separator);
}

/** Appends the filter's first extension when the name has none. */
export function ensureExtension(filePath: string, filter: FileFilter) {
  const { name } = splitPath(filePath);
  const [extension] = filter.extensions;
  if (!extension || extensionOf(name)) {
    return filePath;
  }
  return `${filePath}.${extension}`;
}
