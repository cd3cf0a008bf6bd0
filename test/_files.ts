import type { FileAccess } from "../src/options.js";

/** In-memory FileAccess: reads fail for paths never written */
export function createMemoryFiles(
  initial: Record<string, string> = {},
): FileAccess & { files: Map<string, string> } {
  const files = new Map(Object.entries(initial));
  return {
    files,
    readText(path) {
      const text = files.get(path);
      if (text === undefined) throw new Error(`ENOENT: no such file, open '${path}'`);
      return text;
    },
    writeText(path, text) {
      files.set(path, text);
    },
  };
}
