import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";

// Build by-products that share the `<library>-` prefix but are not executables.
const NON_EXECUTABLE_SUFFIXES = [".d", ".rlib", ".rmeta", ".pdb", ".o"];

/**
 * List compiled test binaries (`<library>-*`) in `dir`, sorted by name.
 * A missing directory yields an empty list.
 */
export async function findTestBinaries(dir: string, libraryName: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw err;
  }

  // Only the library's own unit-test binaries; integration tests under tests/ get no capability grant.
  const prefix = `${libraryName}-`;
  return entries
    .filter((entry) => entry.isFile() && entry.name.startsWith(prefix))
    .filter((entry) => !NON_EXECUTABLE_SUFFIXES.some((suffix) => entry.name.endsWith(suffix)))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}
