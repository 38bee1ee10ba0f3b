import { listFilesRecursive } from "../utils/fs";

/**
 * Substring filter applied to full file paths.
 * Empty `requireAnyOf` / `excludeAnyOf` lists place no constraint.
 */
export interface FileFilter {
  requireAll: readonly string[];
  requireAnyOf?: readonly string[];
  excludeAnyOf?: readonly string[];
}

export function matchesFilter(filePath: string, filter: FileFilter): boolean {
  if (!filter.requireAll.every((token) => filePath.includes(token))) return false;

  const anyOf = filter.requireAnyOf ?? [];
  if (anyOf.length > 0 && !anyOf.some((token) => filePath.includes(token))) return false;

  const excluded = filter.excludeAnyOf ?? [];
  return !excluded.some((token) => filePath.includes(token));
}

/**
 * Lists every regular file under `root` whose path passes `filter`.
 * An empty list is a valid result.
 */
export async function discoverFiles(root: string, filter: FileFilter): Promise<string[]> {
  return listFilesRecursive(root, (filePath) => matchesFilter(filePath, filter));
}
