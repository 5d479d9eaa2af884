import { getRelativePath } from "./finder.ts";
import type { ProjectAPI } from "./host.ts";
import type { Settings } from "./settings.ts";

/**
 * Order-preserving union, compared by string equality
 */
export function union(...lists: ReadonlyArray<readonly string[]>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const list of lists) {
    for (const item of list) {
      if (!seen.has(item)) {
        seen.add(item);
        result.push(item);
      }
    }
  }
  return result;
}

/**
 * Make ignored paths relative to the project root, without trailing "/"
 *
 * Paths outside the root stay absolute.
 */
export function relativeIgnored(root: string, paths: readonly string[]): string[] {
  return paths.map((path) => {
    const relative = getRelativePath(root, path);
    return relative.length > 1 && relative.endsWith("/") ? relative.slice(0, -1) : relative;
  });
}

/**
 * Files a search in `root` should skip
 */
export function ignoredFiles(projects: ProjectAPI, root: string, settings: Settings): string[] {
  if (settings.ignoreStrategy === "search-tool") {
    return union(settings.grepFindIgnoredFiles);
  }
  return union(
    relativeIgnored(root, projects.ignoredFiles(root)),
    projects.globallyIgnoredFileSuffixes().map((suffix) => `*${suffix}`),
    settings.grepFindIgnoredFiles
  );
}

/**
 * Directories a search in `root` should skip
 */
export function ignoredDirectories(projects: ProjectAPI, root: string, settings: Settings): string[] {
  if (settings.ignoreStrategy === "search-tool") {
    return union(settings.grepFindIgnoredDirectories);
  }
  return union(relativeIgnored(root, projects.ignoredDirectories(root)), settings.grepFindIgnoredDirectories);
}
