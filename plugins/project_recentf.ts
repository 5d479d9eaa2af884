/**
 * Project Recent Files Plugin
 */

import { defineSource, getRelativePath, type SourceDefinition } from "./lib/finder.ts";
import { createFinder, defineCommand, requireProjectRoot, type PluginContext } from "./lib/plugin.ts";
import type { ProjectFiles } from "./project_files.ts";

export interface ProjectRecentf {
  source(root: string): SourceDefinition;
  recentf(root: string): Promise<void>;
}

/** Recent files under `root`, most recent first, as absolute paths */
export function recentFilesIn(recent: readonly string[], root: string): string[] {
  const prefix = root.endsWith("/") ? root : `${root}/`;
  return recent.filter((file) => file.startsWith(prefix));
}

export function registerProjectRecentf(ctx: PluginContext, files: ProjectFiles): ProjectRecentf {
  const { editor, projects } = ctx;
  const finder = createFinder(ctx, "project-recentf");

  const source = (root: string): SourceDefinition =>
    defineSource<string>({
      name: "Projectile recent files",
      mode: "filter",
      load: () => recentFilesIn(editor.getRecentFiles(), root),
      format: (file) => ({ label: getRelativePath(root, file) }),
      actions: files.actions,
      keymap: files.keymap,
    });

  async function recentf(root: string): Promise<void> {
    await finder.prompt({
      title: `Recent files in ${projects.projectName(root)}: `,
      sources: [source(root)],
    });
  }

  defineCommand(ctx, "project_finder_recentf", "Open a recently visited file of the current project", () =>
    recentf(requireProjectRoot(ctx))
  );

  return { source, recentf };
}
