/**
 * Project Directories Plugin
 *
 * Pick a directory of the current project. Directory candidates reuse the
 * generic file actions; "Find file" on a directory opens its listing.
 */

import { hackActions, type Action, type ActionList } from "./lib/actions.ts";
import { defineSource, getRelativePath, type SourceDefinition } from "./lib/finder.ts";
import { baseFinderKeymap, makeKeymap } from "./lib/keymap.ts";
import { createFinder, defineCommand, expandRoot, requireProjectRoot, type PluginContext } from "./lib/plugin.ts";
import type { FileActions } from "./file_actions.ts";
import type { GrepCommands } from "./project_grep.ts";
import type { ProjectFiles } from "./project_files.ts";

export interface ProjectDirs {
  actions: ActionList<string>;
  source(root: string): SourceDefinition;
  findDir(root: string, invalidate?: boolean): Promise<void>;
}

export function registerProjectDirs(
  ctx: PluginContext,
  fileActions: FileActions,
  files: ProjectFiles,
  grep: GrepCommands
): ProjectDirs {
  const { projects } = ctx;
  const finder = createFinder(ctx, "project-dirs");

  const grepInDirectory: Action<string> = (dir) => grep.grep(dir);

  const actions = hackActions(
    fileActions.list,
    fileActions.deleteFiles,
    [fileActions.findFile, "Open Dired"],
    [fileActions.grepFiles, grepInDirectory],
    [fileActions.grepFiles, "Grep in directory `C-s'"],
    ["Open Dired in project's directory `C-c d'", files.diredFilesNew]
  );

  const keymap = makeKeymap<string>(
    [
      ["C-c o", fileActions.findFileOtherWindow],
      ["C-s", grepInDirectory],
      ["C-c C-x", fileActions.copyPath],
      ["C-c d", files.diredFilesNew],
    ],
    baseFinderKeymap()
  );

  const source = (root: string): SourceDefinition =>
    defineSource<string>({
      name: "Projectile directories",
      mode: "filter",
      load: async () => (await projects.projectDirs(root)).map((dir) => expandRoot(root, dir)),
      format: (dir) => ({ label: getRelativePath(root, dir) }),
      actions,
      keymap,
    });

  async function findDir(root: string, invalidate = false): Promise<void> {
    if (invalidate) {
      projects.invalidateCache(root);
    }
    await finder.prompt({
      title: `Find dir in ${projects.projectName(root)}: `,
      sources: [source(root)],
    });
  }

  defineCommand(ctx, "project_finder_find_dir", "Find a directory in the current project", (args) =>
    findDir(requireProjectRoot(ctx), args.prefix === true)
  );

  return { actions, source, findDir };
}
