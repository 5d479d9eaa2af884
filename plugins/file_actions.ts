/**
 * Generic file actions
 *
 * The action list every file and directory source starts from. Candidates
 * are absolute paths; directories end in "/". Project sources splice this
 * list with `hackActions` instead of defining their own from scratch.
 */

import type { Action, ActionList } from "./lib/actions.ts";
import { plural, rootOf, type PluginContext } from "./lib/plugin.ts";
import type { GrepCommands } from "./project_grep.ts";

export interface FileActions {
  findFile: Action<string>;
  findFileOtherWindow: Action<string>;
  openFileDirectory: Action<string>;
  switchToShellHere: Action<string>;
  grepFiles: Action<string>;
  copyPath: Action<string>;
  browseProject: Action<string>;
  deleteFiles: Action<string>;
  list: ActionList<string>;
}

export function isDirectory(path: string): boolean {
  return path.endsWith("/");
}

export function createFileActions(ctx: PluginContext, grep: GrepCommands): FileActions {
  const { editor, projects } = ctx;

  const directoryOf = (path: string): string => (isDirectory(path) ? path : editor.pathDirname(path));

  const findFile: Action<string> = (_file, { marked }) => {
    for (const path of marked) {
      if (isDirectory(path)) {
        editor.openDirectory(path);
      } else {
        editor.openFile(path, 0, 0);
      }
    }
    if (marked.length > 1) {
      editor.setStatus(`Opened ${plural(marked.length, "file")}`);
    }
  };

  const findFileOtherWindow: Action<string> = (_file, { marked }) => {
    for (const path of marked) {
      editor.openFileInOtherWindow(path, 0, 0);
    }
  };

  const openFileDirectory: Action<string> = (file) => {
    editor.openDirectory(directoryOf(file));
  };

  const switchToShellHere: Action<string> = (file) => {
    editor.openShell("shell", directoryOf(file));
  };

  const grepFiles: Action<string> = (file, { marked }) =>
    grep.grep(
      directoryOf(file),
      marked.filter((path) => !isDirectory(path))
    );

  const copyPath: Action<string> = (_file, { marked }) => {
    editor.setClipboard(marked.join("\n"));
    editor.setStatus(`Copied ${plural(marked.length, "path")}`);
  };

  const browseProject: Action<string> = (file) => {
    editor.openDirectory(rootOf(ctx, file));
  };

  const deleteFiles: Action<string> = async (_file, { marked }) => {
    const roots = new Set<string>();
    for (const path of marked) {
      await editor.deleteFile(path);
      roots.add(rootOf(ctx, path));
    }
    for (const root of roots) {
      projects.invalidateCache(root);
    }
    editor.setStatus(`Deleted ${plural(marked.length, "file")}`);
  };

  return {
    findFile,
    findFileOtherWindow,
    openFileDirectory,
    switchToShellHere,
    grepFiles,
    copyPath,
    browseProject,
    deleteFiles,
    list: [
      ["Find file", findFile],
      ["Find file other window `C-c o'", findFileOtherWindow],
      ["Open file's directory", openFileDirectory],
      ["Switch to shell here", switchToShellHere],
      ["Grep files `C-s'", grepFiles],
      ["Copy path `C-c C-x'", copyPath],
      ["Browse project", browseProject],
      ["Delete file(s) `M-D'", deleteFiles],
    ],
  };
}
