/**
 * Project Files Plugin
 *
 * Find files in the current project, in every known project, by the file
 * name at point, or by alternate extension (the "other file"). Marked
 * files can be collected into a directory listing.
 */

import { hackActions, type Action, type ActionList } from "./lib/actions.ts";
import { FinderError } from "./lib/errors.ts";
import { abbreviateHome, defineSource, getRelativePath, type SourceDefinition } from "./lib/finder.ts";
import { union } from "./lib/ignore.ts";
import { baseFinderKeymap, makeKeymap, type Keymap } from "./lib/keymap.ts";
import {
  createFinder,
  defineCommand,
  expandRoot,
  plural,
  requireProjectRoot,
  rootOf,
  type PluginContext,
} from "./lib/plugin.ts";
import type { FileActions } from "./file_actions.ts";
import type { GrepCommands } from "./project_grep.ts";

interface Listing {
  root: string;
  files: string[];
}

export interface ProjectFiles {
  /** Project file actions, spliced from the generic file actions */
  actions: ActionList<string>;
  keymap: Keymap<string>;
  diredFilesNew: Action<string>;
  diredFilesAdd: Action<string>;
  /** "Projectile files" of a project, as absolute paths */
  source(root: string): SourceDefinition;
  findFile(root: string, invalidate?: boolean): Promise<void>;
  findFileDwim(root: string, invalidate?: boolean): Promise<void>;
  findOtherFile(file: string): Promise<void>;
  findFileInKnownProjects(): Promise<void>;
}

export function registerProjectFiles(ctx: PluginContext, fileActions: FileActions, grep: GrepCommands): ProjectFiles {
  const { editor, projects } = ctx;
  const finder = createFinder(ctx, "project-files");
  let listing: Listing | null = null;

  function openListing(root: string, paths: string[], add: boolean): void {
    const relative = paths.map((path) => getRelativePath(root, path));
    const files = add && listing !== null && listing.root === root ? union(listing.files, relative) : union(relative);
    editor.openDirectory(root, files);
    listing = { root, files };
    editor.setStatus(`Dired: ${plural(files.length, "file")}`);
  }

  const switchToProjectShell: Action<string> = (file) => {
    editor.openShell("shell", rootOf(ctx, file));
  };

  const grepProject: Action<string> = (file) => grep.grep(rootOf(ctx, file));

  const diredFilesNew: Action<string> = (file, { marked }) => {
    openListing(rootOf(ctx, file), marked, false);
  };

  const diredFilesAdd: Action<string> = (file, { marked }) => {
    openListing(rootOf(ctx, file), marked, true);
  };

  const findOtherFileOf: Action<string> = (file) => findOtherFile(file);

  const actions = hackActions(
    fileActions.list,
    // Delete
    fileActions.browseProject,
    // Substitute
    [fileActions.switchToShellHere, switchToProjectShell],
    [fileActions.grepFiles, grepProject],
    // Rename
    [fileActions.switchToShellHere, "Switch to shell in project `M-e'"],
    [fileActions.grepFiles, "Grep in projects `C-s'"],
    // Require
    ["Open Dired in project's directory `C-c d'", diredFilesNew],
    ["Add files to Dired buffer `C-c a'", diredFilesAdd],
    ["Find other file `C-c f'", findOtherFileOf]
  );

  const keymap = makeKeymap<string>(
    [
      ["C-c o", fileActions.findFileOtherWindow],
      ["M-e", switchToProjectShell],
      ["C-s", grepProject],
      ["C-c C-x", fileActions.copyPath],
      ["M-D", fileActions.deleteFiles],
      ["C-c d", diredFilesNew],
      ["C-c a", diredFilesAdd],
      ["C-c f", findOtherFileOf],
    ],
    baseFinderKeymap()
  );

  function filesSource(root: string, name: string, load: () => Promise<string[]>): SourceDefinition {
    return defineSource<string>({
      name,
      mode: "filter",
      load: async () => (await load()).map((file) => expandRoot(root, file)),
      format: (file) => ({ label: getRelativePath(root, file) }),
      actions,
      keymap,
      persistentAction: (file) => {
        editor.openFile(file, 0, 0);
      },
    });
  }

  const source = (root: string): SourceDefinition =>
    filesSource(root, "Projectile files", () => projects.projectFiles(root));

  async function findFile(root: string, invalidate = false): Promise<void> {
    if (invalidate) {
      projects.invalidateCache(root);
    }
    await finder.prompt({
      title: `Find file in ${projects.projectName(root)}: `,
      sources: [source(root)],
    });
  }

  async function findFileDwim(root: string, invalidate = false): Promise<void> {
    const atPoint = editor.getTextAtCursor().trim();
    if (atPoint === "") {
      return findFile(root, invalidate);
    }
    if (invalidate) {
      projects.invalidateCache(root);
    }

    const matches = (await projects.projectFiles(root)).filter((file) => file.includes(atPoint));
    if (matches.length === 1) {
      editor.openFile(expandRoot(root, matches[0]), 0, 0);
      editor.setStatus(`Opened ${matches[0]}`);
      return;
    }
    if (matches.length === 0) {
      return findFile(root);
    }
    await finder.prompt({
      title: `Find file in ${projects.projectName(root)}: `,
      sources: [filesSource(root, "Projectile files", async () => matches)],
    });
  }

  async function findOtherFile(file: string): Promise<void> {
    const root = rootOf(ctx, file);
    const files = await projects.projectFiles(root);
    const others = projects.otherFiles(getRelativePath(root, file), files);

    if (others.length === 0) {
      throw new FinderError("No other file found");
    }
    if (others.length === 1) {
      editor.openFile(expandRoot(root, others[0]), 0, 0);
      return;
    }
    await finder.prompt({
      title: "Find other file: ",
      sources: [filesSource(root, "Projectile other files", async () => others)],
    });
  }

  async function findFileInKnownProjects(): Promise<void> {
    const home = editor.getEnv("HOME");
    await finder.prompt({
      title: "Find file in projects: ",
      sources: [
        defineSource<string>({
          name: "Projectile files in known projects",
          mode: "filter",
          load: async () => {
            const all: string[] = [];
            for (const root of projects.knownProjects()) {
              for (const file of await projects.projectFiles(root)) {
                all.push(expandRoot(root, file));
              }
            }
            return all;
          },
          format: (file) => ({ label: abbreviateHome(file, home) }),
          actions: fileActions.list,
          keymap: makeKeymap<string>(
            [
              ["C-c o", fileActions.findFileOtherWindow],
              ["C-s", fileActions.grepFiles],
              ["M-D", fileActions.deleteFiles],
            ],
            baseFinderKeymap()
          ),
        }),
      ],
    });
  }

  defineCommand(ctx, "project_finder_find_file", "Find a file in the current project", (args) =>
    findFile(requireProjectRoot(ctx), args.prefix === true)
  );

  defineCommand(ctx, "project_finder_find_file_dwim", "Find the file at point in the current project", (args) =>
    findFileDwim(requireProjectRoot(ctx), args.prefix === true)
  );

  defineCommand(ctx, "project_finder_find_other_file", "Find files with the same name and another extension", () => {
    requireProjectRoot(ctx);
    const file = editor.getBufferPath(editor.getActiveBufferId());
    if (file === "") {
      throw new FinderError("Buffer is not visiting a file");
    }
    return findOtherFile(file);
  });

  defineCommand(ctx, "project_finder_find_file_in_known_projects", "Find a file in any known project", async () => {
    if (projects.knownProjects().length === 0) {
      throw new FinderError("No known projects");
    }
    await findFileInKnownProjects();
  });

  return {
    actions,
    keymap,
    diredFilesNew,
    diredFilesAdd,
    source,
    findFile,
    findFileDwim,
    findOtherFile,
    findFileInKnownProjects,
  };
}
