/**
 * Project Finder
 *
 * Entry point of the plugin set. `install` registers every command with
 * the editor; `project_finder` opens the configured sources in one
 * prompt, and the toggle remaps the project layer's own commands to their
 * finder counterparts.
 *
 * @example
 * ```typescript
 * const finder = install(editor, projects, { sources: ["files", "recentf"] });
 * finder.on();
 * // ...
 * finder.uninstall();
 * ```
 */

import { createFileActions } from "./file_actions.ts";
import type { SourceDefinition } from "./lib/finder.ts";
import type { EditorAPI, ProjectAPI } from "./lib/host.ts";
import { createContext, createFinder, currentProjectRoot, defineCommand, type PluginContext } from "./lib/plugin.ts";
import { loadSettings, type Settings, type SourceKind } from "./lib/settings.ts";
import { registerProjectBuffers } from "./project_buffers.ts";
import { registerProjectDirs } from "./project_dirs.ts";
import { registerProjectFiles } from "./project_files.ts";
import { registerGrep } from "./project_grep.ts";
import { registerProjectRecentf } from "./project_recentf.ts";
import { registerProjects } from "./projects.ts";

/** Project layer command → finder command */
export const COMMAND_REMAPS: ReadonlyArray<readonly [string, string]> = [
  ["projectile-find-file", "project_finder_find_file"],
  ["projectile-find-file-in-known-projects", "project_finder_find_file_in_known_projects"],
  ["projectile-find-file-dwim", "project_finder_find_file_dwim"],
  ["projectile-find-dir", "project_finder_find_dir"],
  ["projectile-find-other-file", "project_finder_find_other_file"],
  ["projectile-switch-project", "project_finder_switch_project"],
  ["projectile-switch-to-buffer", "project_finder_switch_to_buffer"],
  ["projectile-recentf", "project_finder_recentf"],
  ["projectile-grep", "project_finder_grep"],
  ["projectile-ack", "project_finder_ack"],
  ["projectile-ag", "project_finder_ag"],
  ["projectile-ripgrep", "project_finder_rg"],
  ["projectile-browse-dirty-projects", "project_finder_browse_dirty_projects"],
];

const PROJECTILE_SWITCH_ACTION = "projectile-find-file";
const FINDER_SWITCH_ACTION = "project_finder_find_file";

export interface ProjectFinder {
  readonly settings: Settings;
  readonly enabled: boolean;
  /** Remap the project layer's commands when `n > 0`, restore them otherwise */
  toggle(n: number): void;
  on(): void;
  off(): void;
  /** Restore remappings, unregister every command and release the prompts */
  uninstall(): void;
}

/**
 * Install the finder commands
 *
 * @param config - Overrides the editor's configuration section when given
 */
export function install(editor: EditorAPI, projects: ProjectAPI, config?: unknown): ProjectFinder {
  const settings = loadSettings(editor, config);
  const ctx: PluginContext = createContext(editor, projects, settings);

  const grep = registerGrep(ctx);
  const fileActions = createFileActions(ctx, grep);
  const files = registerProjectFiles(ctx, fileActions, grep);
  const dirs = registerProjectDirs(ctx, fileActions, files, grep);
  const buffers = registerProjectBuffers(ctx);
  const recentf = registerProjectRecentf(ctx, files);
  const projectList = registerProjects(ctx, grep);

  const finder = createFinder(ctx, "project-finder");
  let enabled = false;

  function sourceOf(kind: SourceKind, root: string, invalidate: boolean): SourceDefinition {
    switch (kind) {
      case "buffers":
        return buffers.source(root);
      case "files":
        return files.source(root);
      case "projects":
        return projectList.source(invalidate);
      case "recentf":
        return recentf.source(root);
      case "dirs":
        return dirs.source(root);
    }
  }

  defineCommand(ctx, "project_finder", "Find buffers, files and projects", async (args) => {
    const invalidate = args.prefix === true;
    const root = currentProjectRoot(ctx);
    if (root === null) {
      await finder.prompt({ title: "Switch to project: ", sources: [projectList.source(invalidate)] });
      return;
    }
    if (invalidate) {
      projects.invalidateCache(root);
    }
    await finder.prompt({
      title: `${projects.projectName(root)}: `,
      sources: settings.sources.map((kind) => sourceOf(kind, root, invalidate)),
    });
  });

  defineCommand(ctx, "project_finder_resume", "Reopen the last project finder prompt", async () => {
    await finder.resume();
  });

  function toggle(n: number): void {
    if (n > 0) {
      for (const [from, to] of COMMAND_REMAPS) {
        editor.remapCommand(from, to);
      }
      if (projects.switchProjectAction === PROJECTILE_SWITCH_ACTION) {
        projects.switchProjectAction = FINDER_SWITCH_ACTION;
      }
      projects.completionSystem = "finder";
      enabled = true;
    } else {
      for (const [from] of COMMAND_REMAPS) {
        editor.remapCommand(from, null);
      }
      if (projects.switchProjectAction === FINDER_SWITCH_ACTION) {
        projects.switchProjectAction = PROJECTILE_SWITCH_ACTION;
      }
      projects.completionSystem = "default";
      enabled = false;
    }
    editor.debug(`[project-finder] ${enabled ? "enabled" : "disabled"}`);
  }

  const on = (): void => toggle(1);
  const off = (): void => toggle(0);

  defineCommand(ctx, "project_finder_on", "Use the project finder for project commands", () => {
    on();
    editor.setStatus("Project finder enabled");
  });
  defineCommand(ctx, "project_finder_off", "Restore the default project commands", () => {
    off();
    editor.setStatus("Project finder disabled");
  });
  defineCommand(ctx, "project_finder_toggle", "Toggle the project finder", () => {
    toggle(enabled ? 0 : 1);
    editor.setStatus(`Project finder ${enabled ? "enabled" : "disabled"}`);
  });

  return {
    settings,
    get enabled() {
      return enabled;
    },
    toggle,
    on,
    off,
    uninstall() {
      if (enabled) {
        off();
      }
      for (const name of ctx.commands) {
        editor.unregisterCommand(name);
      }
      ctx.commands.length = 0;
      for (const f of ctx.finders) {
        f.dispose();
      }
      ctx.finders.length = 0;
    },
  };
}
