import { errorMessage, NotInProjectError } from "./errors.ts";
import { Finder } from "./finder.ts";
import type { CommandArgs, EditorAPI, ProjectAPI } from "./host.ts";
import type { Settings } from "./settings.ts";

/**
 * What every plugin module is installed with
 */
export interface PluginContext {
  editor: EditorAPI;
  projects: ProjectAPI;
  settings: Settings;
  /** Names of registered commands, for uninstall */
  commands: string[];
  finders: Finder[];
}

export function createContext(editor: EditorAPI, projects: ProjectAPI, settings: Settings): PluginContext {
  return { editor, projects, settings, commands: [], finders: [] };
}

export function createFinder(ctx: PluginContext, id: string): Finder {
  const finder = new Finder(ctx.editor, {
    id,
    maxResults: ctx.settings.maxResults,
    fuzzy: ctx.settings.fuzzyMatch,
    debounceMs: ctx.settings.debounceMs,
    minQueryLength: ctx.settings.minQueryLength,
  });
  ctx.finders.push(finder);
  return finder;
}

/**
 * Register a command whose errors end up on the status line
 */
export function defineCommand(
  ctx: PluginContext,
  name: string,
  description: string,
  run: (args: CommandArgs) => void | Promise<void>
): void {
  ctx.editor.registerCommand(
    name,
    description,
    async (args: CommandArgs) => {
      try {
        await run(args);
      } catch (e) {
        ctx.editor.setStatus(errorMessage(e));
        ctx.editor.debug(`[project-finder] ${name} failed: ${errorMessage(e)}`);
      }
    },
    "normal"
  );
  ctx.commands.push(name);
}

/**
 * Directory of the active buffer's file, or the editor's cwd
 */
export function currentDirectory(editor: EditorAPI): string {
  const path = editor.getBufferPath(editor.getActiveBufferId());
  return path ? editor.pathDirname(path) : editor.getCwd();
}

export function currentProjectRoot(ctx: PluginContext): string | null {
  return ctx.projects.projectRoot(currentDirectory(ctx.editor));
}

export function requireProjectRoot(ctx: PluginContext): string {
  const root = currentProjectRoot(ctx);
  if (root === null) {
    throw new NotInProjectError();
  }
  return root;
}

/** Root of the project owning `path`, or the path's directory */
export function rootOf(ctx: PluginContext, path: string): string {
  const dir = path.endsWith("/") ? path : ctx.editor.pathDirname(path);
  return ctx.projects.projectRoot(dir) ?? dir;
}

export function expandRoot(root: string, relative: string): string {
  return root.endsWith("/") ? `${root}${relative}` : `${root}/${relative}`;
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? "s" : ""}`;
}
