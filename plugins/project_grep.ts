/**
 * Project Grep Plugin
 *
 * Project-wide search with grep, git grep, ack, ag or rg. Each command
 * builds its argv from the project's ignore lists and runs it in the
 * project root on every query; the chosen match opens at its location.
 */

import type { Action, ActionList } from "./lib/actions.ts";
import { defineSource, parseGrepOutput, type GrepMatch } from "./lib/finder.ts";
import {
  ackArgs,
  agArgs,
  expandTemplate,
  formatCommand,
  grepArgs,
  grepExcludeArgs,
  grepTemplate,
  isCaseInsensitive,
  rgArgs,
} from "./lib/grep_command.ts";
import { ignoredDirectories, ignoredFiles } from "./lib/ignore.ts";
import { makeKeymap, baseFinderKeymap } from "./lib/keymap.ts";
import {
  createFinder,
  defineCommand,
  expandRoot,
  requireProjectRoot,
  type PluginContext,
} from "./lib/plugin.ts";

/** Matches carry the directory the search ran in */
interface ProjectMatch extends GrepMatch {
  path: string;
}

type SearchTool = "grep" | "ack" | "ag" | "rg";

export const FILE_GREP_TEMPLATE: readonly string[] = ["grep", "-a", "-d", "skip", "%e", "-n%cH", "-e", "%p", "%f"];

export interface GrepCommands {
  /** Search `dir` with its project's ignore lists, or only `files` when given */
  grep(dir: string, files?: string[]): Promise<void>;
  ack(root: string): Promise<void>;
  ag(root: string): Promise<void>;
  rg(root: string): Promise<void>;
}

export function registerGrep(ctx: PluginContext): GrepCommands {
  const { editor, projects, settings } = ctx;

  const finders = {
    grep: createFinder(ctx, "project-grep"),
    ack: createFinder(ctx, "project-ack"),
    ag: createFinder(ctx, "project-ag"),
    rg: createFinder(ctx, "project-rg"),
  };

  const openMatch: Action<ProjectMatch> = (match) => {
    editor.openFile(match.path, match.line, match.column);
    editor.setStatus(`Opened ${match.file}:${match.line}`);
  };

  const openMatchOtherWindow: Action<ProjectMatch> = (match) => {
    editor.openFileInOtherWindow(match.path, match.line, match.column);
  };

  const matchActions: ActionList<ProjectMatch> = [
    ["Find file", openMatch],
    ["Find file other window `C-c o'", openMatchOtherWindow],
  ];

  const matchKeymap = makeKeymap<ProjectMatch>([["C-c o", openMatchOtherWindow]], baseFinderKeymap());

  function initialInput(): string {
    if (!settings.setInputAutomatically) return "";
    return editor.getRegionText() ?? editor.getTextAtCursor();
  }

  function toProjectMatches(dir: string, matches: GrepMatch[]): ProjectMatch[] {
    return matches.map((m) => {
      const file = m.file.startsWith("./") ? m.file.slice(2) : m.file;
      return { ...m, file, path: file.startsWith("/") ? file : expandRoot(dir, file) };
    });
  }

  async function run(
    tool: SearchTool,
    dir: string,
    title: string,
    executable: string,
    argvFor: (query: string) => string[]
  ): Promise<void> {
    await finders[tool].prompt({
      title,
      initialQuery: initialInput(),
      sources: [
        defineSource<ProjectMatch>({
          name: `${tool} in ${dir}`,
          mode: "search",
          tool: executable,
          search: (query) => {
            const argv = argvFor(query);
            editor.debug(`[project-finder] ${formatCommand(argv)}`);
            return editor.spawnProcess(argv[0], argv.slice(1), dir);
          },
          parse: (stdout, limit) => toProjectMatches(dir, parseGrepOutput(stdout, limit)),
          format: (match) => ({
            label: `${match.file}:${match.line}`,
            description:
              match.content.length > 60 ? match.content.substring(0, 57).trim() + "..." : match.content.trim(),
            location: { file: match.path, line: match.line, column: match.column },
          }),
          actions: matchActions,
          keymap: matchKeymap,
          persistentAction: openMatch,
        }),
      ],
    });
  }

  const commands: GrepCommands = {
    grep: (dir, files) => {
      if (files && files.length > 0) {
        return run("grep", dir, "Grep files: ", FILE_GREP_TEMPLATE[0], (query) =>
          expandTemplate(FILE_GREP_TEMPLATE, {
            excludes: grepExcludeArgs(settings.grepFindIgnoredFiles, []),
            files,
            pattern: query,
            ignoreCase: isCaseInsensitive(query),
          })
        );
      }
      const root = projects.projectRoot(dir) ?? dir;
      const vcs = projects.projectVcs(root);
      const ignored = ignoredFiles(projects, root, settings);
      const dirs = ignoredDirectories(projects, root, settings);
      return run("grep", dir, "Grep in project: ", grepTemplate(settings, vcs)[0], (query) =>
        grepArgs(settings, vcs, ignored, dirs, query)
      );
    },
    ack: (root) =>
      run("ack", root, "Ack in project: ", settings.ackExecutable, (query) => ackArgs(settings, projects, root, query)),
    ag: (root) => {
      const files = ignoredFiles(projects, root, settings);
      const dirs = ignoredDirectories(projects, root, settings);
      const dirconfig = projects.dirconfig(root).ignore;
      return run("ag", root, "Ag in project: ", settings.agBaseCommand[0], (query) =>
        agArgs(settings, files, dirs, dirconfig, settings.agCommandOptions, query)
      );
    },
    rg: (root) => {
      const files = ignoredFiles(projects, root, settings);
      const dirs = ignoredDirectories(projects, root, settings);
      return run("rg", root, "Rg in project: ", settings.rgBaseCommand[0], (query) =>
        rgArgs(settings, files, dirs, query)
      );
    },
  };

  defineCommand(ctx, "project_finder_grep", "Grep in the current project", () =>
    commands.grep(requireProjectRoot(ctx))
  );
  defineCommand(ctx, "project_finder_ack", "Ack in the current project", () => commands.ack(requireProjectRoot(ctx)));
  defineCommand(ctx, "project_finder_ag", "Ag in the current project", () => commands.ag(requireProjectRoot(ctx)));
  defineCommand(ctx, "project_finder_rg", "Ripgrep in the current project", () => commands.rg(requireProjectRoot(ctx)));

  return commands;
}
