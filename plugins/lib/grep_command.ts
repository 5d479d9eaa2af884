/**
 * Search command assembly for grep, git grep, ack, ag and rg
 *
 * Commands are argv templates, one token per argument. Placeholders:
 *
 * - `%e` (whole token): exclude arguments, zero or more
 * - `%f` (whole token): file arguments, zero or more
 * - `%p`: the search pattern
 * - `%c`: "i" for a case-insensitive search, otherwise nothing
 *
 * Tokens that expand to the empty string are dropped.
 */

import type { ProjectAPI, VcsKind } from "./host.ts";
import { relativeIgnored, union } from "./ignore.ts";
import type { Settings } from "./settings.ts";

export const GIT_GREP_TEMPLATE: readonly string[] = [
  "git",
  "--no-pager",
  "grep",
  "--no-color",
  "-n%c",
  "-e",
  "%p",
  "--",
  "%f",
];

export interface TemplateVars {
  excludes: readonly string[];
  files: readonly string[];
  pattern: string;
  ignoreCase: boolean;
}

export function expandTemplate(template: readonly string[], vars: TemplateVars): string[] {
  const argv: string[] = [];
  for (const token of template) {
    if (token === "%e") {
      argv.push(...vars.excludes);
      continue;
    }
    if (token === "%f") {
      argv.push(...vars.files);
      continue;
    }
    const expanded = token.replace(/%[cp]/g, (placeholder) =>
      placeholder === "%c" ? (vars.ignoreCase ? "i" : "") : vars.pattern
    );
    if (expanded !== "") {
      argv.push(expanded);
    }
  }
  return argv;
}

/** Smart case: insensitive unless the pattern has an uppercase letter */
export function isCaseInsensitive(pattern: string): boolean {
  return !/[A-Z]/.test(pattern);
}

export function grepTemplate(settings: Settings, vcs: VcsKind): readonly string[] {
  return settings.useGitGrep && vcs === "git" ? GIT_GREP_TEMPLATE : settings.grepTemplate;
}

export function grepExcludeArgs(files: readonly string[], directories: readonly string[]): string[] {
  return [
    ...files.map((file) => `--exclude=${file}`),
    ...directories.map((dir) => `--exclude-dir=${dir}`),
  ];
}

export function grepArgs(
  settings: Settings,
  vcs: VcsKind,
  ignoredFiles: readonly string[],
  ignoredDirectories: readonly string[],
  pattern: string
): string[] {
  return expandTemplate(grepTemplate(settings, vcs), {
    excludes: grepExcludeArgs(ignoredFiles, ignoredDirectories),
    files: [],
    pattern,
    ignoreCase: isCaseInsensitive(pattern),
  });
}

function lastSegment(path: string): string {
  const trimmed = path.replace(/\/+$/, "");
  return trimmed.slice(trimmed.lastIndexOf("/") + 1);
}

/**
 * ack ignores directories by name and files by root-relative path
 */
export function ackArgs(settings: Settings, projects: ProjectAPI, root: string, pattern: string): string[] {
  const ignores =
    settings.ignoreStrategy === "search-tool"
      ? []
      : union(
          projects.ignoredDirectories(root).map((dir) => `--ignore-dir=${lastSegment(dir)}`),
          relativeIgnored(root, projects.ignoredFiles(root)).map((file) => `--ignore-file=is:${file}`)
        );
  return [
    settings.ackExecutable,
    "-H",
    "--no-group",
    "--no-color",
    ...ignores,
    ...(isCaseInsensitive(pattern) ? ["-i"] : []),
    "--",
    pattern,
  ];
}

export function agArgs(
  settings: Settings,
  ignoredFiles: readonly string[],
  ignoredDirectories: readonly string[],
  dirconfigIgnore: readonly string[],
  options: readonly string[],
  pattern: string
): string[] {
  const ignores = union(ignoredFiles, ignoredDirectories, dirconfigIgnore);
  return [
    ...settings.agBaseCommand,
    ...ignores.flatMap((ignore) => ["--ignore", ignore]),
    ...options,
    "--",
    pattern,
  ];
}

export function rgArgs(
  settings: Settings,
  ignoredFiles: readonly string[],
  ignoredDirectories: readonly string[],
  pattern: string
): string[] {
  const ignores = union(ignoredFiles, ignoredDirectories);
  return [...settings.rgBaseCommand, ...ignores.flatMap((ignore) => ["--glob", `!${ignore}`]), "--", pattern];
}

/**
 * Quote an argv for display and logging as a POSIX shell command line
 */
export function formatCommand(argv: readonly string[]): string {
  return argv
    .map((token) => {
      if (token === "") return "''";
      if (/^[A-Za-z0-9_\-+=.,/:@%]+$/.test(token)) return token;
      return `'${token.replace(/'/g, `'\\''`)}'`;
    })
    .join(" ");
}
