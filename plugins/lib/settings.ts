import { z } from "zod";
import grepIgnores from "./grep_ignores.json";
import type { EditorAPI } from "./host.ts";

export const SOURCE_KINDS = ["buffers", "files", "projects", "recentf", "dirs"] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

const argv = z.array(z.string().min(1)).min(1);

export const SettingsSchema = z
  .object({
    /** Score candidates as subsequence matches instead of space-separated tokens */
    fuzzyMatch: z.boolean().default(true),
    /** Pre-fill grep prompts with the region or the symbol at point */
    setInputAutomatically: z.boolean().default(true),
    /**
     * "projectile": pass the project layer's ignore lists to search tools;
     * "search-tool": leave ignoring to the tool's own configuration
     */
    ignoreStrategy: z.enum(["projectile", "search-tool"]).default("projectile"),
    maxResults: z.number().int().positive().default(100),
    /** Sources shown by the top-level command inside a project */
    sources: z.array(z.enum(SOURCE_KINDS)).min(1).default(["buffers", "files", "projects"]),
    /** Use `git grep` for grep in git projects */
    useGitGrep: z.boolean().default(false),
    grepTemplate: argv.default(["grep", "-a", "-r", "%e", "-n%cH", "-e", "%p", "%f", "."]),
    ackExecutable: z.string().min(1).default("ack"),
    agBaseCommand: argv.default(["ag", "--nocolor", "--nogroup"]),
    /** Extra ag arguments, placed after the ignore arguments */
    agCommandOptions: z.array(z.string()).default([]),
    rgBaseCommand: argv.default([
      "rg",
      "--no-heading",
      "--line-number",
      "--column",
      "--color=never",
      "--smart-case",
    ]),
    grepFindIgnoredFiles: z.array(z.string()).default(grepIgnores.files),
    grepFindIgnoredDirectories: z.array(z.string()).default(grepIgnores.directories),
    debounceMs: z.number().int().nonnegative().default(150),
    minQueryLength: z.number().int().nonnegative().default(2),
  })
  .strict();

export type Settings = z.infer<typeof SettingsSchema>;

export interface ParsedSettings {
  settings: Settings;
  /** `path: message` for every validation problem; empty when valid */
  issues: string[];
}

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

/**
 * Validate a raw configuration section
 *
 * A missing section (undefined or null) yields the defaults. An invalid
 * one yields the defaults plus the issues.
 */
export function parseSettings(raw: unknown): ParsedSettings {
  const result = SettingsSchema.safeParse(raw ?? {});

  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`
    );
    return { settings: defaultSettings(), issues };
  }

  return { settings: result.data, issues: [] };
}

/**
 * Read and validate the plugin's configuration section from the editor
 *
 * Problems are reported with `editor.warn` and the defaults are used.
 */
export function loadSettings(editor: EditorAPI, overrides?: unknown): Settings {
  const raw = overrides ?? editor.getConfig();
  const { settings, issues } = parseSettings(raw);
  if (issues.length > 0) {
    editor.warn(`[project-finder] Invalid configuration, using defaults: ${issues.join("; ")}`);
  }
  return settings;
}
