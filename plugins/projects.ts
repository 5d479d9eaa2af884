/**
 * Projects Plugin
 *
 * Switch between known projects and run project-wide actions on them:
 * open a listing, VC status, shells, grep, compile/test/run, or forget
 * the project. Dirty projects (uncommitted VCS changes) get their own
 * source with VC status as the default action.
 */

import type { Action, ActionContext, ActionList } from "./lib/actions.ts";
import { FinderError } from "./lib/errors.ts";
import { abbreviateHome, defineSource, type SourceDefinition } from "./lib/finder.ts";
import type { DirtyProject } from "./lib/host.ts";
import { baseFinderKeymap, makeKeymap, type KeyBinding, type Keymap } from "./lib/keymap.ts";
import { createFinder, currentProjectRoot, defineCommand, plural, type PluginContext } from "./lib/plugin.ts";
import type { GrepCommands } from "./project_grep.ts";

export interface Projects {
  actions: ActionList<string>;
  keymap: Keymap<string>;
  /** "Projectile projects"; switching invalidates the target's cache when `invalidate` */
  source(invalidate?: boolean): SourceDefinition;
  switchProject(invalidate?: boolean): Promise<void>;
  browseDirtyProjects(): Promise<void>;
}

type ProjectCommand = "compile" | "test" | "run";

/**
 * Run a project action on dirty-project candidates
 */
function onRoot(action: Action<string>): Action<DirtyProject> {
  return (project, context: ActionContext<DirtyProject>) =>
    action(project.root, { ...context, marked: context.marked.map((p) => p.root) });
}

export function registerProjects(ctx: PluginContext, grep: GrepCommands): Projects {
  const { editor, projects } = ctx;
  const finder = createFinder(ctx, "projects");

  const switchToProject =
    (invalidate: boolean): Action<string> =>
    async (root) => {
      if (invalidate) {
        projects.invalidateCache(root);
      }
      await projects.switchProject(root);
    };

  const openDired: Action<string> = (root) => {
    editor.openDirectory(root);
  };

  const openVcStatus: Action<string> = (root) => {
    editor.openVcStatus(root, projects.projectVcs(root));
  };

  const switchToEshell: Action<string> = (root) => {
    editor.openShell("eshell", root);
  };

  const switchToShell: Action<string> = (root) => {
    editor.openShell("shell", root);
  };

  const grepProject: Action<string> = (root) => grep.grep(root);

  const runProjectCommand =
    (kind: ProjectCommand): Action<string> =>
    (root) => {
      const command =
        kind === "compile"
          ? projects.compileCommand(root)
          : kind === "test"
            ? projects.testCommand(root)
            : projects.runCommand(root);
      if (command === "") {
        throw new FinderError(`No ${kind} command for ${projects.projectName(root)}`);
      }
      editor.runCompilation(command, root);
    };

  const compileProject = runProjectCommand("compile");
  const testProject = runProjectCommand("test");
  const runProject = runProjectCommand("run");

  const removeProjects: Action<string> = (_root, { marked }) => {
    for (const root of marked) {
      projects.removeKnownProject(root);
    }
    editor.setStatus(`Removed ${plural(marked.length, "project")}`);
  };

  const projectActions = (invalidate: boolean): ActionList<string> => [
    ["Switch to project", switchToProject(invalidate)],
    ["Open Dired in project's directory `C-d'", openDired],
    ["Open project root in vc-dir or magit `M-g'", openVcStatus],
    ["Switch to Eshell `M-e'", switchToEshell],
    ["Switch to Shell `M-s'", switchToShell],
    ["Grep in projects `C-s'", grepProject],
    ["Compile project `M-c'. With C-u, new compile command", compileProject],
    ["Test project `M-t'.", testProject],
    ["Run project `M-r'.", runProject],
    ["Remove project(s) from project list `M-D'", removeProjects],
  ];

  const bindings: ReadonlyArray<readonly [string, Action<string>]> = [
    ["C-d", openDired],
    ["M-g", openVcStatus],
    ["M-e", switchToEshell],
    ["M-s", switchToShell],
    ["C-s", grepProject],
    ["M-c", compileProject],
    ["M-t", testProject],
    ["M-r", runProject],
    ["M-D", removeProjects],
  ];

  const keymap = makeKeymap<string>(bindings, baseFinderKeymap());

  const home = (): string => editor.getEnv("HOME");

  const actions = projectActions(false);
  const invalidatingActions = projectActions(true);

  const source = (invalidate = false): SourceDefinition =>
    defineSource<string>({
      name: "Projectile projects",
      mode: "filter",
      load: () => (currentProjectRoot(ctx) !== null ? projects.relevantKnownProjects() : projects.knownProjects()),
      format: (root) => ({ label: abbreviateHome(root, home()) }),
      actions: invalidate ? invalidatingActions : actions,
      keymap,
    });

  const dirtyActions: ActionList<DirtyProject> = [
    ["Open project root in vc-dir or magit", onRoot(openVcStatus)],
    ...actions.filter(([, action]) => action !== openVcStatus).map(([d, action]) => [d, onRoot(action)] as const),
  ];

  const dirtyKeymap = makeKeymap<DirtyProject>(
    bindings.map(([key, action]): readonly [string, KeyBinding<DirtyProject>] => [key, onRoot(action)]),
    baseFinderKeymap()
  );

  async function switchProject(invalidate = false): Promise<void> {
    if (projects.knownProjects().length === 0) {
      throw new FinderError("No known projects");
    }
    await finder.prompt({ title: "Switch to project: ", sources: [source(invalidate)] });
  }

  async function browseDirtyProjects(): Promise<void> {
    await finder.prompt({
      title: "Select a project: ",
      sources: [
        defineSource<DirtyProject>({
          name: "Projectile dirty projects",
          mode: "filter",
          load: () => projects.dirtyProjects(),
          format: (project) => ({ label: `${abbreviateHome(project.root, home())}  (${project.status})` }),
          actions: dirtyActions,
          keymap: dirtyKeymap,
        }),
      ],
    });
  }

  defineCommand(ctx, "project_finder_switch_project", "Switch to a known project", (args) =>
    switchProject(args.prefix === true)
  );

  defineCommand(
    ctx,
    "project_finder_browse_dirty_projects",
    "Browse projects with uncommitted changes",
    () => browseDirtyProjects()
  );

  return { actions, keymap, source, switchProject, browseDirtyProjects };
}
