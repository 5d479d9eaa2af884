/**
 * Project Buffers Plugin
 */

import type { Action, ActionList } from "./lib/actions.ts";
import { defineSource, getRelativePath, type SourceDefinition } from "./lib/finder.ts";
import type { BufferInfo } from "./lib/host.ts";
import { baseFinderKeymap, makeKeymap } from "./lib/keymap.ts";
import { createFinder, defineCommand, plural, requireProjectRoot, type PluginContext } from "./lib/plugin.ts";

export interface ProjectBuffers {
  source(root: string): SourceDefinition;
  switchToBuffer(root: string): Promise<void>;
}

export function registerProjectBuffers(ctx: PluginContext): ProjectBuffers {
  const { editor, projects } = ctx;
  const finder = createFinder(ctx, "project-buffers");

  const switchTo: Action<BufferInfo> = (buffer) => {
    editor.switchToBuffer(buffer.id);
  };

  const switchToOtherWindow: Action<BufferInfo> = (_buffer, { marked }) => {
    for (const buffer of marked) {
      editor.switchToBufferInOtherWindow(buffer.id);
    }
  };

  const killBuffers: Action<BufferInfo> = (_buffer, { marked }) => {
    for (const buffer of marked) {
      editor.closeBuffer(buffer.id);
    }
    editor.setStatus(`Killed ${plural(marked.length, "buffer")}`);
  };

  const actions: ActionList<BufferInfo> = [
    ["Switch to buffer", switchTo],
    ["Switch to buffer other window `C-c o'", switchToOtherWindow],
    ["Kill buffer(s) `M-D'", killBuffers],
  ];

  const keymap = makeKeymap<BufferInfo>(
    [
      ["C-c o", switchToOtherWindow],
      ["M-D", killBuffers],
    ],
    baseFinderKeymap()
  );

  const source = (root: string): SourceDefinition =>
    defineSource<BufferInfo>({
      name: "Project buffers",
      mode: "filter",
      load: () => {
        const active = editor.getActiveBufferId();
        return projects.projectBuffers(root).filter((buffer) => buffer.id !== active);
      },
      format: (buffer) => ({
        label: buffer.name,
        description: `${buffer.modified ? "[+] " : ""}${buffer.path ? getRelativePath(root, buffer.path) : ""}`,
      }),
      actions,
      keymap,
      persistentAction: switchTo,
    });

  async function switchToBuffer(root: string): Promise<void> {
    await finder.prompt({
      title: `Switch to buffer in ${projects.projectName(root)}: `,
      sources: [source(root)],
    });
  }

  defineCommand(ctx, "project_finder_switch_to_buffer", "Switch to a buffer of the current project", () =>
    switchToBuffer(requireProjectRoot(ctx))
  );

  return { source, switchToBuffer };
}
