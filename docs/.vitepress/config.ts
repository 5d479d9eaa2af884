import { defineConfig } from "vitepress";

export default defineConfig({
  title: "project-finder",
  description: "Multi-source finder commands for projects: files, directories, buffers, recent files, grep.",
  srcDir: ".",
  outDir: "../dist/docs",

  cleanUrls: true,
  lastUpdated: true,
  appearance: "force-dark",
  themeConfig: {
    nav: [
      { text: "Getting Started", link: "/index" },
      { text: "Commands", link: "/commands" },
    ],

    sidebar: [
      {
        items: [{ text: "Getting Started", link: "/index" }],
      },
      {
        text: "User Guide",
        collapsed: false,
        items: [
          { text: "Commands", link: "/commands" },
          { text: "Keybindings", link: "/keybindings" },
          { text: "Configuration", link: "/configuration" },
        ],
      },
      {
        text: "Development",
        collapsed: false,
        items: [{ text: "Writing Sources", link: "/sources" }],
      },
    ],

    outline: { level: "deep" },

    search: { provider: "local" },
  },
});
