import { defineConfig } from "vitepress";

export default defineConfig({
	title: "smtp-envelope",
	description: "RFC 5321 envelope grammar for TypeScript",
	themeConfig: {
		nav: [
			{ text: "Guide", link: "/guide/getting-started" },
			{ text: "Reference", link: "/reference/grammar" },
		],
		sidebar: [
			{
				text: "Guide",
				items: [
					{ text: "Getting Started", link: "/guide/getting-started" },
					{ text: "Session adapter", link: "/guide/session-adapter" },
				],
			},
			{
				text: "Reference",
				items: [
					{ text: "Grammar", link: "/reference/grammar" },
					{ text: "Values & formatting", link: "/reference/values" },
					{ text: "Parameters & DSN", link: "/reference/parameters" },
				],
			},
		],
		footer: {
			message: "Released under the MIT License.",
		},
	},
});
