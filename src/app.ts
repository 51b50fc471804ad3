#!/usr/bin/env node
import { buildApplication, buildRouteMap, run } from "@stricli/core";
import { runCommand } from "./commands/run/command.js";
import { buildContext } from "./context.js";

const routes = buildRouteMap({
	routes: {
		run: runCommand,
	},
	docs: {
		brief:
			"Summarize new videos from a watch-later playlist into Notion and archive them.",
	},
});

export const app = buildApplication(routes, {
	name: "watchlater-digest",
	versionInfo: {
		currentVersion: "0.1.0",
	},
	scanner: {
		caseStyle: "allow-kebab-for-camel",
	},
});

await run(app, process.argv.slice(2), buildContext(process));
