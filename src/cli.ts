/**
 * cli.ts — Attendance report CLI
 *
 * Groups a directory of Zoom participant reports into recurring meetings and
 * prints an attendance report.
 *
 * Usage:
 *   npx tsx src/cli.ts <exports-dir> --roster <roster.csv> [options]
 *
 * Options:
 *   --roster <file>        Roster CSV (required)
 *   --labels <file>        JSON map of export file name → group label
 *   --config <file>        JSON settings file (see src/settings/types.ts)
 *   --format md|json       Output format (default: md)
 *   --out <file>           Write to file instead of stdout
 *   --trust-topics         Label each group with its meeting topic
 *   --debug                Verbose logging
 */

import { existsSync, writeFileSync } from "fs";
import { resolve } from "path";
import { pathToFileURL } from "url";
import { parseArgs } from "util";

import { loadLabelMap } from "./collect/labels";
import { ConfigurationError } from "./errors";
import { RosterIdentityResolver, loadRoster } from "./identity/roster";
import { error, info, setDebugEnabled } from "./log";
import { exportSourcesFromDir, runAttendancePipeline } from "./pipeline";
import { renderJson, renderMarkdown } from "./render/renderer";
import type { AttendanceDigestSettings } from "./settings/types";
import { loadSettings } from "./settings/validate";

type Format = "md" | "json";

const USAGE = "Usage: attendance-digest <exports-dir> --roster <roster.csv> [--labels <file>] " +
	"[--config <file>] [--format md|json] [--out <file>] [--trust-topics] [--debug]";

function parseFormat(raw: string | undefined): Format {
	if (raw === undefined || raw === "md") return "md";
	if (raw === "json") return "json";
	throw new ConfigurationError(`--format must be "md" or "json", got "${raw}"`);
}

/** Run the CLI and return a process exit code. */
export function main(argv: string[]): number {
	const { values, positionals } = parseArgs({
		args: argv,
		allowPositionals: true,
		options: {
			roster: { type: "string" },
			labels: { type: "string" },
			config: { type: "string" },
			format: { type: "string" },
			out: { type: "string" },
			"trust-topics": { type: "boolean" },
			debug: { type: "boolean" },
		},
	});

	const exportsDir = positionals[0];
	if (!exportsDir || !values.roster) {
		error(USAGE);
		return 2;
	}

	try {
		const overrides: Partial<AttendanceDigestSettings> = {};
		if (values["trust-topics"]) overrides.trustTopics = true;
		if (values.debug) overrides.debugMode = true;
		const settings = loadSettings(values.config, overrides);
		setDebugEnabled(settings.debugMode);
		const format = parseFormat(values.format);
		if (!existsSync(exportsDir)) {
			throw new ConfigurationError(`Export directory not found: ${exportsDir}`);
		}

		const roster = loadRoster(values.roster);
		info(`roster: ${roster.size} members`);
		const resolver = new RosterIdentityResolver(roster, settings.nameOverrides);
		const labelMap = values.labels ? loadLabelMap(values.labels) : undefined;

		const { report } = runAttendancePipeline({
			sources: exportSourcesFromDir(exportsDir),
			resolver,
			settings,
			labelMap,
		});

		const output = format === "json" ? renderJson(report) : renderMarkdown(report);
		if (values.out) {
			writeFileSync(values.out, output + "\n");
			info(`wrote ${resolve(values.out)}`);
		} else {
			process.stdout.write(output + "\n");
		}
		return 0;
	} catch (e) {
		if (e instanceof ConfigurationError) {
			error(`configuration error: ${e.message}`);
			return 1;
		}
		throw e;
	}
}

const invokedDirectly =
	process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
	process.exitCode = main(process.argv.slice(2));
}
