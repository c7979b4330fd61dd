import { existsSync, readFileSync } from "fs";
import { ConfigurationError } from "../errors";
import { isRecord } from "../settings/validate";
import type { LabelMap } from "../types";

/**
 * Read a label map: a JSON object of export file name → group label.
 * Only one export per group needs an entry.
 */
export function parseLabelMap(text: string, origin = "label map"): LabelMap {
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (e) {
		throw new ConfigurationError(
			`${origin} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`
		);
	}
	if (!isRecord(parsed)) {
		throw new ConfigurationError(`${origin} must be a JSON object of file name → label`);
	}
	const entries: Array<[string, string]> = [];
	for (const [file, label] of Object.entries(parsed)) {
		if (typeof label !== "string" || label.trim() === "") {
			throw new ConfigurationError(`${origin}: label for "${file}" must be a non-empty string`);
		}
		entries.push([file, label]);
	}
	return Object.fromEntries(entries);
}

export function loadLabelMap(path: string): LabelMap {
	if (!existsSync(path)) {
		throw new ConfigurationError(`Label map not found: ${path}`);
	}
	return parseLabelMap(readFileSync(path, "utf-8"), path);
}
