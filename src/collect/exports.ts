import { existsSync, readdirSync, readFileSync, statSync } from "fs";
import { join } from "path";
import { debug } from "../log";
import type { RawMeetingExport } from "../types";
import { parseZoomExport } from "./zoom-csv";

/** Editor lock files (~$...) and dotfiles are never exports. */
export function isExportFileName(name: string): boolean {
	if (!name.toLowerCase().endsWith(".csv")) return false;
	return !name.startsWith("~") && !name.startsWith(".");
}

/**
 * List export file names in a directory, sorted lexicographically by
 * code unit. Grouping is order-dependent, so this order is what makes a
 * rerun over the same directory reproducible.
 */
export function listExportFiles(dir: string): string[] {
	if (!existsSync(dir)) {
		throw new Error(`Export directory not found: ${dir}`);
	}
	const names = readdirSync(dir).filter((name) => {
		if (!isExportFileName(name)) {
			debug(`ignoring non-export file ${name}`);
			return false;
		}
		return statSync(join(dir, name)).isFile();
	});
	return names.sort();
}

/** Read and parse one export. Throws FatalParseError for malformed meeting info. */
export function readExport(dir: string, name: string): RawMeetingExport {
	const text = readFileSync(join(dir, name), "utf-8");
	return parseZoomExport(text, name);
}
