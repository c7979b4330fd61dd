import { existsSync, readFileSync } from "fs";
import { ConfigurationError } from "../errors";
import type { AttendanceThresholds } from "../types";
import { type AttendanceDigestSettings, DEFAULT_SETTINGS } from "./types";

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ── Validation ───────────────────────────────────────────

export function validateRatioThreshold(ratio: number): void {
	if (!Number.isFinite(ratio) || ratio <= 0 || ratio >= 1) {
		throw new ConfigurationError(
			`ratioThreshold must be a number strictly between 0 and 1, got ${ratio}`
		);
	}
}

/** red < yellow < green, all non-negative integers. */
export function validateThresholds(thresholds: AttendanceThresholds): void {
	for (const color of ["red", "yellow", "green"] as const) {
		const v = thresholds[color];
		if (!Number.isInteger(v) || v < 0) {
			throw new ConfigurationError(
				`attendanceThresholds.${color} must be a non-negative integer, got ${v}`
			);
		}
	}
	if (!(thresholds.red < thresholds.yellow && thresholds.yellow < thresholds.green)) {
		throw new ConfigurationError(
			`attendanceThresholds must be strictly increasing (red < yellow < green), got ` +
			`${thresholds.red}/${thresholds.yellow}/${thresholds.green}`
		);
	}
}

export function validateSettings(settings: AttendanceDigestSettings): void {
	validateRatioThreshold(settings.ratioThreshold);
	validateThresholds(settings.attendanceThresholds);
}

// ── Coercion ─────────────────────────────────────────────

function coerceThresholds(raw: unknown): AttendanceThresholds {
	if (!isRecord(raw)) {
		throw new ConfigurationError("attendanceThresholds must be an object with red, yellow and green");
	}
	const out: AttendanceThresholds = { red: 0, yellow: 0, green: 0 };
	for (const color of ["red", "yellow", "green"] as const) {
		const v = raw[color];
		if (typeof v !== "number") {
			throw new ConfigurationError(`attendanceThresholds.${color} is required and must be a number`);
		}
		out[color] = v;
	}
	return out;
}

function coerceOverrides(raw: unknown): Record<string, string> {
	if (!isRecord(raw)) {
		throw new ConfigurationError("nameOverrides must be an object of label → roster name");
	}
	const out: Array<[string, string]> = [];
	for (const [label, name] of Object.entries(raw)) {
		if (typeof name !== "string") {
			throw new ConfigurationError(`nameOverrides["${label}"] must be a string`);
		}
		out.push([label, name]);
	}
	// fromEntries defines own keys, so a label such as "__proto__" stays a plain entry
	return Object.fromEntries(out);
}

/**
 * Narrow parsed JSON into a partial settings object. Unknown keys are
 * ignored; known keys with the wrong type are rejected.
 */
export function coerceSettings(raw: unknown): Partial<AttendanceDigestSettings> {
	if (!isRecord(raw)) {
		throw new ConfigurationError("Settings must be a JSON object");
	}
	const out: Partial<AttendanceDigestSettings> = {};
	if (raw.ratioThreshold !== undefined) {
		if (typeof raw.ratioThreshold !== "number") {
			throw new ConfigurationError("ratioThreshold must be a number");
		}
		out.ratioThreshold = raw.ratioThreshold;
	}
	if (raw.attendanceThresholds !== undefined) {
		out.attendanceThresholds = coerceThresholds(raw.attendanceThresholds);
	}
	if (raw.trustTopics !== undefined) {
		if (typeof raw.trustTopics !== "boolean") {
			throw new ConfigurationError("trustTopics must be a boolean");
		}
		out.trustTopics = raw.trustTopics;
	}
	if (raw.nameOverrides !== undefined) {
		out.nameOverrides = coerceOverrides(raw.nameOverrides);
	}
	if (raw.debugMode !== undefined) {
		if (typeof raw.debugMode !== "boolean") {
			throw new ConfigurationError("debugMode must be a boolean");
		}
		out.debugMode = raw.debugMode;
	}
	return out;
}

// ── Loading ──────────────────────────────────────────────

/** Merge overrides onto DEFAULT_SETTINGS and validate the result. */
export function resolveSettings(
	overrides: Partial<AttendanceDigestSettings> = {},
): AttendanceDigestSettings {
	const settings: AttendanceDigestSettings = Object.assign({}, DEFAULT_SETTINGS, overrides);
	validateSettings(settings);
	return settings;
}

/**
 * Read a JSON settings file (if given) and resolve it against the defaults.
 * Throws ConfigurationError for a missing file, invalid JSON or invalid values.
 */
export function loadSettings(
	path?: string,
	overrides: Partial<AttendanceDigestSettings> = {},
): AttendanceDigestSettings {
	let fromFile: Partial<AttendanceDigestSettings> = {};
	if (path) {
		if (!existsSync(path)) {
			throw new ConfigurationError(`Settings file not found: ${path}`);
		}
		let parsed: unknown;
		try {
			parsed = JSON.parse(readFileSync(path, "utf-8"));
		} catch (e) {
			throw new ConfigurationError(
				`Settings file ${path} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`
			);
		}
		fromFile = coerceSettings(parsed);
	}
	return resolveSettings({ ...fromFile, ...overrides });
}
