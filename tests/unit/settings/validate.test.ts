import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ConfigurationError } from "../../../src/errors";
import { DEFAULT_SETTINGS } from "../../../src/settings/types";
import {
	coerceSettings,
	loadSettings,
	resolveSettings,
	validateRatioThreshold,
	validateThresholds,
} from "../../../src/settings/validate";

// ── Validation ───────────────────────────────────────────

describe("validateRatioThreshold", () => {
	it("accepts values strictly between 0 and 1", () => {
		expect(() => validateRatioThreshold(0.75)).not.toThrow();
		expect(() => validateRatioThreshold(0.01)).not.toThrow();
	});

	it("rejects the bounds and non-finite values", () => {
		for (const bad of [0, 1, -0.5, 1.5, Number.NaN, Number.POSITIVE_INFINITY]) {
			expect(() => validateRatioThreshold(bad)).toThrow(ConfigurationError);
		}
	});

	it("names the offending value", () => {
		expect(() => validateRatioThreshold(2)).toThrow(
			"ratioThreshold must be a number strictly between 0 and 1, got 2"
		);
	});
});

describe("validateThresholds", () => {
	it("accepts the defaults", () => {
		expect(() => validateThresholds({ red: 0, yellow: 15, green: 30 })).not.toThrow();
	});

	it("rejects thresholds that are not strictly increasing", () => {
		expect(() => validateThresholds({ red: 0, yellow: 30, green: 30 })).toThrow(
			"attendanceThresholds must be strictly increasing (red < yellow < green), got 0/30/30"
		);
	});

	it("rejects negative or fractional minutes", () => {
		expect(() => validateThresholds({ red: -1, yellow: 15, green: 30 })).toThrow(
			"attendanceThresholds.red must be a non-negative integer, got -1"
		);
		expect(() => validateThresholds({ red: 0, yellow: 15.5, green: 30 })).toThrow(ConfigurationError);
	});
});

// ── Coercion ─────────────────────────────────────────────

describe("coerceSettings", () => {
	it("keeps known keys and ignores unknown ones", () => {
		expect(coerceSettings({ ratioThreshold: 0.6, trustTopics: true, color: "blue" })).toEqual({
			ratioThreshold: 0.6,
			trustTopics: true,
		});
	});

	it("reads thresholds and name overrides", () => {
		expect(
			coerceSettings({
				attendanceThresholds: { red: 5, yellow: 20, green: 40 },
				nameOverrides: { "Mom's iPad": "Alan Turing" },
			})
		).toEqual({
			attendanceThresholds: { red: 5, yellow: 20, green: 40 },
			nameOverrides: { "Mom's iPad": "Alan Turing" },
		});
	});

	it("rejects a known key with the wrong type", () => {
		expect(() => coerceSettings({ ratioThreshold: "0.75" })).toThrow("ratioThreshold must be a number");
		expect(() => coerceSettings({ debugMode: "yes" })).toThrow("debugMode must be a boolean");
		expect(() => coerceSettings({ nameOverrides: { a: 1 } })).toThrow('nameOverrides["a"] must be a string');
	});

	it("keeps a __proto__ override as a plain entry", () => {
		const { nameOverrides } = coerceSettings(JSON.parse('{"nameOverrides": {"__proto__": "Alan Turing"}}'));
		expect(Object.getPrototypeOf(nameOverrides)).toBe(Object.prototype);
		expect(Object.entries(nameOverrides ?? {})).toEqual([["__proto__", "Alan Turing"]]);
	});

	it("requires all three threshold colors", () => {
		expect(() => coerceSettings({ attendanceThresholds: { red: 0, green: 30 } })).toThrow(
			"attendanceThresholds.yellow is required and must be a number"
		);
	});

	it("rejects a non-object", () => {
		expect(() => coerceSettings([1, 2])).toThrow("Settings must be a JSON object");
	});
});

// ── Loading ──────────────────────────────────────────────

describe("resolveSettings", () => {
	it("returns the defaults with no overrides", () => {
		expect(resolveSettings()).toEqual(DEFAULT_SETTINGS);
	});

	it("does not mutate the defaults", () => {
		resolveSettings({ ratioThreshold: 0.5 });
		expect(DEFAULT_SETTINGS.ratioThreshold).toBe(0.75);
	});

	it("validates the merged result", () => {
		expect(() => resolveSettings({ ratioThreshold: 1 })).toThrow(ConfigurationError);
	});
});

describe("loadSettings", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "attendance-settings-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("merges the file over the defaults and overrides over the file", () => {
		const path = join(dir, "settings.json");
		writeFileSync(path, JSON.stringify({ ratioThreshold: 0.6, trustTopics: true }));
		const settings = loadSettings(path, { trustTopics: false });
		expect(settings.ratioThreshold).toBe(0.6);
		expect(settings.trustTopics).toBe(false);
		expect(settings.attendanceThresholds).toEqual({ red: 0, yellow: 15, green: 30 });
	});

	it("uses the defaults without a file", () => {
		expect(loadSettings()).toEqual(DEFAULT_SETTINGS);
	});

	it("rejects a missing file", () => {
		const path = join(dir, "missing.json");
		expect(() => loadSettings(path)).toThrow(`Settings file not found: ${path}`);
	});

	it("rejects invalid JSON", () => {
		const path = join(dir, "settings.json");
		writeFileSync(path, "{ ratio: ");
		expect(() => loadSettings(path)).toThrow(ConfigurationError);
	});
});
