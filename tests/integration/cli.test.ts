import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { main } from "../../src/cli";
import { zoomReport } from "../fixtures/meetings";

describe("cli main", () => {
	let root: string;
	let exportsDir: string;
	let rosterPath: string;

	beforeEach(() => {
		root = mkdtempSync(join(tmpdir(), "attendance-cli-"));
		exportsDir = join(root, "exports");
		mkdirSync(exportsDir);
		rosterPath = join(root, "roster.csv");
		writeFileSync(rosterPath, "name,grade\nAda Lovelace,6\nGrace Hopper,6\nAlan Turing,6\nEdsger Dijkstra,7\n");
		writeFileSync(
			join(exportsDir, "6th Health.csv"),
			zoomReport({
				topic: "Health",
				participants: [
					["Ada Lovelace", 40],
					["Grace Hopper", 35],
					["Alan Turing", 10],
				],
			})
		);
		writeFileSync(
			join(exportsDir, "7th Advisory.csv"),
			zoomReport({ topic: "Advisory", participants: [["Edsger Dijkstra", 30]] })
		);
	});

	afterEach(() => {
		rmSync(root, { recursive: true, force: true });
	});

	it("writes a JSON report to --out", () => {
		const out = join(root, "report.json");
		expect(main([exportsDir, "--roster", rosterPath, "--format", "json", "--out", out])).toBe(0);
		const report: unknown = JSON.parse(readFileSync(out, "utf-8"));
		expect(report).toMatchObject({
			clusters: [{ id: "group-1", label: null }, { id: "group-2", label: null }],
			skipped: [],
		});
	});

	it("labels groups by topic with --trust-topics", () => {
		const out = join(root, "report.json");
		main([exportsDir, "--roster", rosterPath, "--format", "json", "--out", out, "--trust-topics"]);
		const report: unknown = JSON.parse(readFileSync(out, "utf-8"));
		expect(report).toMatchObject({
			clusters: [{ label: "Health" }, { label: "Advisory" }],
		});
	});

	it("applies a label file", () => {
		const labels = join(root, "labels.json");
		writeFileSync(labels, JSON.stringify({ "7th Advisory.csv": "Homeroom" }));
		const out = join(root, "report.md");
		expect(main([exportsDir, "--roster", rosterPath, "--labels", labels, "--out", out])).toBe(0);
		expect(readFileSync(out, "utf-8").split("\n")).toContain("## Homeroom (group-2)");
	});

	it("prints markdown to stdout by default", () => {
		const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
		expect(main([exportsDir, "--roster", rosterPath])).toBe(0);
		expect(write).toHaveBeenCalledTimes(1);
		const [text] = write.mock.calls[0];
		expect(String(text).startsWith("# Attendance Report\n")).toBe(true);
	});

	it("exits 2 without an export directory or roster", () => {
		expect(main([])).toBe(2);
		expect(main([exportsDir])).toBe(2);
	});

	it("exits 1 for a missing roster file", () => {
		expect(main([exportsDir, "--roster", join(root, "missing.csv")])).toBe(1);
	});

	it("exits 1 for a missing export directory", () => {
		expect(main([join(root, "nope"), "--roster", rosterPath])).toBe(1);
	});

	it("exits 1 for an unknown format", () => {
		expect(main([exportsDir, "--roster", rosterPath, "--format", "xml"])).toBe(1);
	});

	it("exits 1 for invalid settings", () => {
		const config = join(root, "settings.json");
		writeFileSync(config, JSON.stringify({ ratioThreshold: 2 }));
		expect(main([exportsDir, "--roster", rosterPath, "--config", config])).toBe(1);
	});
});
