/**
 * End-to-end run: exports → records → groups → report.
 *
 * Strictly sequential. Exports are read in lexicographic file-name order and
 * grouped in that same order; a malformed export is skipped with a reason
 * and never stops the run.
 */

import { buildAttendanceRecord } from "./analyze/record";
import { GroupClusterer, labelMapFromTopics } from "./analyze/groups";
import { assembleReport } from "./analyze/report";
import { listExportFiles, readExport } from "./collect/exports";
import { FatalParseError } from "./errors";
import { debug, info, warn } from "./log";
import { DEFAULT_SETTINGS, type AttendanceDigestSettings } from "./settings/types";
import { validateSettings } from "./settings/validate";
import {
	meetingKeyEquals,
	type AttendanceRecord,
	type AttendanceReport,
	type ClusterSet,
	type IdentityResolver,
	type LabelMap,
	type RawMeetingExport,
	type SkippedExport,
} from "./types";

/** One export waiting to be read. */
export interface ExportSource {
	origin: string;
	load(): RawMeetingExport;
}

export interface RecordCollection {
	records: AttendanceRecord[];
	unresolved: string[];
	skipped: SkippedExport[];
	/** Skipped duplicate export → the collected export of the same meeting. */
	duplicates: Map<string, string>;
}

/**
 * Load and resolve every source in order. FatalParseError marks a source as
 * skipped, as does a second export of a meeting already collected (same
 * topic and start time). Any other error propagates.
 */
export function collectRecords(
	sources: Iterable<ExportSource>,
	resolver: IdentityResolver,
): RecordCollection {
	const records: AttendanceRecord[] = [];
	const unresolved: string[] = [];
	const skipped: SkippedExport[] = [];
	const duplicates = new Map<string, string>();

	for (const source of sources) {
		try {
			const result = buildAttendanceRecord(source.load(), resolver);
			const earlier = records.find((r) => meetingKeyEquals(r, result.record));
			if (earlier) {
				const reason = `duplicate of ${earlier.origin}`;
				warn(`skipping ${source.origin}: ${reason}`);
				skipped.push({ origin: source.origin, reason });
				duplicates.set(source.origin, earlier.origin);
				continue;
			}
			records.push(result.record);
			unresolved.push(...result.unresolved);
			debug(
				`${source.origin}: ${result.record.attendees.size} attendees, ` +
				`${result.unresolved.length} unresolved`
			);
		} catch (e) {
			if (!(e instanceof FatalParseError)) throw e;
			warn(`skipping ${source.origin}: ${e.reason}`);
			skipped.push({ origin: source.origin, reason: e.reason });
		}
	}
	return { records, unresolved, skipped, duplicates };
}

/**
 * Move labels from skipped duplicate exports onto the export that was kept,
 * so a group tagged only through its duplicate keeps its label. An export
 * that already has its own label keeps it.
 */
export function carryDuplicateLabels(labelMap: LabelMap, duplicates: Map<string, string>): LabelMap {
	const carried: LabelMap = { ...labelMap };
	for (const [duplicate, kept] of duplicates) {
		if (!Object.hasOwn(labelMap, duplicate)) continue;
		const label = labelMap[duplicate];
		if (Object.hasOwn(carried, kept)) {
			if (carried[kept] !== label) {
				warn(`label "${label}" on duplicate ${duplicate} ignored; ${kept} is labeled "${carried[kept]}"`);
			}
			continue;
		}
		info(`label "${label}" moved from duplicate ${duplicate} to ${kept}`);
		carried[kept] = label;
	}
	return carried;
}

export function exportSourcesFromDir(dir: string): ExportSource[] {
	return listExportFiles(dir).map((name) => ({
		origin: name,
		load: () => readExport(dir, name),
	}));
}

export interface PipelineOptions {
	sources: Iterable<ExportSource>;
	resolver: IdentityResolver;
	settings?: AttendanceDigestSettings;
	/** Export file name → group label. Takes precedence over trustTopics. */
	labelMap?: LabelMap;
	generatedAt?: Date;
}

export interface PipelineResult {
	records: AttendanceRecord[];
	clusterSet: ClusterSet;
	report: AttendanceReport;
}

export function runAttendancePipeline(options: PipelineOptions): PipelineResult {
	const settings = options.settings ?? DEFAULT_SETTINGS;
	validateSettings(settings);

	const { records, unresolved, skipped, duplicates } = collectRecords(
		options.sources,
		options.resolver,
	);

	const labelMap = options.labelMap
		? carryDuplicateLabels(options.labelMap, duplicates)
		: settings.trustTopics
			? labelMapFromTopics(records)
			: undefined;
	const clusterer = new GroupClusterer({ ratioThreshold: settings.ratioThreshold });
	const clusterSet = clusterer.assignAll(records, labelMap);
	info(
		`${records.length} meetings in ${clusterSet.clusters.length} groups` +
		(skipped.length > 0 ? `, ${skipped.length} skipped` : "")
	);

	const report = assembleReport({
		clusterSet,
		thresholds: settings.attendanceThresholds,
		unresolved,
		skipped,
		generatedAt: options.generatedAt,
	});
	return { records, clusterSet, report };
}
