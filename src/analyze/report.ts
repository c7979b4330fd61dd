/**
 * Report assembly — turns a finished ClusterSet and the run's diagnostics
 * into plain data for a renderer.
 *
 * - Per student: total minutes across every group, percentile rank, and
 *   top/bottom decile standing.
 * - Per group: historical high attendance (the representative) and a health
 *   score per meeting = attendees ÷ historical high, meetings in date order. The full size of a
 *   group is never known, so its own best turnout is the baseline.
 * - Unidentified names with counts, skipped exports, and grouping ambiguities
 *   are carried through unchanged.
 */

import { DEFAULT_THRESHOLDS } from "../settings/types";
import {
	compareMeetingKeys,
	type AttendanceBucket,
	type AttendanceRecord,
	type AttendanceReport,
	type AttendanceThresholds,
	type AttendeeEntry,
	type AttendeeIdentity,
	type ClusterSet,
	type ClusterSummary,
	type MeetingCluster,
	type MeetingSummary,
	type SkippedExport,
	type Standing,
	type StudentAttendance,
	type UnidentifiedName,
} from "../types";
import { labelsById, representativeOf } from "./groups";

const TOP_DECILE = 0.9;
const BOTTOM_DECILE = 0.1;

/** Code-unit order, independent of the host locale. */
function compareCodeUnits(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

// ── Buckets ──────────────────────────────────────────────

/**
 * Highest bucket whose threshold the duration meets. Durations below the
 * red threshold get no color.
 */
export function classifyDuration(
	minutes: number,
	thresholds: AttendanceThresholds = DEFAULT_THRESHOLDS,
): AttendanceBucket | null {
	if (minutes >= thresholds.green) return "green";
	if (minutes >= thresholds.yellow) return "yellow";
	if (minutes >= thresholds.red) return "red";
	return null;
}

// ── Percentiles ──────────────────────────────────────────

/**
 * Percent rank of each value: the share of the other values that are
 * strictly lower. A single value ranks 1.
 */
export function percentRanks(values: number[]): number[] {
	const n = values.length;
	if (n === 1) return [1];
	return values.map((v) => values.filter((o) => o < v).length / (n - 1));
}

function standingFor(percentile: number): Standing {
	if (percentile >= TOP_DECILE) return "top";
	if (percentile <= BOTTOM_DECILE) return "bottom";
	return null;
}

// ── Students ─────────────────────────────────────────────

interface StudentTally {
	identity: AttendeeIdentity;
	totalMinutes: number;
	meetingsAttended: number;
	clusterIds: string[];
}

export function summarizeStudents(clusters: readonly MeetingCluster[]): StudentAttendance[] {
	const tallies = new Map<string, StudentTally>();
	for (const cluster of clusters) {
		for (const record of cluster.records) {
			for (const [key, identity] of record.attendees) {
				let tally = tallies.get(key);
				if (!tally) {
					tally = { identity, totalMinutes: 0, meetingsAttended: 0, clusterIds: [] };
					tallies.set(key, tally);
				}
				tally.totalMinutes += record.attendeeMinutes.get(key) ?? 0;
				tally.meetingsAttended++;
				if (!tally.clusterIds.includes(cluster.id)) tally.clusterIds.push(cluster.id);
			}
		}
	}

	const list = [...tallies.values()].sort(
		(a, b) =>
			b.totalMinutes - a.totalMinutes ||
			compareCodeUnits(a.identity.name, b.identity.name) ||
			compareCodeUnits(a.identity.key, b.identity.key)
	);
	const totals = list.map((t) => t.totalMinutes);
	const ranks = percentRanks(totals);
	// Standing is meaningless with one student or when everyone is tied
	const ranked = list.length > 1 && Math.max(...totals) > Math.min(...totals);

	return list.map((t, i) => ({
		...t,
		percentile: ranks[i],
		standing: ranked ? standingFor(ranks[i]) : null,
	}));
}

// ── Groups ───────────────────────────────────────────────

function summarizeMeeting(
	record: AttendanceRecord,
	historicalHigh: number,
	thresholds: AttendanceThresholds,
): MeetingSummary {
	const attendees: AttendeeEntry[] = [];
	for (const [key, identity] of record.attendees) {
		const minutes = record.attendeeMinutes.get(key) ?? 0;
		attendees.push({ identity, minutes, bucket: classifyDuration(minutes, thresholds) });
	}
	return {
		origin: record.origin,
		topic: record.topic,
		startTime: record.startTime.toISOString(),
		durationMinutes: record.durationMinutes,
		attendeeCount: record.attendees.size,
		health: historicalHigh > 0 ? record.attendees.size / historicalHigh : 0,
		attendees,
	};
}

export function summarizeCluster(
	cluster: MeetingCluster,
	label: string | null,
	thresholds: AttendanceThresholds = DEFAULT_THRESHOLDS,
): ClusterSummary {
	const representative = representativeOf(cluster);
	const historicalHigh = representative.attendees.size;
	const meetings = [...cluster.records]
		.sort(compareMeetingKeys)
		.map((r) => summarizeMeeting(r, historicalHigh, thresholds));
	const averageHealth = meetings.reduce((sum, m) => sum + m.health, 0) / meetings.length;
	return {
		id: cluster.id,
		label,
		topic: representative.topic,
		historicalHigh,
		averageHealth,
		meetings,
	};
}

// ── Unidentified names ───────────────────────────────────

export function tallyUnidentified(labels: Iterable<string>): UnidentifiedName[] {
	const counts = new Map<string, number>();
	for (const label of labels) {
		counts.set(label, (counts.get(label) ?? 0) + 1);
	}
	return [...counts.entries()]
		.map(([label, count]) => ({ label, count }))
		.sort((a, b) => b.count - a.count || compareCodeUnits(a.label, b.label));
}

// ── Assembly ─────────────────────────────────────────────

export interface ReportInput {
	clusterSet: ClusterSet;
	thresholds?: AttendanceThresholds;
	/** Every raw label that failed to resolve, once per occurrence. */
	unresolved?: Iterable<string>;
	skipped?: SkippedExport[];
	generatedAt?: Date;
}

export function assembleReport(input: ReportInput): AttendanceReport {
	const thresholds = input.thresholds ?? DEFAULT_THRESHOLDS;
	const { clusters, labels, ambiguities } = input.clusterSet;
	const labelFor = labelsById(labels);

	const clusterSummaries = clusters.map((c) =>
		summarizeCluster(c, labelFor.get(c.id) ?? null, thresholds)
	);
	const students = summarizeStudents(clusters);

	let best: ClusterSummary | null = null;
	let worst: ClusterSummary | null = null;
	for (const summary of clusterSummaries) {
		if (!best || summary.averageHealth > best.averageHealth) best = summary;
		if (!worst || summary.averageHealth < worst.averageHealth) worst = summary;
	}

	return {
		generatedAt: (input.generatedAt ?? new Date()).toISOString(),
		thresholds,
		clusters: clusterSummaries,
		students,
		topDecile: students.filter((s) => s.standing === "top").map((s) => s.identity.key),
		bottomDecile: students.filter((s) => s.standing === "bottom").map((s) => s.identity.key),
		bestCluster: best?.id ?? null,
		worstCluster: worst?.id ?? null,
		unidentified: tallyUnidentified(input.unresolved ?? []),
		skipped: input.skipped ?? [],
		ambiguities,
	};
}
