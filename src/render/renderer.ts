import type {
	AttendanceBucket,
	AttendanceReport,
	AttendeeIdentity,
	ClusterSummary,
	StudentAttendance,
} from "../types";
import { escapeForMarkdown, escapeForTableCell } from "./escape";

const BUCKET_MARKS: Record<AttendanceBucket, string> = {
	green: "\u{1F7E9}",
	yellow: "\u{1F7E8}",
	red: "\u{1F7E5}",
};

const ABSENT = "—";

function pad2(n: number): string {
	return String(n).padStart(2, "0");
}

function formatDate(d: Date): string {
	return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}

function formatDateTime(iso: string): string {
	const d = new Date(iso);
	return `${formatDate(d)} ${pad2(d.getHours())}:${pad2(d.getMinutes())}`;
}

function formatPercent(ratio: number): string {
	return `${Math.round(ratio * 100)}%`;
}

export function formatMinutes(minutes: number, bucket: AttendanceBucket | null): string {
	const rounded = Number.isInteger(minutes) ? String(minutes) : minutes.toFixed(1);
	return bucket ? `${BUCKET_MARKS[bucket]} ${rounded}` : rounded;
}

export function clusterTitle(cluster: ClusterSummary): string {
	return cluster.label ?? (cluster.topic || cluster.id);
}

function renderKey(lines: string[], report: AttendanceReport): void {
	const t = report.thresholds;
	lines.push("## Key");
	lines.push("");
	lines.push(`- ${BUCKET_MARKS.green} Green: attended at least ${t.green} minutes`);
	lines.push(`- ${BUCKET_MARKS.yellow} Yellow: attended at least ${t.yellow} minutes`);
	lines.push(`- ${BUCKET_MARKS.red} Red: attended at least ${t.red} minutes`);
	lines.push("");
}

function renderStudentList(
	lines: string[],
	heading: string,
	keys: string[],
	byKey: Map<string, StudentAttendance>,
): void {
	if (keys.length === 0) return;
	lines.push(`### ${heading}`);
	lines.push("");
	for (const key of keys) {
		const s = byKey.get(key);
		if (!s) continue;
		lines.push(`- ${escapeForMarkdown(s.identity.name)} (${s.totalMinutes} min)`);
	}
	lines.push("");
}

/**
 * Highlights: top and bottom decile, best and worst group by health,
 * unidentified names, skipped exports and ambiguous placements.
 */
function renderHighlights(lines: string[], report: AttendanceReport): void {
	lines.push("## Highlights");
	lines.push("");

	const byKey = new Map(report.students.map((s) => [s.identity.key, s]));
	renderStudentList(lines, "Top 10% attendance", report.topDecile, byKey);
	renderStudentList(lines, "Bottom 10% attendance", report.bottomDecile, byKey);

	const byId = new Map(report.clusters.map((c) => [c.id, c]));
	const best = report.bestCluster ? byId.get(report.bestCluster) : undefined;
	const worst = report.worstCluster ? byId.get(report.worstCluster) : undefined;
	if (best && worst) {
		lines.push("### Groups");
		lines.push("");
		lines.push(
			`- Best attendance: ${escapeForMarkdown(clusterTitle(best))} ` +
			`(${formatPercent(best.averageHealth)} of its high)`
		);
		lines.push(
			`- Worst attendance: ${escapeForMarkdown(clusterTitle(worst))} ` +
			`(${formatPercent(worst.averageHealth)} of its high)`
		);
		lines.push("");
	}

	if (report.unidentified.length > 0) {
		lines.push("### Unidentified names");
		lines.push("");
		lines.push("| Name | Rows |");
		lines.push("| --- | --- |");
		for (const u of report.unidentified) {
			lines.push(`| ${escapeForTableCell(u.label)} | ${u.count} |`);
		}
		lines.push("");
	}

	if (report.skipped.length > 0) {
		lines.push("### Skipped exports");
		lines.push("");
		for (const s of report.skipped) {
			lines.push(`- ${escapeForMarkdown(s.origin)}: ${escapeForMarkdown(s.reason)}`);
		}
		lines.push("");
	}

	if (report.ambiguities.length > 0) {
		lines.push("### Ambiguous placements");
		lines.push("");
		for (const a of report.ambiguities) {
			lines.push(
				`- ${escapeForMarkdown(a.origin)} joined ${a.assignedTo}; ` +
				`also matched ${a.alsoMatched.join(", ")}`
			);
		}
		lines.push("");
	}
}

function renderCluster(lines: string[], cluster: ClusterSummary): void {
	lines.push(`## ${escapeForMarkdown(clusterTitle(cluster))} (${cluster.id})`);
	lines.push("");
	lines.push(
		`Historical high: ${cluster.historicalHigh} attendees · ` +
		`average health ${formatPercent(cluster.averageHealth)}`
	);
	lines.push("");

	lines.push("| Start | Topic | Minutes | Attendees | Health |");
	lines.push("| --- | --- | --- | --- | --- |");
	for (const m of cluster.meetings) {
		lines.push(
			`| ${formatDateTime(m.startTime)} | ${escapeForTableCell(m.topic)} | ` +
			`${m.durationMinutes} | ${m.attendeeCount} | ${formatPercent(m.health)} |`
		);
	}
	lines.push("");

	// Attendee × meeting grid, attendees in order of first appearance
	const people: AttendeeIdentity[] = [];
	const seen = new Set<string>();
	for (const m of cluster.meetings) {
		for (const a of m.attendees) {
			if (seen.has(a.identity.key)) continue;
			seen.add(a.identity.key);
			people.push(a.identity);
		}
	}
	if (people.length === 0) return;

	const columns = cluster.meetings.map((m) => formatDate(new Date(m.startTime)));
	lines.push(`| Attendee | ${columns.join(" | ")} |`);
	lines.push(`| --- | ${columns.map(() => "---").join(" | ")} |`);
	for (const person of people) {
		const cells = cluster.meetings.map((m) => {
			const entry = m.attendees.find((a) => a.identity.key === person.key);
			return entry ? formatMinutes(entry.minutes, entry.bucket) : ABSENT;
		});
		lines.push(`| ${escapeForTableCell(person.name)} | ${cells.join(" | ")} |`);
	}
	lines.push("");
}

export function renderMarkdown(report: AttendanceReport): string {
	const lines: string[] = [];
	lines.push("# Attendance Report");
	lines.push("");
	lines.push(
		`Generated ${formatDateTime(report.generatedAt)} · ` +
		`${report.clusters.length} groups · ${report.students.length} attendees`
	);
	lines.push("");

	renderKey(lines, report);
	renderHighlights(lines, report);
	for (const cluster of report.clusters) {
		renderCluster(lines, cluster);
	}

	return lines.join("\n");
}

/** JSON rendering; identities are kept whole so a consumer needs no roster. */
export function renderJson(report: AttendanceReport): string {
	return JSON.stringify(report, null, 2);
}
