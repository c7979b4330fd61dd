// ── Identities ───────────────────────────────────────────

/** A known person from the roster. Identity equality is by `key`. */
export interface AttendeeIdentity {
	/** Canonical key: roster id, or the normalized full name when the roster has none. */
	key: string;
	name: string;
	firstName: string;
	lastName: string;
	/** Grade level or cohort tag, e.g. "6". */
	cohort: string | null;
}

/**
 * Maps a raw attendee label (as typed into the meeting client) to a roster
 * identity. Returns null when no identity can be determined.
 */
export interface IdentityResolver {
	resolve(rawLabel: string, cohort?: string | null): AttendeeIdentity | null;
}

// ── Raw exports ──────────────────────────────────────────

export interface RawAttendeeRow {
	label: string;
	/** Raw per-attendee duration cell, in minutes. */
	minutes: string;
}

/** One export file as read off disk, before identity resolution. */
export interface RawMeetingExport {
	/** Export file name; the "file origin" label maps refer to. */
	origin: string;
	topic: string;
	startTime: string;
	durationMinutes: string;
	rows: RawAttendeeRow[];
}

// ── Meetings ─────────────────────────────────────────────

/** Value identity of a meeting instance. */
export interface MeetingKey {
	topic: string;
	startTime: Date;
}

export function meetingKeyEquals(a: MeetingKey, b: MeetingKey): boolean {
	return a.topic === b.topic && a.startTime.getTime() === b.startTime.getTime();
}

/** Total order on meeting keys: start time first, then topic. */
export function compareMeetingKeys(a: MeetingKey, b: MeetingKey): number {
	const dt = a.startTime.getTime() - b.startTime.getTime();
	if (dt !== 0) return dt;
	if (a.topic === b.topic) return 0;
	return a.topic < b.topic ? -1 : 1;
}

export interface AttendanceRecord extends MeetingKey {
	origin: string;
	durationMinutes: number;
	cohort: string | null;
	/** Resolved attendees keyed by identity key, in order of first appearance. */
	attendees: ReadonlyMap<string, AttendeeIdentity>;
	/** Minutes attended per identity key. Same keys as `attendees`. */
	attendeeMinutes: ReadonlyMap<string, number>;
}

// ── Clusters ─────────────────────────────────────────────

/** Meeting instances believed to be recurrences of the same group meeting. */
export interface MeetingCluster {
	id: string;
	/** Records in arrival order. */
	records: AttendanceRecord[];
}

/** Sparse mapping of export file name to a human-supplied group label. */
export type LabelMap = Record<string, string>;

export interface ClusteringAmbiguity {
	origin: string;
	assignedTo: string;
	/** Later clusters that would also have accepted the record. */
	alsoMatched: string[];
}

export interface ClusterSet {
	clusters: readonly MeetingCluster[];
	labels: Map<string, MeetingCluster>;
	ambiguities: ClusteringAmbiguity[];
}

// ── Diagnostics ──────────────────────────────────────────

export interface SkippedExport {
	origin: string;
	reason: string;
}

export interface UnidentifiedName {
	label: string;
	count: number;
}

// ── Report ───────────────────────────────────────────────

export type AttendanceBucket = "red" | "yellow" | "green";

export interface AttendanceThresholds {
	red: number;
	yellow: number;
	green: number;
}

export type Standing = "top" | "bottom" | null;

export interface StudentAttendance {
	identity: AttendeeIdentity;
	totalMinutes: number;
	meetingsAttended: number;
	clusterIds: string[];
	/** Share of other students with a strictly lower total, 0–1. */
	percentile: number;
	standing: Standing;
}

export interface AttendeeEntry {
	identity: AttendeeIdentity;
	minutes: number;
	bucket: AttendanceBucket | null;
}

export interface MeetingSummary {
	origin: string;
	topic: string;
	/** ISO-8601 start time. */
	startTime: string;
	durationMinutes: number;
	attendeeCount: number;
	/** attendeeCount ÷ the group's historical high. */
	health: number;
	attendees: AttendeeEntry[];
}

export interface ClusterSummary {
	id: string;
	label: string | null;
	topic: string;
	historicalHigh: number;
	averageHealth: number;
	meetings: MeetingSummary[];
}

export interface AttendanceReport {
	generatedAt: string;
	thresholds: AttendanceThresholds;
	clusters: ClusterSummary[];
	students: StudentAttendance[];
	topDecile: string[];
	bottomDecile: string[];
	bestCluster: string | null;
	worstCluster: string | null;
	unidentified: UnidentifiedName[];
	skipped: SkippedExport[];
	ambiguities: ClusteringAmbiguity[];
}
