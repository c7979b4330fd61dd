/**
 * Meeting Grouping — infers which exports are recurrences of the same
 * group meeting from the overlap of their attendee sets.
 *
 * Algorithm (single pass, in arrival order):
 * 1. For each existing group, take its representative: the meeting with the
 *    most attendees so far (ties go to the earliest arrival).
 * 2. union = |P ∪ R|, total = |P| + |R|.
 * 3. The meeting joins the first group, in creation order, for which
 *    total * ratioThreshold > union. First match wins, not best match.
 * 4. Otherwise it starts a new group.
 *
 * With identical attendance union == total / 2, so any ratio above 0.5
 * accepts it; 0.75 tolerates roughly a quarter of the group being absent.
 * Groups are only ever appended to, and a group's representative can change
 * as bigger meetings arrive, so earlier placements are never revisited.
 * Results depend on arrival order.
 */

import { debug, warn } from "../log";
import { validateRatioThreshold } from "../settings/validate";
import type {
	AttendanceRecord,
	ClusterSet,
	ClusteringAmbiguity,
	LabelMap,
	MeetingCluster,
} from "../types";

export const DEFAULT_RATIO_THRESHOLD = 0.75;

// ── Match test ───────────────────────────────────────────

/**
 * The union/total test. A zero total (both meetings empty) never matches,
 * so empty meetings always end up in a group of their own.
 */
export function unionRatioMatches(
	representative: AttendanceRecord,
	candidate: AttendanceRecord,
	ratioThreshold: number = DEFAULT_RATIO_THRESHOLD,
): boolean {
	const p = representative.attendees;
	const r = candidate.attendees;
	const total = p.size + r.size;
	if (total === 0) return false;
	let union = p.size;
	for (const key of r.keys()) {
		if (!p.has(key)) union++;
	}
	return total * ratioThreshold > union;
}

/**
 * The record with the most attendees. Attendee count is only a partial
 * order, so ties are broken by arrival: the earlier record stays.
 */
export function representativeOf(cluster: MeetingCluster): AttendanceRecord {
	let best = cluster.records[0];
	for (const record of cluster.records) {
		if (record.attendees.size > best.attendees.size) best = record;
	}
	return best;
}

// ── Clusterer ────────────────────────────────────────────

export interface GroupClustererOptions {
	/** Range (0, 1). Default 0.75. */
	ratioThreshold?: number;
}

export class GroupClusterer {
	readonly ratioThreshold: number;
	private readonly _clusters: MeetingCluster[] = [];
	private readonly _ambiguities: ClusteringAmbiguity[] = [];

	constructor(options: GroupClustererOptions = {}) {
		const ratio = options.ratioThreshold ?? DEFAULT_RATIO_THRESHOLD;
		validateRatioThreshold(ratio);
		this.ratioThreshold = ratio;
	}

	get clusters(): readonly MeetingCluster[] {
		return this._clusters;
	}

	/** Records that more than one group would have accepted. */
	get ambiguities(): readonly ClusteringAmbiguity[] {
		return this._ambiguities;
	}

	get size(): number {
		return this._clusters.length;
	}

	/**
	 * Place a record into the first matching group, or a new one.
	 * Each record must be assigned exactly once.
	 */
	assign(record: AttendanceRecord): MeetingCluster {
		let match: MeetingCluster | null = null;
		const alsoMatched: string[] = [];

		for (const cluster of this._clusters) {
			if (!unionRatioMatches(representativeOf(cluster), record, this.ratioThreshold)) continue;
			if (match) {
				alsoMatched.push(cluster.id);
			} else {
				match = cluster;
			}
		}

		if (!match) {
			const cluster: MeetingCluster = {
				id: `group-${this._clusters.length + 1}`,
				records: [record],
			};
			this._clusters.push(cluster);
			debug(`${record.origin} starts ${cluster.id}`);
			return cluster;
		}

		match.records.push(record);
		debug(`${record.origin} joins ${match.id}`);
		if (alsoMatched.length > 0) {
			this._ambiguities.push({ origin: record.origin, assignedTo: match.id, alsoMatched });
			debug(`${record.origin} also matched ${alsoMatched.join(", ")}`);
		}
		return match;
	}

	/** Assign every record in order and return the resulting set. */
	assignAll(records: Iterable<AttendanceRecord>, labelMap?: LabelMap): ClusterSet {
		for (const record of records) this.assign(record);
		return this.toClusterSet(labelMap);
	}

	toClusterSet(labelMap?: LabelMap): ClusterSet {
		return {
			clusters: [...this._clusters],
			labels: labelMap ? resolveLabels(this._clusters, labelMap) : new Map(),
			ambiguities: [...this._ambiguities],
		};
	}
}

// ── Labels ───────────────────────────────────────────────

/**
 * Name groups from a sparse map of export file name → label. The first
 * tagged record (in arrival order) names its group; untagged groups are
 * left out. When two groups resolve to the same label the earlier group
 * keeps it.
 */
export function resolveLabels(
	clusters: readonly MeetingCluster[],
	labelMap: LabelMap,
): Map<string, MeetingCluster> {
	const labels = new Map<string, MeetingCluster>();
	for (const cluster of clusters) {
		const tagged = cluster.records.find((r) => Object.hasOwn(labelMap, r.origin));
		if (!tagged) continue;
		const label = labelMap[tagged.origin];
		const existing = labels.get(label);
		if (existing) {
			warn(`label "${label}" already names ${existing.id}; ${cluster.id} stays unlabeled`);
			continue;
		}
		labels.set(label, cluster);
	}
	return labels;
}

/** Treat every meeting's topic as the label of its group. */
export function labelMapFromTopics(records: Iterable<AttendanceRecord>): LabelMap {
	const map: LabelMap = {};
	for (const record of records) {
		if (record.topic) map[record.origin] = record.topic;
	}
	return map;
}

/** Reverse view: group id → label. */
export function labelsById(labels: Map<string, MeetingCluster>): Map<string, string> {
	const byId = new Map<string, string>();
	for (const [label, cluster] of labels) byId.set(cluster.id, label);
	return byId;
}
