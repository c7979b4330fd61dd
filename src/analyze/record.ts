/**
 * AttendanceRecord construction — turns one raw export into an immutable
 * meeting instance with resolved attendees.
 *
 * Two kinds of failure are kept apart:
 * - malformed meeting metadata (start time, duration) throws FatalParseError
 *   and makes the whole export unusable;
 * - an attendee label the resolver cannot place is returned in `unresolved`
 *   and never interrupts construction.
 */

import { DateTime } from "luxon";
import { FatalParseError } from "../errors";
import type {
	AttendanceRecord,
	AttendeeIdentity,
	IdentityResolver,
	RawMeetingExport,
} from "../types";

/**
 * Zoom writes local 12-hour timestamps with English AM/PM whatever the
 * host locale; seconds and the comma vary by client version.
 */
const START_TIME_FORMATS = [
	"M/d/yyyy h:mm:ss a",
	"M/d/yyyy h:mm a",
	"M/d/yyyy, h:mm:ss a",
	"M/d/yyyy, h:mm a",
];

export interface RecordBuildResult {
	record: AttendanceRecord;
	/** Raw labels that did not resolve, one entry per row. */
	unresolved: string[];
}

/** Parse a 12-hour meeting start time. Returns null when no format fits. */
export function parseMeetingTimestamp(raw: string): Date | null {
	const trimmed = raw.trim().replace(/\s+/g, " ");
	for (const format of START_TIME_FORMATS) {
		const dt = DateTime.fromFormat(trimmed, format, { locale: "en-US" });
		if (dt.isValid) return dt.toJSDate();
	}
	return null;
}

/** Meeting duration: a non-negative integer number of minutes. */
export function parseDurationMinutes(raw: string): number | null {
	const trimmed = raw.trim();
	if (!/^\d+$/.test(trimmed)) return null;
	return Number(trimmed);
}

/** Grade level / cohort from the first character of the export name, when it is a digit. */
export function cohortFromOrigin(origin: string): string | null {
	const first = origin.charAt(0);
	return /\d/.test(first) ? first : null;
}

function parseAttendeeMinutes(raw: string): number {
	const n = Number(raw.trim());
	return raw.trim() !== "" && Number.isFinite(n) && n >= 0 ? n : 0;
}

export function buildAttendanceRecord(
	raw: RawMeetingExport,
	resolver: IdentityResolver,
): RecordBuildResult {
	const startTime = parseMeetingTimestamp(raw.startTime);
	if (!startTime) {
		throw new FatalParseError(raw.origin, `invalid start time "${raw.startTime}"`);
	}
	const durationMinutes = parseDurationMinutes(raw.durationMinutes);
	if (durationMinutes === null) {
		throw new FatalParseError(raw.origin, `invalid meeting duration "${raw.durationMinutes}"`);
	}

	const cohort = cohortFromOrigin(raw.origin);
	const attendees = new Map<string, AttendeeIdentity>();
	const attendeeMinutes = new Map<string, number>();
	const unresolved: string[] = [];

	for (const row of raw.rows) {
		const identity = resolver.resolve(row.label, cohort);
		if (!identity) {
			unresolved.push(row.label);
			continue;
		}
		// Reconnects show up as extra rows for the same person
		const minutes = parseAttendeeMinutes(row.minutes);
		if (!attendees.has(identity.key)) attendees.set(identity.key, identity);
		attendeeMinutes.set(identity.key, (attendeeMinutes.get(identity.key) ?? 0) + minutes);
	}

	const record: AttendanceRecord = Object.freeze({
		origin: raw.origin,
		topic: raw.topic,
		startTime,
		durationMinutes,
		cohort,
		attendees,
		attendeeMinutes,
	});
	return { record, unresolved };
}
