/**
 * Zoom participant-report parser.
 *
 * A report is laid out as two sections separated by a blank line:
 *
 *   Meeting ID,Topic,Start Time,End Time,User Email,Duration (Minutes),Participants
 *   812 3456 7890,Health,09/24/2020 10:13:25 AM,09/24/2020 10:58:02 AM,t@example.org,45,23
 *
 *   Name (Original Name),User Email,Total Duration (Minutes),Guest
 *   Ada Lovelace,,44,Yes
 *
 * Columns are located by header name, not position. A report without the
 * meeting-info section cannot be grouped and raises FatalParseError.
 */

import { parse } from "csv-parse/sync";
import { FatalParseError } from "../errors";
import type { RawAttendeeRow, RawMeetingExport } from "../types";

function findColumn(header: string[], prefix: string): number {
	return header.findIndex((cell) => cell.toLowerCase().startsWith(prefix));
}

function isParticipantHeader(row: string[]): boolean {
	return (row[0] ?? "").toLowerCase().startsWith("name");
}

export function parseCsvRows(text: string, origin: string): string[][] {
	try {
		return parse(text, {
			bom: true,
			relax_column_count: true,
			relax_quotes: true,
			skip_empty_lines: true,
			trim: true,
		});
	} catch (e) {
		throw new FatalParseError(origin, `unreadable CSV: ${e instanceof Error ? e.message : String(e)}`);
	}
}

/** Parse the text of one participant report. */
export function parseZoomExport(text: string, origin: string): RawMeetingExport {
	const rows = parseCsvRows(text, origin);
	const header = rows[0] ?? [];
	const values = rows[1];

	const topicCol = findColumn(header, "topic");
	const startCol = findColumn(header, "start time");
	const durationCol = findColumn(header, "duration");
	if (
		topicCol === -1 ||
		startCol === -1 ||
		durationCol === -1 ||
		!values ||
		isParticipantHeader(values)
	) {
		throw new FatalParseError(origin, "report does not contain meeting information");
	}

	const topic = values[topicCol] ?? "";
	const startTime = values[startCol] ?? "";
	const durationMinutes = values[durationCol] ?? "";
	if (!startTime) throw new FatalParseError(origin, "missing start time");
	if (!durationMinutes) throw new FatalParseError(origin, "missing meeting duration");

	const participantStart = rows.findIndex((row, i) => i >= 2 && isParticipantHeader(row));
	const attendeeRows: RawAttendeeRow[] = [];
	if (participantStart !== -1) {
		const minutesCol = rows[participantStart].findIndex((cell) =>
			cell.toLowerCase().includes("duration")
		);
		for (const row of rows.slice(participantStart + 1)) {
			const label = row[0] ?? "";
			if (!label) continue;
			attendeeRows.push({
				label,
				minutes: minutesCol === -1 ? "" : (row[minutesCol] ?? ""),
			});
		}
	}

	return { origin, topic, startTime, durationMinutes, rows: attendeeRows };
}
