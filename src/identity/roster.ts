/**
 * Roster of known attendees and the default IdentityResolver built on it.
 *
 * The roster is an explicit value handed to the resolver at construction;
 * nothing here is cached at module level.
 */

import { existsSync, readFileSync } from "fs";
import { basename } from "path";
import { parse } from "csv-parse/sync";
import { ConfigurationError } from "../errors";
import { debug } from "../log";
import type { AttendeeIdentity, IdentityResolver } from "../types";

// ── Name normalization ───────────────────────────────────

/**
 * Lowercase, treat dots as word separators, drop punctuation and emoji,
 * collapse whitespace. "J.Doe 🙂" → "j doe".
 */
export function normalizeName(raw: string): string {
	return raw
		.toLowerCase()
		.replace(/\./g, " ")
		.replace(/ω/g, "")
		.replace(/[^\p{L}\p{N}\s]/gu, "")
		.replace(/\s+/g, " ")
		.trim();
}

/** Split "Last, First" or "First Last" into parts. */
export function splitRosterName(raw: string): { firstName: string; lastName: string } {
	const comma = raw.indexOf(",");
	if (comma !== -1) {
		return {
			lastName: raw.slice(0, comma).trim(),
			firstName: raw.slice(comma + 1).trim(),
		};
	}
	const parts = raw.trim().split(/\s+/);
	if (parts.length === 1) return { firstName: parts[0], lastName: "" };
	return { firstName: parts[0], lastName: parts.slice(1).join(" ") };
}

export function makeIdentity(
	firstName: string,
	lastName: string,
	cohort: string | null = null,
	id?: string,
): AttendeeIdentity {
	const name = lastName ? `${firstName} ${lastName}` : firstName;
	return {
		key: id || normalizeName(name),
		name,
		firstName,
		lastName,
		cohort,
	};
}

// ── Roster ───────────────────────────────────────────────

export class Roster {
	readonly members: readonly AttendeeIdentity[];
	private readonly byName = new Map<string, AttendeeIdentity>();

	constructor(members: AttendeeIdentity[]) {
		this.members = members;
		for (const m of members) {
			const forward = normalizeName(`${m.firstName} ${m.lastName}`);
			const reverse = normalizeName(`${m.lastName} ${m.firstName}`);
			if (!this.byName.has(forward)) this.byName.set(forward, m);
			if (!this.byName.has(reverse)) this.byName.set(reverse, m);
		}
	}

	get size(): number {
		return this.members.length;
	}

	/** Exact match on a normalized "first last" or "last first" name. */
	findByName(normalized: string): AttendeeIdentity | null {
		return this.byName.get(normalized) ?? null;
	}

	/** Members whose normalized first name equals `firstName`, within `cohort` when given. */
	withFirstName(firstName: string, cohort: string | null): AttendeeIdentity[] {
		return this.members.filter(
			(m) =>
				normalizeName(m.firstName) === firstName &&
				(cohort === null || m.cohort === cohort)
		);
	}
}

function findHeader(header: string[], names: string[]): number {
	return header.findIndex((cell) => names.includes(cell.toLowerCase()));
}

/**
 * Parse a roster CSV. The header row must name either a `name` column
 * ("Last, First" or "First Last") or `first name` and `last name` columns.
 * `id` and `cohort`/`grade` columns are optional.
 */
export function parseRosterCsv(text: string, origin = "roster"): Roster {
	let rows: string[][];
	try {
		rows = parse(text, {
			bom: true,
			relax_column_count: true,
			skip_empty_lines: true,
			trim: true,
		});
	} catch (e) {
		throw new ConfigurationError(
			`Roster ${origin} is not valid CSV: ${e instanceof Error ? e.message : String(e)}`
		);
	}
	const header = rows[0] ?? [];
	const idCol = findHeader(header, ["id", "student id"]);
	const nameCol = findHeader(header, ["name", "student name", "full name"]);
	const firstCol = findHeader(header, ["first name", "first"]);
	const lastCol = findHeader(header, ["last name", "last"]);
	const cohortCol = findHeader(header, ["cohort", "grade", "grade level"]);
	if (nameCol === -1 && (firstCol === -1 || lastCol === -1)) {
		throw new ConfigurationError(
			`Roster ${origin} needs a "name" column or "first name" and "last name" columns`
		);
	}

	const members: AttendeeIdentity[] = [];
	for (const row of rows.slice(1)) {
		const split =
			nameCol !== -1
				? splitRosterName(row[nameCol] ?? "")
				: { firstName: row[firstCol] ?? "", lastName: row[lastCol] ?? "" };
		if (!split.firstName) continue;
		const cohort = cohortCol !== -1 ? row[cohortCol] || null : null;
		const id = idCol !== -1 ? row[idCol] : undefined;
		members.push(makeIdentity(split.firstName, split.lastName, cohort, id));
	}
	return new Roster(members);
}

export function loadRoster(path: string): Roster {
	if (!existsSync(path)) {
		throw new ConfigurationError(`Roster file not found: ${path}`);
	}
	return parseRosterCsv(readFileSync(path, "utf-8"), basename(path));
}

// ── Resolver ─────────────────────────────────────────────

export class RosterIdentityResolver implements IdentityResolver {
	constructor(
		private readonly roster: Roster,
		private readonly overrides: Record<string, string> = {},
	) {}

	resolve(rawLabel: string, cohort: string | null = null): AttendeeIdentity | null {
		const label = Object.hasOwn(this.overrides, rawLabel) ? this.overrides[rawLabel] : rawLabel;
		const cleaned = normalizeName(label);
		if (!cleaned) return null;

		const exact = this.roster.findByName(cleaned);
		if (exact) return exact;

		const byFirst = this.uniqueFirstName(cleaned, cohort);
		if (byFirst) return byFirst;

		const parts = cleaned.split(" ");
		if (parts.length < 2) return null;
		for (const part of parts) {
			const match = this.uniqueFirstName(part, cohort);
			if (match) return match;
		}
		return null;
	}

	/**
	 * Process of elimination within a cohort: a bare first name is accepted
	 * only when exactly one member of the cohort carries it.
	 */
	private uniqueFirstName(firstName: string, cohort: string | null): AttendeeIdentity | null {
		const candidates = this.roster.withFirstName(firstName, cohort);
		if (candidates.length === 1) {
			debug(`matched "${firstName}" to ${candidates[0].name} by first name`);
			return candidates[0];
		}
		if (candidates.length > 1) {
			debug(
				`cannot match "${firstName}": ${candidates.length} members` +
				(cohort ? ` of cohort ${cohort}` : "") +
				" share that first name"
			);
		}
		return null;
	}
}
