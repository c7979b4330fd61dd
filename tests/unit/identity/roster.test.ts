import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../../../src/errors";
import {
	Roster,
	RosterIdentityResolver,
	makeIdentity,
	normalizeName,
	parseRosterCsv,
	splitRosterName,
} from "../../../src/identity/roster";
import { coerceSettings } from "../../../src/settings/validate";

// ── Helpers ──────────────────────────────────────────────

function sampleRoster(): Roster {
	return new Roster([
		makeIdentity("Ada", "Lovelace", "6", "s-1"),
		makeIdentity("Grace", "Hopper", "6", "s-2"),
		makeIdentity("Ada", "Byron", "7", "s-3"),
		makeIdentity("Alan", "Turing", "6", "s-4"),
	]);
}

// ── normalizeName ────────────────────────────────────────

describe("normalizeName", () => {
	it("lowercases and collapses whitespace", () => {
		expect(normalizeName("  Ada   LOVELACE ")).toBe("ada lovelace");
	});

	it("treats dots as word separators", () => {
		expect(normalizeName("J.Doe")).toBe("j doe");
	});

	it("drops punctuation and emoji", () => {
		expect(normalizeName("Grace 🙂")).toBe("grace");
		expect(normalizeName("Mom's iPad")).toBe("moms ipad");
	});

	it("keeps accented letters", () => {
		expect(normalizeName("Jos\u00e9 N\u00fa\u00f1ez")).toBe("jos\u00e9 n\u00fa\u00f1ez");
	});
});

// ── splitRosterName ──────────────────────────────────────

describe("splitRosterName", () => {
	it("splits Last, First", () => {
		expect(splitRosterName("Lovelace, Ada")).toEqual({ firstName: "Ada", lastName: "Lovelace" });
	});

	it("splits First Last, keeping every later word in the last name", () => {
		expect(splitRosterName("Ada King Lovelace")).toEqual({ firstName: "Ada", lastName: "King Lovelace" });
	});

	it("accepts a single name", () => {
		expect(splitRosterName("Cher")).toEqual({ firstName: "Cher", lastName: "" });
	});
});

describe("makeIdentity", () => {
	it("keys by id when one is given", () => {
		expect(makeIdentity("Ada", "Lovelace", "6", "s-1").key).toBe("s-1");
	});

	it("keys by normalized name otherwise", () => {
		const ada = makeIdentity("Ada", "Lovelace");
		expect(ada.key).toBe("ada lovelace");
		expect(ada.name).toBe("Ada Lovelace");
		expect(ada.cohort).toBeNull();
	});
});

// ── parseRosterCsv ───────────────────────────────────────

describe("parseRosterCsv", () => {
	it("reads a name column in Last, First form", () => {
		const roster = parseRosterCsv('Student ID,Name,Grade\ns-1,"Lovelace, Ada",6\ns-2,"Hopper, Grace",7\n');
		expect(roster.size).toBe(2);
		expect(roster.members[0]).toEqual({
			key: "s-1",
			name: "Ada Lovelace",
			firstName: "Ada",
			lastName: "Lovelace",
			cohort: "6",
		});
		expect(roster.members[1].cohort).toBe("7");
	});

	it("reads separate first and last name columns", () => {
		const roster = parseRosterCsv("First Name,Last Name\nAda,Lovelace\n");
		expect(roster.members[0].key).toBe("ada lovelace");
		expect(roster.members[0].cohort).toBeNull();
	});

	it("skips rows without a name", () => {
		const roster = parseRosterCsv("name,cohort\nAda Lovelace,6\n,6\n");
		expect(roster.size).toBe(1);
	});

	it("rejects a roster without name columns", () => {
		expect(() => parseRosterCsv("id,grade\n1,6\n", "class.csv")).toThrow(ConfigurationError);
		expect(() => parseRosterCsv("id,grade\n1,6\n", "class.csv")).toThrow(
			'Roster class.csv needs a "name" column or "first name" and "last name" columns'
		);
	});
});

// ── Roster ───────────────────────────────────────────────

describe("Roster", () => {
	it("finds a member by first-last and last-first name", () => {
		const roster = sampleRoster();
		expect(roster.findByName("ada lovelace")?.key).toBe("s-1");
		expect(roster.findByName("lovelace ada")?.key).toBe("s-1");
		expect(roster.findByName("ada")).toBeNull();
	});

	it("filters first-name matches by cohort", () => {
		const roster = sampleRoster();
		expect(roster.withFirstName("ada", null).map((m) => m.key)).toEqual(["s-1", "s-3"]);
		expect(roster.withFirstName("ada", "7").map((m) => m.key)).toEqual(["s-3"]);
	});
});

// ── RosterIdentityResolver ───────────────────────────────

describe("RosterIdentityResolver", () => {
	it("resolves a full name in either order", () => {
		const resolver = new RosterIdentityResolver(sampleRoster());
		expect(resolver.resolve("Ada Lovelace")?.key).toBe("s-1");
		expect(resolver.resolve("LOVELACE, Ada")?.key).toBe("s-1");
	});

	it("resolves a bare first name only when it is unique in the cohort", () => {
		const resolver = new RosterIdentityResolver(sampleRoster());
		expect(resolver.resolve("Ada", "6")?.key).toBe("s-1");
		expect(resolver.resolve("Ada", "7")?.key).toBe("s-3");
		expect(resolver.resolve("Ada")).toBeNull();
	});

	it("finds a unique first name inside a longer label", () => {
		const resolver = new RosterIdentityResolver(sampleRoster());
		expect(resolver.resolve("iPad Grace")?.key).toBe("s-2");
		expect(resolver.resolve("Grace 🙂")?.key).toBe("s-2");
	});

	it("applies name overrides before matching", () => {
		const resolver = new RosterIdentityResolver(sampleRoster(), { "Mom's iPad": "Alan Turing" });
		expect(resolver.resolve("Mom's iPad")?.key).toBe("s-4");
	});

	it("returns null for labels it cannot place", () => {
		const resolver = new RosterIdentityResolver(sampleRoster());
		expect(resolver.resolve("iPad")).toBeNull();
		expect(resolver.resolve("")).toBeNull();
		expect(resolver.resolve("🙂")).toBeNull();
	});

	it("treats object property names as ordinary labels", () => {
		const resolver = new RosterIdentityResolver(sampleRoster(), { "Mom's iPad": "Alan Turing" });
		for (const label of ["toString", "constructor", "hasOwnProperty", "__proto__", "valueOf"]) {
			expect(resolver.resolve(label, "6")).toBeNull();
		}
	});

	it("applies an override keyed by __proto__ from a settings file", () => {
		const { nameOverrides } = coerceSettings(JSON.parse('{"nameOverrides": {"__proto__": "Alan Turing"}}'));
		const resolver = new RosterIdentityResolver(sampleRoster(), nameOverrides);
		expect(resolver.resolve("__proto__")?.key).toBe("s-4");
	});
});
