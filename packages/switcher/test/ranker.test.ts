import { describe, it, expect } from "vitest";
import { MatchTier, matchTier, rankProjects, recencyRanks } from "../src/ranker.js";

const p = (id: string, name: string) => ({ id, name });
const activated = (...ids: (string | undefined)[]) => ids.map((projectId) => (projectId === undefined ? {} : { projectId }));

describe("recencyRanks", () => {
	it("should keep the first occurrence and skip events without a project", () => {
		const ranks = recencyRanks(activated("b", undefined, "a", "b"));
		expect([...ranks.entries()]).toEqual([["b", 0], ["a", 2]]);
	});
});

describe("matchTier", () => {
	it("should rank name prefix above id prefix above substrings", () => {
		expect(matchTier(p("web-app", "Website"), "web")).toBe(MatchTier.NamePrefix);
		expect(matchTier(p("api-server", "Backend"), "api")).toBe(MatchTier.IdPrefix);
		expect(matchTier(p("x", "My Docs"), "docs")).toBe(MatchTier.NameInfix);
		expect(matchTier(p("team-docs", "Manual"), "docs")).toBe(MatchTier.IdInfix);
		expect(matchTier(p("alpha", "Alpha"), "zzz")).toBeUndefined();
	});

	it("should compare case-insensitively against a lowercased query", () => {
		expect(matchTier(p("alpha", "ALPHA"), "al")).toBe(MatchTier.NamePrefix);
	});
});

describe("rankProjects", () => {
	const a = p("a", "Apple");
	const b = p("b", "Banana");
	const c = p("c", "Cherry");

	it("should order by recency, then config order", () => {
		expect(rankProjects([a, b, c], "", activated("b", "a"))).toEqual([b, a, c]);
	});

	it("should keep config order without history", () => {
		expect(rankProjects([c, a, b], "", [])).toEqual([c, a, b]);
	});

	it("should treat a whitespace query as empty", () => {
		expect(rankProjects([a, b], "  \t ", activated("b"))).toEqual([b, a]);
	});

	it("should filter to matches", () => {
		expect(rankProjects([a, b, c], "ch", activated("b", "a"))).toEqual([c]);
		expect(rankProjects([a, b, c], "xyz", [])).toEqual([]);
	});

	it("should put better tiers first regardless of recency", () => {
		const docs = p("docs", "Docs");
		const myDocs = p("my-docs", "My Docs");
		expect(rankProjects([myDocs, docs], "DOCS", activated("my-docs"))).toEqual([docs, myDocs]);
	});

	it("should break tier ties by recency", () => {
		const app1 = p("app-one", "App One");
		const app2 = p("app-two", "App Two");
		expect(rankProjects([app1, app2], "app", activated("app-two"))).toEqual([app2, app1]);
	});

	it("should not mutate the input", () => {
		const projects = [a, b, c];
		rankProjects(projects, "", activated("c"));
		expect(projects).toEqual([a, b, c]);
	});
});
