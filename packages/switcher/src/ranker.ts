/**
 * Project ordering for the switcher.
 *
 * - Empty query: most recently activated first, then config order.
 * - Otherwise: only matching projects, by match tier, then recency, then
 *   config order. Tiers, best first: name prefix, id prefix, name substring,
 *   id substring.
 */

import type { ProjectConfig } from "@workdeck/config";

/** A focus-history event. Only project activations carry a `projectId`. */
export interface ActivationEvent {
	readonly projectId?: string;
}

export type RankableProject = Pick<ProjectConfig, "id" | "name">;

export enum MatchTier {
	NamePrefix = 0,
	IdPrefix = 1,
	NameInfix = 2,
	IdInfix = 3,
}

/** How `project` matches an already lowercased query, or undefined for no match. */
export function matchTier(project: RankableProject, query: string): MatchTier | undefined {
	const name = project.name.toLowerCase();
	const id = project.id.toLowerCase();
	if (name.startsWith(query)) return MatchTier.NamePrefix;
	if (id.startsWith(query)) return MatchTier.IdPrefix;
	if (name.includes(query)) return MatchTier.NameInfix;
	if (id.includes(query)) return MatchTier.IdInfix;
	return undefined;
}

/**
 * Rank of each project id in the history: the index of its first (newest)
 * occurrence.
 */
export function recencyRanks(recentActivations: readonly ActivationEvent[]): Map<string, number> {
	const ranks = new Map<string, number>();
	recentActivations.forEach((event, index) => {
		if (event.projectId !== undefined && !ranks.has(event.projectId)) {
			ranks.set(event.projectId, index);
		}
	});
	return ranks;
}

interface Candidate<P> {
	project: P;
	tier: number;
	recency: number;
	order: number;
}

/**
 * Filter and order `projects` for display.
 *
 * @param recentActivations - Newest first. Projects missing from it sort after
 *   every project that has history.
 */
export function rankProjects<P extends RankableProject>(
	projects: readonly P[],
	query: string,
	recentActivations: readonly ActivationEvent[],
): P[] {
	const ranks = recencyRanks(recentActivations);
	const noHistory = recentActivations.length;
	const normalizedQuery = query.trim().toLowerCase();

	const candidates: Candidate<P>[] = [];
	projects.forEach((project, order) => {
		let tier = 0;
		if (normalizedQuery.length > 0) {
			const match = matchTier(project, normalizedQuery);
			if (match === undefined) return;
			tier = match;
		}
		candidates.push({ project, tier, recency: ranks.get(project.id) ?? noHistory, order });
	});

	candidates.sort((a, b) => a.tier - b.tier || a.recency - b.recency || a.order - b.order);
	return candidates.map((c) => c.project);
}
