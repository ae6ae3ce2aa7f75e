// @workdeck/switcher: Project search and ordering
export { rankProjects, matchTier, recencyRanks, MatchTier } from "./ranker.js";
export type { ActivationEvent, RankableProject } from "./ranker.js";
