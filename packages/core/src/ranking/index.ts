export { BlastRadiusRanker, compareFindings, mergeFindings, type RankOptions } from './ranker';
