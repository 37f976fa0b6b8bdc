/**
 * Learning badges are awarded once per analysis, straight from the profile:
 * one for the learning style, up to two for the top trait and interest,
 * and special combination badges for certain style/trait/interest pairs.
 */

export interface LearningBadge {
  icon: string;
  title: string;
  description: string;
}

export type CombinationBadgeKey =
  | "codeCommander"
  | "designDynamo"
  | "futureCeo"
  | "innovationArchitect";

export interface BadgeCatalog {
  byTag: Record<string, LearningBadge>;
  combinations: Record<CombinationBadgeKey, LearningBadge>;
}

export interface LearningBadges {
  primaryBadge: LearningBadge;
  secondaryBadges: LearningBadge[];
  combinationBadges: LearningBadge[];
}
