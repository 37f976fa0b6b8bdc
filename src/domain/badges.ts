import { loadBadgeCatalog } from "../loaders/catalogLoader";
import { AnalysisResults } from "./analysis";
import { BadgeCatalog, CombinationBadgeKey, LearningBadge, LearningBadges } from "./badge";

/**
 * Combination badges: a learning style or trait paired with an interest.
 * Checked in this order.
 */
interface CombinationRule {
  badge: CombinationBadgeKey;
  matches: (results: AnalysisResults) => boolean;
}

const COMBINATION_RULES: CombinationRule[] = [
  {
    badge: "codeCommander",
    matches: r => r.learningStyles.primary === "logical" && r.interests.topInterests.includes("tech"),
  },
  {
    badge: "designDynamo",
    matches: r => r.learningStyles.primary === "visual" && r.interests.topInterests.includes("arts"),
  },
  {
    badge: "futureCeo",
    matches: r =>
      r.traits.topTraits.includes("leadership") &&
      r.interests.topInterests.includes("entrepreneurship"),
  },
  {
    badge: "innovationArchitect",
    matches: r => r.traits.topTraits.includes("creative") && r.interests.topInterests.includes("tech"),
  },
];

/**
 * Award badges for an analyzed profile.
 *
 * The primary badge always matches the primary learning style. Secondary
 * badges come from the top trait and then the top interest, skipping any
 * tag without a badge.
 */
export function generateLearningBadges(
  results: AnalysisResults,
  catalog: BadgeCatalog = loadBadgeCatalog()
): LearningBadges {
  const primaryBadge = catalog.byTag[results.learningStyles.primary];

  const secondaryBadges: LearningBadge[] = [];
  const [topTrait] = results.traits.topTraits;
  const [topInterest] = results.interests.topInterests;
  for (const tag of [topTrait, topInterest]) {
    const badge = tag !== undefined ? catalog.byTag[tag] : undefined;
    if (badge) {
      secondaryBadges.push(badge);
    }
  }

  const combinationBadges = COMBINATION_RULES
    .filter(rule => rule.matches(results))
    .map(rule => catalog.combinations[rule.badge]);

  return { primaryBadge, secondaryBadges, combinationBadges };
}
