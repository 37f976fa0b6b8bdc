/**
 * Learning Profile Domain Model
 *
 * The vocabulary the scoring engine speaks: learning styles, traits and
 * interest areas, plus the catalog entries that describe each of them
 * in the student and parent reports.
 *
 * Questionnaire answers map to free-form tags ("persistent", "guided",
 * "example-based"...). Only some tags have a catalog entry; the rest are
 * still counted and ranked but are shown with a humanized name only.
 */

// ============================================
// Learning Styles
// ============================================

export const LEARNING_STYLES = [
  "visual",
  "auditory",
  "kinesthetic",
  "logical",
  "social",
  "independent",
] as const;

export type LearningStyle = (typeof LEARNING_STYLES)[number];

export function isLearningStyle(tag: string): tag is LearningStyle {
  return LEARNING_STYLES.some(style => style === tag);
}

export interface StyleProfile {
  name: string; // e.g. "Visual Learner"
  description: string;
  strategies: string[];
  idealEnvironment: string;
}

// ============================================
// Traits & Interests
// ============================================

export interface TraitProfile {
  name: string; // e.g. "Creative Thinker"
  description: string;
  strengths: string[];
}

export interface InterestProfile {
  name: string; // e.g. "Technology & Computing"
  description: string;
  relatedCareers: string[];
  enrichmentTracks: string[];
}

export interface ProfileCatalog {
  learningStyles: Record<LearningStyle, StyleProfile>;
  traits: Record<string, TraitProfile>;
  interests: Record<string, InterestProfile>;
}

/**
 * Turn a raw tag into a display label.
 * "guidance-seeking" -> "Guidance Seeking", "pattern_recognition" -> "Pattern Recognition"
 */
export function humanizeTag(tag: string): string {
  return tag
    .split(/[-_\s]+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function getTraitName(catalog: ProfileCatalog, trait: string): string {
  return catalog.traits[trait]?.name ?? humanizeTag(trait);
}

export function getInterestName(catalog: ProfileCatalog, interest: string): string {
  return catalog.interests[interest]?.name ?? humanizeTag(interest);
}

export function withArticle(phrase: string): string {
  return /^[aeiou]/i.test(phrase) ? `an ${phrase}` : `a ${phrase}`;
}

/**
 * "a", "a and b", "a, b and c"
 */
export function joinList(items: string[]): string {
  if (items.length <= 1) return items.join("");
  return `${items.slice(0, -1).join(", ")} and ${items[items.length - 1]}`;
}
