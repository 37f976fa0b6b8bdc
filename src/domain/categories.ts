import { LearningStyle } from "./learningProfile";

/**
 * Course & Career Categories
 *
 * Both the pathway mapper and the career advisor place a student in one
 * primary category and one or more complementary ones. The rules for
 * choosing them live here so the two stay in step.
 */

export const COURSE_CATEGORIES = [
  "tech",
  "arts",
  "entrepreneurship",
  "science",
  "language",
] as const;

export type CourseCategory = (typeof COURSE_CATEGORIES)[number];

export function isCourseCategory(tag: string): tag is CourseCategory {
  return COURSE_CATEGORIES.some(category => category === tag);
}

export const STYLE_CATEGORIES: Record<LearningStyle, CourseCategory[]> = {
  visual: ["arts", "tech"],
  auditory: ["language", "science"],
  kinesthetic: ["tech", "science"],
  logical: ["science", "tech"],
  social: ["entrepreneurship", "language"],
  independent: ["science", "arts"],
};

export const TRAIT_CATEGORIES: Record<string, CourseCategory[]> = {
  creative: ["arts", "language"],
  analytical: ["science", "tech"],
  persistent: ["tech", "science"],
  leadership: ["entrepreneurship", "language"],
  collaborative: ["entrepreneurship", "language"],
  organized: ["science", "entrepreneurship"],
};

export const DEFAULT_CATEGORY: CourseCategory = "tech";

/**
 * Pick the category a student's pathway and career field are built around.
 *
 * Priority: top interest, then the learning style's categories (preferring
 * one the student also listed as a later interest), then the top trait's
 * categories, then the default.
 */
export function determinePrimaryCategory(
  interests: string[],
  learningStyle: LearningStyle | undefined,
  traits: string[]
): CourseCategory {
  const [topInterest, ...laterInterests] = interests;
  if (topInterest && isCourseCategory(topInterest)) {
    return topInterest;
  }

  if (learningStyle) {
    const styleCategories = STYLE_CATEGORIES[learningStyle];
    const matchingInterest = laterInterests.find(
      (interest): interest is CourseCategory =>
        isCourseCategory(interest) && styleCategories.includes(interest)
    );
    return matchingInterest ?? styleCategories[0];
  }

  const traitCategories = traits.length > 0 ? TRAIT_CATEGORIES[traits[0]] : undefined;
  if (traitCategories) {
    return traitCategories[0];
  }

  return DEFAULT_CATEGORY;
}
