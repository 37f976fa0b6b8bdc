import { loadCareerCatalog } from "../loaders/catalogLoader";
import { AnalysisResults } from "./analysis";
import { CareerAffinities, CareerCatalog, EducationPaths } from "./career";
import {
  COURSE_CATEGORIES,
  CourseCategory,
  STYLE_CATEGORIES,
  TRAIT_CATEGORIES,
  determinePrimaryCategory,
  isCourseCategory,
} from "./categories";

export const PRIMARY_CAREER_COUNT = 3;
export const SECONDARY_FIELD_COUNT = 2;

export const EDUCATION_PATHS_NOTE =
  "Education paths are just one way to prepare for these careers. Many successful professionals combine formal education with practical experience and self-directed learning.";

export const CAREER_DISCLAIMER =
  "These suggestions are based on your current interests and strengths. Your path may change as you grow and explore new areas. This is meant to inspire, not limit your options.";

/**
 * Related fields to show beside the primary one: other interests first,
 * then the learning style's fields, then those of every top trait.
 * Never empty.
 */
export function determineSecondaryCategories(
  primary: CourseCategory,
  results: AnalysisResults
): CourseCategory[] {
  const categories: CourseCategory[] = [];
  const add = (category: CourseCategory) => {
    if (category !== primary && !categories.includes(category)) {
      categories.push(category);
    }
  };

  results.interests.topInterests.filter(isCourseCategory).forEach(add);
  STYLE_CATEGORIES[results.learningStyles.primary].forEach(add);
  for (const trait of results.traits.topTraits) {
    TRAIT_CATEGORIES[trait]?.forEach(add);
  }

  if (categories.length === 0) {
    const other = COURSE_CATEGORIES.find(c => c !== primary);
    if (other) categories.push(other);
  }
  return categories;
}

function buildEducationPaths(
  catalog: CareerCatalog,
  primary: CourseCategory,
  secondary: CourseCategory | undefined
): EducationPaths {
  const primaryField = catalog[primary];
  const collegeMajors = primaryField.collegeMajors.slice(0, 3);
  const alternativePaths = primaryField.alternativePaths.slice(0, 2);

  if (secondary) {
    collegeMajors.push(...catalog[secondary].collegeMajors.slice(0, 2));
    alternativePaths.push(...catalog[secondary].alternativePaths.slice(0, 1));
  }

  return { collegeMajors, alternativePaths, note: EDUCATION_PATHS_NOTE };
}

/**
 * Suggest career fields and example careers for an analyzed profile.
 */
export function generateCareerAffinities(
  results: AnalysisResults,
  catalog: CareerCatalog = loadCareerCatalog()
): CareerAffinities {
  const primaryCategory = determinePrimaryCategory(
    results.interests.topInterests,
    results.learningStyles.primary,
    results.traits.topTraits
  );
  const secondaryCategories = determineSecondaryCategories(primaryCategory, results);
  const field = catalog[primaryCategory];

  const secondaryCareers = secondaryCategories
    .slice(0, SECONDARY_FIELD_COUNT)
    .flatMap(category => catalog[category].careers.slice(0, 1));

  return {
    primaryCategory,
    primaryField: field.title,
    primaryFieldDescription: field.description,
    primaryCareers: field.careers.slice(0, PRIMARY_CAREER_COUNT),
    secondaryCategories,
    secondaryCareers,
    educationPaths: buildEducationPaths(catalog, primaryCategory, secondaryCategories[0]),
    disclaimer: CAREER_DISCLAIMER,
  };
}
