import { getCoursesAt } from "../loaders/catalogLoader";
import { AnalysisResults } from "./analysis";
import {
  COURSE_CATEGORIES,
  CourseCategory,
  STYLE_CATEGORIES,
  TRAIT_CATEGORIES,
  determinePrimaryCategory,
  isCourseCategory,
} from "./categories";
import { COURSE_NOT_AVAILABLE, CourseLevel, PathwayCourse, isAgeAppropriate } from "./course";
import { Student } from "./student";

/**
 * Learning Pathway
 *
 * Three steps through the course catalog: entry, intermediate and advanced
 * courses in the student's primary category, with one entry course from a
 * complementary category to start.
 */

export interface FoundationStep {
  title: string;
  description: string;
  primaryCourse: PathwayCourse;
  complementaryCourse: PathwayCourse;
}

export interface PathwayStep {
  title: string;
  description: string;
  course: PathwayCourse;
}

export interface Pathway {
  primaryCategory: CourseCategory;
  secondaryCategory: CourseCategory;
  step1: FoundationStep;
  step2: PathwayStep;
  step3: PathwayStep;
}

/**
 * A category different from the primary one to round out the pathway.
 * Falls back to the primary category only if no other exists.
 */
export function determineSecondaryCategory(
  primary: CourseCategory,
  results: AnalysisResults
): CourseCategory {
  const isOther = (c: CourseCategory) => c !== primary;

  const interest = results.interests.topInterests
    .filter(isCourseCategory)
    .find(isOther);
  if (interest) return interest;

  const styleCategory = STYLE_CATEGORIES[results.learningStyles.primary].find(isOther);
  if (styleCategory) return styleCategory;

  const [topTrait] = results.traits.topTraits;
  const traitCategory = topTrait !== undefined ? TRAIT_CATEGORIES[topTrait]?.find(isOther) : undefined;
  if (traitCategory) return traitCategory;

  return COURSE_CATEGORIES.find(isOther) ?? primary;
}

/**
 * First course at the level that fits the student's age.
 * Without one, the first course at the level; without any, a placeholder.
 */
export function selectCourse(category: CourseCategory, level: CourseLevel, age: number): PathwayCourse {
  const available = getCoursesAt(category, level);
  return (
    available.find(course => isAgeAppropriate(course, age)) ??
    available[0] ??
    COURSE_NOT_AVAILABLE
  );
}

export function generatePathway(student: Pick<Student, "age">, results: AnalysisResults): Pathway {
  const primaryCategory = determinePrimaryCategory(
    results.interests.topInterests,
    results.learningStyles.primary,
    results.traits.topTraits
  );
  const secondaryCategory = determineSecondaryCategory(primaryCategory, results);

  return {
    primaryCategory,
    secondaryCategory,
    step1: {
      title: "Building Your Foundation",
      description: "Start with these courses to build core skills in your areas of interest and strength.",
      primaryCourse: selectCourse(primaryCategory, "entry", student.age),
      complementaryCourse: selectCourse(secondaryCategory, "entry", student.age),
    },
    step2: {
      title: "Expanding Your Skills",
      description: "Once you've mastered the basics, these courses will help you develop more advanced abilities.",
      course: selectCourse(primaryCategory, "intermediate", student.age),
    },
    step3: {
      title: "Specializing Your Expertise",
      description: "These advanced courses will prepare you for real-world applications and future opportunities.",
      course: selectCourse(primaryCategory, "advanced", student.age),
    },
  };
}
