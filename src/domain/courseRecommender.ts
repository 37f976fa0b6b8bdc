import { loadCourseCatalog } from "../loaders/catalogLoader";
import { AnalysisResults } from "./analysis";
import { CourseCategory, isCourseCategory } from "./categories";
import { Course, RecommendedCourse, isAgeAppropriate } from "./course";
import { LearningStyle } from "./learningProfile";
import { Pathway } from "./pathway";
import { Student } from "./student";

/**
 * Course Recommender
 *
 * Scores catalog courses against a student's profile and picks the best fits.
 *
 * Fit score:
 * - +30 when the course suits the primary learning style
 * - +5 for each secondary learning style it suits
 * - +10 / +7 / +4 for the student's 1st / 2nd / 3rd trait
 * - +20 / +15 / +10 when the course category is the 1st / 2nd / 3rd interest
 * - +popularity / 10
 */

export const DEFAULT_RECOMMENDATION_COUNT = 3;

const PRIMARY_STYLE_POINTS = 30;
const SECONDARY_STYLE_POINTS = 5;
const TRAIT_POINTS = [10, 7, 4];
const INTEREST_POINTS = [20, 15, 10];

const STYLE_BENEFITS: Record<LearningStyle, string> = {
  visual: "The visual elements and demonstrations in this course align perfectly with your visual learning style.",
  auditory: "This course includes discussions and verbal explanations that match your auditory learning preference.",
  kinesthetic: "You'll enjoy the hands-on activities in this course that suit your kinesthetic learning style.",
  logical: "The structured approach of this course complements your logical learning style.",
  social: "The collaborative aspects of this course are ideal for your social learning preference.",
  independent: "This course offers opportunities for self-directed learning that match your independent style.",
};

const TRAIT_BENEFITS: Record<string, string> = {
  creative: "Your creative thinking will be an asset in the innovative projects included in this course.",
  analytical: "Your analytical abilities will help you excel in the problem-solving aspects of this course.",
  persistent: "Your persistence will be valuable when tackling the challenging components of this course.",
  leadership: "Your leadership qualities will shine in the group activities included in this course.",
  collaborative: "Your collaborative nature will be beneficial in the team projects within this course.",
  organized: "Your organizational skills will help you manage the various components of this course effectively.",
};

export function calculateFitScore(course: Course, results: AnalysisResults): number {
  let score = 0;

  if (course.learningStyles.includes(results.learningStyles.primary)) {
    score += PRIMARY_STYLE_POINTS;
  }
  for (const style of results.learningStyles.secondary) {
    if (course.learningStyles.includes(style)) {
      score += SECONDARY_STYLE_POINTS;
    }
  }

  results.traits.topTraits.forEach((trait, i) => {
    if (course.traits.includes(trait)) {
      score += TRAIT_POINTS[i] ?? 0;
    }
  });

  const interestRank = results.interests.topInterests.indexOf(course.category);
  if (interestRank >= 0) {
    score += INTEREST_POINTS[interestRank] ?? 0;
  }

  return score + course.popularity / 10;
}

/**
 * Why this course suits the student: the course's own benefits, then a
 * sentence for the learning style and, when known, one for the top trait.
 */
export function personalizeBenefit(course: Course, results: AnalysisResults): string {
  const parts = [course.benefits, STYLE_BENEFITS[results.learningStyles.primary]];
  const [topTrait] = results.traits.topTraits;
  const traitBenefit = topTrait !== undefined ? TRAIT_BENEFITS[topTrait] : undefined;
  if (traitBenefit) {
    parts.push(traitBenefit);
  }
  return parts.join(" ");
}

function candidateCategories(pathway: Pathway, results: AnalysisResults): CourseCategory[] {
  const categories: CourseCategory[] = [pathway.primaryCategory];
  const add = (category: CourseCategory) => {
    if (!categories.includes(category)) categories.push(category);
  };
  add(pathway.secondaryCategory);
  results.interests.topInterests.filter(isCourseCategory).forEach(add);
  return categories;
}

/**
 * Recommend the best-fitting courses for a student.
 *
 * Candidates come from the pathway's categories and the student's other
 * interests. When fewer than `count` candidates exist, the most popular
 * remaining age-appropriate courses fill the list.
 */
export function recommendCourses(
  student: Pick<Student, "age">,
  results: AnalysisResults,
  pathway: Pathway,
  count: number = DEFAULT_RECOMMENDATION_COUNT,
  catalog: Course[] = loadCourseCatalog()
): RecommendedCourse[] {
  const candidates = candidateCategories(pathway, results).flatMap(category =>
    catalog.filter(course => course.category === category)
  );

  const ageAppropriate = candidates.filter(course => isAgeAppropriate(course, student.age));
  const pool = ageAppropriate.length > 0 ? ageAppropriate : candidates;

  const scored = pool
    .map(course => ({ course, fitScore: calculateFitScore(course, results) }))
    .sort((a, b) => b.fitScore - a.fitScore)
    .slice(0, count);

  if (scored.length < count) {
    const chosen = new Set(scored.map(s => s.course.id));
    const extras = catalog
      .filter(course => !chosen.has(course.id) && isAgeAppropriate(course, student.age))
      .sort((a, b) => b.popularity - a.popularity)
      .slice(0, count - scored.length);
    for (const course of extras) {
      scored.push({ course, fitScore: calculateFitScore(course, results) });
    }
  }

  return scored.map(({ course, fitScore }) => ({
    ...course,
    fitScore,
    personalizedBenefit: personalizeBenefit(course, results),
  }));
}
