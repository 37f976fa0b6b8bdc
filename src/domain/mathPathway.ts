import { loadMathCatalog } from "../loaders/catalogLoader";
import { AnalysisResults } from "./analysis";
import { LearningStyle } from "./learningProfile";
import { AgeGroup, getAgeBand } from "./questionnaire";
import { Student } from "./student";

/**
 * Mathematics Pathway
 *
 * A separate track beside the course pathway: Abacus, Vedic or an
 * integrated mix, chosen from the learning style and top traits. The
 * student's age sets the starting level; the journey covers three levels
 * from there, each paired with a course where one fits.
 */

// ============================================
// Types
// ============================================

export type MathPathwayType = "abacus" | "vedic" | "integrated";

const PATHWAY_TYPES: MathPathwayType[] = ["abacus", "vedic", "integrated"];

export interface MathLevel {
  level: string; // "Beginner" | "Intermediate" | "Advanced" | "Expert"
  title: string;
  description: string;
  skills: string[];
  duration: string;
  minAge: number;
  maxAge: number;
  prerequisites: string;
}

export interface MathCertification {
  name: string;
  levels: string[];
  benefits: string;
}

export interface MathCompetition {
  name: string;
  frequency: string;
  eligibility: string;
  description: string;
  // Open to all ages when absent
  minAge?: number;
  maxAge?: number;
}

export interface MathPathwayDefinition {
  title: string;
  description: string;
  summary: string;
  benefits: string[];
  levels: MathLevel[];
  certification: MathCertification;
  competitions: MathCompetition[];
  careerConnections: string[];
}

export interface MathCourse {
  id: string; // e.g. "MATH201"
  title: string;
  description: string;
  pathway: MathPathwayType;
  level: string; // may span levels, e.g. "Intermediate-Advanced"
  minAge: number;
  maxAge: number;
  duration: string;
  keySkills: string[];
  nextCourse: string | null;
}

export interface ContestRecommendation {
  name: string;
  description: string;
  eligibility: string;
  website: string;
  preparation: string;
}

export type PathwayWeights = Record<MathPathwayType, number>;

export interface MathCatalog {
  pathways: Record<MathPathwayType, MathPathwayDefinition>;
  courses: Record<AgeGroup, MathCourse[]>;
  styleWeights: Record<LearningStyle, PathwayWeights>;
  traitWeights: Record<string, PathwayWeights>;
  styleSentences: Record<LearningStyle, string>;
  traitSentences: Record<string, string>;
  mathInterestSentence: string;
  competitionsByAgeGroup: Record<AgeGroup, ContestRecommendation[]>;
}

export interface JourneyStep extends MathLevel {
  course?: MathCourse;
}

export interface MathPathway {
  type: MathPathwayType;
  title: string;
  description: string;
  personalizedDescription: string;
  benefits: string[];
  levelIndex: number;
  journeySteps: JourneyStep[];
  recommendedCourses: MathCourse[];
  certification: MathCertification;
  competitions: MathCompetition[];
  contestRecommendations: ContestRecommendation[];
  careerConnections: string[];
}

export const JOURNEY_LENGTH = 3;
export const MAX_MATH_COURSES = 3;
export const MAX_CONTESTS = 5;

const LEVEL_KEYWORDS = ["beginner", "intermediate", "advanced", "expert"];

// Weights in tenths: primary style 1, secondary styles 0.5, top traits 1 / 0.7 / 0.4
const PRIMARY_STYLE_WEIGHT = 10;
const SECONDARY_STYLE_WEIGHT = 5;
const TRAIT_RANK_WEIGHTS = [10, 7, 4];

const EXTENDED_LEVEL_DESCRIPTION = "Further advancement in mathematical excellence and problem-solving.";

// ============================================
// Selection
// ============================================

/**
 * Score every pathway against the profile. Ties and an all-zero score go
 * to the earlier pathway, with integrated as the default.
 */
export function determineMathPathwayType(
  results: AnalysisResults,
  catalog: MathCatalog = loadMathCatalog()
): MathPathwayType {
  const scores: PathwayWeights = { abacus: 0, vedic: 0, integrated: 0 };
  const add = (weights: PathwayWeights | undefined, factor: number) => {
    if (!weights) return;
    for (const type of PATHWAY_TYPES) {
      scores[type] += weights[type] * factor;
    }
  };

  add(catalog.styleWeights[results.learningStyles.primary], PRIMARY_STYLE_WEIGHT);
  for (const style of results.learningStyles.secondary) {
    add(catalog.styleWeights[style], SECONDARY_STYLE_WEIGHT);
  }
  results.traits.topTraits.slice(0, TRAIT_RANK_WEIGHTS.length).forEach((trait, rank) => {
    add(catalog.traitWeights[trait], TRAIT_RANK_WEIGHTS[rank]);
  });

  let best: MathPathwayType = "integrated";
  let bestScore = 0;
  for (const type of PATHWAY_TYPES) {
    if (scores[type] > bestScore) {
      best = type;
      bestScore = scores[type];
    }
  }
  return best;
}

/**
 * Starting level by age: 0 Beginner (to 8), 1 Intermediate (to 11),
 * 2 Advanced (to 14), 3 Expert.
 */
export function determineLevelIndex(age: number): number {
  if (age <= 8) return 0;
  if (age <= 11) return 1;
  if (age <= 14) return 2;
  return 3;
}

function fitsAge(range: { minAge?: number; maxAge?: number }, age: number): boolean {
  return (range.minAge === undefined || age >= range.minAge) && (range.maxAge === undefined || age <= range.maxAge);
}

/**
 * Courses in the student's age band on the pathway at the starting level.
 * Falls back to the band's integrated courses, then to any course in the
 * band that fits the age.
 */
export function recommendMathCourses(
  age: number,
  type: MathPathwayType,
  levelIndex: number,
  catalog: MathCatalog = loadMathCatalog()
): MathCourse[] {
  const band = catalog.courses[getAgeBand(age)];
  const keyword = LEVEL_KEYWORDS[levelIndex];

  let courses = band.filter(c => c.pathway === type && c.level.toLowerCase().includes(keyword));
  if (courses.length === 0 && type !== "integrated") {
    courses = band.filter(c => c.pathway === "integrated");
  }
  if (courses.length === 0) {
    courses = band.filter(c => fitsAge(c, age));
  }
  return courses.slice(0, MAX_MATH_COURSES);
}

export function personalizeMathDescription(
  type: MathPathwayType,
  results: AnalysisResults,
  catalog: MathCatalog = loadMathCatalog()
): string {
  const sentences = [catalog.pathways[type].summary];

  const styleSentence = catalog.styleSentences[results.learningStyles.primary];
  if (styleSentence) sentences.push(styleSentence);

  const topTrait = results.traits.topTraits[0];
  const traitSentence = topTrait ? catalog.traitSentences[topTrait] : undefined;
  if (traitSentence) sentences.push(traitSentence);

  if (results.interests.topInterests.includes("math")) {
    sentences.push(catalog.mathInterestSentence);
  }
  return sentences.join(" ");
}

/**
 * Three levels from the starting level. When the pathway runs out of
 * levels, the last one is repeated as an extended step.
 */
export function buildJourneySteps(
  type: MathPathwayType,
  levelIndex: number,
  courses: MathCourse[],
  catalog: MathCatalog = loadMathCatalog()
): JourneyStep[] {
  const levels = catalog.pathways[type].levels.slice(levelIndex, levelIndex + JOURNEY_LENGTH);

  const base = levels[levels.length - 1];
  for (let extension = 1; base && levels.length < JOURNEY_LENGTH; extension++) {
    const suffix = extension === 1 ? "(Advanced)" : `(Advanced ${extension})`;
    levels.push({ ...base, title: `${base.title} ${suffix}`, description: EXTENDED_LEVEL_DESCRIPTION });
  }

  return levels.map((level, index) => {
    const course = courses.find(c => level.level.toLowerCase().includes(c.level.toLowerCase())) ?? courses[index];
    return course ? { ...level, course } : { ...level };
  });
}

/**
 * Contests for the student: the pathway's own competitions open to their
 * age, then the general contests for their age band.
 */
export function recommendContests(
  type: MathPathwayType,
  age: number,
  catalog: MathCatalog = loadMathCatalog()
): ContestRecommendation[] {
  const pathwayContests = catalog.pathways[type].competitions
    .filter(c => fitsAge(c, age))
    .map(c => ({
      name: c.name,
      description: c.description,
      eligibility: c.eligibility,
      website: "Ask your program coordinator for details",
      preparation: "Specialized training through the pathway's courses",
    }));

  return [...pathwayContests, ...catalog.competitionsByAgeGroup[getAgeBand(age)]].slice(0, MAX_CONTESTS);
}

// ============================================
// Pathway
// ============================================

export function generateMathPathway(
  student: Pick<Student, "age">,
  results: AnalysisResults,
  catalog: MathCatalog = loadMathCatalog()
): MathPathway {
  const type = determineMathPathwayType(results, catalog);
  const definition = catalog.pathways[type];
  const levelIndex = determineLevelIndex(student.age);
  const recommendedCourses = recommendMathCourses(student.age, type, levelIndex, catalog);

  return {
    type,
    title: definition.title,
    description: definition.description,
    personalizedDescription: personalizeMathDescription(type, results, catalog),
    benefits: definition.benefits,
    levelIndex,
    journeySteps: buildJourneySteps(type, levelIndex, recommendedCourses, catalog),
    recommendedCourses,
    certification: definition.certification,
    competitions: definition.competitions.slice(0, 2),
    contestRecommendations: recommendContests(type, student.age, catalog),
    careerConnections: definition.careerConnections.slice(0, 5),
  };
}
