import { AnalysisResults, analyzeResponses, compareParentResponses } from "../domain/analysis";
import { DiagnosticResults } from "../domain/assessment";
import { generateLearningBadges } from "../domain/badges";
import { generateCareerAffinities } from "../domain/careers";
import { recommendCourses } from "../domain/courseRecommender";
import { recommendExaminations } from "../domain/examRecommender";
import { LearningStyle } from "../domain/learningProfile";
import { generateMathPathway } from "../domain/mathPathway";
import { generatePathway } from "../domain/pathway";
import { Responses } from "../domain/questionnaire";
import { Student } from "../domain/student";

/**
 * Shared test data: a 12-year-old who learns hands-on, leans creative and
 * persistent, and is into technology.
 */

export const middleSchoolResponses: Responses = {
  ls_1: 2,
  ls_2: 2,
  ls_3: 0,
  ps_1: 2,
  bh_1: 1,
  cr_1: 2,
  tm_1: 1,
  cm_1: 2,
  in_1: 2,
  in_2: 0,
  mid_1: 0,
  mid_2: 0,
  mid_3: 3,
  mid_4: 1,
  mid_5: 0,
  mid_6: 3,
};

export const matchingParentResponses: Responses = {
  parent_1: 2,
  parent_2: 1,
  parent_3: 2,
  parent_4: 0,
  parent_5: 0,
};

export function makeStudent(overrides: Partial<Student> = {}): Student {
  return {
    id: "student-1",
    firstName: "Jordan",
    lastName: "Rivera",
    age: 12,
    grade: "7th",
    createdAt: "2025-03-01T00:00:00.000Z",
    ...overrides,
  };
}

interface ProfileShape {
  primary?: LearningStyle;
  secondary?: LearningStyle[];
  traits?: string[];
  interests?: string[];
}

/**
 * Minimal analysis results for testing the mappers in isolation.
 * Descriptive fields are left empty.
 */
export function makeResults({
  primary = "visual",
  secondary = [],
  traits = [],
  interests = [],
}: ProfileShape = {}): AnalysisResults {
  return {
    learningStyles: {
      primary,
      secondary,
      name: "",
      description: "",
      strategies: [],
      idealEnvironment: "",
      scores: { visual: 0, auditory: 0, kinesthetic: 0, logical: 0, social: 0, independent: 0 },
    },
    traits: { topTraits: traits, names: [], descriptions: [], strengths: [] },
    interests: { topInterests: interests, names: [], descriptions: [], relatedCareers: [], enrichmentTracks: [] },
    dimensionScores: { logicalThinking: 50, creativity: 50, socialSkills: 50, selfDirection: 50 },
  };
}

/**
 * Diagnostic results for the middle school fixture, built with the real
 * scoring and mapping functions and a fixed narrative.
 */
export function makeDiagnosticResults(
  student: Student = makeStudent(),
  parentResponses: Responses | undefined = matchingParentResponses
): DiagnosticResults {
  const analysis = analyzeResponses(middleSchoolResponses, student.age);
  const pathway = generatePathway(student, analysis);
  return {
    analysis,
    badges: generateLearningBadges(analysis),
    comparison: compareParentResponses(parentResponses, analysis),
    pathway,
    careers: generateCareerAffinities(analysis),
    recommendedCourses: recommendCourses(student, analysis, pathway),
    mathPathway: generateMathPathway(student, analysis),
    examRecommendations: recommendExaminations(student, analysis),
    reflections: [],
    narrative: { studentSummary: "Student summary.", parentSummary: "Parent summary." },
    analyzedAt: "2025-03-05T10:00:00.000Z",
  };
}
