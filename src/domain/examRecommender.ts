import { loadExamCatalog } from "../loaders/catalogLoader";
import { AnalysisResults } from "./analysis";
import { LearningStyle } from "./learningProfile";
import { AgeGroup, getAgeBand } from "./questionnaire";
import { Student } from "./student";

/**
 * Examination Recommendations
 *
 * Picks internationally available exams for the student's age band in
 * five categories. Each category starts from a weight set by the learning
 * style; top traits and interests raise it. A category's weight decides
 * what share of its exams is shown (at least one). Exams whose name or
 * description mentions one of the student's interests come first.
 */

export type ExamCategory = "academic" | "aptitude" | "competition" | "talentSearch" | "certification";

export const EXAM_CATEGORIES: ExamCategory[] = [
  "academic",
  "aptitude",
  "competition",
  "talentSearch",
  "certification",
];

export interface Exam {
  name: string;
  description: string;
  ageRange: string; // as published, e.g. "Grades 6-8"
  regions: string;
  website: string;
  benefits: string[];
  preparation: string;
}

// Weights are in tenths: 7 means 70% of a category's exams
export type CategoryWeights = Record<ExamCategory, number>;

export interface ExamCatalog {
  categories: Record<ExamCategory, string>;
  exams: Record<AgeGroup, Record<ExamCategory, Exam[]>>;
  categoryWeights: Record<LearningStyle, CategoryWeights>;
  defaultWeight: number;
  traitBoosts: Record<string, ExamCategory[]>;
  interestBoosts: Record<string, ExamCategory[]>;
  styleAdvice: Record<LearningStyle, string>;
  traitAdvice: Record<string, string>;
  categoryAdvice: Partial<Record<ExamCategory, string>>; // "{exam}" is replaced
  balancedAdvice: string;
  generalStrategies: string[];
  styleStrategies: Record<LearningStyle, string[]>;
  traitStrategies: Record<string, string[]>;
  examTypeStrategies: string[];
}

export interface ExamRecommendations {
  ageGroup: AgeGroup;
  recommendedExams: Record<ExamCategory, Exam[]>;
  personalizedRecommendations: string[];
  preparationStrategies: string[];
}

const STYLE_STRATEGY_COUNT = 3;
const TRAIT_STRATEGY_COUNT = 2;

export function calculateCategoryWeights(
  results: AnalysisResults,
  catalog: ExamCatalog = loadExamCatalog()
): CategoryWeights {
  const base = catalog.categoryWeights[results.learningStyles.primary];
  const weights: CategoryWeights = {
    academic: base?.academic ?? catalog.defaultWeight,
    aptitude: base?.aptitude ?? catalog.defaultWeight,
    competition: base?.competition ?? catalog.defaultWeight,
    talentSearch: base?.talentSearch ?? catalog.defaultWeight,
    certification: base?.certification ?? catalog.defaultWeight,
  };

  for (const trait of results.traits.topTraits) {
    catalog.traitBoosts[trait]?.forEach(category => weights[category]++);
  }
  for (const interest of results.interests.topInterests) {
    catalog.interestBoosts[interest]?.forEach(category => weights[category]++);
  }
  return weights;
}

function interestMatches(exam: Exam, interests: string[]): number {
  const text = `${exam.name} ${exam.description}`.toLowerCase();
  return interests.filter(interest => text.includes(interest.toLowerCase())).length;
}

/**
 * The share of each category's exams its weight allows, interest matches first
 */
export function selectExams(
  exams: Record<ExamCategory, Exam[]>,
  weights: CategoryWeights,
  interests: string[]
): Record<ExamCategory, Exam[]> {
  const pick = (category: ExamCategory): Exam[] => {
    const available = exams[category] ?? [];
    const count = Math.max(1, Math.floor((available.length * weights[category]) / 10));
    return available
      .map((exam, index) => ({ exam, index, matches: interestMatches(exam, interests) }))
      .sort((a, b) => b.matches - a.matches || a.index - b.index)
      .slice(0, count)
      .map(entry => entry.exam);
  };

  return {
    academic: pick("academic"),
    aptitude: pick("aptitude"),
    competition: pick("competition"),
    talentSearch: pick("talentSearch"),
    certification: pick("certification"),
  };
}

export function buildExamAdvice(
  recommended: Record<ExamCategory, Exam[]>,
  results: AnalysisResults,
  catalog: ExamCatalog = loadExamCatalog()
): string[] {
  const advice: string[] = [];

  const styleAdvice = catalog.styleAdvice[results.learningStyles.primary];
  if (styleAdvice) advice.push(styleAdvice);

  const topTrait = results.traits.topTraits[0];
  const traitAdvice = topTrait ? catalog.traitAdvice[topTrait] : undefined;
  if (traitAdvice) advice.push(traitAdvice);

  for (const category of EXAM_CATEGORIES) {
    const template = catalog.categoryAdvice[category];
    const first = recommended[category][0];
    if (template && first) {
      advice.push(template.replace("{exam}", first.name));
    }
  }

  advice.push(catalog.balancedAdvice);
  return advice;
}

export function buildPreparationStrategies(
  results: AnalysisResults,
  catalog: ExamCatalog = loadExamCatalog()
): string[] {
  const topTrait = results.traits.topTraits[0];
  return [
    ...catalog.generalStrategies,
    ...(catalog.styleStrategies[results.learningStyles.primary] ?? []).slice(0, STYLE_STRATEGY_COUNT),
    ...((topTrait ? catalog.traitStrategies[topTrait] : undefined) ?? []).slice(0, TRAIT_STRATEGY_COUNT),
    ...catalog.examTypeStrategies,
  ];
}

export function recommendExaminations(
  student: Pick<Student, "age">,
  results: AnalysisResults,
  catalog: ExamCatalog = loadExamCatalog()
): ExamRecommendations {
  const ageGroup = getAgeBand(student.age);
  const recommendedExams = selectExams(
    catalog.exams[ageGroup],
    calculateCategoryWeights(results, catalog),
    results.interests.topInterests
  );

  return {
    ageGroup,
    recommendedExams,
    personalizedRecommendations: buildExamAdvice(recommendedExams, results, catalog),
    preparationStrategies: buildPreparationStrategies(results, catalog),
  };
}
