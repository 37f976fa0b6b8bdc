/**
 * Learning Style Analysis
 *
 * Turns questionnaire responses into a learning profile:
 * - Learning styles: each learning-style answer is a vote for one style
 * - Traits: situational answers map to behaviour tags; logic puzzles award
 *   their tag only when solved
 * - Interests: interest answers map to interest areas
 * - Dimension scores: four 0-100 scores read from specific questions
 *
 * Ranking is by vote count, ties broken by the order tags were first seen.
 * Open-ended answers are never scored; they are collected as reflections
 * for the report narrative instead.
 */

import { loadProfileCatalog } from "../loaders/catalogLoader";
import {
  LearningStyle,
  ProfileCatalog,
  getInterestName,
  getTraitName,
  isLearningStyle,
  withArticle,
} from "./learningProfile";
import {
  Question,
  Responses,
  findParentQuestion,
  findQuestion,
  isOpenEnded,
  mappedTag,
} from "./questionnaire";

// ============================================
// Types
// ============================================

export interface LearningStyleResult {
  primary: LearningStyle;
  secondary: LearningStyle[];
  name: string;
  description: string;
  strategies: string[];
  idealEnvironment: string;
  // Share of learning-style answers per style, 0-100
  scores: Record<LearningStyle, number>;
}

export interface TraitResult {
  topTraits: string[];
  names: string[];
  descriptions: string[];
  strengths: string[][];
}

export interface InterestResult {
  topInterests: string[];
  names: string[];
  descriptions: string[];
  relatedCareers: string[][];
  enrichmentTracks: string[][];
}

export interface DimensionScores {
  logicalThinking: number;
  creativity: number;
  socialSkills: number;
  selfDirection: number;
}

export interface AnalysisResults {
  learningStyles: LearningStyleResult;
  traits: TraitResult;
  interests: InterestResult;
  dimensionScores: DimensionScores;
}

export interface ParentComparison {
  alignments: string[];
  differences: string[];
  insights: string[];
}

export interface Reflection {
  questionId: string;
  question: string;
  answer: string;
}

// ============================================
// Configuration Constants
// ============================================

export const DEFAULT_LEARNING_STYLE: LearningStyle = "visual";
export const TOP_COUNT = 3;
export const NEUTRAL_DIMENSION_SCORE = 50;

/**
 * Questions each dimension is read from. Only the ones the student
 * actually answered count toward the score.
 */
export const DIMENSION_QUESTIONS: Record<keyof DimensionScores, string[]> = {
  logicalThinking: ["ps_1", "mid_2", "high_2"],
  creativity: ["cr_1", "elem_3", "mid_3", "high_3"],
  socialSkills: ["ls_3", "mid_6", "high_6"],
  selfDirection: ["bh_1", "tm_1", "high_4"],
};

// Options from this index on count toward a dimension
const POSITIVE_OPTION_INDEX = 2;

export const NO_PARENT_RESPONSES_INSIGHT =
  "Complete the parent questionnaire to see how your perceptions compare with your child's results.";

// ============================================
// Counting Helpers
// ============================================

function increment(counts: Map<string, number>, tag: string | undefined): void {
  if (tag === undefined) return;
  counts.set(tag, (counts.get(tag) ?? 0) + 1);
}

/**
 * Tags by count, highest first. Array sort is stable, so equal counts
 * keep the order the tags were first counted in.
 */
export function rankTags(counts: Map<string, number>): string[] {
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .map(([tag]) => tag);
}

/**
 * The option text a choice answer selected
 */
function selectedOption(question: Question, answerIndex: number): string | undefined {
  return mappedTag(question.options, answerIndex);
}

function isSolved(question: Question, answerIndex: number): boolean {
  return (
    question.correctAnswer !== undefined &&
    selectedOption(question, answerIndex) === question.correctAnswer
  );
}

/**
 * The trait a choice answer earns, if any
 */
function traitForAnswer(question: Question, answerIndex: number): string | undefined {
  if (question.type === "logic_puzzle") {
    return isSolved(question, answerIndex) ? question.traitMapping?.[0] : undefined;
  }
  return mappedTag(question.traitMapping, answerIndex);
}

// ============================================
// Analysis
// ============================================

/**
 * Analyze a student's responses into a learning profile.
 * Unknown question ids and text answers to choice questions are ignored.
 */
export function analyzeResponses(
  responses: Responses,
  age: number,
  catalog: ProfileCatalog = loadProfileCatalog()
): AnalysisResults {
  const styleCounts = new Map<string, number>();
  const traitCounts = new Map<string, number>();
  const interestCounts = new Map<string, number>();

  for (const [questionId, answer] of Object.entries(responses)) {
    const question = findQuestion(questionId, age);
    if (!question || isOpenEnded(question) || typeof answer !== "number") {
      continue;
    }

    if (question.category === "learning_style" && question.learningStyleMapping) {
      increment(styleCounts, mappedTag(question.learningStyleMapping, answer));
    } else if (question.traitMapping) {
      increment(traitCounts, traitForAnswer(question, answer));
    } else if (question.interestMapping) {
      increment(interestCounts, mappedTag(question.interestMapping, answer));
    }
  }

  // Tags like "guided" are counted but have no profile, so they never lead
  const rankedStyles = rankTags(styleCounts).filter(isLearningStyle);
  const primary = rankedStyles[0] ?? DEFAULT_LEARNING_STYLE;
  const secondary = rankedStyles.slice(1, TOP_COUNT);
  const styleProfile = catalog.learningStyles[primary];

  const topTraits = rankTags(traitCounts).slice(0, TOP_COUNT);
  const topInterests = rankTags(interestCounts).slice(0, TOP_COUNT);

  return {
    learningStyles: {
      primary,
      secondary,
      name: styleProfile.name,
      description: styleProfile.description,
      strategies: [...styleProfile.strategies],
      idealEnvironment: styleProfile.idealEnvironment,
      scores: calculateStyleScores(styleCounts),
    },
    traits: {
      topTraits,
      names: topTraits.map(t => getTraitName(catalog, t)),
      descriptions: topTraits.map(t => catalog.traits[t]?.description ?? ""),
      strengths: topTraits.map(t => [...(catalog.traits[t]?.strengths ?? [])]),
    },
    interests: {
      topInterests,
      names: topInterests.map(i => getInterestName(catalog, i)),
      descriptions: topInterests.map(i => catalog.interests[i]?.description ?? ""),
      relatedCareers: topInterests.map(i => [...(catalog.interests[i]?.relatedCareers ?? [])]),
      enrichmentTracks: topInterests.map(i => [...(catalog.interests[i]?.enrichmentTracks ?? [])]),
    },
    dimensionScores: {
      logicalThinking: calculateDimensionScore(responses, DIMENSION_QUESTIONS.logicalThinking, age),
      creativity: calculateDimensionScore(responses, DIMENSION_QUESTIONS.creativity, age),
      socialSkills: calculateDimensionScore(responses, DIMENSION_QUESTIONS.socialSkills, age),
      selfDirection: calculateDimensionScore(responses, DIMENSION_QUESTIONS.selfDirection, age),
    },
  };
}

/**
 * Percentage of all learning-style answers that went to each profiled style.
 * Uncatalogued tags still count toward the total.
 */
export function calculateStyleScores(styleCounts: Map<string, number>): Record<LearningStyle, number> {
  const total = [...styleCounts.values()].reduce((sum, n) => sum + n, 0);
  const score = (style: LearningStyle): number =>
    total > 0 ? Math.round(((styleCounts.get(style) ?? 0) / total) * 100) : 0;

  return {
    visual: score("visual"),
    auditory: score("auditory"),
    kinesthetic: score("kinesthetic"),
    logical: score("logical"),
    social: score("social"),
    independent: score("independent"),
  };
}

/**
 * Score one dimension 0-100 from the answered questions in its list.
 *
 * Choice questions count as positive when one of the later options
 * (index 2 or above) was picked; logic puzzles count when solved.
 * Returns the neutral score when none of the questions were answered.
 */
export function calculateDimensionScore(
  responses: Responses,
  questionIds: string[],
  age: number
): number {
  let positive = 0;
  let answered = 0;

  for (const questionId of questionIds) {
    const answer = responses[questionId];
    const question = findQuestion(questionId, age);
    if (!question || typeof answer !== "number") continue;

    answered++;
    const isPositive =
      question.type === "logic_puzzle"
        ? isSolved(question, answer)
        : answer >= POSITIVE_OPTION_INDEX;
    if (isPositive) positive++;
  }

  if (answered === 0) {
    return NEUTRAL_DIMENSION_SCORE;
  }
  return Math.floor((positive * 100) / answered);
}

/**
 * Free-text answers to open-ended questions, in answer order
 */
export function collectReflections(responses: Responses, age: number): Reflection[] {
  const reflections: Reflection[] = [];
  for (const [questionId, answer] of Object.entries(responses)) {
    const question = findQuestion(questionId, age);
    if (!question || !isOpenEnded(question) || typeof answer !== "string") continue;
    const text = answer.trim();
    if (text.length === 0) continue;
    reflections.push({ questionId, question: question.question, answer: text });
  }
  return reflections;
}

// ============================================
// Parent Comparison
// ============================================

/**
 * Compare a parent's view of their child with the child's own results.
 *
 * Every trait and interest the parent picked is reported as either an
 * alignment or a difference. Insights suggest where to lean in.
 */
export function compareParentResponses(
  parentResponses: Responses | undefined,
  results: AnalysisResults,
  catalog: ProfileCatalog = loadProfileCatalog()
): ParentComparison {
  const comparison: ParentComparison = { alignments: [], differences: [], insights: [] };

  if (!parentResponses || Object.keys(parentResponses).length === 0) {
    comparison.insights.push(NO_PARENT_RESPONSES_INSIGHT);
    return comparison;
  }

  let parentStyle: string | undefined;
  const parentTraits: string[] = [];
  const parentInterests: string[] = [];

  for (const [questionId, answer] of Object.entries(parentResponses)) {
    const question = findParentQuestion(questionId);
    if (!question || typeof answer !== "number") continue;

    if (question.category === "learning_style" && question.learningStyleMapping) {
      parentStyle = mappedTag(question.learningStyleMapping, answer) ?? parentStyle;
    } else if (question.traitMapping) {
      const trait = mappedTag(question.traitMapping, answer);
      if (trait) parentTraits.push(trait);
    } else if (question.interestMapping) {
      const interest = mappedTag(question.interestMapping, answer);
      if (interest) parentInterests.push(interest);
    }
  }

  const insights = new Set<string>();

  // Learning style
  const childStyle = results.learningStyles.primary;
  const childStyleName = catalog.learningStyles[childStyle].name.toLowerCase();
  if (parentStyle === childStyle) {
    comparison.alignments.push(`You both identified a preference for ${childStyle} learning.`);
  } else {
    const parentStyleName =
      parentStyle && isLearningStyle(parentStyle)
        ? withArticle(catalog.learningStyles[parentStyle].name.toLowerCase())
        : "a different type of learner";
    comparison.differences.push(
      `You identified your child as ${parentStyleName}, but their responses indicate they are ${withArticle(childStyleName)}.`
    );
    insights.add(`Consider providing more opportunities for ${childStyle} learning experiences.`);
  }

  // Traits
  const childTraits = results.traits.topTraits;
  for (const trait of parentTraits) {
    const traitName = getTraitName(catalog, trait).toLowerCase();
    if (childTraits.includes(trait)) {
      comparison.alignments.push(`You both recognized the ${traitName} trait.`);
    } else {
      comparison.differences.push(
        `You identified your child as ${withArticle(traitName)}, but this wasn't among their top traits in the assessment.`
      );
    }
  }

  // Interests
  const childInterests = results.interests.topInterests;
  const childInterestNames = childInterests
    .slice(0, 2)
    .map(i => getInterestName(catalog, i).toLowerCase());
  for (const interest of parentInterests) {
    const interestName = getInterestName(catalog, interest).toLowerCase();
    if (childInterests.includes(interest)) {
      comparison.alignments.push(`You both identified an interest in ${interestName}.`);
    } else {
      comparison.differences.push(
        `You identified an interest in ${interestName}, but this wasn't among their top interests in the assessment.`
      );
      if (childInterestNames.length > 0) {
        insights.add(
          `Your child may benefit from exploring their expressed interests in ${childInterestNames.join(", ")}.`
        );
      }
    }
  }

  comparison.insights = [...insights];
  return comparison;
}
