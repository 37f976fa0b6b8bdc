import { loadQuestionBank } from "../loaders/catalogLoader";

/**
 * Questionnaire Domain Model
 *
 * Students see the common questions plus the questions for their age group.
 * Parents answer a short mirror questionnaire describing how they see their child.
 *
 * Each answer option maps (by index) to a learning style, a trait tag or an
 * interest tag; the analysis counts those tags.
 */

export type AgeGroup = "elementary" | "middle" | "high";

export type QuestionCategory =
  | "learning_style"
  | "problem_solving"
  | "behavior"
  | "creativity"
  | "time_management"
  | "communication"
  | "interests"
  | "open_ended";

export type QuestionType =
  | "multiple_choice"
  | "situational"
  | "logic_puzzle"
  | "visual_reasoning"
  | "open_ended";

export interface Question {
  id: string;
  category: QuestionCategory;
  type: QuestionType;
  question: string;
  options?: string[];
  correctAnswer?: string; // logic puzzles only
  learningStyleMapping?: string[];
  traitMapping?: string[];
  interestMapping?: string[];
}

export interface AgeRange {
  minAge: number;
  maxAge: number;
}

export interface QuestionBank {
  ageGroups: Record<AgeGroup, AgeRange>;
  common: Question[];
  elementary: Question[];
  middle: Question[];
  high: Question[];
  parent: Question[];
}

/**
 * Answers keyed by question id.
 * Choice questions take the selected option index; open-ended questions take text.
 */
export type Responses = Record<string, number | string>;

export const MIN_STUDENT_AGE = 5;
export const MAX_STUDENT_AGE = 18;

export function getAgeGroup(age: number): AgeGroup | null {
  const { ageGroups } = loadQuestionBank();
  const groups: AgeGroup[] = ["elementary", "middle", "high"];
  return groups.find(g => age >= ageGroups[g].minAge && age <= ageGroups[g].maxAge) ?? null;
}

/**
 * The age group for grouping catalog content. Ages outside every group
 * take the nearest one.
 */
export function getAgeBand(age: number): AgeGroup {
  const group = getAgeGroup(age);
  if (group) {
    return group;
  }
  return age < loadQuestionBank().ageGroups.middle.minAge ? "elementary" : "high";
}

/**
 * Questions for a student of the given age: common questions first,
 * then the age group's own questions. Ages outside every group get the
 * common questions only.
 */
export function getQuestionsForAge(age: number): Question[] {
  const bank = loadQuestionBank();
  const group = getAgeGroup(age);
  return group ? [...bank.common, ...bank[group]] : [...bank.common];
}

export function getParentQuestions(): Question[] {
  return [...loadQuestionBank().parent];
}

export function findQuestion(questionId: string, age: number): Question | null {
  return getQuestionsForAge(age).find(q => q.id === questionId) ?? null;
}

export function findParentQuestion(questionId: string): Question | null {
  return getParentQuestions().find(q => q.id === questionId) ?? null;
}

export function isOpenEnded(question: Question): boolean {
  return question.type === "open_ended";
}

/**
 * Ids a student must answer before the assessment counts as completed.
 * Open-ended questions are optional.
 */
export function getRequiredQuestionIds(age: number): string[] {
  return getQuestionsForAge(age)
    .filter(q => !isOpenEnded(q))
    .map(q => q.id);
}

/**
 * The tag an option index maps to, or undefined when the index is out of range.
 */
export function mappedTag(mapping: string[] | undefined, answerIndex: number): string | undefined {
  if (!mapping || !Number.isInteger(answerIndex) || answerIndex < 0) {
    return undefined;
  }
  return mapping[answerIndex];
}
