import { randomUUID } from "crypto";
import { AnalysisResults, ParentComparison, Reflection } from "./analysis";
import { LearningBadges } from "./badge";
import { CareerAffinities } from "./career";
import { RecommendedCourse } from "./course";
import { AssessmentStateError, AssessmentValidationError } from "./errors";
import { ExamRecommendations } from "./examRecommender";
import { MathPathway } from "./mathPathway";
import { Narrative } from "./narrator";
import { Pathway } from "./pathway";
import {
  Question,
  Responses,
  findParentQuestion,
  findQuestion,
  getRequiredQuestionIds,
  isOpenEnded,
} from "./questionnaire";
import { Student } from "./student";

/**
 * Assessment Domain Model
 *
 * Lifecycle:
 *   pending -> in_progress    questionnaire opened or first answers recorded
 *   in_progress -> completed  every required question for the age is answered
 *   completed -> analyzed     diagnostics computed and stored
 *
 * Analysis may be re-run on an analyzed assessment. New answers after
 * analysis clear the stored results and drop it back to completed.
 */

export type AssessmentStatus = "pending" | "in_progress" | "completed" | "analyzed";

export interface DiagnosticResults {
  analysis: AnalysisResults;
  badges: LearningBadges;
  comparison: ParentComparison;
  pathway: Pathway;
  careers: CareerAffinities;
  recommendedCourses: RecommendedCourse[];
  mathPathway: MathPathway;
  examRecommendations: ExamRecommendations;
  reflections: Reflection[];
  narrative: Narrative;
  analyzedAt: string;
}

export interface Assessment {
  id: string;
  studentId: string;
  date: string; // ISO timestamp the assessment was created
  status: AssessmentStatus;
  studentResponses: Responses;
  parentResponses?: Responses;
  results?: DiagnosticResults;
  updatedAt: string;
}

export interface ResponseSubmission {
  studentResponses?: Responses;
  parentResponses?: Responses;
}

export function createAssessment(studentId: string, now: Date = new Date()): Assessment {
  const timestamp = now.toISOString();
  return {
    id: randomUUID(),
    studentId,
    date: timestamp,
    status: "pending",
    studentResponses: {},
    updatedAt: timestamp,
  };
}

/**
 * Mark a pending assessment as started. Any other status is left as is.
 */
export function openQuestionnaire(assessment: Assessment, now: Date = new Date()): Assessment {
  if (assessment.status !== "pending") {
    return assessment;
  }
  return { ...assessment, status: "in_progress", updatedAt: now.toISOString() };
}

// ============================================
// Response Validation
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function checkAnswer(question: Question, answer: unknown, label: string): string | null {
  if (isOpenEnded(question)) {
    return typeof answer === "string" ? null : `${label}: answer must be text`;
  }
  const optionCount = question.options?.length ?? 0;
  if (typeof answer !== "number" || !Number.isInteger(answer) || answer < 0 || answer >= optionCount) {
    return `${label}: answer must be an option index from 0 to ${optionCount - 1}`;
  }
  return null;
}

function validateResponseSet(
  value: unknown,
  field: string,
  lookup: (questionId: string) => Question | null,
  problems: string[]
): Responses | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    problems.push(`${field} must be an object keyed by question id`);
    return undefined;
  }

  const responses: Responses = {};
  for (const [questionId, answer] of Object.entries(value)) {
    const question = lookup(questionId);
    if (!question) {
      problems.push(`${field}.${questionId}: unknown question`);
      continue;
    }
    const problem = checkAnswer(question, answer, `${field}.${questionId}`);
    if (problem) {
      problems.push(problem);
    } else if (typeof answer === "number" || typeof answer === "string") {
      responses[questionId] = answer;
    }
  }
  return responses;
}

/**
 * Check a raw response submission against the student's questionnaire
 * and the parent questionnaire. Collects every problem before throwing.
 */
export function validateResponses(body: unknown, age: number): ResponseSubmission {
  if (!isRecord(body)) {
    throw new AssessmentValidationError("Invalid responses", ["Request body must be an object"]);
  }

  const problems: string[] = [];
  const studentResponses = validateResponseSet(
    body.studentResponses,
    "studentResponses",
    id => findQuestion(id, age),
    problems
  );
  const parentResponses = validateResponseSet(
    body.parentResponses,
    "parentResponses",
    findParentQuestion,
    problems
  );

  const answerCount =
    Object.keys(studentResponses ?? {}).length + Object.keys(parentResponses ?? {}).length;
  if (problems.length === 0 && answerCount === 0) {
    problems.push("At least one response is required");
  }
  if (problems.length > 0) {
    throw new AssessmentValidationError("Invalid responses", problems);
  }

  return {
    ...(studentResponses ? { studentResponses } : {}),
    ...(parentResponses ? { parentResponses } : {}),
  };
}

// ============================================
// Lifecycle
// ============================================

export function isComplete(responses: Responses, age: number): boolean {
  return getRequiredQuestionIds(age).every(id => responses[id] !== undefined);
}

/**
 * Merge validated answers into the assessment and advance its status.
 * Later answers to the same question replace earlier ones.
 */
export function recordResponses(
  assessment: Assessment,
  student: Pick<Student, "age">,
  submission: ResponseSubmission,
  now: Date = new Date()
): Assessment {
  const studentResponses = { ...assessment.studentResponses, ...submission.studentResponses };
  const parentResponses = submission.parentResponses
    ? { ...assessment.parentResponses, ...submission.parentResponses }
    : assessment.parentResponses;

  const status: AssessmentStatus = isComplete(studentResponses, student.age) ? "completed" : "in_progress";

  const updated: Assessment = {
    ...assessment,
    status,
    studentResponses,
    updatedAt: now.toISOString(),
  };
  if (parentResponses) {
    updated.parentResponses = parentResponses;
  }
  delete updated.results;
  return updated;
}

export function assertCanAnalyze(assessment: Assessment): void {
  if (assessment.status !== "completed" && assessment.status !== "analyzed") {
    throw new AssessmentStateError(
      `Assessment ${assessment.id} is ${assessment.status}; all required questions must be answered before analysis`
    );
  }
}

export function assertCanReport(assessment: Assessment): DiagnosticResults {
  if (assessment.status !== "analyzed" || !assessment.results) {
    throw new AssessmentStateError(
      `Assessment ${assessment.id} is ${assessment.status}; it must be analyzed before reports can be generated`
    );
  }
  return assessment.results;
}

/**
 * Whether two copies of an assessment carry the same answers and update
 */
export function isSameRevision(a: Assessment, b: Assessment): boolean {
  return (
    a.updatedAt === b.updatedAt &&
    a.status === b.status &&
    JSON.stringify(a.studentResponses) === JSON.stringify(b.studentResponses) &&
    JSON.stringify(a.parentResponses ?? {}) === JSON.stringify(b.parentResponses ?? {})
  );
}

export function markAnalyzed(
  assessment: Assessment,
  results: DiagnosticResults,
  now: Date = new Date()
): Assessment {
  return { ...assessment, status: "analyzed", results, updatedAt: now.toISOString() };
}
