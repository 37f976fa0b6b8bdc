/**
 * Diagnostic Service
 *
 * Runs an assessment through its lifecycle:
 * - Start an assessment for a student and open the questionnaire
 * - Record student and parent answers
 * - Analyze: scoring, badges, parent comparison, pathway, careers,
 *   course recommendations, the math pathway, exam recommendations and
 *   the report narrative
 * - Build and store the student and parent reports
 *
 * Methods return null when the assessment or student does not exist.
 * Invalid input raises AssessmentValidationError; out-of-order steps raise
 * AssessmentStateError, as does an analysis that finishes after new answers
 * were recorded.
 */

import { AppConfig } from "../config";
import { analyzeResponses, collectReflections, compareParentResponses } from "../domain/analysis";
import {
  Assessment,
  DiagnosticResults,
  assertCanAnalyze,
  assertCanReport,
  createAssessment,
  isSameRevision,
  markAnalyzed,
  openQuestionnaire,
  recordResponses,
  validateResponses,
} from "../domain/assessment";
import { generateLearningBadges } from "../domain/badges";
import { generateCareerAffinities } from "../domain/careers";
import { recommendCourses } from "../domain/courseRecommender";
import { AssessmentStateError } from "../domain/errors";
import { recommendExaminations } from "../domain/examRecommender";
import { LLMNarrator } from "../domain/llmNarrator";
import { generateMathPathway } from "../domain/mathPathway";
import { ReportNarrator } from "../domain/narrator";
import { generatePathway } from "../domain/pathway";
import { Question, getParentQuestions, getQuestionsForAge } from "../domain/questionnaire";
import { AdminSummary, Report, buildAdminSummary, buildReports } from "../domain/report";
import { Student } from "../domain/student";
import { TemplateNarrator } from "../domain/templateNarrator";
import { AssessmentStore } from "../stores/assessmentStore";
import { ReportStore } from "../stores/reportStore";
import { StudentStore } from "../stores/studentStore";

// ============================================
// Types
// ============================================

export interface DiagnosticServiceDeps {
  students: StudentStore;
  assessments: AssessmentStore;
  reports: ReportStore;
  narrator: ReportNarrator;
  clock?: () => Date;
  adminContact?: string;
}

export interface AssessmentQuestionnaire {
  assessment: Assessment;
  questions: Question[];
  parentQuestions: Question[];
}

export interface AssessmentContext {
  assessment: Assessment;
  student: Student;
}

/**
 * The narrator the configuration asks for. The LLM narrator needs an API key;
 * without one the template narrator is used.
 */
export function createNarrator(config: AppConfig): ReportNarrator {
  if (config.narrator === "llm") {
    if (config.openaiApiKey) {
      return new LLMNarrator(config.openaiApiKey, config.narratorModel);
    }
    console.warn("NARRATOR=llm but OPENAI_API_KEY is not set; using template narrator");
  }
  return new TemplateNarrator();
}

export class DiagnosticService {
  private readonly now: () => Date;

  constructor(private readonly deps: DiagnosticServiceDeps) {
    this.now = deps.clock ?? (() => new Date());
  }

  /**
   * Load an assessment together with its student
   */
  getContext(assessmentId: string): AssessmentContext | null {
    const assessment = this.deps.assessments.load(assessmentId);
    if (!assessment) {
      return null;
    }
    const student = this.deps.students.load(assessment.studentId);
    if (!student) {
      return null;
    }
    return { assessment, student };
  }

  startAssessment(studentId: string): Assessment | null {
    if (!this.deps.students.load(studentId)) {
      return null;
    }
    const assessment = createAssessment(studentId, this.now());
    this.deps.assessments.save(assessment);
    return assessment;
  }

  /**
   * The questions for the assessment's student. Opening a pending
   * assessment moves it to in_progress.
   */
  openQuestionnaire(assessmentId: string): AssessmentQuestionnaire | null {
    const context = this.getContext(assessmentId);
    if (!context) {
      return null;
    }

    const assessment = openQuestionnaire(context.assessment, this.now());
    if (assessment !== context.assessment) {
      this.deps.assessments.save(assessment);
    }

    return {
      assessment,
      questions: getQuestionsForAge(context.student.age),
      parentQuestions: getParentQuestions(),
    };
  }

  /**
   * Validate and record a batch of answers
   */
  submitResponses(assessmentId: string, body: unknown): Assessment | null {
    const context = this.getContext(assessmentId);
    if (!context) {
      return null;
    }

    const submission = validateResponses(body, context.student.age);
    const assessment = recordResponses(context.assessment, context.student, submission, this.now());
    this.deps.assessments.save(assessment);
    return assessment;
  }

  /**
   * Run the full diagnostic pipeline for a student's answers
   */
  async runDiagnostics(student: Student, assessment: Assessment): Promise<DiagnosticResults> {
    const analysis = analyzeResponses(assessment.studentResponses, student.age);
    const badges = generateLearningBadges(analysis);
    const comparison = compareParentResponses(assessment.parentResponses, analysis);
    const pathway = generatePathway(student, analysis);
    const careers = generateCareerAffinities(analysis);
    const recommendedCourses = recommendCourses(student, analysis, pathway);
    const mathPathway = generateMathPathway(student, analysis);
    const examRecommendations = recommendExaminations(student, analysis);
    const reflections = collectReflections(assessment.studentResponses, student.age);

    const narrative = await this.deps.narrator.narrate({
      student,
      results: analysis,
      comparison,
      pathway,
      careers,
      reflections,
    });

    return {
      analysis,
      badges,
      comparison,
      pathway,
      careers,
      recommendedCourses,
      mathPathway,
      examRecommendations,
      reflections,
      narrative,
      analyzedAt: this.now().toISOString(),
    };
  }

  async analyzeAssessment(assessmentId: string): Promise<Assessment | null> {
    const context = this.getContext(assessmentId);
    if (!context) {
      return null;
    }

    assertCanAnalyze(context.assessment);
    const results = await this.runDiagnostics(context.student, context.assessment);

    // Answers recorded while the narrator ran would be overwritten by a save
    const latest = this.deps.assessments.load(assessmentId);
    if (!latest || !isSameRevision(latest, context.assessment)) {
      throw new AssessmentStateError(
        `Assessment ${assessmentId} changed while it was being analyzed; analyze it again`
      );
    }

    const assessment = markAnalyzed(latest, results, this.now());
    this.deps.assessments.save(assessment);

    console.log(
      `Analyzed assessment ${assessment.id}: ${results.analysis.learningStyles.primary} learner, ` +
        `pathway ${results.pathway.primaryCategory}`
    );
    return assessment;
  }

  /**
   * Build the student and parent reports, replacing any earlier ones
   */
  generateReports(assessmentId: string): Report[] | null {
    const context = this.getContext(assessmentId);
    if (!context) {
      return null;
    }

    const results = assertCanReport(context.assessment);
    const reports = buildReports(context.student, context.assessment, results, this.now());
    this.deps.reports.replaceForAssessment(context.assessment.id, reports);
    return reports;
  }

  listReports(assessmentId: string): Report[] | null {
    if (!this.deps.assessments.load(assessmentId)) {
      return null;
    }
    return this.deps.reports.findByAssessment(assessmentId);
  }

  getAdminSummary(): AdminSummary {
    return buildAdminSummary(
      this.deps.students.getAll(),
      this.deps.assessments.getAll(),
      this.deps.reports.getAll().length,
      this.now(),
      this.deps.adminContact
    );
  }
}
