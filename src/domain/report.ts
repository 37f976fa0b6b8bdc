import { randomUUID } from "crypto";
import { loadProfileCatalog } from "../loaders/catalogLoader";
import { AnalysisResults, DimensionScores, ParentComparison, Reflection } from "./analysis";
import { Assessment, AssessmentStatus, DiagnosticResults } from "./assessment";
import { LearningBadges } from "./badge";
import { CareerAffinities } from "./career";
import { RecommendedCourse } from "./course";
import { ExamRecommendations } from "./examRecommender";
import { LEARNING_STYLES, ProfileCatalog } from "./learningProfile";
import { MathPathway } from "./mathPathway";
import { Pathway } from "./pathway";
import { Student, getFullName } from "./student";

/**
 * Report Contexts
 *
 * Reports are plain data: everything a student report, parent report or
 * admin dashboard needs to render, chart series included.
 */

// ============================================
// Types
// ============================================

export type ReportType = "student" | "parent";

export interface RadarChart {
  title: string;
  labels: string[];
  values: number[];
  max: number;
}

export interface BarChart {
  title: string;
  labels: string[];
  values: number[];
}

export interface ReportCharts {
  dimensionRadar: RadarChart;
  learningStyles: BarChart;
}

export interface ReportStudent {
  id: string;
  firstName: string;
  lastName: string;
  fullName: string;
  age: number;
  grade: string;
}

export interface StudentReportContext {
  reportId: string; // SSR-YYYYMMDD-<studentId>
  date: string; // e.g. "March 05, 2025"
  student: ReportStudent;
  results: AnalysisResults;
  badges: LearningBadges;
  pathway: Pathway;
  careers: CareerAffinities;
  recommendedCourses: RecommendedCourse[];
  mathPathway: MathPathway;
  examRecommendations: ExamRecommendations;
  reflections: Reflection[];
  narrative: string;
  charts: ReportCharts;
}

export interface ParentReportContext extends Omit<StudentReportContext, "reflections"> {
  // reportId is SPR-YYYYMMDD-<studentId>
  comparison: ParentComparison;
  parentEmail?: string;
}

interface ReportBase {
  id: string;
  assessmentId: string;
  studentId: string;
  generatedAt: string;
}

export type Report =
  | (ReportBase & { type: "student"; content: StudentReportContext })
  | (ReportBase & { type: "parent"; content: ParentReportContext });

export interface RecentAssessment {
  id: string;
  studentId: string;
  studentName: string;
  date: string;
  status: AssessmentStatus;
}

export interface AdminSummary {
  date: string;
  generatedAt: string;
  totals: {
    students: number;
    assessments: number;
    reports: number;
  };
  assessmentsByStatus: Record<AssessmentStatus, number>;
  recentAssessments: RecentAssessment[];
  adminContact?: string;
}

export const RECENT_ASSESSMENT_LIMIT = 10;

const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

const DIMENSIONS: (keyof DimensionScores)[] = [
  "logicalThinking",
  "creativity",
  "socialSkills",
  "selfDirection",
];

const DIMENSION_LABELS: Record<keyof DimensionScores, string> = {
  logicalThinking: "Logical Thinking",
  creativity: "Creativity",
  socialSkills: "Social Skills",
  selfDirection: "Self Direction",
};

// ============================================
// Formatting
// ============================================

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * "March 05, 2025" (UTC)
 */
export function formatReportDate(date: Date): string {
  return `${MONTHS[date.getUTCMonth()]} ${pad(date.getUTCDate())}, ${date.getUTCFullYear()}`;
}

export function buildReportId(prefix: "SSR" | "SPR", studentId: string, date: Date): string {
  const stamp = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  return `${prefix}-${stamp}-${studentId}`;
}

// ============================================
// Charts
// ============================================

export function buildCharts(
  results: AnalysisResults,
  catalog: ProfileCatalog = loadProfileCatalog()
): ReportCharts {
  return {
    dimensionRadar: {
      title: "Learning Dimension Scores",
      labels: DIMENSIONS.map(d => DIMENSION_LABELS[d]),
      values: DIMENSIONS.map(d => results.dimensionScores[d]),
      max: 100,
    },
    learningStyles: {
      title: "Learning Style Preferences",
      labels: LEARNING_STYLES.map(s => catalog.learningStyles[s].name),
      values: LEARNING_STYLES.map(s => results.learningStyles.scores[s]),
    },
  };
}

// ============================================
// Report Builders
// ============================================

function toReportStudent(student: Student): ReportStudent {
  return {
    id: student.id,
    firstName: student.firstName,
    lastName: student.lastName,
    fullName: getFullName(student),
    age: student.age,
    grade: student.grade,
  };
}

export function buildStudentReport(
  student: Student,
  results: DiagnosticResults,
  now: Date = new Date()
): StudentReportContext {
  return {
    reportId: buildReportId("SSR", student.id, now),
    date: formatReportDate(now),
    student: toReportStudent(student),
    results: results.analysis,
    badges: results.badges,
    pathway: results.pathway,
    careers: results.careers,
    recommendedCourses: results.recommendedCourses,
    mathPathway: results.mathPathway,
    examRecommendations: results.examRecommendations,
    reflections: results.reflections,
    narrative: results.narrative.studentSummary,
    charts: buildCharts(results.analysis),
  };
}

export function buildParentReport(
  student: Student,
  results: DiagnosticResults,
  now: Date = new Date()
): ParentReportContext {
  const context: ParentReportContext = {
    reportId: buildReportId("SPR", student.id, now),
    date: formatReportDate(now),
    student: toReportStudent(student),
    results: results.analysis,
    badges: results.badges,
    pathway: results.pathway,
    careers: results.careers,
    recommendedCourses: results.recommendedCourses,
    mathPathway: results.mathPathway,
    examRecommendations: results.examRecommendations,
    comparison: results.comparison,
    narrative: results.narrative.parentSummary,
    charts: buildCharts(results.analysis),
  };
  if (student.parentEmail) {
    context.parentEmail = student.parentEmail;
  }
  return context;
}

/**
 * Wrap both report contexts for an analyzed assessment into stored reports
 */
export function buildReports(
  student: Student,
  assessment: Assessment,
  results: DiagnosticResults,
  now: Date = new Date()
): Report[] {
  const base = {
    assessmentId: assessment.id,
    studentId: student.id,
    generatedAt: now.toISOString(),
  };
  return [
    { ...base, id: randomUUID(), type: "student", content: buildStudentReport(student, results, now) },
    { ...base, id: randomUUID(), type: "parent", content: buildParentReport(student, results, now) },
  ];
}

/**
 * Counts and the most recent assessments for the admin dashboard
 */
export function buildAdminSummary(
  students: Student[],
  assessments: Assessment[],
  reportCount: number,
  now: Date = new Date(),
  adminContact?: string
): AdminSummary {
  const assessmentsByStatus: Record<AssessmentStatus, number> = {
    pending: 0,
    in_progress: 0,
    completed: 0,
    analyzed: 0,
  };
  for (const assessment of assessments) {
    assessmentsByStatus[assessment.status]++;
  }

  const namesById = new Map(students.map((s): [string, string] => [s.id, getFullName(s)]));
  const recentAssessments = [...assessments]
    .sort((a, b) => b.date.localeCompare(a.date))
    .slice(0, RECENT_ASSESSMENT_LIMIT)
    .map(a => ({
      id: a.id,
      studentId: a.studentId,
      studentName: namesById.get(a.studentId) ?? "Unknown student",
      date: a.date,
      status: a.status,
    }));

  const summary: AdminSummary = {
    date: formatReportDate(now),
    generatedAt: now.toISOString(),
    totals: {
      students: students.length,
      assessments: assessments.length,
      reports: reportCount,
    },
    assessmentsByStatus,
    recentAssessments,
  };
  if (adminContact) {
    summary.adminContact = adminContact;
  }
  return summary;
}
