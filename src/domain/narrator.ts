import { AnalysisResults, ParentComparison, Reflection } from "./analysis";
import { CareerAffinities } from "./career";
import { Pathway } from "./pathway";
import { Student } from "./student";

export interface NarrationInput {
  student: Student;
  results: AnalysisResults;
  comparison: ParentComparison;
  pathway: Pathway;
  careers: CareerAffinities;
  reflections: Reflection[];
}

export interface Narrative {
  studentSummary: string; // addressed to the student
  parentSummary: string; // addressed to the parent
}

export interface ReportNarrator {
  /**
   * Write the short summaries shown at the top of the reports.
   * Returns a promise since real narrators may call external APIs.
   */
  narrate(input: NarrationInput): Promise<Narrative>;
}
