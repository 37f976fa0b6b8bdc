import { AssessmentValidationError } from "./errors";
import { MAX_STUDENT_AGE, MIN_STUDENT_AGE } from "./questionnaire";

/**
 * Student Domain Model
 *
 * A student takes one or more assessments. Parent contact details are
 * optional and only used to address the parent report.
 */

export interface Student {
  id: string;
  firstName: string;
  lastName: string;
  age: number;
  grade: string; // e.g. "7th"
  parentEmail?: string;
  parentPhone?: string;
  createdAt: string; // ISO timestamp
}

/**
 * Input type for creating a new student
 */
export interface CreateStudentInput {
  firstName: string;
  lastName: string;
  age: number;
  grade: string;
  parentEmail?: string;
  parentPhone?: string;
}

export function getFullName(student: Pick<Student, "firstName" | "lastName">): string {
  return `${student.firstName} ${student.lastName}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requiredText(body: Record<string, unknown>, field: string, problems: string[]): string {
  const value = body[field];
  if (typeof value === "number") {
    return String(value);
  }
  if (typeof value !== "string" || value.trim().length === 0) {
    problems.push(`${field} is required`);
    return "";
  }
  return value.trim();
}

function optionalText(body: Record<string, unknown>, field: string, problems: string[]): string | undefined {
  const value = body[field];
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  if (typeof value !== "string") {
    problems.push(`${field} must be a string`);
    return undefined;
  }
  return value.trim();
}

/**
 * Check a raw request body and turn it into student input.
 * Collects every problem before throwing.
 */
export function validateStudentInput(body: unknown): CreateStudentInput {
  if (!isRecord(body)) {
    throw new AssessmentValidationError("Invalid student", ["Request body must be an object"]);
  }

  const problems: string[] = [];
  const firstName = requiredText(body, "firstName", problems);
  const lastName = requiredText(body, "lastName", problems);
  const grade = requiredText(body, "grade", problems);

  const age = body.age;
  if (typeof age !== "number" || !Number.isInteger(age)) {
    problems.push("age must be a whole number");
  } else if (age < MIN_STUDENT_AGE || age > MAX_STUDENT_AGE) {
    problems.push(`age must be between ${MIN_STUDENT_AGE} and ${MAX_STUDENT_AGE}`);
  }

  const parentEmail = optionalText(body, "parentEmail", problems);
  const parentPhone = optionalText(body, "parentPhone", problems);

  if (problems.length > 0 || typeof age !== "number") {
    throw new AssessmentValidationError("Invalid student", problems);
  }

  return {
    firstName,
    lastName,
    age,
    grade,
    ...(parentEmail !== undefined ? { parentEmail } : {}),
    ...(parentPhone !== undefined ? { parentPhone } : {}),
  };
}
