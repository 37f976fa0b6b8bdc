import fs from "fs";
import path from "path";
import { QuestionBank } from "../domain/questionnaire";
import { ProfileCatalog } from "../domain/learningProfile";
import { BadgeCatalog } from "../domain/badge";
import { Course, CourseLevel } from "../domain/course";
import { CareerCatalog } from "../domain/career";
import { CourseCategory } from "../domain/categories";
import { MathCatalog } from "../domain/mathPathway";
import { ExamCatalog } from "../domain/examRecommender";

const CATALOG_DIR = path.join(__dirname, "../../catalog");

/**
 * Catalog Loader - reads the static JSON that drives scoring and recommendations
 *
 * - questions.json: question bank per age group, plus the parent questionnaire
 * - profiles.json: learning style, trait and interest descriptions
 * - badges.json: badge per tag, plus combination badges
 * - courses.json: course catalog (category, level, age range, fit tags)
 * - careers.json: career fields with careers and education paths
 * - mathPathways.json: Abacus, Vedic and integrated math tracks, their courses and contests
 * - exams.json: exams per age band and category, with weights and advice
 *
 * Each file is read once and kept for the life of the process.
 */

function readCatalogFile<T>(fileName: string): T {
  const filePath = path.join(CATALOG_DIR, fileName);
  const data: T = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return data;
}

let questionBank: QuestionBank | null = null;
let profileCatalog: ProfileCatalog | null = null;
let badgeCatalog: BadgeCatalog | null = null;
let careerCatalog: CareerCatalog | null = null;
let courseCatalog: Course[] | null = null;
let mathCatalog: MathCatalog | null = null;
let examCatalog: ExamCatalog | null = null;

export function loadQuestionBank(): QuestionBank {
  questionBank ??= readCatalogFile<QuestionBank>("questions.json");
  return questionBank;
}

export function loadProfileCatalog(): ProfileCatalog {
  profileCatalog ??= readCatalogFile<ProfileCatalog>("profiles.json");
  return profileCatalog;
}

export function loadBadgeCatalog(): BadgeCatalog {
  badgeCatalog ??= readCatalogFile<BadgeCatalog>("badges.json");
  return badgeCatalog;
}

export function loadCareerCatalog(): CareerCatalog {
  careerCatalog ??= readCatalogFile<CareerCatalog>("careers.json");
  return careerCatalog;
}

export function loadCourseCatalog(): Course[] {
  courseCatalog ??= readCatalogFile<Course[]>("courses.json");
  return courseCatalog;
}

export function loadMathCatalog(): MathCatalog {
  mathCatalog ??= readCatalogFile<MathCatalog>("mathPathways.json");
  return mathCatalog;
}

export function loadExamCatalog(): ExamCatalog {
  examCatalog ??= readCatalogFile<ExamCatalog>("exams.json");
  return examCatalog;
}

/**
 * Courses in a category at a level, in catalog order
 */
export function getCoursesAt(category: CourseCategory, level: CourseLevel): Course[] {
  return loadCourseCatalog().filter(c => c.category === category && c.level === level);
}
