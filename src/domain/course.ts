import { CourseCategory } from "./categories";
import { LearningStyle } from "./learningProfile";

/**
 * Course Domain Model
 *
 * One catalog feeds both the 3-step pathway (by category and level)
 * and the fit-scored course recommendations.
 */

export type CourseLevel = "entry" | "intermediate" | "advanced";

export interface Course {
  id: string; // e.g. "TECH101"
  category: CourseCategory;
  level: CourseLevel;
  title: string;
  description: string;
  benefits: string;
  duration: string; // e.g. "8 weeks"
  minAge: number;
  maxAge: number;
  learningStyles: LearningStyle[];
  traits: string[];
  discountEligible: boolean;
  popularity: number; // 0-100
}

/**
 * A catalog course chosen for a student, with the reasoning attached.
 */
export interface RecommendedCourse extends Course {
  fitScore: number;
  personalizedBenefit: string;
}

/**
 * Shown in a pathway step when a category has no course at that level.
 */
export interface UnavailableCourse {
  id: "N/A";
  title: string;
  description: string;
  benefits: string;
  duration: "N/A";
}

export type PathwayCourse = Course | UnavailableCourse;

export const COURSE_NOT_AVAILABLE: UnavailableCourse = {
  id: "N/A",
  title: "Course Not Available",
  description: "No suitable course found for this category and level.",
  benefits: "Please contact an advisor for alternatives.",
  duration: "N/A",
};

export function isAgeAppropriate(course: Course, age: number): boolean {
  return age >= course.minAge && age <= course.maxAge;
}

export function isPlaceholderCourse(course: PathwayCourse): course is UnavailableCourse {
  return course.id === COURSE_NOT_AVAILABLE.id;
}
