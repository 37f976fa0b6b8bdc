import { CourseCategory } from "./categories";

/**
 * Career Domain Model
 *
 * Careers are grouped into the same categories as courses. Each field also
 * lists college majors and non-college routes into it.
 */

export interface Career {
  title: string;
  description: string;
  educationPath: string;
  skillsNeeded: string[];
  growthOutlook: string;
}

export interface CareerField {
  title: string; // e.g. "Technology & Computing"
  description: string;
  careers: Career[];
  collegeMajors: string[];
  alternativePaths: string[];
}

export type CareerCatalog = Record<CourseCategory, CareerField>;

export interface EducationPaths {
  collegeMajors: string[];
  alternativePaths: string[];
  note: string;
}

export interface CareerAffinities {
  primaryCategory: CourseCategory;
  primaryField: string;
  primaryFieldDescription: string;
  primaryCareers: Career[];
  secondaryCategories: CourseCategory[];
  secondaryCareers: Career[];
  educationPaths: EducationPaths;
  disclaimer: string;
}
