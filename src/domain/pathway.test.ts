import * as catalogLoader from "../loaders/catalogLoader";
import { analyzeResponses } from "./analysis";
import { COURSE_NOT_AVAILABLE, isPlaceholderCourse } from "./course";
import { determineSecondaryCategory, generatePathway, selectCourse } from "./pathway";
import { makeResults, middleSchoolResponses } from "../testing/fixtures";

describe("generatePathway", () => {
  it("builds three steps in the primary category", () => {
    const pathway = generatePathway({ age: 12 }, analyzeResponses(middleSchoolResponses, 12));

    expect(pathway.primaryCategory).toBe("tech");
    expect(pathway.secondaryCategory).toBe("science");
    expect(pathway.step1.title).toBe("Building Your Foundation");
    expect(pathway.step1.primaryCourse.id).toBe("TECH101");
    expect(pathway.step1.complementaryCourse.id).toBe("SCI101");
    expect(pathway.step2.title).toBe("Expanding Your Skills");
    expect(pathway.step2.course.id).toBe("TECH201");
    expect(pathway.step3.title).toBe("Specializing Your Expertise");
    // No advanced tech course takes 12-year-olds, so the first one is used
    expect(pathway.step3.course.id).toBe("TECH301");
  });

  it("picks the first course that fits the student's age", () => {
    const pathway = generatePathway({ age: 16 }, makeResults({ primary: "visual", interests: ["arts"] }));

    expect(pathway.primaryCategory).toBe("arts");
    expect(pathway.secondaryCategory).toBe("tech");
    expect(pathway.step1.primaryCourse.id).toBe("ARTS101");
    expect(pathway.step1.complementaryCourse.id).toBe("TECH102");
    expect(pathway.step2.course.id).toBe("ARTS201");
    expect(pathway.step3.course.id).toBe("ARTS301");
  });
});

describe("determineSecondaryCategory", () => {
  it("prefers another interest", () => {
    const results = makeResults({ primary: "visual", interests: ["tech", "math", "language"] });

    expect(determineSecondaryCategory("tech", results)).toBe("language");
  });

  it("falls back to the learning style's categories", () => {
    const results = makeResults({ primary: "logical", interests: ["science"] });

    expect(determineSecondaryCategory("science", results)).toBe("tech");
  });
});

describe("selectCourse", () => {
  it("uses the first course at the level when none fits the age", () => {
    expect(selectCourse("tech", "entry", 5).id).toBe("TECH101");
  });

  it("marks the placeholder course", () => {
    expect(isPlaceholderCourse(COURSE_NOT_AVAILABLE)).toBe(true);
    expect(isPlaceholderCourse(selectCourse("arts", "entry", 10))).toBe(false);
  });

  it("returns the placeholder when the catalog has nothing at the level", () => {
    const spy = jest.spyOn(catalogLoader, "getCoursesAt").mockReturnValue([]);

    const course = selectCourse("language", "advanced", 12);

    expect(course).toBe(COURSE_NOT_AVAILABLE);
    expect(isPlaceholderCourse(course)).toBe(true);
    expect(course.title).toBe("Course Not Available");
    expect(spy).toHaveBeenCalledWith("language", "advanced");
    spy.mockRestore();
  });

  it("fills every step with the placeholder for an empty catalog", () => {
    const spy = jest.spyOn(catalogLoader, "getCoursesAt").mockReturnValue([]);

    const pathway = generatePathway({ age: 12 }, makeResults({ primary: "visual", interests: ["arts"] }));

    expect(pathway.step1.primaryCourse.id).toBe("N/A");
    expect(pathway.step1.complementaryCourse.id).toBe("N/A");
    expect(pathway.step2.course.id).toBe("N/A");
    expect(pathway.step3.course.id).toBe("N/A");
    spy.mockRestore();
  });
});
