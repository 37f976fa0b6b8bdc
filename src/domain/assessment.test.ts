import {
  Assessment,
  assertCanAnalyze,
  assertCanReport,
  createAssessment,
  isComplete,
  isSameRevision,
  markAnalyzed,
  openQuestionnaire,
  recordResponses,
  validateResponses,
} from "./assessment";
import { AssessmentStateError, AssessmentValidationError } from "./errors";
import { makeDiagnosticResults, middleSchoolResponses } from "../testing/fixtures";

const NOW = new Date("2025-03-05T10:00:00.000Z");
const LATER = new Date("2025-03-05T11:00:00.000Z");

function validationDetails(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof AssessmentValidationError) {
      return error.details;
    }
    throw error;
  }
  throw new Error("Expected a validation error");
}

describe("assessment lifecycle", () => {
  let assessment: Assessment;

  beforeEach(() => {
    assessment = createAssessment("student-1", NOW);
  });

  it("starts pending with no answers", () => {
    expect(assessment.status).toBe("pending");
    expect(assessment.studentId).toBe("student-1");
    expect(assessment.date).toBe("2025-03-05T10:00:00.000Z");
    expect(assessment.studentResponses).toEqual({});
  });

  it("moves to in_progress when the questionnaire is opened", () => {
    const opened = openQuestionnaire(assessment, LATER);

    expect(opened.status).toBe("in_progress");
    expect(opened.updatedAt).toBe(LATER.toISOString());
  });

  it("leaves other statuses alone when reopened", () => {
    const completed: Assessment = { ...assessment, status: "completed" };

    expect(openQuestionnaire(completed, LATER)).toBe(completed);
  });

  it("stays in_progress until every required question is answered", () => {
    const partial = recordResponses(assessment, { age: 12 }, { studentResponses: { ls_1: 0 } }, LATER);

    expect(partial.status).toBe("in_progress");
    expect(partial.studentResponses).toEqual({ ls_1: 0 });
  });

  it("completes once all required questions are answered", () => {
    const done = recordResponses(assessment, { age: 12 }, { studentResponses: middleSchoolResponses }, LATER);

    expect(done.status).toBe("completed");
  });

  it("merges answers across submissions, later answers winning", () => {
    const first = recordResponses(assessment, { age: 12 }, { studentResponses: { ls_1: 0, ls_2: 1 } });
    const second = recordResponses(first, { age: 12 }, {
      studentResponses: { ls_1: 3 },
      parentResponses: { parent_1: 2 },
    });

    expect(second.studentResponses).toEqual({ ls_1: 3, ls_2: 1 });
    expect(second.parentResponses).toEqual({ parent_1: 2 });
  });

  it("clears stored results when answers change after analysis", () => {
    const done = recordResponses(assessment, { age: 12 }, { studentResponses: middleSchoolResponses });
    const analyzed = markAnalyzed(done, makeDiagnosticResults(), LATER);

    const changed = recordResponses(analyzed, { age: 12 }, { studentResponses: { ls_1: 1 } });

    expect(analyzed.status).toBe("analyzed");
    expect(changed.status).toBe("completed");
    expect(changed.results).toBeUndefined();
  });

  it("only analyzes completed or analyzed assessments", () => {
    expect(() => assertCanAnalyze(assessment)).toThrow(AssessmentStateError);
    expect(() => assertCanAnalyze({ ...assessment, status: "completed" })).not.toThrow();
    expect(() => assertCanAnalyze({ ...assessment, status: "analyzed" })).not.toThrow();
  });

  it("only reports on analyzed assessments", () => {
    expect(() => assertCanReport({ ...assessment, status: "completed" })).toThrow(
      /must be analyzed before reports can be generated/
    );
  });

  it("knows when the questionnaire is complete", () => {
    expect(isComplete(middleSchoolResponses, 12)).toBe(true);
    // the high school questionnaire has more questions
    expect(isComplete(middleSchoolResponses, 16)).toBe(false);
  });
});

describe("validateResponses", () => {
  it("accepts student and parent answers", () => {
    const submission = validateResponses(
      { studentResponses: { ls_1: 0, high_3: "Build apps" }, parentResponses: { parent_1: 3 } },
      16
    );

    expect(submission).toEqual({
      studentResponses: { ls_1: 0, high_3: "Build apps" },
      parentResponses: { parent_1: 3 },
    });
  });

  it("drops fields other than student and parent answers", () => {
    expect(validateResponses({ studentResponses: { ls_1: 0 }, teacherResponses: { t1: 1 } }, 12)).toEqual({
      studentResponses: { ls_1: 0 },
    });
  });

  it("requires at least one answer", () => {
    expect(validationDetails(() => validateResponses({}, 12))).toEqual(["At least one response is required"]);
    expect(validationDetails(() => validateResponses({ studentResponses: {} }, 12))).toEqual([
      "At least one response is required",
    ]);
  });

  it("rejects a body that is not an object", () => {
    expect(validationDetails(() => validateResponses([1, 2], 12))).toEqual(["Request body must be an object"]);
  });

  it("collects every problem", () => {
    const details = validationDetails(() =>
      validateResponses(
        {
          studentResponses: { ls_1: 4, ls_2: 1.5, ls_3: "0", high_1: 0, nope: 1 },
          parentResponses: { parent_1: -1 },
        },
        12
      )
    );

    expect(details).toEqual([
      "studentResponses.ls_1: answer must be an option index from 0 to 3",
      "studentResponses.ls_2: answer must be an option index from 0 to 3",
      "studentResponses.ls_3: answer must be an option index from 0 to 3",
      "studentResponses.high_1: unknown question",
      "studentResponses.nope: unknown question",
      "parentResponses.parent_1: answer must be an option index from 0 to 3",
    ]);
  });

  it("requires text for open-ended questions", () => {
    expect(validationDetails(() => validateResponses({ studentResponses: { high_8: 2 } }, 16))).toEqual([
      "studentResponses.high_8: answer must be text",
    ]);
  });

  it("rejects answers that are not keyed by question id", () => {
    expect(validationDetails(() => validateResponses({ studentResponses: [0, 1] }, 12))).toEqual([
      "studentResponses must be an object keyed by question id",
    ]);
  });
});

describe("isSameRevision", () => {
  const base = recordResponses(
    createAssessment("student-1", NOW),
    { age: 12 },
    { studentResponses: middleSchoolResponses },
    NOW
  );

  it("matches an identical copy", () => {
    expect(isSameRevision(base, JSON.parse(JSON.stringify(base)))).toBe(true);
  });

  it("detects answers recorded in the same instant", () => {
    const changed = recordResponses(base, { age: 12 }, { parentResponses: { parent_1: 0 } }, NOW);

    expect(changed.updatedAt).toBe(base.updatedAt);
    expect(isSameRevision(base, changed)).toBe(false);
  });

  it("detects a later update", () => {
    const changed = recordResponses(base, { age: 12 }, { studentResponses: { ls_1: 2 } }, LATER);

    expect(isSameRevision(base, changed)).toBe(false);
  });
});
