import fs from "fs";
import os from "os";
import path from "path";
import { DiagnosticService, createNarrator } from "./diagnosticService";
import { loadConfig } from "../config";
import { AssessmentStateError, AssessmentValidationError } from "../domain/errors";
import { LLMNarrator } from "../domain/llmNarrator";
import { NarrationInput, Narrative, ReportNarrator } from "../domain/narrator";
import { TemplateNarrator } from "../domain/templateNarrator";
import { AssessmentStore } from "../stores/assessmentStore";
import { ReportStore } from "../stores/reportStore";
import { StudentStore } from "../stores/studentStore";
import { matchingParentResponses, middleSchoolResponses } from "../testing/fixtures";

const NOW = new Date("2025-03-05T10:00:00.000Z");

describe("DiagnosticService", () => {
  let dataDir: string;
  let students: StudentStore;
  let assessments: AssessmentStore;
  let reports: ReportStore;
  let service: DiagnosticService;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "learninglens-service-"));
    students = new StudentStore(dataDir);
    assessments = new AssessmentStore(dataDir);
    reports = new ReportStore(dataDir);
    service = new DiagnosticService({
      students,
      assessments,
      reports,
      narrator: new TemplateNarrator(),
      clock: () => NOW,
      adminContact: "admin@example.com",
    });
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  function registerJordan() {
    return students.create(
      { firstName: "Jordan", lastName: "Rivera", age: 12, grade: "7th", parentEmail: "parent@example.com" },
      NOW
    );
  }

  describe("startAssessment", () => {
    it("creates a pending assessment for a known student", () => {
      const student = registerJordan();

      const assessment = service.startAssessment(student.id);

      expect(assessment).not.toBeNull();
      expect(assessment?.status).toBe("pending");
      expect(assessment?.date).toBe(NOW.toISOString());
      expect(assessments.load(assessment?.id ?? "")).toEqual(assessment);
    });

    it("returns null for an unknown student", () => {
      expect(service.startAssessment("missing")).toBeNull();
      expect(assessments.getAll()).toEqual([]);
    });
  });

  describe("openQuestionnaire", () => {
    it("moves a pending assessment to in_progress and returns the questions for the student's age", () => {
      const student = registerJordan();
      const started = service.startAssessment(student.id);

      const questionnaire = service.openQuestionnaire(started?.id ?? "");

      expect(questionnaire?.assessment.status).toBe("in_progress");
      expect(questionnaire?.questions.map(q => q.id)).toContain("mid_1");
      expect(questionnaire?.questions.map(q => q.id)).not.toContain("high_1");
      expect(questionnaire?.parentQuestions).toHaveLength(5);
      expect(assessments.load(started?.id ?? "")?.status).toBe("in_progress");
    });

    it("returns null for an unknown assessment", () => {
      expect(service.openQuestionnaire("missing")).toBeNull();
    });
  });

  describe("submitResponses", () => {
    it("records partial answers as in progress", () => {
      const student = registerJordan();
      const started = service.startAssessment(student.id);

      const updated = service.submitResponses(started?.id ?? "", { studentResponses: { ls_1: 2 } });

      expect(updated?.status).toBe("in_progress");
      expect(updated?.studentResponses).toEqual({ ls_1: 2 });
    });

    it("completes the assessment once every required question is answered", () => {
      const student = registerJordan();
      const started = service.startAssessment(student.id);

      const updated = service.submitResponses(started?.id ?? "", {
        studentResponses: middleSchoolResponses,
        parentResponses: matchingParentResponses,
      });

      expect(updated?.status).toBe("completed");
      expect(assessments.load(started?.id ?? "")?.parentResponses).toEqual(matchingParentResponses);
    });

    it("rejects invalid answers without saving them", () => {
      const student = registerJordan();
      const started = service.startAssessment(student.id);

      expect(() => service.submitResponses(started?.id ?? "", { studentResponses: { ls_1: 9 } })).toThrow(
        AssessmentValidationError
      );
      expect(assessments.load(started?.id ?? "")?.studentResponses).toEqual({});
    });

    it("returns null for an unknown assessment", () => {
      expect(service.submitResponses("missing", { studentResponses: { ls_1: 0 } })).toBeNull();
    });
  });

  describe("analyzeAssessment", () => {
    it("refuses to analyze an incomplete assessment", async () => {
      const student = registerJordan();
      const started = service.startAssessment(student.id);

      await expect(service.analyzeAssessment(started?.id ?? "")).rejects.toThrow(AssessmentStateError);
    });

    it("stores the diagnostic results and marks the assessment analyzed", async () => {
      const student = registerJordan();
      const started = service.startAssessment(student.id);
      service.submitResponses(started?.id ?? "", {
        studentResponses: middleSchoolResponses,
        parentResponses: matchingParentResponses,
      });

      const analyzed = await service.analyzeAssessment(started?.id ?? "");

      expect(analyzed?.status).toBe("analyzed");
      const results = analyzed?.results;
      expect(results?.analysis.learningStyles.primary).toBe("kinesthetic");
      expect(results?.analysis.interests.topInterests).toEqual(["tech"]);
      expect(results?.badges.primaryBadge.title).toBe("Hands-On Hero");
      expect(results?.pathway.primaryCategory).toBe("tech");
      expect(results?.recommendedCourses.map(c => c.id)).toEqual(["TECH101", "TECH102", "SCI101"]);
      expect(results?.mathPathway.type).toBe("integrated");
      expect(results?.examRecommendations.ageGroup).toBe("middle");
      expect(results?.comparison.alignments).toHaveLength(5);
      expect(results?.narrative.studentSummary).toMatch(/^Hi Jordan! You learn best as a kinesthetic learner\./);
      expect(results?.analyzedAt).toBe(NOW.toISOString());
      expect(assessments.load(started?.id ?? "")?.status).toBe("analyzed");
      expect(logSpy).toHaveBeenCalledWith(
        `Analyzed assessment ${started?.id}: kinesthetic learner, pathway tech`
      );
    });

    it("returns null for an unknown assessment", async () => {
      await expect(service.analyzeAssessment("missing")).resolves.toBeNull();
    });

    it("refuses to store results when answers arrive during analysis", async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      const slowNarrator: ReportNarrator = {
        async narrate(input: NarrationInput): Promise<Narrative> {
          await gate;
          return new TemplateNarrator().narrate(input);
        },
      };
      const slowService = new DiagnosticService({
        students,
        assessments,
        reports,
        narrator: slowNarrator,
        clock: () => NOW,
      });

      const student = registerJordan();
      const assessmentId = slowService.startAssessment(student.id)?.id ?? "";
      slowService.submitResponses(assessmentId, { studentResponses: middleSchoolResponses });

      const analysis = slowService.analyzeAssessment(assessmentId);
      slowService.submitResponses(assessmentId, {
        studentResponses: { ls_1: 0 },
        parentResponses: { parent_1: 0 },
      });
      release();

      await expect(analysis).rejects.toThrow(AssessmentStateError);
      const stored = assessments.load(assessmentId);
      expect(stored?.status).toBe("completed");
      expect(stored?.studentResponses.ls_1).toBe(0);
      expect(stored?.parentResponses).toEqual({ parent_1: 0 });
      expect(stored?.results).toBeUndefined();
    });

    it("re-analyzes an already analyzed assessment", async () => {
      const student = registerJordan();
      const assessmentId = service.startAssessment(student.id)?.id ?? "";
      service.submitResponses(assessmentId, { studentResponses: middleSchoolResponses });
      await service.analyzeAssessment(assessmentId);

      const again = await service.analyzeAssessment(assessmentId);

      expect(again?.status).toBe("analyzed");
    });
  });

  describe("generateReports", () => {
    async function analyzedAssessmentId(): Promise<{ assessmentId: string; studentId: string }> {
      const student = registerJordan();
      const started = service.startAssessment(student.id);
      const assessmentId = started?.id ?? "";
      service.submitResponses(assessmentId, {
        studentResponses: middleSchoolResponses,
        parentResponses: matchingParentResponses,
      });
      await service.analyzeAssessment(assessmentId);
      return { assessmentId, studentId: student.id };
    }

    it("refuses to build reports before analysis", () => {
      const student = registerJordan();
      const started = service.startAssessment(student.id);

      expect(() => service.generateReports(started?.id ?? "")).toThrow(AssessmentStateError);
    });

    it("builds and stores a student report and a parent report", async () => {
      const { assessmentId, studentId } = await analyzedAssessmentId();

      const built = service.generateReports(assessmentId);

      expect(built?.map(r => r.type)).toEqual(["student", "parent"]);
      const parent = built?.find(r => r.type === "parent");
      expect(parent?.type === "parent" && parent.content.reportId).toBe(`SPR-20250305-${studentId}`);
      expect(parent?.type === "parent" && parent.content.parentEmail).toBe("parent@example.com");
      expect(service.listReports(assessmentId)).toHaveLength(2);
    });

    it("replaces earlier reports when regenerated", async () => {
      const { assessmentId } = await analyzedAssessmentId();

      const first = service.generateReports(assessmentId) ?? [];
      const second = service.generateReports(assessmentId) ?? [];

      const storedIds = (service.listReports(assessmentId) ?? []).map(r => r.id).sort();
      expect(storedIds).toEqual(second.map(r => r.id).sort());
      expect(storedIds).not.toContain(first[0].id);
    });

    it("returns null for an unknown assessment", () => {
      expect(service.generateReports("missing")).toBeNull();
      expect(service.listReports("missing")).toBeNull();
    });
  });

  describe("getAdminSummary", () => {
    it("counts students, assessments and reports", () => {
      const student = registerJordan();
      service.startAssessment(student.id);

      const summary = service.getAdminSummary();

      expect(summary.date).toBe("March 05, 2025");
      expect(summary.totals).toEqual({ students: 1, assessments: 1, reports: 0 });
      expect(summary.assessmentsByStatus.pending).toBe(1);
      expect(summary.recentAssessments[0].studentName).toBe("Jordan Rivera");
      expect(summary.adminContact).toBe("admin@example.com");
    });
  });
});

describe("createNarrator", () => {
  it("uses the template narrator by default", () => {
    expect(createNarrator(loadConfig({}))).toBeInstanceOf(TemplateNarrator);
  });

  it("uses the LLM narrator when asked and a key is set", () => {
    const config = loadConfig({ NARRATOR: "llm", OPENAI_API_KEY: "test-key" });

    expect(createNarrator(config)).toBeInstanceOf(LLMNarrator);
  });

  it("falls back to the template narrator with a warning when the key is missing", () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);

    expect(createNarrator(loadConfig({ NARRATOR: "llm" }))).toBeInstanceOf(TemplateNarrator);
    expect(warn).toHaveBeenCalledWith("NARRATOR=llm but OPENAI_API_KEY is not set; using template narrator");
    warn.mockRestore();
  });
});
