import { Router } from "express";
import { DiagnosticService } from "../../services/diagnosticService";
import { AssessmentStore } from "../../stores/assessmentStore";
import { handleRouteError } from "../handleError";

const NOT_FOUND = { error: "Assessment not found" };

export function createAssessmentsRouter(service: DiagnosticService, assessmentStore: AssessmentStore): Router {
  const router = Router();

  // GET /api/assessments - List assessments (optionally ?studentId=)
  router.get("/", (req, res) => {
    try {
      const { studentId } = req.query;
      const assessments =
        typeof studentId === "string" ? assessmentStore.findByStudent(studentId) : assessmentStore.getAll();
      res.json(assessments);
    } catch (error) {
      console.error("Error fetching assessments:", error);
      res.status(500).json({ error: "Failed to fetch assessments" });
    }
  });

  // POST /api/assessments - Start an assessment for a student
  router.post("/", (req, res) => {
    try {
      const studentId: unknown = req.body?.studentId;
      if (typeof studentId !== "string" || studentId.trim().length === 0) {
        return res.status(400).json({ error: "studentId is required" });
      }

      const assessment = service.startAssessment(studentId.trim());
      if (!assessment) {
        return res.status(404).json({ error: "Student not found" });
      }
      res.status(201).json(assessment);
    } catch (error) {
      handleRouteError(res, error, "Error creating assessment", "Failed to create assessment");
    }
  });

  // GET /api/assessments/:id - Get assessment by ID
  router.get("/:id", (req, res) => {
    try {
      const assessment = assessmentStore.load(req.params.id);
      if (!assessment) {
        return res.status(404).json(NOT_FOUND);
      }
      res.json(assessment);
    } catch (error) {
      console.error("Error fetching assessment:", error);
      res.status(500).json({ error: "Failed to fetch assessment" });
    }
  });

  // GET /api/assessments/:id/questionnaire - Questions for this assessment
  router.get("/:id/questionnaire", (req, res) => {
    try {
      const questionnaire = service.openQuestionnaire(req.params.id);
      if (!questionnaire) {
        return res.status(404).json(NOT_FOUND);
      }
      res.json(questionnaire);
    } catch (error) {
      handleRouteError(res, error, "Error opening questionnaire", "Failed to open questionnaire");
    }
  });

  // POST /api/assessments/:id/responses - Record student and/or parent answers
  router.post("/:id/responses", (req, res) => {
    try {
      const assessment = service.submitResponses(req.params.id, req.body);
      if (!assessment) {
        return res.status(404).json(NOT_FOUND);
      }
      res.json(assessment);
    } catch (error) {
      handleRouteError(res, error, "Error recording responses", "Failed to record responses");
    }
  });

  // POST /api/assessments/:id/analyze - Score a completed assessment
  router.post("/:id/analyze", async (req, res) => {
    try {
      const assessment = await service.analyzeAssessment(req.params.id);
      if (!assessment) {
        return res.status(404).json(NOT_FOUND);
      }
      res.json(assessment);
    } catch (error) {
      handleRouteError(res, error, "Error analyzing assessment", "Failed to analyze assessment");
    }
  });

  // POST /api/assessments/:id/reports - Build student and parent reports
  router.post("/:id/reports", (req, res) => {
    try {
      const reports = service.generateReports(req.params.id);
      if (!reports) {
        return res.status(404).json(NOT_FOUND);
      }
      res.status(201).json(reports);
    } catch (error) {
      handleRouteError(res, error, "Error generating reports", "Failed to generate reports");
    }
  });

  // GET /api/assessments/:id/reports - Stored reports (optionally ?type=student|parent)
  router.get("/:id/reports", (req, res) => {
    try {
      const reports = service.listReports(req.params.id);
      if (!reports) {
        return res.status(404).json(NOT_FOUND);
      }
      const { type } = req.query;
      res.json(typeof type === "string" ? reports.filter(r => r.type === type) : reports);
    } catch (error) {
      console.error("Error fetching reports:", error);
      res.status(500).json({ error: "Failed to fetch reports" });
    }
  });

  return router;
}
