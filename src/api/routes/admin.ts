import { Router } from "express";
import { DiagnosticService } from "../../services/diagnosticService";

export function createAdminRouter(service: DiagnosticService): Router {
  const router = Router();

  // GET /api/admin/summary - Counts and recent assessments
  router.get("/summary", (req, res) => {
    try {
      res.json(service.getAdminSummary());
    } catch (error) {
      console.error("Error building admin summary:", error);
      res.status(500).json({ error: "Failed to build admin summary" });
    }
  });

  return router;
}
