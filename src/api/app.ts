import express, { Express, NextFunction, Request, Response } from "express";
import cors from "cors";

import { DiagnosticService } from "../services/diagnosticService";
import { AssessmentStore } from "../stores/assessmentStore";
import { StudentStore } from "../stores/studentStore";
import { createAdminRouter } from "./routes/admin";
import { createAssessmentsRouter } from "./routes/assessments";
import { createQuestionnaireRouter } from "./routes/questionnaire";
import { createStudentsRouter } from "./routes/students";

export interface AppDeps {
  service: DiagnosticService;
  students: StudentStore;
  assessments: AssessmentStore;
  corsOrigins: string[];
}

function httpStatusOf(error: unknown): number {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return 500;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: deps.corsOrigins,
    credentials: true,
  }));
  app.use(express.json({ limit: "100kb" }));

  // Routes
  app.use("/api/questionnaire", createQuestionnaireRouter());
  app.use("/api/students", createStudentsRouter(deps.students, deps.assessments));
  app.use("/api/assessments", createAssessmentsRouter(deps.service, deps.assessments));
  app.use("/api/admin", createAdminRouter(deps.service));

  // Health check
  app.get("/api/health", (req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Unknown routes
  app.use((req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Malformed JSON bodies
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (error instanceof SyntaxError) {
      return res.status(400).json({ error: "Request body is not valid JSON" });
    }
    next(error);
  });

  // Body parser rejections (e.g. 413) keep their status; anything else is a 500
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }
    const status = httpStatusOf(error);
    if (status >= 400 && status < 500) {
      return res.status(status).json({ error: error instanceof Error ? error.message : "Bad request" });
    }
    console.error("Unhandled error:", error);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
