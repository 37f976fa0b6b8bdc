import { config } from "../config";
import { DiagnosticService, createNarrator } from "../services/diagnosticService";
import { AssessmentStore } from "../stores/assessmentStore";
import { ReportStore } from "../stores/reportStore";
import { StudentStore } from "../stores/studentStore";
import { createApp } from "./app";

const students = new StudentStore(config.dataDir);
const assessments = new AssessmentStore(config.dataDir);
const reports = new ReportStore(config.dataDir);

const service = new DiagnosticService({
  students,
  assessments,
  reports,
  narrator: createNarrator(config),
  adminContact: config.adminEmail,
});

const app = createApp({ service, students, assessments, corsOrigins: config.corsOrigins });

// Start server
app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port} (${config.env})`);
});

export default app;
