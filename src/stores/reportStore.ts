import path from "path";
import { config } from "../config";
import { Report } from "../domain/report";
import { JsonFileStore } from "./jsonFileStore";

export class ReportStore extends JsonFileStore<Report> {
  constructor(dataDir: string = config.dataDir) {
    super(path.join(dataDir, "reports"));
  }

  findByAssessment(assessmentId: string): Report[] {
    return this.getAll().filter(r => r.assessmentId === assessmentId);
  }

  /**
   * Replace every stored report for an assessment with a new set
   */
  replaceForAssessment(assessmentId: string, reports: Report[]): void {
    for (const existing of this.findByAssessment(assessmentId)) {
      this.delete(existing.id);
    }
    for (const report of reports) {
      this.save(report);
    }
  }
}
