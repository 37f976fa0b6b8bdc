import path from "path";
import { config } from "../config";
import { Assessment } from "../domain/assessment";
import { JsonFileStore } from "./jsonFileStore";

/**
 * AssessmentStore keeps assessments, responses and diagnostic results together.
 */
export class AssessmentStore extends JsonFileStore<Assessment> {
  constructor(dataDir: string = config.dataDir) {
    super(path.join(dataDir, "assessments"));
  }

  /**
   * A student's assessments, newest first
   */
  findByStudent(studentId: string): Assessment[] {
    return this.getAll()
      .filter(a => a.studentId === studentId)
      .sort((a, b) => b.date.localeCompare(a.date));
  }
}
