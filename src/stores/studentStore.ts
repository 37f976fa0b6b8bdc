import path from "path";
import { randomUUID } from "crypto";
import { config } from "../config";
import { CreateStudentInput, Student } from "../domain/student";
import { JsonFileStore } from "./jsonFileStore";

/**
 * StudentStore handles saving and loading students.
 */
export class StudentStore extends JsonFileStore<Student> {
  constructor(dataDir: string = config.dataDir) {
    super(path.join(dataDir, "students"));
  }

  /**
   * Create and save a new student
   */
  create(input: CreateStudentInput, now: Date = new Date()): Student {
    const student: Student = {
      id: randomUUID(),
      ...input,
      createdAt: now.toISOString(),
    };
    this.save(student);
    return student;
  }
}
