import { Router } from "express";
import { validateStudentInput } from "../../domain/student";
import { AssessmentStore } from "../../stores/assessmentStore";
import { StudentStore } from "../../stores/studentStore";
import { handleRouteError } from "../handleError";

export function createStudentsRouter(studentStore: StudentStore, assessmentStore: AssessmentStore): Router {
  const router = Router();

  // GET /api/students - List all students
  router.get("/", (req, res) => {
    try {
      const students = studentStore.getAll();
      res.json(students);
    } catch (error) {
      console.error("Error fetching students:", error);
      res.status(500).json({ error: "Failed to fetch students" });
    }
  });

  // POST /api/students - Register a student
  router.post("/", (req, res) => {
    try {
      const input = validateStudentInput(req.body);
      const student = studentStore.create(input);
      res.status(201).json(student);
    } catch (error) {
      handleRouteError(res, error, "Error creating student", "Failed to create student");
    }
  });

  // GET /api/students/:id - Get student by ID, with their assessments
  router.get("/:id", (req, res) => {
    try {
      const student = studentStore.load(req.params.id);
      if (!student) {
        return res.status(404).json({ error: "Student not found" });
      }

      const assessments = assessmentStore.findByStudent(student.id).map(a => ({
        id: a.id,
        date: a.date,
        status: a.status,
      }));
      res.json({ ...student, assessments });
    } catch (error) {
      console.error("Error fetching student:", error);
      res.status(500).json({ error: "Failed to fetch student" });
    }
  });

  return router;
}
