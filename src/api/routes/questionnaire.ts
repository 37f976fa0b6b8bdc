import { Router } from "express";
import {
  MAX_STUDENT_AGE,
  MIN_STUDENT_AGE,
  getAgeGroup,
  getParentQuestions,
  getQuestionsForAge,
} from "../../domain/questionnaire";

export function createQuestionnaireRouter(): Router {
  const router = Router();

  // GET /api/questionnaire?age=N - Questions for a student of that age
  router.get("/", (req, res) => {
    try {
      const age = Number(req.query.age);
      if (!Number.isInteger(age) || age < MIN_STUDENT_AGE || age > MAX_STUDENT_AGE) {
        return res.status(400).json({
          error: `age must be a whole number between ${MIN_STUDENT_AGE} and ${MAX_STUDENT_AGE}`,
        });
      }

      res.json({
        age,
        ageGroup: getAgeGroup(age),
        questions: getQuestionsForAge(age),
      });
    } catch (error) {
      console.error("Error fetching questionnaire:", error);
      res.status(500).json({ error: "Failed to fetch questionnaire" });
    }
  });

  // GET /api/questionnaire/parent - Parent mirror questionnaire
  router.get("/parent", (req, res) => {
    try {
      res.json({ questions: getParentQuestions() });
    } catch (error) {
      console.error("Error fetching parent questionnaire:", error);
      res.status(500).json({ error: "Failed to fetch parent questionnaire" });
    }
  });

  return router;
}
