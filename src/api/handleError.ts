import { Response } from "express";
import { AssessmentStateError, AssessmentValidationError } from "../domain/errors";

/**
 * Map a thrown error to a JSON response.
 * Domain errors carry their own status; anything else is logged as a 500.
 */
export function handleRouteError(res: Response, error: unknown, context: string, fallbackMessage: string) {
  if (error instanceof AssessmentValidationError) {
    return res.status(400).json({ error: error.message, details: error.details });
  }
  if (error instanceof AssessmentStateError) {
    return res.status(409).json({ error: error.message });
  }
  console.error(`${context}:`, error);
  return res.status(500).json({ error: fallbackMessage });
}
