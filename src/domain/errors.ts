/**
 * Errors raised by the assessment domain. Route handlers map them to
 * HTTP status codes: validation -> 400, state -> 409.
 */

export class AssessmentValidationError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = "AssessmentValidationError";
    this.details = details;
  }
}

export class AssessmentStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AssessmentStateError";
  }
}
