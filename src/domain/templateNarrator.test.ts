import { NarrationInput } from "./narrator";
import { TemplateNarrator } from "./templateNarrator";
import { makeDiagnosticResults, makeStudent } from "../testing/fixtures";

function makeInput(): NarrationInput {
  const student = makeStudent();
  const results = makeDiagnosticResults(student);
  return {
    student,
    results: results.analysis,
    comparison: results.comparison,
    pathway: results.pathway,
    careers: results.careers,
    reflections: [],
  };
}

describe("TemplateNarrator", () => {
  let narrator: TemplateNarrator;

  beforeEach(() => {
    narrator = new TemplateNarrator();
  });

  it("writes the student summary", async () => {
    const narrative = await narrator.narrate(makeInput());

    expect(narrative.studentSummary).toBe(
      "Hi Jordan! You learn best as a kinesthetic learner. " +
        "Your strengths show you are a creative thinker, a persistent worker and an independent. " +
        "You are most excited about technology & computing. " +
        "A great first step on your pathway is Introduction to Coding."
    );
  });

  it("quotes the student's first reflection", async () => {
    const input = makeInput();
    input.reflections = [{ questionId: "high_8", question: "Where do you see yourself?", answer: "Making games." }];

    const narrative = await narrator.narrate(input);

    expect(narrative.studentSummary).toMatch(/You told us: "Making games\." Keep that goal in mind as you learn\.$/);
  });

  it("writes the parent summary with the comparison tally", async () => {
    const narrative = await narrator.narrate(makeInput());

    expect(narrative.parentSummary).toBe(
      "Jordan learns best as a kinesthetic learner. " +
        "Their top traits are creative thinker, persistent worker and independent. " +
        "Their profile points toward technology & computing, where careers such as " +
        "Software Developer, AI & Machine Learning Specialist and Robotics Engineer are a natural fit. " +
        "Your answers matched Jordan's results in 5 of 5 areas."
    );
  });

  it("leaves out the tally when the parent did not answer", async () => {
    const input = makeInput();
    input.comparison = { alignments: [], differences: [], insights: ["Complete the parent questionnaire."] };

    const narrative = await narrator.narrate(input);

    expect(narrative.parentSummary).toMatch(/are a natural fit\.$/);
  });

  it("handles a profile with no traits or interests", async () => {
    const input = makeInput();
    input.results = {
      ...input.results,
      traits: { topTraits: [], names: [], descriptions: [], strengths: [] },
      interests: { topInterests: [], names: [], descriptions: [], relatedCareers: [], enrichmentTracks: [] },
    };

    const narrative = await narrator.narrate(input);

    expect(narrative.studentSummary).toBe(
      "Hi Jordan! You learn best as a kinesthetic learner. " +
        "Your strengths are still taking shape, so keep exploring! " +
        "A great first step on your pathway is Introduction to Coding."
    );
  });
});
