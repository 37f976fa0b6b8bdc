import OpenAI from "openai";
import { NarrationInput, Narrative, ReportNarrator } from "./narrator";
import { TemplateNarrator } from "./templateNarrator";

/**
 * LLMNarrator asks OpenAI's GPT for warm, age-appropriate report summaries.
 * Falls back to the template narrator when the call fails or the reply
 * is missing a summary.
 */
export class LLMNarrator implements ReportNarrator {
  private client: OpenAI;
  private model: string;
  private fallback = new TemplateNarrator();

  constructor(apiKey?: string, model: string = "gpt-4o-mini") {
    this.client = new OpenAI({
      apiKey: apiKey || process.env.OPENAI_API_KEY
    });
    this.model = model;
  }

  async narrate(input: NarrationInput): Promise<Narrative> {
    const { student, results, comparison, careers, reflections } = input;

    const systemPrompt = `You write short summaries for a learning diagnostic report about a ${student.age}-year-old student in grade ${student.grade}.

Write two summaries:
- studentSummary: addressed to the student by first name, 2-4 sentences, simple words for their age, encouraging
- parentSummary: addressed to the parent, 2-4 sentences, practical and warm

Only use facts from the profile you are given. Never invent scores, diagnoses or careers.

Return JSON:
{
  "studentSummary": "<text>",
  "parentSummary": "<text>"
}`;

    const userPrompt = `STUDENT: ${student.firstName}

LEARNING STYLE: ${results.learningStyles.name} (secondary: ${results.learningStyles.secondary.join(", ") || "none"})
TOP TRAITS: ${results.traits.names.join(", ") || "none yet"}
TOP INTERESTS: ${results.interests.names.join(", ") || "none yet"}
CAREER FIELD: ${careers.primaryField}
EXAMPLE CAREERS: ${careers.primaryCareers.map(c => c.title).join(", ")}

PARENT COMPARISON:
Alignments: ${comparison.alignments.join(" ") || "(none)"}
Differences: ${comparison.differences.join(" ") || "(none)"}

STUDENT'S OWN WORDS:
${reflections.map(r => `- ${r.question} ${r.answer}`).join("\n") || "(No reflections provided)"}

Write the summaries and return JSON:`;

    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userPrompt }
        ],
        temperature: 0.3,
        response_format: { type: "json_object" }
      });

      const content = completion.choices[0]?.message?.content;
      if (!content) {
        throw new Error("No response from LLM");
      }

      const result: unknown = JSON.parse(content);
      return parseNarrative(result);
    } catch (error) {
      console.error(`Error narrating report for student ${student.id}:`, error);
      return this.fallback.narrate(input);
    }
  }
}

function parseNarrative(value: unknown): Narrative {
  if (typeof value !== "object" || value === null) {
    throw new Error("LLM response is not an object");
  }
  const studentSummary = "studentSummary" in value ? value.studentSummary : undefined;
  const parentSummary = "parentSummary" in value ? value.parentSummary : undefined;
  if (typeof studentSummary !== "string" || typeof parentSummary !== "string") {
    throw new Error("LLM response is missing a summary");
  }
  return { studentSummary: studentSummary.trim(), parentSummary: parentSummary.trim() };
}
