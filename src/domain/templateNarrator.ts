import { joinList, withArticle } from "./learningProfile";
import { NarrationInput, Narrative, ReportNarrator } from "./narrator";

/**
 * TemplateNarrator builds the report summaries from fixed sentences.
 * Deterministic, so it is the default and the fallback for the LLM narrator.
 */
export class TemplateNarrator implements ReportNarrator {
  async narrate(input: NarrationInput): Promise<Narrative> {
    return {
      studentSummary: this.studentSummary(input),
      parentSummary: this.parentSummary(input),
    };
  }

  private studentSummary({ student, results, pathway, reflections }: NarrationInput): string {
    const sentences = [
      `Hi ${student.firstName}! You learn best as ${withArticle(results.learningStyles.name.toLowerCase())}.`,
    ];

    const strengths = results.traits.names.map(n => n.toLowerCase());
    sentences.push(
      strengths.length > 0
        ? `Your strengths show you are ${joinList(strengths.map(withArticle))}.`
        : "Your strengths are still taking shape, so keep exploring!"
    );

    if (results.interests.names.length > 0) {
      sentences.push(`You are most excited about ${joinList(results.interests.names.map(n => n.toLowerCase()))}.`);
    }

    sentences.push(`A great first step on your pathway is ${pathway.step1.primaryCourse.title}.`);

    const [reflection] = reflections;
    if (reflection) {
      sentences.push(`You told us: "${reflection.answer}" Keep that goal in mind as you learn.`);
    }

    return sentences.join(" ");
  }

  private parentSummary({ student, results, comparison, careers }: NarrationInput): string {
    const name = student.firstName;
    const sentences = [
      `${name} learns best as ${withArticle(results.learningStyles.name.toLowerCase())}.`,
    ];

    if (results.traits.names.length > 0) {
      sentences.push(`Their top traits are ${joinList(results.traits.names.map(n => n.toLowerCase()))}.`);
    }

    sentences.push(
      `Their profile points toward ${careers.primaryField.toLowerCase()}, where careers such as ${joinList(
        careers.primaryCareers.map(c => c.title)
      )} are a natural fit.`
    );

    const { alignments, differences } = comparison;
    if (alignments.length + differences.length > 0) {
      sentences.push(
        `Your answers matched ${name}'s results in ${alignments.length} of ${alignments.length + differences.length} areas.`
      );
    }

    return sentences.join(" ");
  }
}
