import fs from "fs";
import os from "os";
import path from "path";
import { config } from "../config";
import { LearningBadge } from "../domain/badge";
import { isPlaceholderCourse } from "../domain/course";
import { Responses } from "../domain/questionnaire";
import { validateStudentInput } from "../domain/student";
import { DiagnosticService, createNarrator } from "../services/diagnosticService";
import { AssessmentStore } from "../stores/assessmentStore";
import { ReportStore } from "../stores/reportStore";
import { StudentStore } from "../stores/studentStore";

interface DemoFixture {
  student: unknown;
  studentResponses: Responses;
  parentResponses: Responses;
}

const DEMO_FILE = path.join(__dirname, "../../catalog/demo.json");

function formatBadge(badge: LearningBadge): string {
  return `${badge.icon} ${badge.title}`;
}

/**
 * Run a sample student through the whole assessment and print the results.
 * Records are written to a temporary directory and removed afterwards.
 */
async function runDemo(): Promise<void> {
  const fixture: DemoFixture = JSON.parse(fs.readFileSync(DEMO_FILE, "utf-8"));
  const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "learninglens-demo-"));

  try {
    const students = new StudentStore(dataDir);
    const assessments = new AssessmentStore(dataDir);
    const reports = new ReportStore(dataDir);
    const service = new DiagnosticService({
      students,
      assessments,
      reports,
      narrator: createNarrator(config),
    });

    const student = students.create(validateStudentInput(fixture.student));
    const started = service.startAssessment(student.id);
    if (!started) {
      throw new Error("Demo student was not saved");
    }
    service.openQuestionnaire(started.id);
    service.submitResponses(started.id, {
      studentResponses: fixture.studentResponses,
      parentResponses: fixture.parentResponses,
    });

    const analyzed = await service.analyzeAssessment(started.id);
    const results = analyzed?.results;
    if (!results) {
      throw new Error("Demo assessment was not analyzed");
    }
    const generated = service.generateReports(started.id) ?? [];

    const { analysis, pathway, careers } = results;

    console.log("\n" + "═".repeat(50));
    console.log(`  Diagnostic Summary for ${student.firstName} ${student.lastName} (age ${student.age})`);
    console.log("═".repeat(50));

    console.log(`\n🧠 Learning style: ${analysis.learningStyles.name}`);
    if (analysis.learningStyles.secondary.length > 0) {
      console.log(`   Also: ${analysis.learningStyles.secondary.join(", ")}`);
    }
    console.log(`   Traits: ${analysis.traits.names.join(", ") || "(none)"}`);
    console.log(`   Interests: ${analysis.interests.names.join(", ") || "(none)"}`);

    console.log("\n📊 Dimension scores:");
    for (const [dimension, score] of Object.entries(analysis.dimensionScores)) {
      console.log(`   ${dimension.padEnd(16)} ${score}/100`);
    }

    console.log(`\n🏅 Badges: ${[
      results.badges.primaryBadge,
      ...results.badges.secondaryBadges,
      ...results.badges.combinationBadges,
    ].map(formatBadge).join("  ")}`);

    console.log(`\n🛤️  Pathway (${pathway.primaryCategory} + ${pathway.secondaryCategory}):`);
    console.log(`   1. ${pathway.step1.primaryCourse.title} / ${pathway.step1.complementaryCourse.title}`);
    console.log(`   2. ${pathway.step2.course.title}`);
    console.log(`   3. ${pathway.step3.course.title}`);
    if ([pathway.step1.primaryCourse, pathway.step2.course, pathway.step3.course].some(isPlaceholderCourse)) {
      console.log("   (some steps have no course yet)");
    }

    console.log(`\n💼 Career field: ${careers.primaryField}`);
    console.log(`   ${careers.primaryCareers.map(c => c.title).join(", ")}`);

    console.log("\n📚 Recommended courses:");
    for (const course of results.recommendedCourses) {
      console.log(`   ${course.id} ${course.title} (fit ${course.fitScore})`);
    }

    const { mathPathway, examRecommendations } = results;
    console.log(`\n🧮 Math pathway: ${mathPathway.title}`);
    mathPathway.journeySteps.forEach((step, index) => {
      console.log(`   ${index + 1}. ${step.title}${step.course ? ` (${step.course.id})` : ""}`);
    });

    console.log(`\n🎓 Exams (${examRecommendations.ageGroup}):`);
    for (const [category, exams] of Object.entries(examRecommendations.recommendedExams)) {
      console.log(`   ${category}: ${exams.map(e => e.name).join("; ")}`);
    }

    console.log("\n👪 Parent comparison:");
    for (const line of [...results.comparison.alignments, ...results.comparison.differences]) {
      console.log(`   - ${line}`);
    }

    console.log(`\n📝 ${results.narrative.studentSummary}`);
    console.log(`\nReports generated: ${generated.map(r => r.content.reportId).join(", ")}\n`);
  } finally {
    fs.rmSync(dataDir, { recursive: true, force: true });
  }
}

runDemo().catch(error => {
  console.error("Demo failed:", error);
  process.exitCode = 1;
});
