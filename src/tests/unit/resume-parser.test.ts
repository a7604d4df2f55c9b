import assert from "node:assert/strict";
import { test } from "node:test";
import { normalizeParsedResume, ResumeParserService } from "../../resumes/resume-parser.service";
import { isServiceError } from "../../shared/errors";
import { noopLogger, scriptedLlm } from "../support/fakes";

test("normalizeParsedResume cleans values and fills confidences", () => {
  const parsed = normalizeParsedResume({
    name: "  Asha   Rao ",
    email: "Asha.Rao@Example.com",
    phone: 9876543210,
    company: "Acme Labs",
    designation: "",
    skills: "TypeScript, typescript, Node.js",
    experience_years: "4.6",
    confidence_scores: { name: 1.4, email: 0.9, designation: 0.8 },
  });

  assert.equal(parsed.name, "Asha Rao");
  assert.equal(parsed.email, "asha.rao@example.com");
  assert.equal(parsed.phone, "9876543210");
  assert.equal(parsed.designation, "");
  assert.deepEqual(parsed.skills, ["TypeScript", "Node.js"]);
  assert.equal(parsed.experienceYears, 5);
  assert.deepEqual(parsed.confidenceScores, {
    name: 1,
    email: 0.9,
    phone: 0.5,
    company: 0.5,
    designation: 0,
    skills: 0.5,
    experience_years: 0.5,
  });
});

test("normalizeParsedResume treats negative experience as none", () => {
  const parsed = normalizeParsedResume({ name: "Ravi", experience_years: -2 });
  assert.equal(parsed.experienceYears, 0);
  assert.equal(parsed.confidenceScores.experience_years, 0);
  assert.deepEqual(parsed.skills, []);
});

test("ResumeParserService sends the resume text to the model", async () => {
  const llm = scriptedLlm([
    JSON.stringify({
      name: "Asha Rao",
      email: "asha.rao@example.com",
      phone: "+91 98765 43210",
      skills: ["Go"],
      experience_years: 3,
      confidence_scores: { name: 0.9, email: 0.9, phone: 0.9, skills: 0.7, experience_years: 0.6 },
    }),
  ]);
  const service = new ResumeParserService(llm, noopLogger);
  const parsed = await service.parse("Asha Rao, backend engineer, Go");

  assert.equal(llm.prompts.length, 1);
  assert.ok(llm.prompts[0]?.includes("Asha Rao, backend engineer, Go"));
  assert.equal(parsed.phone, "+91 98765 43210");
  assert.equal(parsed.experienceYears, 3);
  assert.equal(parsed.confidenceScores.company, 0);
});

test("ResumeParserService surfaces model failures as llm_failure", async () => {
  const service = new ResumeParserService(scriptedLlm([new Error("OpenAI HTTP 401")]), noopLogger);
  await assert.rejects(
    () => service.parse("some resume"),
    (error: unknown) =>
      isServiceError(error) &&
      error.code === "llm_failure" &&
      error.message === "Resume parsing failed: llm_failure",
  );
});
