import assert from "node:assert/strict";
import { test } from "node:test";
import { parseCandidateCorrection } from "../../candidates/candidate-correction";
import { CandidateIntakeService } from "../../candidates/candidate-intake.service";
import { CandidatesService } from "../../candidates/candidates.service";
import { ResumeParserService } from "../../resumes/resume-parser.service";
import { ResumeTextService } from "../../resumes/resume-text.service";
import { UploadedFile } from "../../shared/types/domain.types";
import { FileStorageService } from "../../storage/file-storage.service";
import {
  buildCandidate,
  buildRepositories,
  noopLogger,
  scriptedLlm,
  steppingClock,
  withTempDir,
} from "../support/fakes";

function textResume(originalName = "cv.txt"): UploadedFile {
  const buffer = Buffer.from("Asha Rao, backend engineer");
  return { originalName, mimeType: "text/plain", buffer, size: buffer.length };
}

const PARSED = JSON.stringify({
  name: "Asha Rao",
  email: "asha.rao@example.com",
  phone: "+91 98765 43210",
  confidence_scores: { name: 0.9, email: 0.9, phone: 0.9 },
});

test("intake creates a candidate, updates it on a repeated email and replaces the stored resume", async () => {
  await withTempDir(async (dir) => {
    const repositories = buildRepositories();
    const storage = new FileStorageService(dir, noopLogger);
    const service = new CandidateIntakeService(
      repositories.candidatesRepository,
      repositories.agentLogsRepository,
      new ResumeTextService(noopLogger),
      new ResumeParserService(scriptedLlm([PARSED]), noopLogger),
      storage,
      noopLogger,
      steppingClock("2026-10-19T10:00:00.000Z", "2026-10-19T11:00:00.000Z"),
    );

    const first = await service.intakeResume(textResume());
    assert.equal(first.isUpdate, false);
    assert.equal(first.candidate.status, "VALIDATED");
    assert.equal(first.candidate.resumePath, "resumes/20261019_100000_cv.txt");
    assert.equal(first.candidate.documentStatus, "NOT_REQUESTED");

    const second = await service.intakeResume(textResume());
    assert.equal(second.isUpdate, true);
    assert.equal(second.candidate.id, first.candidate.id);
    assert.equal(second.candidate.createdAt, "2026-10-19T10:00:00.000Z");
    assert.equal(second.candidate.updatedAt, "2026-10-19T11:00:00.000Z");
    assert.equal(second.candidate.resumePath, "resumes/20261019_110000_cv.txt");

    assert.equal((await repositories.candidatesRepository.list()).length, 1);
    const logs = await repositories.agentLogsRepository.listByCandidate(first.candidate.id);
    assert.deepEqual(
      logs.map((entry) => [entry.action, entry.output.is_update]),
      [
        ["RESUME_PARSED", true],
        ["RESUME_PARSED", false],
      ],
    );
    assert.equal(await storage.read("resumes/20261019_100000_cv.txt"), null);
    assert.equal((await storage.read("resumes/20261019_110000_cv.txt"))?.length, textResume().size);
  });
});

test("intake without an email always inserts and asks for manual entry", async () => {
  await withTempDir(async (dir) => {
    const repositories = buildRepositories();
    const service = new CandidateIntakeService(
      repositories.candidatesRepository,
      repositories.agentLogsRepository,
      new ResumeTextService(noopLogger),
      new ResumeParserService(scriptedLlm([JSON.stringify({ name: "Ravi" })]), noopLogger),
      new FileStorageService(dir, noopLogger),
      noopLogger,
    );
    const first = await service.intakeResume(textResume());
    const second = await service.intakeResume(textResume());
    assert.equal(first.candidate.status, "MANUAL_ENTRY_REQUIRED");
    assert.notEqual(first.candidate.id, second.candidate.id);
    await assert.rejects(() => service.intakeResume(textResume("  ")), { message: "No file selected" });
  });
});

test("parseCandidateCorrection validates the body", () => {
  assert.deepEqual(
    parseCandidateCorrection({ email: " Asha@Example.COM ", skills: ["Go", "go", " SQL "], experience_years: 4 }),
    { email: "asha@example.com", skills: ["Go", "SQL"], experience_years: 4 },
  );
  assert.throws(() => parseCandidateCorrection([]), { message: "Request body must be a JSON object" });
  assert.throws(() => parseCandidateCorrection({ name: 5 }), { message: "Field name must be a string" });
  assert.throws(() => parseCandidateCorrection({ skills: "Go" }), {
    message: "Field skills must be an array of strings",
  });
  assert.throws(() => parseCandidateCorrection({ experience_years: 2.5 }), {
    message: "Field experience_years must be a non-negative integer",
  });
  assert.throws(() => parseCandidateCorrection({ unknown: true }), { message: "No updatable fields provided" });
});

test("correct re-validates and refuses an email owned by another candidate", async () => {
  await withTempDir(async (dir) => {
    const repositories = buildRepositories();
    await repositories.candidatesRepository.create(buildCandidate({ id: "c-1", phone: "", status: "MANUAL_ENTRY_REQUIRED" }));
    await repositories.candidatesRepository.create(buildCandidate({ id: "c-2", email: "other@example.com" }));
    const service = new CandidatesService(
      repositories.candidatesRepository,
      repositories.documentsRepository,
      repositories.agentLogsRepository,
      new FileStorageService(dir, noopLogger),
      noopLogger,
      steppingClock("2026-10-19T12:00:00.000Z"),
    );

    const { candidate, validation } = await service.correct("c-1", { phone: "+91 98765 43210" });
    assert.equal(candidate.status, "VALIDATED");
    assert.equal(candidate.confidenceScores.phone, 1);
    assert.equal(validation.overallConfidence, 0.93);
    assert.equal(candidate.updatedAt, "2026-10-19T12:00:00.000Z");

    await assert.rejects(() => service.correct("c-1", { email: "other@example.com" }), {
      message: "Another candidate already uses this email address",
    });

    const logs = await service.listLogs("c-1");
    assert.equal(logs[0]?.action, "CANDIDATE_UPDATED");
    assert.deepEqual(logs[0]?.input, { fields: ["phone"] });
  });
});

test("delete removes the candidate, its documents and stored files", async () => {
  await withTempDir(async (dir) => {
    const repositories = buildRepositories();
    const storage = new FileStorageService(dir, noopLogger);
    const resume = await storage.save("resumes", "cv.txt", Buffer.from("resume"));
    const pan = await storage.save("documents", "c-1_PAN.png", Buffer.from("pan"));
    await repositories.candidatesRepository.create(buildCandidate({ resumePath: resume.key }));
    await repositories.documentsRepository.insert({
      id: "d-1",
      candidateId: "c-1",
      documentType: "PAN",
      filePath: pan.key,
      fileName: pan.fileName,
      fileSize: pan.size,
      uploadedAt: "2026-10-19T10:00:00.000Z",
      verificationStatus: "PENDING",
    });
    const service = new CandidatesService(
      repositories.candidatesRepository,
      repositories.documentsRepository,
      repositories.agentLogsRepository,
      storage,
      noopLogger,
    );

    await service.delete("c-1");

    assert.equal(await repositories.candidatesRepository.findById("c-1"), null);
    assert.deepEqual(await repositories.documentsRepository.listByCandidate("c-1"), []);
    assert.equal(await storage.read(resume.key), null);
    assert.equal(await storage.read(pan.key), null);
    await assert.rejects(() => service.delete("c-1"), { message: "Candidate not found" });
  });
});
