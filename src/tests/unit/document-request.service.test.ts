import assert from "node:assert/strict";
import { test } from "node:test";
import { buildTemplateEmail, DocumentRequestService } from "../../documents/document-request.service";
import { isServiceError } from "../../shared/errors";
import { JsonLlmClient } from "../../ai/llm.client";
import {
  buildCandidate,
  buildRepositories,
  noopLogger,
  RecordingEmailSender,
  scriptedLlm,
  steppingClock,
} from "../support/fakes";

const NOW = "2026-10-19T10:00:00.000Z";
const UPLOAD_LINK = "https://verify.example.com/upload/c-1";

function buildHarness(llm: JsonLlmClient, clock = steppingClock(NOW)) {
  const repositories = buildRepositories();
  const emailSender = new RecordingEmailSender();
  const service = new DocumentRequestService(
    repositories.candidatesRepository,
    repositories.agentLogsRepository,
    llm,
    emailSender,
    noopLogger,
    { publicAppUrl: "https://verify.example.com", deadlineDays: 7 },
    clock,
  );
  return { ...repositories, emailSender, service };
}

test("sends a generated email and moves the candidate to REQUESTED", async () => {
  const harness = buildHarness(
    scriptedLlm([JSON.stringify({ subject: "  Document   request ", body: "Dear Asha,\nPlease upload." })]),
  );
  await harness.candidatesRepository.create(buildCandidate());

  const result = await harness.service.requestDocuments("c-1");

  assert.equal(result.deadline, "October 26, 2026");
  assert.equal(result.uploadLink, UPLOAD_LINK);
  assert.deepEqual(result.email, {
    subject: "Document request",
    body: `Dear Asha,\nPlease upload.\n\nUpload your documents here:\n${UPLOAD_LINK}`,
    generatedBy: "llm",
  });
  assert.deepEqual(result.sendResult, { provider: "test", messageId: "msg-1" });
  assert.equal(harness.emailSender.sent[0]?.to, "asha.rao@example.com");

  const candidate = await harness.candidatesRepository.findById("c-1");
  assert.equal(candidate?.documentStatus, "REQUESTED");
  assert.equal(candidate?.documentsRequestedAt, NOW);

  const logs = await harness.agentLogsRepository.listByCandidate("c-1");
  assert.equal(logs.length, 1);
  assert.equal(logs[0]?.action, "DOCUMENT_REQUEST_SENT");
  assert.equal(logs[0]?.toolUsed, "email:test");
  assert.deepEqual(logs[0]?.output, { success: true, provider: "test", message_id: "msg-1" });
});

test("re-sending while REQUESTED emails a reminder and moves the request date forward", async () => {
  const later = "2026-10-22T15:30:00.000Z";
  const harness = buildHarness(
    scriptedLlm([JSON.stringify({ subject: "Document request", body: "Dear Asha,\nPlease upload." })]),
    steppingClock(NOW, later),
  );
  await harness.candidatesRepository.create(buildCandidate());

  await harness.service.requestDocuments("c-1");
  const reminder = await harness.service.requestDocuments("c-1");

  assert.equal(reminder.deadline, "October 29, 2026");
  assert.deepEqual(reminder.sendResult, { provider: "test", messageId: "msg-2" });
  assert.equal(harness.emailSender.sent.length, 2);

  const candidate = await harness.candidatesRepository.findById("c-1");
  assert.equal(candidate?.documentStatus, "REQUESTED");
  assert.equal(candidate?.documentsRequestedAt, later);

  const logs = await harness.agentLogsRepository.listByCandidate("c-1");
  assert.deepEqual(
    logs.map((entry) => [entry.action, entry.timestamp]),
    [
      ["DOCUMENT_REQUEST_SENT", later],
      ["DOCUMENT_REQUEST_SENT", NOW],
    ],
  );
});

test("falls back to the template when the model fails", async () => {
  const harness = buildHarness(scriptedLlm([new Error("OpenAI HTTP 401")]));
  await harness.candidatesRepository.create(buildCandidate());

  const result = await harness.service.requestDocuments("c-1");

  const expected = buildTemplateEmail({
    candidateName: "Asha Rao",
    uploadLink: UPLOAD_LINK,
    deadline: "October 26, 2026",
  });
  assert.deepEqual(result.email, expected);
  assert.equal(expected.subject, "Document Verification Request");
  assert.ok(expected.body.startsWith("Dear Asha Rao,\n"));
  assert.ok(expected.body.includes(`\n${UPLOAD_LINK}\n`));
  assert.ok(expected.body.includes("Please complete the submission by October 26, 2026."));
  assert.equal(harness.emailSender.sent[0]?.text, expected.body);
});

test("a failed send keeps the status and records the failure", async () => {
  const harness = buildHarness(scriptedLlm([new Error("OpenAI HTTP 401")]));
  harness.emailSender.failWith = new Error("provider unavailable");
  await harness.candidatesRepository.create(buildCandidate());

  await assert.rejects(
    () => harness.service.requestDocuments("c-1"),
    (error: unknown) =>
      isServiceError(error) &&
      error.statusCode === 502 &&
      error.message === "Failed to send document request email",
  );

  const candidate = await harness.candidatesRepository.findById("c-1");
  assert.equal(candidate?.documentStatus, "NOT_REQUESTED");
  const logs = await harness.agentLogsRepository.listByCandidate("c-1");
  assert.equal(logs[0]?.action, "DOCUMENT_REQUEST_FAILED");
  assert.deepEqual(logs[0]?.output, { success: false, error: "provider unavailable" });
});

test("rejects unknown, email-less and already verified candidates", async () => {
  const harness = buildHarness(scriptedLlm(["{}"]));
  await harness.candidatesRepository.create(buildCandidate({ id: "no-email", email: "" }));
  await harness.candidatesRepository.create(
    buildCandidate({ id: "done", email: "done@example.com", documentStatus: "VERIFIED" }),
  );

  await assert.rejects(() => harness.service.requestDocuments("missing"), {
    message: "Candidate not found",
  });
  await assert.rejects(() => harness.service.requestDocuments("no-email"), {
    message: "Candidate has no email address",
  });
  await assert.rejects(
    () => harness.service.requestDocuments("done"),
    (error: unknown) => isServiceError(error) && error.code === "conflict",
  );
  assert.equal(harness.emailSender.sent.length, 0);
});

test("buildUploadLink encodes the candidate id", () => {
  const harness = buildHarness(scriptedLlm(["{}"]));
  assert.equal(harness.service.buildUploadLink("a b"), "https://verify.example.com/upload/a%20b");
});
