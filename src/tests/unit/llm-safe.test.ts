import assert from "node:assert/strict";
import { test } from "node:test";
import { FetchError } from "node-fetch";
import { callJsonPromptSafe, tryParseJsonObject } from "../../ai/llm.safe";
import { noopLogger, scriptedLlm } from "../support/fakes";

const baseArgs = {
  prompt: "Return JSON",
  maxTokens: 200,
  promptName: "unit_test",
  schemaHint: "{ \"value\": number }",
  logger: noopLogger,
};

test("tryParseJsonObject accepts fenced objects and rejects arrays", () => {
  assert.deepEqual(tryParseJsonObject("```json\n{\"a\":1}\n```"), { ok: true, data: { a: 1 } });
  assert.deepEqual(tryParseJsonObject("[1,2]"), { ok: false });
  assert.deepEqual(tryParseJsonObject("no json here"), { ok: false });
});

test("callJsonPromptSafe returns parsed data on the first answer", async () => {
  const llm = scriptedLlm(["{\"value\": 3}"]);
  const result = await callJsonPromptSafe({ ...baseArgs, llmClient: llm });
  assert.deepEqual(result, { ok: true, data: { value: 3 } });
  assert.equal(llm.prompts.length, 1);
});

test("callJsonPromptSafe repairs a non-JSON answer", async () => {
  const llm = scriptedLlm(["value is three", "{\"value\": 3}"]);
  const result = await callJsonPromptSafe({ ...baseArgs, llmClient: llm });
  assert.deepEqual(result, { ok: true, data: { value: 3 } });
  assert.equal(llm.prompts.length, 2);
  assert.ok(llm.prompts[1]?.includes("value is three"));
});

test("callJsonPromptSafe reports json_parse_failed when the repair fails too", async () => {
  const llm = scriptedLlm(["nope", "still nope"]);
  const result = await callJsonPromptSafe({ ...baseArgs, llmClient: llm });
  assert.deepEqual(result, { ok: false, error_code: "json_parse_failed", raw: "still nope" });
});

test("callJsonPromptSafe retries a transient failure once", async () => {
  const llm = scriptedLlm([new Error("OpenAI HTTP 503"), "{\"value\": 1}"]);
  const result = await callJsonPromptSafe({ ...baseArgs, llmClient: llm });
  assert.deepEqual(result, { ok: true, data: { value: 1 } });
  assert.equal(llm.prompts.length, 2);
});

test("callJsonPromptSafe retries a refused connection once", async () => {
  const refused = new FetchError(
    "request to https://api.openai.com/v1/chat/completions failed, reason: connect ECONNREFUSED 127.0.0.1:443",
    "system",
    { name: "Error", message: "connect ECONNREFUSED 127.0.0.1:443", code: "ECONNREFUSED" },
  );
  const llm = scriptedLlm([refused, "{\"value\": 1}"]);
  const result = await callJsonPromptSafe({ ...baseArgs, llmClient: llm });
  assert.deepEqual(result, { ok: true, data: { value: 1 } });
  assert.equal(llm.prompts.length, 2);
});

test("callJsonPromptSafe retries an unresolved host and reports a second failure as transient", async () => {
  const lookupFailure = Object.assign(new Error("getaddrinfo ENOTFOUND api.openai.com"), { code: "ENOTFOUND" });
  const llm = scriptedLlm([lookupFailure, new Error("socket hang up")]);
  const result = await callJsonPromptSafe({ ...baseArgs, llmClient: llm });
  assert.deepEqual(result, { ok: false, error_code: "transient_failure" });
  assert.equal(llm.prompts.length, 2);
});

test("callJsonPromptSafe does not retry a permanent failure", async () => {
  const llm = scriptedLlm([new Error("OpenAI HTTP 401"), "{\"value\": 1}"]);
  const result = await callJsonPromptSafe({ ...baseArgs, llmClient: llm });
  assert.deepEqual(result, { ok: false, error_code: "llm_failure" });
  assert.equal(llm.prompts.length, 1);
});

test("callJsonPromptSafe applies the type guard", async () => {
  const llm = scriptedLlm(["{\"value\": \"three\"}"]);
  const result = await callJsonPromptSafe({
    ...baseArgs,
    llmClient: llm,
    validate: (value: unknown): value is { value: number } =>
      typeof value === "object" && value !== null && "value" in value && typeof value.value === "number",
  });
  assert.deepEqual(result, { ok: false, error_code: "schema_invalid", raw: "{\"value\": \"three\"}" });
});
