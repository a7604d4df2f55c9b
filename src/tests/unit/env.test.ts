import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";
import { loadEnv } from "../../config/env";

const base = { OPENAI_API_KEY: "test-openai-key" };

test("loadEnv applies defaults", () => {
  const env = loadEnv({ ...base });
  assert.equal(env.port, 5000);
  assert.equal(env.logLevel, "info");
  assert.equal(env.openaiChatModel, "gpt-4o-mini");
  assert.equal(env.llmTimeoutMs, 25000);
  assert.equal(env.maxUploadBytes, 10 * 1024 * 1024);
  assert.equal(env.publicAppUrl, "http://localhost:5000");
  assert.equal(env.documentDeadlineDays, 7);
  assert.equal(env.corsOrigin, "*");
  assert.equal(env.publicRateLimitPerMin, 20);
  assert.equal(env.uploadDir, path.join(os.tmpdir(), "candidate-verify", "uploads"));
  assert.equal(env.supabaseUrl, undefined);
  assert.equal(env.recruiterApiKey, undefined);
});

test("loadEnv reads overrides and strips the trailing slash of the public url", () => {
  const env = loadEnv({
    ...base,
    PORT: "8080",
    LOG_LEVEL: "DEBUG",
    PUBLIC_APP_URL: "https://verify.example.com/",
    SUPABASE_URL: "https://db.example.com",
    SUPABASE_PUBLISHABLE_KEY: "test-publishable",
    SUPABASE_SERVICE_ROLE_KEY: "test-service-role",
    MAX_UPLOAD_MB: "2",
  });
  assert.equal(env.port, 8080);
  assert.equal(env.logLevel, "debug");
  assert.equal(env.publicAppUrl, "https://verify.example.com");
  assert.equal(env.supabaseApiKey, "test-service-role");
  assert.equal(env.maxUploadBytes, 2 * 1024 * 1024);
});

test("loadEnv rejects missing and invalid values", () => {
  assert.throws(() => loadEnv({}), {
    message: "Missing required environment variable: OPENAI_API_KEY",
  });
  assert.throws(() => loadEnv({ ...base, PORT: "abc" }), { message: "Invalid PORT value: abc" });
  assert.throws(() => loadEnv({ ...base, LOG_LEVEL: "verbose" }), {
    message: "Invalid LOG_LEVEL value: verbose",
  });
  assert.throws(() => loadEnv({ ...base, MAX_UPLOAD_MB: "0" }), {
    message: "Invalid MAX_UPLOAD_MB value: 0. Expected number between 0 and 100.",
  });
  assert.throws(() => loadEnv({ ...base, DOCUMENT_DEADLINE_DAYS: "0" }), {
    message: "Invalid DOCUMENT_DEADLINE_DAYS value: 0",
  });
});

test("loadEnv requires a sender address once SendGrid is configured", () => {
  assert.throws(() => loadEnv({ ...base, SENDGRID_API_KEY: "test-sendgrid-key" }), {
    message: "Missing required environment variable: EMAIL_FROM",
  });
  const env = loadEnv({
    ...base,
    SENDGRID_API_KEY: "test-sendgrid-key",
    EMAIL_FROM: "hr@example.com",
  });
  assert.equal(env.emailFrom, "hr@example.com");
});
