import os from "node:os";
import path from "node:path";
import dotenv from "dotenv";
import { LogLevel } from "./logger";

dotenv.config();

type EnvSource = Record<string, string | undefined>;

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  openaiApiKey: string;
  openaiChatModel: string;
  llmTimeoutMs: number;
  supabaseUrl?: string;
  supabaseApiKey?: string;
  uploadDir: string;
  maxUploadBytes: number;
  publicAppUrl: string;
  documentDeadlineDays: number;
  sendgridApiKey?: string;
  emailFrom?: string;
  recruiterApiKey?: string;
  corsOrigin: string;
  publicRateLimitPerMin: number;
}

function getRequiredString(source: EnvSource, name: string): string {
  const value = source[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return trimmed;
}

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const portRaw = source.PORT ?? "5000";
  const port = Number(portRaw);
  const llmTimeoutRaw = source.LLM_TIMEOUT_MS ?? "25000";
  const llmTimeoutMs = Number(llmTimeoutRaw);
  const maxUploadMbRaw = source.MAX_UPLOAD_MB ?? "10";
  const maxUploadMb = Number(maxUploadMbRaw);
  const deadlineDaysRaw = source.DOCUMENT_DEADLINE_DAYS ?? "7";
  const documentDeadlineDays = Number(deadlineDaysRaw);
  const rateLimitRaw = source.PUBLIC_RATE_LIMIT_PER_MIN ?? "20";
  const publicRateLimitPerMin = Number(rateLimitRaw);
  const logLevel = parseLogLevel((source.LOG_LEVEL ?? "info").trim().toLowerCase());

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isFinite(llmTimeoutMs) || llmTimeoutMs < 1000) {
    throw new Error(`Invalid LLM_TIMEOUT_MS value: ${llmTimeoutRaw}`);
  }
  if (!Number.isFinite(maxUploadMb) || maxUploadMb <= 0 || maxUploadMb > 100) {
    throw new Error(`Invalid MAX_UPLOAD_MB value: ${maxUploadMbRaw}. Expected number between 0 and 100.`);
  }
  if (!Number.isInteger(documentDeadlineDays) || documentDeadlineDays < 1) {
    throw new Error(`Invalid DOCUMENT_DEADLINE_DAYS value: ${deadlineDaysRaw}`);
  }
  if (!Number.isInteger(publicRateLimitPerMin) || publicRateLimitPerMin < 1) {
    throw new Error(`Invalid PUBLIC_RATE_LIMIT_PER_MIN value: ${rateLimitRaw}`);
  }

  const sendgridApiKey = getOptionalTrimmed(source, "SENDGRID_API_KEY");
  const emailFrom = getOptionalTrimmed(source, "EMAIL_FROM");
  if (sendgridApiKey && !emailFrom) {
    throw new Error("Missing required environment variable: EMAIL_FROM");
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel,
    openaiApiKey: getRequiredString(source, "OPENAI_API_KEY"),
    openaiChatModel: getOptionalTrimmed(source, "OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    llmTimeoutMs,
    supabaseUrl: getOptionalTrimmed(source, "SUPABASE_URL"),
    supabaseApiKey:
      getOptionalTrimmed(source, "SUPABASE_SERVICE_ROLE_KEY") ??
      getOptionalTrimmed(source, "SUPABASE_PUBLISHABLE_KEY"),
    uploadDir:
      getOptionalTrimmed(source, "UPLOAD_DIR") ?? path.join(os.tmpdir(), "candidate-verify", "uploads"),
    maxUploadBytes: Math.floor(maxUploadMb * 1024 * 1024),
    publicAppUrl: stripTrailingSlash(
      getOptionalTrimmed(source, "PUBLIC_APP_URL") ?? `http://localhost:${port}`,
    ),
    documentDeadlineDays,
    sendgridApiKey,
    emailFrom,
    recruiterApiKey: getOptionalTrimmed(source, "RECRUITER_API_KEY"),
    corsOrigin: getOptionalTrimmed(source, "CORS_ORIGIN") ?? "*",
    publicRateLimitPerMin,
  };
}

function stripTrailingSlash(value: string): string {
  return value.replace(/\/+$/, "");
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
