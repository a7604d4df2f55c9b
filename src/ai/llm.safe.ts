import { Logger } from "../config/logger";
import { JsonLlmClient } from "./llm.client";
import { buildJsonRepairV1Prompt } from "./prompts/utils/json-repair.v1.prompt";

export interface JsonSafeCallArgs<T> {
  llmClient: JsonLlmClient;
  prompt: string;
  maxTokens: number;
  promptName: string;
  schemaHint: string;
  logger?: Logger;
  timeoutMs?: number;
  validate?: (value: unknown) => value is T;
}

export type SafeJsonErrorCode =
  | "timeout"
  | "transient_failure"
  | "llm_failure"
  | "json_parse_failed"
  | "schema_invalid";

export type SafeJsonResult<T> =
  | {
      ok: true;
      data: T;
    }
  | {
      ok: false;
      error_code: SafeJsonErrorCode;
      raw?: string;
    };

const DEFAULT_TIMEOUT_MS = 25_000;

export async function callJsonPromptSafe<T = Record<string, unknown>>(
  args: JsonSafeCallArgs<T>,
): Promise<SafeJsonResult<T>> {
  const timeoutMs = normalizeTimeout(args.timeoutMs);
  const initial = await attemptJsonCall(args, args.prompt, args.maxTokens, args.promptName, timeoutMs);
  if (!initial.ok) {
    return initial;
  }

  const parsed = tryParseJsonObject(initial.raw);
  if (parsed.ok) {
    return checkShape(args, parsed.data, initial.raw);
  }

  args.logger?.warn("llm.safe.json_repair", { promptName: args.promptName });
  const repairPrompt = buildJsonRepairV1Prompt({
    schemaHint: args.schemaHint,
    raw: initial.raw,
  });
  const repaired = await attemptJsonCall(
    args,
    repairPrompt,
    Math.max(240, Math.min(2400, args.maxTokens)),
    `${args.promptName}_json_repair`,
    timeoutMs,
  );
  if (!repaired.ok) {
    return repaired;
  }
  const repairedParsed = tryParseJsonObject(repaired.raw);
  if (!repairedParsed.ok) {
    return { ok: false, error_code: "json_parse_failed", raw: repaired.raw };
  }
  return checkShape(args, repairedParsed.data, repaired.raw);
}

function checkShape<T>(
  args: JsonSafeCallArgs<T>,
  data: Record<string, unknown>,
  raw: string,
): SafeJsonResult<T> {
  if (args.validate) {
    if (!args.validate(data)) {
      return { ok: false, error_code: "schema_invalid", raw };
    }
    return { ok: true, data };
  }
  return { ok: true, data: data as T };
}

async function attemptJsonCall<T>(
  args: JsonSafeCallArgs<T>,
  prompt: string,
  maxTokens: number,
  promptName: string,
  timeoutMs: number,
): Promise<
  | { ok: true; raw: string }
  | {
      ok: false;
      error_code: "timeout" | "transient_failure" | "llm_failure";
    }
> {
  const attempt = async (): Promise<string> =>
    withTimeout(
      args.llmClient.generateStructuredJson(prompt, maxTokens, { promptName }),
      timeoutMs,
    );

  try {
    return { ok: true, raw: await attempt() };
  } catch (error) {
    if (!isTransientError(error)) {
      return {
        ok: false,
        error_code: isTimeoutError(error) ? "timeout" : "llm_failure",
      };
    }
  }

  args.logger?.warn("llm.safe.retry.once", {
    promptName,
    modelName: args.llmClient.getModelName?.(),
  });
  try {
    return { ok: true, raw: await attempt() };
  } catch (error) {
    return {
      ok: false,
      error_code: isTimeoutError(error)
        ? "timeout"
        : isTransientError(error)
          ? "transient_failure"
          : "llm_failure",
    };
  }
}

export function tryParseJsonObject(
  raw: string,
): { ok: true; data: Record<string, unknown> } | { ok: false } {
  const text = raw.trim();
  const firstBrace = text.indexOf("{");
  const lastBrace = text.lastIndexOf("}");
  if (firstBrace < 0 || lastBrace < 0 || lastBrace <= firstBrace) {
    return { ok: false };
  }
  try {
    const parsed: unknown = JSON.parse(text.slice(firstBrace, lastBrace + 1));
    if (!isRecord(parsed)) {
      return { ok: false };
    }
    return { ok: true, data: parsed };
  } catch {
    return { ok: false };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error("timeout"));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function isTimeoutError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout");
}

const TRANSIENT_SOCKET_CODES = ["ECONNRESET", "ECONNREFUSED", "ENOTFOUND", "ETIMEDOUT", "EAI_AGAIN", "EPIPE"];

// node-fetch v2 reports connection failures as a FetchError of type "system" carrying the socket code.
function isNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === "FetchError" && "type" in error && error.type === "system") {
    return true;
  }
  const code = "code" in error && typeof error.code === "string" ? error.code : "";
  if (TRANSIENT_SOCKET_CODES.includes(code)) {
    return true;
  }
  const message = error.message.toUpperCase();
  return (
    TRANSIENT_SOCKET_CODES.some((socketCode) => message.includes(socketCode)) ||
    message.includes("SOCKET HANG UP")
  );
}

function isTransientError(error: unknown): boolean {
  if (isNetworkError(error)) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return (
    message.includes("timeout") ||
    message.includes("network") ||
    message.includes("429") ||
    message.includes("rate limit") ||
    message.includes("http 500") ||
    message.includes("http 502") ||
    message.includes("http 503") ||
    message.includes("http 504")
  );
}
