import { JsonLlmClient } from "../ai/llm.client";
import { callJsonPromptSafe } from "../ai/llm.safe";
import {
  buildResumeParsingV1Prompt,
  RESUME_PARSING_SCHEMA_HINT,
} from "../ai/prompts/candidate/resume-parsing.v1.prompt";
import { Logger } from "../config/logger";
import { ServiceError } from "../shared/errors";
import { CandidateField, ConfidenceScores, ParsedResume } from "../shared/types/domain.types";

export const CANDIDATE_FIELDS: CandidateField[] = [
  "name",
  "email",
  "phone",
  "company",
  "designation",
  "skills",
  "experience_years",
];

const DEFAULT_PRESENT_CONFIDENCE = 0.5;
const MAX_SKILLS = 60;

export class ResumeParserService {
  constructor(
    private readonly llmClient: JsonLlmClient,
    private readonly logger: Logger,
    private readonly timeoutMs?: number,
  ) {}

  async parse(resumeText: string): Promise<ParsedResume> {
    const safe = await callJsonPromptSafe({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt: buildResumeParsingV1Prompt({ resumeText }),
      maxTokens: 900,
      promptName: "resume_parsing_v1",
      schemaHint: RESUME_PARSING_SCHEMA_HINT,
      timeoutMs: this.timeoutMs,
    });
    if (!safe.ok) {
      this.logger.warn("Resume parsing failed", { errorCode: safe.error_code });
      throw new ServiceError("llm_failure", `Resume parsing failed: ${safe.error_code}`);
    }

    return normalizeParsedResume(safe.data);
  }
}

export function normalizeParsedResume(data: Record<string, unknown>): ParsedResume {
  const base = {
    name: normalizeText(data.name),
    email: normalizeText(data.email).toLowerCase(),
    phone: normalizeText(data.phone),
    company: normalizeText(data.company),
    designation: normalizeText(data.designation),
    skills: normalizeSkills(data.skills),
    experienceYears: normalizeExperience(data.experience_years),
  };
  const rawScores = isRecord(data.confidence_scores) ? data.confidence_scores : {};

  const confidenceScores: ConfidenceScores = {};
  for (const field of CANDIDATE_FIELDS) {
    const present = isFieldPresent(base, field);
    const score = rawScores[field];
    if (typeof score === "number" && Number.isFinite(score)) {
      confidenceScores[field] = present ? clampConfidence(score) : 0;
    } else {
      confidenceScores[field] = present ? DEFAULT_PRESENT_CONFIDENCE : 0;
    }
  }

  return { ...base, confidenceScores };
}

export function isFieldPresent(record: Omit<ParsedResume, "confidenceScores">, field: CandidateField): boolean {
  switch (field) {
    case "skills":
      return record.skills.length > 0;
    case "experience_years":
      return record.experienceYears > 0;
    case "name":
    case "email":
    case "phone":
    case "company":
    case "designation":
      return record[field].length > 0;
  }
}

function normalizeText(value: unknown): string {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value !== "string") {
    return "";
  }
  return value.replace(/\s+/g, " ").trim();
}

function normalizeSkills(value: unknown): string[] {
  const source = Array.isArray(value)
    ? value
    : typeof value === "string"
      ? value.split(",")
      : [];
  const seen = new Set<string>();
  const skills: string[] = [];
  for (const item of source) {
    const skill = normalizeText(item);
    const key = skill.toLowerCase();
    if (!skill || seen.has(key)) {
      continue;
    }
    seen.add(key);
    skills.push(skill);
    if (skills.length >= MAX_SKILLS) {
      break;
    }
  }
  return skills;
}

function normalizeExperience(value: unknown): number {
  const numeric = typeof value === "string" ? Number.parseFloat(value) : value;
  if (typeof numeric !== "number" || !Number.isFinite(numeric) || numeric <= 0) {
    return 0;
  }
  return Math.round(numeric);
}

function clampConfidence(value: number): number {
  if (value < 0) {
    return 0;
  }
  if (value > 1) {
    return 1;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
