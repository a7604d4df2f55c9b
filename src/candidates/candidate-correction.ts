import { ServiceError } from "../shared/errors";
import { CandidateField, ParsedResume } from "../shared/types/domain.types";

export interface CandidateCorrection {
  name?: string;
  email?: string;
  phone?: string;
  company?: string;
  designation?: string;
  skills?: string[];
  experience_years?: number;
}

const TEXT_FIELDS = ["name", "email", "phone", "company", "designation"] as const;

export function parseCandidateCorrection(body: unknown): CandidateCorrection {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new ServiceError("bad_request", "Request body must be a JSON object");
  }
  const source: Record<string, unknown> = { ...body };
  const correction: CandidateCorrection = {};

  for (const field of TEXT_FIELDS) {
    const value = source[field];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "string") {
      throw new ServiceError("bad_request", `Field ${field} must be a string`);
    }
    const trimmed = value.replace(/\s+/g, " ").trim();
    correction[field] = field === "email" ? trimmed.toLowerCase() : trimmed;
  }

  if (source.skills !== undefined) {
    if (!Array.isArray(source.skills) || !source.skills.every((item) => typeof item === "string")) {
      throw new ServiceError("bad_request", "Field skills must be an array of strings");
    }
    correction.skills = dedupeSkills(source.skills);
  }

  if (source.experience_years !== undefined) {
    const value = source.experience_years;
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
      throw new ServiceError("bad_request", "Field experience_years must be a non-negative integer");
    }
    correction.experience_years = value;
  }

  if (Object.keys(correction).length === 0) {
    throw new ServiceError("bad_request", "No updatable fields provided");
  }
  return correction;
}

/** Applies a correction; every corrected field is treated as certain. */
export function applyCorrection(current: ParsedResume, correction: CandidateCorrection): ParsedResume {
  const next: ParsedResume = {
    ...current,
    skills: [...current.skills],
    confidenceScores: { ...current.confidenceScores },
  };
  const corrected: CandidateField[] = [];

  for (const field of TEXT_FIELDS) {
    const value = correction[field];
    if (value !== undefined) {
      next[field] = value;
      corrected.push(field);
    }
  }
  if (correction.skills) {
    next.skills = correction.skills;
    corrected.push("skills");
  }
  if (correction.experience_years !== undefined) {
    next.experienceYears = correction.experience_years;
    corrected.push("experience_years");
  }

  for (const field of corrected) {
    next.confidenceScores[field] = 1;
  }
  return next;
}

function dedupeSkills(values: string[]): string[] {
  const seen = new Set<string>();
  const output: string[] = [];
  for (const value of values) {
    const skill = value.replace(/\s+/g, " ").trim();
    const key = skill.toLowerCase();
    if (!skill || seen.has(key)) {
      continue;
    }
    seen.add(key);
    output.push(skill);
  }
  return output;
}
