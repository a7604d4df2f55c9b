import { CandidateStatus, ParsedResume } from "../shared/types/domain.types";

export const MANDATORY_FIELDS = ["name", "email", "phone"] as const;
export type MandatoryField = (typeof MANDATORY_FIELDS)[number];

export const REVIEW_CONFIDENCE_THRESHOLD = 0.7;

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]{2,}$/;
const PHONE_DIGITS_PATTERN = /^\d{7,15}$/;

export interface ValidationResult {
  isValid: boolean;
  status: Exclude<CandidateStatus, "PARSED">;
  mandatoryFields: Record<MandatoryField, boolean>;
  formatValidation: {
    email: boolean;
    phone: boolean;
  };
  overallConfidence: number;
  issues: string[];
}

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value.trim());
}

export function isValidPhone(value: string): boolean {
  const digits = value.trim().replace(/^\+/, "").replace(/[\s\-.()]/g, "");
  return PHONE_DIGITS_PATTERN.test(digits);
}

export function validateCandidate(record: ParsedResume): ValidationResult {
  const issues: string[] = [];
  const mandatoryFields: Record<MandatoryField, boolean> = {
    name: record.name.trim().length > 0,
    email: record.email.trim().length > 0,
    phone: record.phone.trim().length > 0,
  };
  for (const field of MANDATORY_FIELDS) {
    if (!mandatoryFields[field]) {
      issues.push(`Missing ${field}`);
    }
  }

  const formatValidation = {
    email: mandatoryFields.email && isValidEmail(record.email),
    phone: mandatoryFields.phone && isValidPhone(record.phone),
  };
  if (mandatoryFields.email && !formatValidation.email) {
    issues.push("Invalid email format");
  }
  if (mandatoryFields.phone && !formatValidation.phone) {
    issues.push("Invalid phone format");
  }

  const overallConfidence = computeOverallConfidence(record);
  const allPresent = MANDATORY_FIELDS.every((field) => mandatoryFields[field]);
  const isValid = allPresent && formatValidation.email && formatValidation.phone;

  let status: ValidationResult["status"];
  if (!allPresent) {
    status = "MANUAL_ENTRY_REQUIRED";
  } else if (!isValid) {
    status = "NEEDS_REVIEW";
  } else if (overallConfidence < REVIEW_CONFIDENCE_THRESHOLD) {
    issues.push(`Overall confidence ${overallConfidence} is below ${REVIEW_CONFIDENCE_THRESHOLD}`);
    status = "NEEDS_REVIEW";
  } else {
    status = "VALIDATED";
  }

  return {
    isValid,
    status,
    mandatoryFields,
    formatValidation,
    overallConfidence,
    issues,
  };
}

function computeOverallConfidence(record: ParsedResume): number {
  const total = MANDATORY_FIELDS.reduce(
    (sum, field) => sum + (record.confidenceScores[field] ?? 0),
    0,
  );
  return Math.round((total / MANDATORY_FIELDS.length) * 100) / 100;
}
