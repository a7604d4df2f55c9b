import { CandidateStatus, DocumentStatus } from "../shared/types/domain.types";

const candidateStatusRules: Record<CandidateStatus, CandidateStatus[]> = {
  PARSED: ["VALIDATED", "NEEDS_REVIEW", "MANUAL_ENTRY_REQUIRED"],
  VALIDATED: ["VALIDATED", "NEEDS_REVIEW", "MANUAL_ENTRY_REQUIRED"],
  NEEDS_REVIEW: ["VALIDATED", "NEEDS_REVIEW", "MANUAL_ENTRY_REQUIRED"],
  MANUAL_ENTRY_REQUIRED: ["VALIDATED", "NEEDS_REVIEW", "MANUAL_ENTRY_REQUIRED"],
};

const documentStatusRules: Record<DocumentStatus, DocumentStatus[]> = {
  NOT_REQUESTED: ["REQUESTED"],
  REQUESTED: ["REQUESTED", "SUBMITTED"],
  SUBMITTED: ["VERIFIED", "REQUESTED"],
  VERIFIED: [],
};

export function isAllowedCandidateTransition(from: CandidateStatus, to: CandidateStatus): boolean {
  return candidateStatusRules[from].includes(to);
}

export function isAllowedDocumentTransition(from: DocumentStatus, to: DocumentStatus): boolean {
  return documentStatusRules[from].includes(to);
}
