import { ServiceError } from "../shared/errors";
import { CandidateStatus, DocumentStatus } from "../shared/types/domain.types";
import { isAllowedCandidateTransition, isAllowedDocumentTransition } from "./transition-rules";

export function assertCandidateTransition(from: CandidateStatus, to: CandidateStatus): void {
  if (!isAllowedCandidateTransition(from, to)) {
    throw new ServiceError("conflict", `Invalid candidate status transition from ${from} to ${to}`, {
      from,
      to,
    });
  }
}

export function assertDocumentTransition(from: DocumentStatus, to: DocumentStatus): void {
  if (!isAllowedDocumentTransition(from, to)) {
    throw new ServiceError("conflict", `Invalid document status transition from ${from} to ${to}`, {
      from,
      to,
    });
  }
}
