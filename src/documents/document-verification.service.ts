import { Logger } from "../config/logger";
import { AgentLogsRepository } from "../db/repositories/agent-logs.repo";
import { CandidatesRepository } from "../db/repositories/candidates.repo";
import { DocumentsRepository } from "../db/repositories/documents.repo";
import { ServiceError } from "../shared/errors";
import { DocumentStatus } from "../shared/types/domain.types";
import { Clock, systemClock } from "../shared/utils/time";
import { assertDocumentTransition } from "../state/state-machine";

export type VerificationDecision = "VERIFIED" | "REJECTED";

export interface VerificationInput {
  decision: VerificationDecision;
  notes?: string;
}

export interface VerificationResult {
  candidateId: string;
  decision: VerificationDecision;
  documentStatus: DocumentStatus;
  documentsUpdated: number;
}

const MAX_NOTES_LENGTH = 1000;

export function parseVerificationInput(body: unknown): VerificationInput {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new ServiceError("bad_request", "Request body must be a JSON object");
  }
  const decision = "decision" in body ? body.decision : undefined;
  if (decision !== "VERIFIED" && decision !== "REJECTED") {
    throw new ServiceError("bad_request", "Field decision must be VERIFIED or REJECTED");
  }
  const notes = "notes" in body ? body.notes : undefined;
  if (notes !== undefined && notes !== null && typeof notes !== "string") {
    throw new ServiceError("bad_request", "Field notes must be a string");
  }
  const trimmedNotes = typeof notes === "string" ? notes.trim().slice(0, MAX_NOTES_LENGTH) : "";
  return trimmedNotes ? { decision, notes: trimmedNotes } : { decision };
}

export class DocumentVerificationService {
  constructor(
    private readonly candidatesRepository: CandidatesRepository,
    private readonly documentsRepository: DocumentsRepository,
    private readonly agentLogsRepository: AgentLogsRepository,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock,
  ) {}

  async verify(candidateId: string, input: VerificationInput): Promise<VerificationResult> {
    const candidate = await this.candidatesRepository.findById(candidateId);
    if (!candidate) {
      throw new ServiceError("not_found", "Candidate not found");
    }
    if (candidate.documentStatus !== "SUBMITTED") {
      throw new ServiceError("conflict", "Documents are not awaiting verification");
    }

    // A rejection reopens the upload link for a fresh submission.
    const nextStatus: DocumentStatus = input.decision === "VERIFIED" ? "VERIFIED" : "REQUESTED";
    assertDocumentTransition(candidate.documentStatus, nextStatus);

    const documentsUpdated = await this.documentsRepository.updateVerificationStatus(
      candidateId,
      "PENDING",
      input.decision,
    );
    const now = this.clock().toISOString();
    await this.candidatesRepository.updateDocumentStatus(candidateId, {
      documentStatus: nextStatus,
      updatedAt: now,
    });
    await this.agentLogsRepository.log({
      candidateId,
      action: input.decision === "VERIFIED" ? "DOCUMENTS_VERIFIED" : "DOCUMENTS_REJECTED",
      toolUsed: "recruiter_review",
      input: { decision: input.decision, notes: input.notes ?? null },
      output: { document_status: nextStatus, documents_updated: documentsUpdated },
      timestamp: now,
    });

    this.logger.info("Identity documents reviewed", {
      candidateId,
      decision: input.decision,
      documentsUpdated,
    });
    return { candidateId, decision: input.decision, documentStatus: nextStatus, documentsUpdated };
  }
}
