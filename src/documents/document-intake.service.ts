import { randomUUID } from "node:crypto";
import { Logger } from "../config/logger";
import { AgentLogsRepository } from "../db/repositories/agent-logs.repo";
import { CandidatesRepository } from "../db/repositories/candidates.repo";
import { DocumentsRepository } from "../db/repositories/documents.repo";
import { ServiceError } from "../shared/errors";
import {
  CandidateDocument,
  DocumentStatus,
  IdentityDocumentType,
  UploadedFile,
} from "../shared/types/domain.types";
import { Clock, formatCompactTimestamp, systemClock } from "../shared/utils/time";
import { assertDocumentTransition } from "../state/state-machine";
import { fileExtension, FileStorageService } from "../storage/file-storage.service";

export const ALLOWED_DOCUMENT_EXTENSIONS = ["jpg", "jpeg", "png", "pdf"];

const CLOSED_STATUS_MESSAGES: Partial<Record<DocumentStatus, string>> = {
  NOT_REQUESTED: "Documents have not been requested for this candidate",
  SUBMITTED: "Documents have already been submitted",
  VERIFIED: "Documents have already been verified",
};

export interface DocumentSubmission {
  pan?: UploadedFile;
  aadhaar?: UploadedFile;
}

export interface DocumentSubmissionResult {
  candidateId: string;
  documents: {
    pan: string;
    aadhaar: string;
  };
}

export class DocumentIntakeService {
  constructor(
    private readonly candidatesRepository: CandidatesRepository,
    private readonly documentsRepository: DocumentsRepository,
    private readonly agentLogsRepository: AgentLogsRepository,
    private readonly fileStorage: FileStorageService,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock,
  ) {}

  async submitDocuments(
    candidateId: string,
    submission: DocumentSubmission,
  ): Promise<DocumentSubmissionResult> {
    const candidate = await this.candidatesRepository.findById(candidateId);
    if (!candidate) {
      throw new ServiceError("not_found", "Candidate not found");
    }
    const closedMessage = CLOSED_STATUS_MESSAGES[candidate.documentStatus];
    if (closedMessage) {
      throw new ServiceError("bad_request", closedMessage);
    }

    const { pan, aadhaar } = submission;
    if (!pan || !aadhaar) {
      throw new ServiceError("bad_request", "Both PAN Card and Aadhaar Card are required");
    }
    if (!pan.originalName.trim() || !aadhaar.originalName.trim()) {
      throw new ServiceError("bad_request", "No files selected");
    }
    if (!isAllowedDocument(pan.originalName) || !isAllowedDocument(aadhaar.originalName)) {
      throw new ServiceError("bad_request", "Invalid file type. Only JPG, PNG, and PDF are allowed");
    }
    if (pan.size === 0 || aadhaar.size === 0) {
      throw new ServiceError("bad_request", "Uploaded files must not be empty");
    }
    assertDocumentTransition(candidate.documentStatus, "SUBMITTED");

    const now = this.clock();
    const [panDocument, aadhaarDocument] = await this.storeFiles(candidate.id, now, [
      ["PAN", pan],
      ["AADHAAR", aadhaar],
    ]);
    for (const document of [panDocument, aadhaarDocument]) {
      await this.documentsRepository.insert(document);
    }

    await this.candidatesRepository.updateDocumentStatus(candidate.id, {
      documentStatus: "SUBMITTED",
      documentsSubmittedAt: now.toISOString(),
      updatedAt: now.toISOString(),
    });
    await this.agentLogsRepository.log({
      candidateId: candidate.id,
      action: "DOCUMENTS_SUBMITTED",
      input: {
        pan_file: panDocument.fileName,
        aadhaar_file: aadhaarDocument.fileName,
      },
      output: { success: true },
      timestamp: now.toISOString(),
    });

    this.logger.info("Identity documents submitted", {
      candidateId: candidate.id,
      panBytes: panDocument.fileSize,
      aadhaarBytes: aadhaarDocument.fileSize,
    });

    return {
      candidateId: candidate.id,
      documents: {
        pan: panDocument.fileName,
        aadhaar: aadhaarDocument.fileName,
      },
    };
  }

  /** Writes every file before any row exists; a failed write removes the files already written. */
  private async storeFiles(
    candidateId: string,
    now: Date,
    files: Array<[IdentityDocumentType, UploadedFile]>,
  ): Promise<CandidateDocument[]> {
    const stored: CandidateDocument[] = [];
    try {
      for (const [documentType, file] of files) {
        const fileName = `${candidateId}_${documentType}_${formatCompactTimestamp(now)}.${fileExtension(file.originalName)}`;
        const saved = await this.fileStorage.save("documents", fileName, file.buffer);
        stored.push({
          id: randomUUID(),
          candidateId,
          documentType,
          filePath: saved.key,
          fileName: saved.fileName,
          fileSize: saved.size,
          uploadedAt: now.toISOString(),
          verificationStatus: "PENDING",
        });
      }
    } catch (error) {
      for (const document of stored) {
        try {
          await this.fileStorage.remove(document.filePath);
        } catch (cleanupError) {
          this.logger.warn("Partial document upload could not be removed", {
            candidateId,
            key: document.filePath,
            error: cleanupError instanceof Error ? cleanupError.message : "Unknown error",
          });
        }
      }
      throw error;
    }
    return stored;
  }
}

function isAllowedDocument(fileName: string): boolean {
  return ALLOWED_DOCUMENT_EXTENSIONS.includes(fileExtension(fileName));
}
