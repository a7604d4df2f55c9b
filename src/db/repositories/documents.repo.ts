import { Logger } from "../../config/logger";
import {
  CandidateDocument,
  DocumentVerificationStatus,
  IdentityDocumentType,
} from "../../shared/types/domain.types";
import { readNumber, readOneOf, readString } from "../row-readers";
import { TableClient, TableRow } from "../table.client";

const DOCUMENTS_TABLE = "documents";

const DOCUMENT_TYPES: readonly IdentityDocumentType[] = ["PAN", "AADHAAR"];
const VERIFICATION_STATUSES: readonly DocumentVerificationStatus[] = ["PENDING", "VERIFIED", "REJECTED"];

export class DocumentsRepository {
  constructor(
    private readonly logger: Logger,
    private readonly tableClient: TableClient,
  ) {}

  async insert(document: CandidateDocument): Promise<void> {
    await this.tableClient.insert(DOCUMENTS_TABLE, {
      id: document.id,
      candidate_id: document.candidateId,
      document_type: document.documentType,
      file_path: document.filePath,
      file_name: document.fileName,
      file_size: document.fileSize,
      uploaded_at: document.uploadedAt,
      verification_status: document.verificationStatus,
    });
    this.logger.debug("Document row inserted", {
      candidateId: document.candidateId,
      documentId: document.id,
      documentType: document.documentType,
    });
  }

  async findById(id: string): Promise<CandidateDocument | null> {
    const row = await this.tableClient.selectOne(DOCUMENTS_TABLE, { id });
    return row ? toDocument(row) : null;
  }

  async listByCandidate(candidateId: string): Promise<CandidateDocument[]> {
    const rows = await this.tableClient.selectMany(
      DOCUMENTS_TABLE,
      { candidate_id: candidateId },
      { orderBy: { column: "uploaded_at", ascending: false } },
    );
    return rows.map(toDocument);
  }

  async updateVerificationStatus(
    candidateId: string,
    from: DocumentVerificationStatus,
    to: DocumentVerificationStatus,
  ): Promise<number> {
    const rows = await this.tableClient.update(
      DOCUMENTS_TABLE,
      { candidate_id: candidateId, verification_status: from },
      { verification_status: to },
    );
    return rows.length;
  }

  async deleteByCandidate(candidateId: string): Promise<void> {
    await this.tableClient.deleteMany(DOCUMENTS_TABLE, { candidate_id: candidateId });
  }
}

function toDocument(row: TableRow): CandidateDocument {
  return {
    id: readString(row, "id"),
    candidateId: readString(row, "candidate_id"),
    documentType: readOneOf(row, "document_type", DOCUMENT_TYPES, "PAN"),
    filePath: readString(row, "file_path"),
    fileName: readString(row, "file_name"),
    fileSize: readNumber(row, "file_size"),
    uploadedAt: readString(row, "uploaded_at"),
    verificationStatus: readOneOf(row, "verification_status", VERIFICATION_STATUSES, "PENDING"),
  };
}
