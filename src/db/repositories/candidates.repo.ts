import { Logger } from "../../config/logger";
import {
  Candidate,
  CandidateStatus,
  ConfidenceScores,
  DocumentStatus,
  ParsedResume,
} from "../../shared/types/domain.types";
import { CANDIDATE_FIELDS } from "../../resumes/resume-parser.service";
import {
  readNullableString,
  readNumber,
  readOneOf,
  readRecord,
  readString,
  readStringArray,
} from "../row-readers";
import { TableClient, TableRow } from "../table.client";

const CANDIDATES_TABLE = "candidates";

const CANDIDATE_STATUSES: readonly CandidateStatus[] = [
  "PARSED",
  "VALIDATED",
  "NEEDS_REVIEW",
  "MANUAL_ENTRY_REQUIRED",
];
const DOCUMENT_STATUSES: readonly DocumentStatus[] = [
  "NOT_REQUESTED",
  "REQUESTED",
  "SUBMITTED",
  "VERIFIED",
];

export interface CandidateDocumentStatusPatch {
  documentStatus: DocumentStatus;
  documentsRequestedAt?: string;
  documentsSubmittedAt?: string;
  updatedAt: string;
}

export class CandidatesRepository {
  constructor(
    private readonly logger: Logger,
    private readonly tableClient: TableClient,
  ) {}

  async create(candidate: Candidate): Promise<void> {
    await this.tableClient.insert(CANDIDATES_TABLE, toRow(candidate));
    this.logger.debug("Candidate row inserted", { candidateId: candidate.id });
  }

  async findById(id: string): Promise<Candidate | null> {
    const row = await this.tableClient.selectOne(CANDIDATES_TABLE, { id });
    return row ? toCandidate(row) : null;
  }

  async findByEmail(email: string): Promise<Candidate | null> {
    const normalized = email.trim().toLowerCase();
    if (!normalized) {
      return null;
    }
    const row = await this.tableClient.selectOne(CANDIDATES_TABLE, { email: normalized });
    return row ? toCandidate(row) : null;
  }

  async list(): Promise<Candidate[]> {
    const rows = await this.tableClient.selectMany(
      CANDIDATES_TABLE,
      {},
      { orderBy: { column: "created_at", ascending: false } },
    );
    return rows.map(toCandidate);
  }

  async updateParsedFields(
    id: string,
    input: {
      parsed: ParsedResume;
      status: CandidateStatus;
      resumePath?: string;
      updatedAt: string;
    },
  ): Promise<Candidate | null> {
    const patch: TableRow = {
      ...parsedColumns(input.parsed),
      status: input.status,
      updated_at: input.updatedAt,
    };
    if (input.resumePath) {
      patch.resume_path = input.resumePath;
    }
    const rows = await this.tableClient.update(CANDIDATES_TABLE, { id }, patch);
    return rows[0] ? toCandidate(rows[0]) : null;
  }

  async updateDocumentStatus(
    id: string,
    input: CandidateDocumentStatusPatch,
  ): Promise<Candidate | null> {
    const patch: TableRow = {
      document_status: input.documentStatus,
      updated_at: input.updatedAt,
    };
    if (input.documentsRequestedAt) {
      patch.documents_requested_at = input.documentsRequestedAt;
    }
    if (input.documentsSubmittedAt) {
      patch.documents_submitted_at = input.documentsSubmittedAt;
    }
    const rows = await this.tableClient.update(CANDIDATES_TABLE, { id }, patch);
    this.logger.info("Candidate document status updated", {
      candidateId: id,
      documentStatus: input.documentStatus,
      matched: rows.length,
    });
    return rows[0] ? toCandidate(rows[0]) : null;
  }

  async delete(id: string): Promise<void> {
    await this.tableClient.deleteMany(CANDIDATES_TABLE, { id });
  }
}

function parsedColumns(parsed: ParsedResume): TableRow {
  return {
    name: parsed.name,
    email: parsed.email.trim().toLowerCase(),
    phone: parsed.phone,
    company: parsed.company || null,
    designation: parsed.designation || null,
    skills: parsed.skills,
    experience_years: parsed.experienceYears,
    confidence_scores: parsed.confidenceScores,
  };
}

function toRow(candidate: Candidate): TableRow {
  return {
    id: candidate.id,
    ...parsedColumns(candidate),
    resume_path: candidate.resumePath,
    status: candidate.status,
    document_status: candidate.documentStatus,
    documents_requested_at: candidate.documentsRequestedAt,
    documents_submitted_at: candidate.documentsSubmittedAt,
    created_at: candidate.createdAt,
    updated_at: candidate.updatedAt,
  };
}

function toCandidate(row: TableRow): Candidate {
  return {
    id: readString(row, "id"),
    name: readString(row, "name"),
    email: readString(row, "email"),
    phone: readString(row, "phone"),
    company: readString(row, "company"),
    designation: readString(row, "designation"),
    skills: readStringArray(row, "skills"),
    experienceYears: readNumber(row, "experience_years"),
    confidenceScores: toConfidenceScores(readRecord(row, "confidence_scores")),
    resumePath: readString(row, "resume_path"),
    status: readOneOf(row, "status", CANDIDATE_STATUSES, "PARSED"),
    documentStatus: readOneOf(row, "document_status", DOCUMENT_STATUSES, "NOT_REQUESTED"),
    documentsRequestedAt: readNullableString(row, "documents_requested_at"),
    documentsSubmittedAt: readNullableString(row, "documents_submitted_at"),
    createdAt: readString(row, "created_at"),
    updatedAt: readString(row, "updated_at"),
  };
}

function toConfidenceScores(raw: Record<string, unknown>): ConfidenceScores {
  const scores: ConfidenceScores = {};
  for (const field of CANDIDATE_FIELDS) {
    const value = raw[field];
    if (typeof value === "number" && Number.isFinite(value)) {
      scores[field] = value;
    }
  }
  return scores;
}
