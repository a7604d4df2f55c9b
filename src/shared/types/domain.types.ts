export type CandidateStatus = "PARSED" | "VALIDATED" | "NEEDS_REVIEW" | "MANUAL_ENTRY_REQUIRED";

export type DocumentStatus = "NOT_REQUESTED" | "REQUESTED" | "SUBMITTED" | "VERIFIED";

export type DocumentVerificationStatus = "PENDING" | "VERIFIED" | "REJECTED";

export type IdentityDocumentType = "PAN" | "AADHAAR";

export type ResumeFileType = "pdf" | "docx" | "txt" | "unknown";

export type CandidateField =
  | "name"
  | "email"
  | "phone"
  | "company"
  | "designation"
  | "skills"
  | "experience_years";

export type ConfidenceScores = Partial<Record<CandidateField, number>>;

export interface ParsedResume {
  name: string;
  email: string;
  phone: string;
  company: string;
  designation: string;
  skills: string[];
  experienceYears: number;
  confidenceScores: ConfidenceScores;
}

export interface Candidate extends ParsedResume {
  id: string;
  resumePath: string;
  status: CandidateStatus;
  documentStatus: DocumentStatus;
  documentsRequestedAt: string | null;
  documentsSubmittedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface CandidateDocument {
  id: string;
  candidateId: string;
  documentType: IdentityDocumentType;
  filePath: string;
  fileName: string;
  fileSize: number;
  uploadedAt: string;
  verificationStatus: DocumentVerificationStatus;
}

export type AgentAction =
  | "RESUME_PARSED"
  | "CANDIDATE_UPDATED"
  | "DOCUMENT_REQUEST_SENT"
  | "DOCUMENT_REQUEST_FAILED"
  | "DOCUMENTS_SUBMITTED"
  | "DOCUMENTS_VERIFIED"
  | "DOCUMENTS_REJECTED";

export interface AgentLogEntry {
  id: string;
  candidateId: string;
  action: AgentAction;
  toolUsed: string | null;
  input: Record<string, unknown>;
  output: Record<string, unknown>;
  timestamp: string;
}

export interface UploadedFile {
  originalName: string;
  mimeType: string;
  buffer: Buffer;
  size: number;
}
