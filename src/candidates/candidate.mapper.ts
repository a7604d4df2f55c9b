import { AgentLogEntry, Candidate, CandidateDocument } from "../shared/types/domain.types";
import { CandidateIntakeResult } from "./candidate-intake.service";
import { ValidationResult } from "./candidate-validation";

export function toValidationDetails(validation: ValidationResult) {
  return {
    mandatory_fields: validation.mandatoryFields,
    format_validation: validation.formatValidation,
    calculated_confidence: validation.overallConfidence,
    issues: validation.issues,
  };
}

export function toUploadResponse(result: CandidateIntakeResult) {
  const { candidate, parsed, validation, isUpdate } = result;
  return {
    success: true,
    data: {
      name: parsed.name,
      email: parsed.email,
      phone: parsed.phone,
      company: parsed.company,
      designation: parsed.designation,
      skills: parsed.skills,
      experience_years: parsed.experienceYears,
      confidence_scores: parsed.confidenceScores,
      validation_status: validation.isValid ? "valid" : "invalid",
      status: validation.status,
      validation_details: toValidationDetails(validation),
      candidate_id: candidate.id,
      is_update: isUpdate,
      db_status: isUpdate
        ? "Candidate already existed - data updated"
        : "New candidate saved successfully",
    },
  };
}

export function toCandidateListItem(candidate: Candidate) {
  return {
    id: candidate.id,
    name: candidate.name,
    email: candidate.email,
    company: candidate.company || "-",
    status: candidate.status,
    document_status: candidate.documentStatus || "NOT_REQUESTED",
  };
}

export function toCandidateResponse(candidate: Candidate) {
  return {
    id: candidate.id,
    name: candidate.name,
    email: candidate.email,
    phone: candidate.phone,
    company: candidate.company,
    designation: candidate.designation,
    skills: candidate.skills,
    experience_years: candidate.experienceYears,
    confidence_scores: candidate.confidenceScores,
    resume_path: candidate.resumePath,
    status: candidate.status,
    document_status: candidate.documentStatus,
    documents_requested_at: candidate.documentsRequestedAt,
    documents_submitted_at: candidate.documentsSubmittedAt,
    created_at: candidate.createdAt,
    updated_at: candidate.updatedAt,
  };
}

export function toDocumentResponse(document: CandidateDocument) {
  const encodedId = encodeURIComponent(document.id);
  return {
    id: document.id,
    type: document.documentType,
    file_name: document.fileName,
    file_size: document.fileSize,
    uploaded_at: document.uploadedAt,
    verification_status: document.verificationStatus,
    download_url: `/api/documents/${encodedId}/download`,
    view_url: `/api/documents/${encodedId}/view`,
  };
}

export function toAgentLogResponse(entry: AgentLogEntry) {
  return {
    id: entry.id,
    candidate_id: entry.candidateId,
    action: entry.action,
    tool_used: entry.toolUsed,
    input: entry.input,
    output: entry.output,
    timestamp: entry.timestamp,
  };
}
