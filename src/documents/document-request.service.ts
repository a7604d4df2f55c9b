import { JsonLlmClient } from "../ai/llm.client";
import { callJsonPromptSafe } from "../ai/llm.safe";
import {
  buildDocumentRequestEmailV1Prompt,
  DOCUMENT_REQUEST_EMAIL_SCHEMA_HINT,
} from "../ai/prompts/documents/document-request-email.v1.prompt";
import { Logger } from "../config/logger";
import { isValidEmail } from "../candidates/candidate-validation";
import { AgentLogsRepository } from "../db/repositories/agent-logs.repo";
import { CandidatesRepository } from "../db/repositories/candidates.repo";
import { EmailSender, EmailSendResult } from "../notifications/email.sender";
import { ServiceError } from "../shared/errors";
import { addDays, Clock, formatDeadline, systemClock } from "../shared/utils/time";
import { assertDocumentTransition } from "../state/state-machine";

const MAX_SUBJECT_LENGTH = 120;

export interface DocumentRequestOptions {
  publicAppUrl: string;
  deadlineDays: number;
  llmTimeoutMs?: number;
}

export interface DocumentRequestEmail {
  subject: string;
  body: string;
  generatedBy: "llm" | "template";
}

export interface DocumentRequestResult {
  candidateId: string;
  candidateName: string;
  candidateEmail: string;
  email: DocumentRequestEmail;
  deadline: string;
  uploadLink: string;
  sendResult: EmailSendResult;
}

interface EmailDraft {
  subject: string;
  body: string;
}

export class DocumentRequestService {
  constructor(
    private readonly candidatesRepository: CandidatesRepository,
    private readonly agentLogsRepository: AgentLogsRepository,
    private readonly llmClient: JsonLlmClient,
    private readonly emailSender: EmailSender,
    private readonly logger: Logger,
    private readonly options: DocumentRequestOptions,
    private readonly clock: Clock = systemClock,
  ) {}

  buildUploadLink(candidateId: string): string {
    return `${this.options.publicAppUrl}/upload/${encodeURIComponent(candidateId)}`;
  }

  async requestDocuments(candidateId: string): Promise<DocumentRequestResult> {
    const candidate = await this.candidatesRepository.findById(candidateId);
    if (!candidate) {
      throw new ServiceError("not_found", "Candidate not found");
    }
    assertDocumentTransition(candidate.documentStatus, "REQUESTED");
    if (!candidate.email) {
      throw new ServiceError("bad_request", "Candidate has no email address");
    }
    if (!isValidEmail(candidate.email)) {
      throw new ServiceError("bad_request", "Candidate email address is invalid");
    }

    const now = this.clock();
    const deadline = formatDeadline(addDays(now, this.options.deadlineDays));
    const uploadLink = this.buildUploadLink(candidate.id);
    const candidateName = candidate.name || "Candidate";
    const email = await this.composeEmail({ candidateName, uploadLink, deadline });
    const toolUsed = `email:${this.emailSender.provider}`;
    const logInput = {
      to_email: candidate.email,
      subject: email.subject,
      upload_link: uploadLink,
      generated_by: email.generatedBy,
    };

    let sendResult: EmailSendResult;
    try {
      sendResult = await this.emailSender.send({
        to: candidate.email,
        subject: email.subject,
        text: email.body,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      this.logger.error("Document request email failed", {
        candidateId,
        provider: this.emailSender.provider,
        error: message,
      });
      await this.agentLogsRepository.log({
        candidateId,
        action: "DOCUMENT_REQUEST_FAILED",
        toolUsed,
        input: logInput,
        output: { success: false, error: message },
        timestamp: now.toISOString(),
      });
      throw new ServiceError("email_failure", "Failed to send document request email");
    }

    await this.candidatesRepository.updateDocumentStatus(candidate.id, {
      documentStatus: "REQUESTED",
      documentsRequestedAt: now.toISOString(),
      updatedAt: now.toISOString(),
    });
    await this.agentLogsRepository.log({
      candidateId,
      action: "DOCUMENT_REQUEST_SENT",
      toolUsed,
      input: logInput,
      output: {
        success: true,
        provider: sendResult.provider,
        message_id: sendResult.messageId,
      },
      timestamp: now.toISOString(),
    });

    return {
      candidateId: candidate.id,
      candidateName,
      candidateEmail: candidate.email,
      email,
      deadline,
      uploadLink,
      sendResult,
    };
  }

  private async composeEmail(input: {
    candidateName: string;
    uploadLink: string;
    deadline: string;
  }): Promise<DocumentRequestEmail> {
    const safe = await callJsonPromptSafe<EmailDraft>({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt: buildDocumentRequestEmailV1Prompt(input),
      maxTokens: 700,
      promptName: "document_request_email_v1",
      schemaHint: DOCUMENT_REQUEST_EMAIL_SCHEMA_HINT,
      timeoutMs: this.options.llmTimeoutMs,
      validate: isEmailDraft,
    });
    if (!safe.ok) {
      this.logger.warn("Document request email falls back to template", {
        errorCode: safe.error_code,
      });
      return buildTemplateEmail(input);
    }

    const subject = safe.data.subject.replace(/\s+/g, " ").trim().slice(0, MAX_SUBJECT_LENGTH);
    let body = safe.data.body.trim();
    if (!body.includes(input.uploadLink)) {
      body = `${body}\n\nUpload your documents here:\n${input.uploadLink}`;
    }
    return { subject, body, generatedBy: "llm" };
  }
}

function isEmailDraft(value: unknown): value is EmailDraft {
  if (typeof value !== "object" || value === null || !("subject" in value) || !("body" in value)) {
    return false;
  }
  const { subject, body } = value;
  return (
    typeof subject === "string" &&
    subject.trim().length > 0 &&
    typeof body === "string" &&
    body.trim().length > 0
  );
}

export function buildTemplateEmail(input: {
  candidateName: string;
  uploadLink: string;
  deadline: string;
}): DocumentRequestEmail {
  const body = [
    `Dear ${input.candidateName},`,
    "",
    "As part of your candidate verification, please submit the following documents:",
    "",
    "- PAN Card",
    "- Aadhaar Card",
    "",
    "Accepted formats: JPG, PNG or PDF.",
    "",
    "Upload your documents here:",
    input.uploadLink,
    "",
    `Please complete the submission by ${input.deadline}.`,
    "",
    "Regards,",
    "Candidate Verification Team",
  ].join("\n");
  return {
    subject: "Document Verification Request",
    body,
    generatedBy: "template",
  };
}
