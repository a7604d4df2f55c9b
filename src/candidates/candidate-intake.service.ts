import { randomUUID } from "node:crypto";
import { Logger } from "../config/logger";
import { AgentLogsRepository } from "../db/repositories/agent-logs.repo";
import { CandidatesRepository } from "../db/repositories/candidates.repo";
import { ResumeParserService } from "../resumes/resume-parser.service";
import { ResumeTextService } from "../resumes/resume-text.service";
import { ServiceError } from "../shared/errors";
import { Candidate, ParsedResume, UploadedFile } from "../shared/types/domain.types";
import { Clock, formatCompactTimestamp, systemClock } from "../shared/utils/time";
import { assertCandidateTransition } from "../state/state-machine";
import { FileStorageService } from "../storage/file-storage.service";
import { validateCandidate, ValidationResult } from "./candidate-validation";

export interface CandidateIntakeResult {
  candidate: Candidate;
  parsed: ParsedResume;
  validation: ValidationResult;
  isUpdate: boolean;
}

export class CandidateIntakeService {
  constructor(
    private readonly candidatesRepository: CandidatesRepository,
    private readonly agentLogsRepository: AgentLogsRepository,
    private readonly resumeTextService: ResumeTextService,
    private readonly resumeParserService: ResumeParserService,
    private readonly fileStorage: FileStorageService,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock,
  ) {}

  async intakeResume(file: UploadedFile): Promise<CandidateIntakeResult> {
    if (!file.originalName.trim()) {
      throw new ServiceError("bad_request", "No file selected");
    }

    const resumeText = await this.resumeTextService.extractText(
      file.buffer,
      file.originalName,
      file.mimeType,
    );
    const parsed = await this.resumeParserService.parse(resumeText);
    const validation = validateCandidate(parsed);
    assertCandidateTransition("PARSED", validation.status);

    const now = this.clock();
    const stored = await this.fileStorage.save(
      "resumes",
      `${formatCompactTimestamp(now)}_${file.originalName}`,
      file.buffer,
    );

    const existing = parsed.email ? await this.candidatesRepository.findByEmail(parsed.email) : null;
    let candidate: Candidate;
    if (existing) {
      const updated = await this.candidatesRepository.updateParsedFields(existing.id, {
        parsed,
        status: validation.status,
        resumePath: stored.key,
        updatedAt: now.toISOString(),
      });
      if (!updated) {
        throw new ServiceError("not_found", "Candidate not found");
      }
      candidate = updated;
      if (existing.resumePath && existing.resumePath !== stored.key) {
        await this.removeReplacedResume(existing.id, existing.resumePath);
      }
    } else {
      candidate = {
        ...parsed,
        id: randomUUID(),
        resumePath: stored.key,
        status: validation.status,
        documentStatus: "NOT_REQUESTED",
        documentsRequestedAt: null,
        documentsSubmittedAt: null,
        createdAt: now.toISOString(),
        updatedAt: now.toISOString(),
      };
      await this.candidatesRepository.create(candidate);
    }

    await this.agentLogsRepository.log({
      candidateId: candidate.id,
      action: "RESUME_PARSED",
      toolUsed: "resume_parser",
      input: {
        file_name: stored.fileName,
        text_chars: resumeText.length,
      },
      output: {
        status: validation.status,
        is_update: Boolean(existing),
        overall_confidence: validation.overallConfidence,
        issues: validation.issues,
      },
      timestamp: now.toISOString(),
    });

    this.logger.info("Resume intake completed", {
      candidateId: candidate.id,
      status: validation.status,
      isUpdate: Boolean(existing),
    });

    return {
      candidate,
      parsed,
      validation,
      isUpdate: Boolean(existing),
    };
  }

  private async removeReplacedResume(candidateId: string, key: string): Promise<void> {
    try {
      await this.fileStorage.remove(key);
    } catch (error) {
      this.logger.warn("Replaced resume could not be removed", {
        candidateId,
        key,
        error: error instanceof Error ? error.message : "Unknown error",
      });
    }
  }
}
