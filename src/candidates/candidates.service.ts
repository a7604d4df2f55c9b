import { Logger } from "../config/logger";
import { AgentLogsRepository } from "../db/repositories/agent-logs.repo";
import { CandidatesRepository } from "../db/repositories/candidates.repo";
import { DocumentsRepository } from "../db/repositories/documents.repo";
import { ServiceError } from "../shared/errors";
import { AgentLogEntry, Candidate, CandidateDocument } from "../shared/types/domain.types";
import { Clock, systemClock } from "../shared/utils/time";
import { assertCandidateTransition } from "../state/state-machine";
import { FileStorageService } from "../storage/file-storage.service";
import { applyCorrection, CandidateCorrection } from "./candidate-correction";
import { validateCandidate, ValidationResult } from "./candidate-validation";

export interface CandidateDetails {
  candidate: Candidate;
  documents: CandidateDocument[];
}

export class CandidatesService {
  constructor(
    private readonly candidatesRepository: CandidatesRepository,
    private readonly documentsRepository: DocumentsRepository,
    private readonly agentLogsRepository: AgentLogsRepository,
    private readonly fileStorage: FileStorageService,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock,
  ) {}

  async list(): Promise<Candidate[]> {
    return this.candidatesRepository.list();
  }

  async getDetails(candidateId: string): Promise<CandidateDetails> {
    const candidate = await this.requireCandidate(candidateId);
    const documents = await this.documentsRepository.listByCandidate(candidateId);
    return { candidate, documents };
  }

  async findById(candidateId: string): Promise<Candidate | null> {
    return this.candidatesRepository.findById(candidateId);
  }

  async getPublicName(candidateId: string): Promise<string> {
    const candidate = await this.requireCandidate(candidateId);
    return candidate.name;
  }

  async correct(
    candidateId: string,
    correction: CandidateCorrection,
  ): Promise<{ candidate: Candidate; validation: ValidationResult }> {
    const existing = await this.requireCandidate(candidateId);

    if (correction.email && correction.email !== existing.email) {
      const owner = await this.candidatesRepository.findByEmail(correction.email);
      if (owner && owner.id !== existing.id) {
        throw new ServiceError("conflict", "Another candidate already uses this email address");
      }
    }

    const next = applyCorrection(existing, correction);
    const validation = validateCandidate(next);
    assertCandidateTransition(existing.status, validation.status);

    const now = this.clock().toISOString();
    const updated = await this.candidatesRepository.updateParsedFields(candidateId, {
      parsed: next,
      status: validation.status,
      updatedAt: now,
    });
    if (!updated) {
      throw new ServiceError("not_found", "Candidate not found");
    }

    await this.agentLogsRepository.log({
      candidateId,
      action: "CANDIDATE_UPDATED",
      toolUsed: "manual_entry",
      input: { fields: Object.keys(correction) },
      output: {
        previous_status: existing.status,
        status: validation.status,
        issues: validation.issues,
      },
      timestamp: now,
    });
    return { candidate: updated, validation };
  }

  async listLogs(candidateId: string): Promise<AgentLogEntry[]> {
    await this.requireCandidate(candidateId);
    return this.agentLogsRepository.listByCandidate(candidateId);
  }

  async delete(candidateId: string): Promise<void> {
    const candidate = await this.requireCandidate(candidateId);
    const documents = await this.documentsRepository.listByCandidate(candidateId);
    const storedKeys = [candidate.resumePath, ...documents.map((document) => document.filePath)].filter(
      (key) => key.length > 0,
    );
    for (const key of storedKeys) {
      try {
        await this.fileStorage.remove(key);
      } catch (error) {
        this.logger.warn("Stored file could not be removed", {
          candidateId,
          key,
          error: error instanceof Error ? error.message : "Unknown error",
        });
      }
    }

    await this.agentLogsRepository.deleteByCandidate(candidateId);
    await this.documentsRepository.deleteByCandidate(candidateId);
    await this.candidatesRepository.delete(candidateId);
    this.logger.info("Candidate deleted", { candidateId, filesRemoved: storedKeys.length });
  }

  private async requireCandidate(candidateId: string): Promise<Candidate> {
    const candidate = await this.candidatesRepository.findById(candidateId);
    if (!candidate) {
      throw new ServiceError("not_found", "Candidate not found");
    }
    return candidate;
  }
}
