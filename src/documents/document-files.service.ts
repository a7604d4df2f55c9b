import { CandidatesRepository } from "../db/repositories/candidates.repo";
import { DocumentsRepository } from "../db/repositories/documents.repo";
import { ServiceError } from "../shared/errors";
import { FileStorageService, guessContentType } from "../storage/file-storage.service";

export interface FilePayload {
  fileName: string;
  contentType: string;
  buffer: Buffer;
}

export class DocumentFilesService {
  constructor(
    private readonly candidatesRepository: CandidatesRepository,
    private readonly documentsRepository: DocumentsRepository,
    private readonly fileStorage: FileStorageService,
  ) {}

  async getDocumentFile(documentId: string): Promise<FilePayload> {
    const document = await this.documentsRepository.findById(documentId);
    if (!document) {
      throw new ServiceError("not_found", "Document not found");
    }
    const buffer = await this.fileStorage.read(document.filePath);
    if (!buffer) {
      throw new ServiceError("not_found", "File not found on server");
    }
    return {
      fileName: document.fileName,
      contentType: guessContentType(document.fileName),
      buffer,
    };
  }

  async getResumeFile(candidateId: string): Promise<FilePayload> {
    const candidate = await this.candidatesRepository.findById(candidateId);
    if (!candidate) {
      throw new ServiceError("not_found", "Candidate not found");
    }
    if (!candidate.resumePath) {
      throw new ServiceError("not_found", "Resume file not found");
    }
    const buffer = await this.fileStorage.read(candidate.resumePath);
    if (!buffer) {
      throw new ServiceError("not_found", "Resume file not found on server");
    }
    const fileName = candidate.resumePath.split("/").pop() ?? "resume";
    return { fileName, contentType: guessContentType(fileName), buffer };
  }
}
