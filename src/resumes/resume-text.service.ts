import { Logger } from "../config/logger";
import { ServiceError } from "../shared/errors";
import { ResumeFileType } from "../shared/types/domain.types";
import { extractDocxText } from "./extractors/docx.extractor";
import { extractPdfText } from "./extractors/pdf.extractor";
import { extractPlainText } from "./extractors/text.extractor";

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export class ResumeTextService {
  constructor(private readonly logger: Logger) {}

  detectResumeType(fileName?: string, mimeType?: string): ResumeFileType {
    const normalizedFileName = (fileName ?? "").toLowerCase();
    const normalizedMime = (mimeType ?? "").toLowerCase();

    if (normalizedMime.includes("pdf") || normalizedFileName.endsWith(".pdf")) {
      return "pdf";
    }
    if (normalizedMime.includes(DOCX_MIME) || normalizedFileName.endsWith(".docx")) {
      return "docx";
    }
    if (normalizedMime.startsWith("text/plain") || normalizedFileName.endsWith(".txt")) {
      return "txt";
    }
    return "unknown";
  }

  async extractText(buffer: Buffer, fileName?: string, mimeType?: string): Promise<string> {
    const type = this.detectResumeType(fileName, mimeType);
    if (type === "unknown") {
      throw new ServiceError("bad_request", "Unsupported resume type. Please upload PDF, DOCX or TXT.");
    }

    let text: string;
    try {
      text = await this.extractByType(type, buffer);
    } catch (error) {
      this.logger.warn("Resume text extraction failed", {
        fileName,
        type,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw new ServiceError("bad_request", "Could not extract text from resume.");
    }
    const compactText = text.replace(/\u0000/g, "").replace(/\s+/g, " ").trim();

    this.logger.info("Resume text extracted", {
      mimeType,
      fileName,
      type,
      chars: compactText.length,
    });

    if (!compactText) {
      throw new ServiceError("bad_request", "Could not extract text from resume.");
    }

    return compactText;
  }

  private async extractByType(type: Exclude<ResumeFileType, "unknown">, buffer: Buffer): Promise<string> {
    if (type === "pdf") {
      return extractPdfText(buffer);
    }
    if (type === "docx") {
      return extractDocxText(buffer);
    }
    return extractPlainText(buffer);
  }
}
