import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { Logger } from "../config/logger";
import { ServiceError } from "../shared/errors";

export type StorageFolder = "resumes" | "documents";

export interface StoredFile {
  key: string;
  fileName: string;
  size: number;
}

const CONTENT_TYPES: Record<string, string> = {
  ".pdf": "application/pdf",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".txt": "text/plain; charset=utf-8",
  ".docx": "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
};

/**
 * Stores uploads below a single root directory. Keys are relative
 * ("documents/<name>") and are what the tables persist.
 */
export class FileStorageService {
  private readonly rootDir: string;

  constructor(
    rootDir: string,
    private readonly logger: Logger,
  ) {
    this.rootDir = path.resolve(rootDir);
  }

  async save(folder: StorageFolder, fileName: string, buffer: Buffer): Promise<StoredFile> {
    const safeName = sanitizeFileName(fileName);
    const key = `${folder}/${safeName}`;
    const absolutePath = this.resolveKey(key);
    try {
      await mkdir(path.dirname(absolutePath), { recursive: true });
      await writeFile(absolutePath, buffer);
    } catch (error) {
      this.logger.error("File storage write failed", {
        key,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw new ServiceError("storage_failure", "Failed to store uploaded file");
    }
    this.logger.debug("File stored", { key, size: buffer.length });
    return { key, fileName: safeName, size: buffer.length };
  }

  async read(key: string): Promise<Buffer | null> {
    const absolutePath = this.resolveKey(key);
    try {
      return await readFile(absolutePath);
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
  }

  async remove(key: string): Promise<void> {
    await rm(this.resolveKey(key), { force: true });
  }

  resolveKey(key: string): string {
    const absolutePath = path.resolve(this.rootDir, key);
    const relative = path.relative(this.rootDir, absolutePath);
    if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new ServiceError("bad_request", "Invalid file path");
    }
    return absolutePath;
  }
}

export function sanitizeFileName(fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? "";
  const cleaned = base
    .replace(/[^A-Za-z0-9._-]+/g, "_")
    .replace(/\.{2,}/g, ".")
    .replace(/^[._]+/, "");
  return cleaned || "file";
}

export function fileExtension(fileName: string): string {
  const index = fileName.lastIndexOf(".");
  if (index < 0 || index === fileName.length - 1) {
    return "";
  }
  return fileName.slice(index + 1).toLowerCase();
}

export function guessContentType(fileName: string): string {
  return CONTENT_TYPES[path.extname(fileName).toLowerCase()] ?? "application/octet-stream";
}

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}
