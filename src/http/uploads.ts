import { Request } from "express";
import multer from "multer";
import { UploadedFile } from "../shared/types/domain.types";

export function buildUploadMiddleware(maxUploadBytes: number): multer.Multer {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 2 },
  });
}

export function toUploadedFile(file: Express.Multer.File | undefined): UploadedFile | undefined {
  if (!file) {
    return undefined;
  }
  return {
    originalName: file.originalname,
    mimeType: file.mimetype,
    buffer: file.buffer,
    size: file.size,
  };
}

/** First file of a named field from `upload.fields(...)`. */
export function fieldFile(request: Request, field: string): UploadedFile | undefined {
  const files = request.files;
  if (!files || Array.isArray(files)) {
    return undefined;
  }
  return toUploadedFile(files[field]?.[0]);
}

export function routeParam(request: Request, name: string): string {
  return String(request.params[name] ?? "");
}
