import { timingSafeEqual } from "node:crypto";
import { NextFunction, Request, RequestHandler, Response } from "express";
import { ServiceError } from "../shared/errors";

/** Passes everything through when no key is configured. */
export function buildRecruiterAuth(apiKey?: string): RequestHandler {
  return (request: Request, _response: Response, next: NextFunction) => {
    if (!apiKey) {
      next();
      return;
    }
    const provided = request.header("x-api-key") ?? "";
    if (!safeEqual(provided, apiKey)) {
      next(new ServiceError("unauthorized", "Invalid or missing API key"));
      return;
    }
    next();
  };
}

function safeEqual(left: string, right: string): boolean {
  const leftBuffer = Buffer.from(left);
  const rightBuffer = Buffer.from(right);
  if (leftBuffer.length !== rightBuffer.length) {
    return false;
  }
  return timingSafeEqual(leftBuffer, rightBuffer);
}
