import { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import multer from "multer";
import { Logger } from "../config/logger";
import { errorMessage, isServiceError } from "../shared/errors";

interface HttpFailure {
  status: number;
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

type AsyncRouteHandler = (request: Request, response: Response) => Promise<void>;

/** Express 4 does not await handlers; rejections are forwarded to the error middleware. */
export function asyncRoute(handler: AsyncRouteHandler): RequestHandler {
  return (request: Request, response: Response, next: NextFunction) => {
    handler(request, response).catch(next);
  };
}

export function toHttpFailure(error: unknown): HttpFailure {
  if (isServiceError(error)) {
    return {
      status: error.statusCode,
      code: error.code,
      message: error.message,
      details: error.details,
    };
  }
  if (error instanceof multer.MulterError) {
    if (error.code === "LIMIT_FILE_SIZE") {
      return {
        status: 413,
        code: "payload_too_large",
        message: "File exceeds the maximum upload size",
      };
    }
    return { status: 400, code: "bad_request", message: error.message };
  }
  if (hasBodyParserType(error, "entity.parse.failed")) {
    return { status: 400, code: "bad_request", message: "Request body is not valid JSON" };
  }
  if (hasBodyParserType(error, "entity.too.large")) {
    return { status: 413, code: "payload_too_large", message: "Request body is too large" };
  }
  return { status: 500, code: "internal_error", message: "Internal server error" };
}

export function sendFailure(response: Response, failure: HttpFailure): void {
  response.status(failure.status).json({
    success: false,
    error: failure.message,
    error_code: failure.code,
    ...(failure.details ?? {}),
  });
}

export function buildErrorMiddleware(logger: Logger): ErrorRequestHandler {
  return (error: unknown, request: Request, response: Response, next: NextFunction) => {
    if (response.headersSent) {
      next(error);
      return;
    }
    const failure = toHttpFailure(error);
    if (failure.status >= 500) {
      logger.error("Request failed", {
        method: request.method,
        route: request.path,
        errorCode: failure.code,
        error: errorMessage(error),
      });
    }
    sendFailure(response, failure);
  };
}

function hasBodyParserType(error: unknown, type: string): boolean {
  return typeof error === "object" && error !== null && "type" in error && error.type === type;
}
