import { NextFunction, Request, RequestHandler, Response, Router } from "express";
import multer from "multer";
import { asyncRoute } from "../http/http-errors";
import { fieldFile, routeParam } from "../http/uploads";
import { ServiceError } from "../shared/errors";
import { SlidingWindowRateLimiter } from "../shared/utils/rate-limit";
import { DocumentFilesService, FilePayload } from "./document-files.service";
import { DocumentIntakeService } from "./document-intake.service";
import { DocumentRequestService } from "./document-request.service";
import { DocumentVerificationService, parseVerificationInput } from "./document-verification.service";

interface DocumentsControllerDeps {
  documentRequestService: DocumentRequestService;
  documentIntakeService: DocumentIntakeService;
  documentVerificationService: DocumentVerificationService;
  documentFilesService: DocumentFilesService;
  upload: multer.Multer;
  requireRecruiter: RequestHandler;
  submitRateLimiter: SlidingWindowRateLimiter;
}

export function buildDocumentsController(deps: DocumentsControllerDeps): Router {
  const router = Router();

  router.post(
    "/candidates/:id/request-documents",
    deps.requireRecruiter,
    asyncRoute(async (request: Request, response: Response) => {
      const result = await deps.documentRequestService.requestDocuments(routeParam(request, "id"));
      response.status(200).json({
        success: true,
        candidate_id: result.candidateId,
        candidate_name: result.candidateName,
        candidate_email: result.candidateEmail,
        email: {
          subject: result.email.subject,
          body: result.email.body,
          generated_by: result.email.generatedBy,
        },
        deadline: result.deadline,
        upload_link: result.uploadLink,
        send_result: {
          provider: result.sendResult.provider,
          message_id: result.sendResult.messageId,
        },
      });
    }),
  );

  router.post(
    "/candidates/:id/submit-documents",
    rateLimitByIp(deps.submitRateLimiter),
    deps.upload.fields([
      { name: "pan_card", maxCount: 1 },
      { name: "aadhaar_card", maxCount: 1 },
    ]),
    asyncRoute(async (request: Request, response: Response) => {
      const result = await deps.documentIntakeService.submitDocuments(routeParam(request, "id"), {
        pan: fieldFile(request, "pan_card"),
        aadhaar: fieldFile(request, "aadhaar_card"),
      });
      response.status(200).json({
        success: true,
        message: "Documents submitted successfully",
        candidate_id: result.candidateId,
        documents: result.documents,
      });
    }),
  );

  router.post(
    "/candidates/:id/verify-documents",
    deps.requireRecruiter,
    asyncRoute(async (request: Request, response: Response) => {
      const input = parseVerificationInput(request.body);
      const result = await deps.documentVerificationService.verify(routeParam(request, "id"), input);
      response.status(200).json({
        success: true,
        candidate_id: result.candidateId,
        decision: result.decision,
        document_status: result.documentStatus,
        documents_updated: result.documentsUpdated,
      });
    }),
  );

  router.get(
    "/api/documents/:id/download",
    deps.requireRecruiter,
    asyncRoute(async (request: Request, response: Response) => {
      const file = await deps.documentFilesService.getDocumentFile(routeParam(request, "id"));
      sendFile(response, file, "attachment");
    }),
  );

  router.get(
    "/api/documents/:id/view",
    deps.requireRecruiter,
    asyncRoute(async (request: Request, response: Response) => {
      const file = await deps.documentFilesService.getDocumentFile(routeParam(request, "id"));
      sendFile(response, file, "inline");
    }),
  );

  router.get(
    "/api/resume/:candidateId/download",
    deps.requireRecruiter,
    asyncRoute(async (request: Request, response: Response) => {
      const file = await deps.documentFilesService.getResumeFile(routeParam(request, "candidateId"));
      sendFile(response, file, "attachment");
    }),
  );

  return router;
}

function rateLimitByIp(limiter: SlidingWindowRateLimiter): RequestHandler {
  return (request: Request, response: Response, next: NextFunction) => {
    const decision = limiter.checkAndConsume(request.ip ?? "unknown");
    if (!decision.allowed) {
      response.setHeader("Retry-After", String(decision.retryAfterSeconds));
      next(
        new ServiceError("rate_limited", "Too many submissions, please try again later", {
          retry_after_seconds: decision.retryAfterSeconds,
        }),
      );
      return;
    }
    next();
  };
}

function sendFile(response: Response, file: FilePayload, disposition: "attachment" | "inline"): void {
  response.setHeader("Content-Type", file.contentType);
  response.setHeader("Content-Disposition", `${disposition}; filename="${file.fileName}"`);
  response.status(200).send(file.buffer);
}
