import { Request, RequestHandler, Response, Router } from "express";
import multer from "multer";
import { Logger } from "../config/logger";
import { asyncRoute } from "../http/http-errors";
import { routeParam, toUploadedFile } from "../http/uploads";
import { ServiceError } from "../shared/errors";
import { parseCandidateCorrection } from "./candidate-correction";
import { CandidateIntakeService } from "./candidate-intake.service";
import {
  toAgentLogResponse,
  toCandidateListItem,
  toCandidateResponse,
  toDocumentResponse,
  toUploadResponse,
  toValidationDetails,
} from "./candidate.mapper";
import { CandidatesService } from "./candidates.service";

interface CandidatesControllerDeps {
  candidateIntakeService: CandidateIntakeService;
  candidatesService: CandidatesService;
  upload: multer.Multer;
  requireRecruiter: RequestHandler;
  logger: Logger;
}

export function buildCandidatesController(deps: CandidatesControllerDeps): Router {
  const router = Router();

  router.post(
    "/upload",
    deps.requireRecruiter,
    deps.upload.single("resume"),
    asyncRoute(async (request: Request, response: Response) => {
      const file = toUploadedFile(request.file);
      if (!file) {
        throw new ServiceError("bad_request", "No resume file provided");
      }
      const result = await deps.candidateIntakeService.intakeResume(file);
      response.status(200).json(toUploadResponse(result));
    }),
  );

  router.get(
    "/",
    deps.requireRecruiter,
    asyncRoute(async (_request: Request, response: Response) => {
      const candidates = await deps.candidatesService.list();
      response.status(200).json(candidates.map(toCandidateListItem));
    }),
  );

  router.get(
    "/:id",
    deps.requireRecruiter,
    asyncRoute(async (request: Request, response: Response) => {
      const { candidate, documents } = await deps.candidatesService.getDetails(routeParam(request, "id"));
      response.status(200).json({
        ...toCandidateResponse(candidate),
        documents: documents.map(toDocumentResponse),
      });
    }),
  );

  router.patch(
    "/:id",
    deps.requireRecruiter,
    asyncRoute(async (request: Request, response: Response) => {
      const correction = parseCandidateCorrection(request.body);
      const { candidate, validation } = await deps.candidatesService.correct(
        routeParam(request, "id"),
        correction,
      );
      response.status(200).json({
        success: true,
        data: toCandidateResponse(candidate),
        validation_details: toValidationDetails(validation),
      });
    }),
  );

  router.get(
    "/:id/logs",
    deps.requireRecruiter,
    asyncRoute(async (request: Request, response: Response) => {
      const logs = await deps.candidatesService.listLogs(routeParam(request, "id"));
      response.status(200).json(logs.map(toAgentLogResponse));
    }),
  );

  router.delete(
    "/:id",
    deps.requireRecruiter,
    asyncRoute(async (request: Request, response: Response) => {
      const candidateId = routeParam(request, "id");
      await deps.candidatesService.delete(candidateId);
      deps.logger.info("Candidate removed by recruiter", { candidateId });
      response.status(200).json({ success: true, message: "Candidate deleted" });
    }),
  );

  return router;
}
