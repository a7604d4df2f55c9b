import { Request, Response, Router } from "express";
import { CandidatesService } from "../candidates/candidates.service";
import { asyncRoute } from "../http/http-errors";
import { routeParam } from "../http/uploads";
import { renderUploadPage, UploadPageView } from "./upload.page";

interface PublicControllerDeps {
  candidatesService: CandidatesService;
}

export function buildPublicController(deps: PublicControllerDeps): Router {
  const router = Router();

  router.get(
    "/api/candidates/:id/public",
    asyncRoute(async (request: Request, response: Response) => {
      const name = await deps.candidatesService.getPublicName(routeParam(request, "id"));
      response.status(200).json({ name });
    }),
  );

  router.get(
    "/upload/:id",
    asyncRoute(async (request: Request, response: Response) => {
      const candidateId = routeParam(request, "id");
      const candidate = await deps.candidatesService.findById(candidateId);
      let view: UploadPageView;
      if (!candidate) {
        view = { kind: "not_found" };
      } else if (candidate.documentStatus === "SUBMITTED" || candidate.documentStatus === "VERIFIED") {
        view = {
          kind: "already_submitted",
          candidateName: candidate.name,
          verified: candidate.documentStatus === "VERIFIED",
        };
      } else if (candidate.documentStatus === "NOT_REQUESTED") {
        view = { kind: "not_requested", candidateName: candidate.name };
      } else {
        view = {
          kind: "form",
          candidateName: candidate.name,
          submitUrl: `/candidates/${encodeURIComponent(candidate.id)}/submit-documents`,
        };
      }
      response
        .status(view.kind === "not_found" ? 404 : 200)
        .type("html")
        .send(renderUploadPage(view));
    }),
  );

  return router;
}
