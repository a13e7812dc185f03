import { type Request, type Response, Router } from "express";
import { type Logger, logContext } from "../config/logger";
import type { RankingService } from "../ranking/ranking.service";
import { renderReportCsv } from "../reports/report.csv";
import { describeError, RankerError, type RankerErrorCode } from "../shared/errors";
import type { Criterion, ScoringBatch } from "../shared/types/ranking.types";
import {
  parseCriteriaList,
  parseDocument,
  parseDocumentList,
  parseRequestBody,
} from "./request.parsers";

interface RankingControllerDeps {
  rankingService: RankingService;
  logger: Logger;
}

const STATUS_BY_CODE: Record<RankerErrorCode, number> = {
  unsupported_format: 400,
  invalid_input: 400,
  corrupt_document: 422,
  service_error: 502,
};

export function buildRankingController(deps: RankingControllerDeps): Router {
  const router = Router();

  router.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  router.post("/extract-criteria", async (request: Request, response: Response) => {
    try {
      const body = parseRequestBody(request.body);
      const document = parseDocument(body.document, "document");
      deps.rankingService.assertSupportedDocuments([document]);
      const criteria = await deps.rankingService.extractCriteriaFromDocument(document);
      response.status(200).json({ criteria });
    } catch (error) {
      sendError(response, error, deps.logger, "/extract-criteria");
    }
  });

  router.post("/score-resumes", async (request: Request, response: Response) => {
    try {
      const body = parseRequestBody(request.body);
      const criteria = parseCriteriaList(body.criteria);
      const resumes = parseDocumentList(body.resumes, "resumes");
      deps.rankingService.assertSupportedDocuments(resumes);
      const batch = await deps.rankingService.scoreResumes(resumes, criteria);
      sendReport(request, response, criteria, batch);
    } catch (error) {
      sendError(response, error, deps.logger, "/score-resumes");
    }
  });

  router.post("/rank", async (request: Request, response: Response) => {
    try {
      const body = parseRequestBody(request.body);
      const jobDescription = parseDocument(body.jobDescription, "jobDescription");
      const resumes = parseDocumentList(body.resumes, "resumes");
      const outcome = await deps.rankingService.rankDocuments(jobDescription, resumes);
      sendReport(request, response, outcome.criteria, outcome);
    } catch (error) {
      sendError(response, error, deps.logger, "/rank");
    }
  });

  return router;
}

function sendReport(
  request: Request,
  response: Response,
  criteria: readonly Criterion[],
  batch: ScoringBatch,
): void {
  if (request.query.format === "csv") {
    response
      .status(200)
      .type("text/csv")
      .attachment("resume_scores.csv")
      .send(renderReportCsv(criteria, batch.ranked));
    return;
  }
  response.status(200).json({
    criteria,
    ranked: batch.ranked,
    failures: batch.failures,
  });
}

function sendError(response: Response, error: unknown, logger: Logger, route: string): void {
  if (error instanceof RankerError) {
    const status = STATUS_BY_CODE[error.code];
    logContext(logger, status >= 500 ? "error" : "warn", "http.request.failed", {
      route,
      ok: false,
      error_code: error.code,
    }, { status, error: error.message });
    response.status(status).json({ error: { code: error.code, message: error.message } });
    return;
  }
  logContext(logger, "error", "http.request.failed", { route, ok: false, error_code: "internal" }, {
    status: 500,
    error: describeError(error),
  });
  response.status(500).json({ error: { code: "internal", message: "Internal server error" } });
}
