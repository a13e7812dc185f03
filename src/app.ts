import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { CompletionService } from "./ai/completion.service";
import { LlmClient } from "./ai/llm.client";
import { buildRankingController } from "./api/ranking.controller";
import { isRecord } from "./api/request.parsers";
import type { EnvConfig } from "./config/env";
import { createLogger, type Logger } from "./config/logger";
import { CriteriaExtractorService } from "./criteria/criteria-extractor.service";
import { type DocumentDecoders, DocumentService } from "./documents/document.service";
import { RankingService } from "./ranking/ranking.service";
import { ResumeScorerService } from "./scoring/resume-scorer.service";

export interface AppContext {
  app: Express;
  logger: Logger;
  completionService: CompletionService;
  rankingService: RankingService;
}

export interface AppOverrides {
  logger?: Logger;
  completionService?: CompletionService;
  decoders?: DocumentDecoders;
}

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger({ minLevel: env.logLevel });
  const app = express();

  app.use(express.json({ limit: env.requestBodyLimit }));

  const completionService =
    overrides.completionService ??
    new LlmClient(
      {
        apiKey: env.openaiApiKey,
        model: env.openaiChatModel,
        baseUrl: env.openaiBaseUrl,
        maxTokens: env.llmMaxTokens,
      },
      logger,
    );
  const documentService = new DocumentService(logger, overrides.decoders);
  const criteriaExtractor = new CriteriaExtractorService(completionService, logger, env.llmTemperature);
  const resumeScorer = new ResumeScorerService(completionService, logger, env.llmTemperature);
  const rankingService = new RankingService({
    documentService,
    criteriaExtractor,
    resumeScorer,
    logger,
    concurrency: env.scoringConcurrency,
  });

  app.use(buildRankingController({ rankingService, logger }));

  // Body parser failures (malformed JSON, oversized payloads) carry their own status.
  app.use((error: unknown, _request: Request, response: Response, next: NextFunction) => {
    if (response.headersSent) {
      next(error);
      return;
    }
    const status = isRecord(error) && typeof error.status === "number" ? error.status : 500;
    const message = error instanceof Error ? error.message : "Unknown error";
    logger.warn("http.request.rejected", { status, error: message });
    response.status(status).json({
      error: {
        code: status === 413 ? "payload_too_large" : status < 500 ? "invalid_input" : "internal",
        message: status < 500 ? message : "Internal server error",
      },
    });
  });

  return { app, logger, completionService, rankingService };
}
