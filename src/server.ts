import { createApp } from "./app";
import { loadEnv } from "./config/env";

function bootstrap(): void {
  const env = loadEnv();
  const { app, logger, completionService } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
    logger.info(`LLM chat model: ${completionService.getModelName?.() ?? env.openaiChatModel}`);
    logger.info("Scoring concurrency", { limit: env.scoringConcurrency });
  });
}

bootstrap();
