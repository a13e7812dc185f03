import dotenv from "dotenv";
import { isLogLevel, type LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  requestBodyLimit: string;
  openaiApiKey: string;
  openaiChatModel: string;
  openaiBaseUrl: string;
  llmTemperature: number;
  llmMaxTokens: number;
  scoringConcurrency: number;
}

type EnvSource = Record<string, string | undefined>;

const MAX_SCORING_CONCURRENCY = 32;

function getRequiredString(source: EnvSource, name: string): string {
  const value = source[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return trimmed;
}

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const portRaw = source.PORT ?? "8000";
  const port = Number(portRaw);
  const temperatureRaw = source.LLM_TEMPERATURE ?? "0.1";
  const llmTemperature = Number(temperatureRaw);
  const maxTokensRaw = source.LLM_MAX_TOKENS ?? "1024";
  const llmMaxTokens = Number(maxTokensRaw);
  const concurrencyRaw = source.SCORING_CONCURRENCY ?? "4";
  const scoringConcurrency = Number(concurrencyRaw);
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isFinite(llmTemperature) || llmTemperature < 0 || llmTemperature > 2) {
    throw new Error(`Invalid LLM_TEMPERATURE value: ${temperatureRaw}. Expected number between 0 and 2.`);
  }
  if (!Number.isInteger(llmMaxTokens) || llmMaxTokens <= 0) {
    throw new Error(`Invalid LLM_MAX_TOKENS value: ${maxTokensRaw}`);
  }
  if (
    !Number.isInteger(scoringConcurrency) ||
    scoringConcurrency < 1 ||
    scoringConcurrency > MAX_SCORING_CONCURRENCY
  ) {
    throw new Error(
      `Invalid SCORING_CONCURRENCY value: ${concurrencyRaw}. Expected integer between 1 and ${MAX_SCORING_CONCURRENCY}.`,
    );
  }
  if (!isLogLevel(logLevelRaw)) {
    throw new Error(`Invalid LOG_LEVEL value: ${logLevelRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel: logLevelRaw,
    requestBodyLimit: getOptionalTrimmed(source, "REQUEST_BODY_LIMIT") ?? "25mb",
    openaiApiKey: getRequiredString(source, "OPENAI_API_KEY"),
    openaiChatModel: getOptionalTrimmed(source, "OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    openaiBaseUrl: (getOptionalTrimmed(source, "OPENAI_BASE_URL") ?? "https://api.openai.com/v1").replace(
      /\/+$/,
      "",
    ),
    llmTemperature,
    llmMaxTokens,
    scoringConcurrency,
  };
}
