import { InvalidInputError } from "../shared/errors";
import type { Criterion, UploadedDocument } from "../shared/types/ranking.types";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseRequestBody(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new InvalidInputError("Request body must be a JSON object.");
  }
  return body;
}

export function parseDocument(value: unknown, field: string): UploadedDocument {
  if (!isRecord(value)) {
    throw new InvalidInputError(`${field} must be an object with fileName and contentBase64.`);
  }
  const fileName = typeof value.fileName === "string" ? value.fileName.trim() : "";
  if (!fileName) {
    throw new InvalidInputError(`${field}.fileName is required.`);
  }
  if (typeof value.contentBase64 !== "string") {
    throw new InvalidInputError(`${field}.contentBase64 is required.`);
  }
  const encoded = value.contentBase64.replace(/\s+/g, "");
  if (!encoded || encoded.length % 4 !== 0 || !BASE64_PATTERN.test(encoded)) {
    throw new InvalidInputError(`${field}.contentBase64 is not valid base64.`);
  }
  return { fileName, content: Buffer.from(encoded, "base64") };
}

export function parseDocumentList(value: unknown, field: string): UploadedDocument[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new InvalidInputError(`${field} must be a non-empty array.`);
  }
  return value.map((item, index) => parseDocument(item, `${field}[${index}]`));
}

export function parseCriteriaList(value: unknown): Criterion[] {
  if (!Array.isArray(value)) {
    throw new InvalidInputError("criteria must be an array of strings.");
  }
  const criteria = value
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  if (criteria.length === 0 || criteria.length !== value.length) {
    throw new InvalidInputError("criteria must be a non-empty array of non-empty strings.");
  }
  return criteria;
}
