import type { Criterion } from "../../../shared/types/ranking.types";

export const RESUME_SCORING_V1_SYSTEM_PROMPT = [
  "You are an expert HR system that evaluates resumes against job criteria.",
  "For each criterion, provide a score from 0 to 5, where:",
  "",
  "0: No evidence of meeting the criterion",
  "1: Minimal evidence, significantly below expectations",
  "2: Some evidence, but below expectations",
  "3: Meets expectations",
  "4: Exceeds expectations",
  "5: Far exceeds expectations",
  "",
  "Be objective and consistent in your scoring. Focus on concrete evidence in the resume.",
].join("\n");

export function formatNumberedCriteria(criteria: readonly Criterion[]): string {
  return criteria.map((criterion, index) => `${index + 1}. ${criterion}`).join("\n");
}

export function buildResumeScoringV1Prompt(input: {
  resumeText: string;
  criteria: readonly Criterion[];
}): string {
  return [
    "Score the following resume against each criterion on a scale of 0-5:",
    "",
    "CRITERIA:",
    formatNumberedCriteria(input.criteria),
    "",
    "RESUME:",
    input.resumeText,
    "",
    "For each criterion, provide ONLY a numeric score (0-5), one per line.",
    "Return your answers as a list of numbers in the same order as the criteria, with nothing else.",
  ].join("\n");
}
