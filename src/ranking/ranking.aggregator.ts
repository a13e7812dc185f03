import path from "node:path";
import type { CandidateResult, RankedReport, ScoreVector } from "../shared/types/ranking.types";

export function candidateNameFromFileName(fileName: string): string {
  return path.parse(fileName).name;
}

export function buildCandidateResult(fileName: string, scores: ScoreVector): CandidateResult {
  const frozenScores = Object.freeze([...scores]);
  return Object.freeze({
    name: candidateNameFromFileName(fileName),
    scores: frozenScores,
    total: frozenScores.reduce((sum, score) => sum + score, 0),
  });
}

/** Highest total first; candidates with equal totals keep their input order. */
export function rankCandidates(results: readonly CandidateResult[]): RankedReport {
  return [...results].sort((left, right) => right.total - left.total);
}
