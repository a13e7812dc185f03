import type { RankerErrorCode } from "../errors";

export type Criterion = string;

/** One integer in [0,5] per criterion, in criteria order. */
export type ScoreVector = readonly number[];

export interface CandidateResult {
  readonly name: string;
  readonly scores: ScoreVector;
  readonly total: number;
}

export type RankedReport = readonly CandidateResult[];

export interface CandidateFailure {
  name: string;
  fileName: string;
  errorCode: RankerErrorCode | "unknown";
  message: string;
}

export interface ScoringBatch {
  ranked: RankedReport;
  failures: CandidateFailure[];
}

export interface RankingOutcome extends ScoringBatch {
  criteria: Criterion[];
}

export interface UploadedDocument {
  fileName: string;
  content: Buffer;
}
