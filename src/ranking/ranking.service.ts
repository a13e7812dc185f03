import type { Logger } from "../config/logger";
import type { CriteriaExtractorService } from "../criteria/criteria-extractor.service";
import type { DocumentService } from "../documents/document.service";
import type { ResumeScorerService } from "../scoring/resume-scorer.service";
import { describeError, InvalidInputError, RankerError } from "../shared/errors";
import type {
  CandidateFailure,
  CandidateResult,
  Criterion,
  RankingOutcome,
  ScoringBatch,
  UploadedDocument,
} from "../shared/types/ranking.types";
import { createConcurrencyLimiter, type LimitedRunner } from "../shared/utils/concurrency";
import { buildCandidateResult, candidateNameFromFileName, rankCandidates } from "./ranking.aggregator";

interface RankingServiceDeps {
  documentService: DocumentService;
  criteriaExtractor: CriteriaExtractorService;
  resumeScorer: ResumeScorerService;
  logger: Logger;
  concurrency: number;
}

type CandidateOutcome =
  | { ok: true; result: CandidateResult }
  | { ok: false; failure: CandidateFailure };

export class RankingService {
  private readonly runLimited: LimitedRunner;

  constructor(private readonly deps: RankingServiceDeps) {
    this.runLimited = createConcurrencyLimiter(deps.concurrency);
  }

  assertSupportedDocuments(documents: readonly UploadedDocument[]): void {
    for (const document of documents) {
      this.deps.documentService.assertSupportedDocument(document.fileName);
    }
  }

  async extractCriteriaFromDocument(jobDescription: UploadedDocument): Promise<Criterion[]> {
    const text = await this.deps.documentService.extractText(jobDescription.content, jobDescription.fileName);
    if (!text.trim()) {
      throw new InvalidInputError(`Job description ${jobDescription.fileName} contains no text.`);
    }
    return this.deps.criteriaExtractor.extractCriteria(text);
  }

  async scoreCandidate(resume: UploadedDocument, criteria: readonly Criterion[]): Promise<CandidateResult> {
    const text = await this.deps.documentService.extractText(resume.content, resume.fileName);
    const scores = await this.deps.resumeScorer.scoreResume(text, criteria);
    return buildCandidateResult(resume.fileName, scores);
  }

  /**
   * Scores every resume independently under the concurrency limit. A failing resume
   * is reported in `failures` and does not affect the others.
   */
  async scoreResumes(resumes: readonly UploadedDocument[], criteria: readonly Criterion[]): Promise<ScoringBatch> {
    const startedAt = Date.now();
    const outcomes = await Promise.all(
      resumes.map((resume) =>
        this.runLimited(() => this.scoreCandidate(resume, criteria)).then(
          (result): CandidateOutcome => ({ ok: true, result }),
          (error: unknown): CandidateOutcome => ({ ok: false, failure: this.toFailure(resume, error) }),
        ),
      ),
    );

    const results: CandidateResult[] = [];
    const failures: CandidateFailure[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        results.push(outcome.result);
      } else {
        failures.push(outcome.failure);
      }
    }

    this.deps.logger.info("ranking.batch.completed", {
      resumes: resumes.length,
      scored: results.length,
      failed: failures.length,
      criteria: criteria.length,
      latencyMs: Date.now() - startedAt,
    });
    return { ranked: rankCandidates(results), failures };
  }

  async rankDocuments(
    jobDescription: UploadedDocument,
    resumes: readonly UploadedDocument[],
  ): Promise<RankingOutcome> {
    this.assertSupportedDocuments([jobDescription, ...resumes]);
    const criteria = await this.extractCriteriaFromDocument(jobDescription);
    const batch = await this.scoreResumes(resumes, criteria);
    return { criteria, ...batch };
  }

  private toFailure(resume: UploadedDocument, error: unknown): CandidateFailure {
    const failure: CandidateFailure = {
      name: candidateNameFromFileName(resume.fileName),
      fileName: resume.fileName,
      errorCode: error instanceof RankerError ? error.code : "unknown",
      message: describeError(error),
    };
    this.deps.logger.warn("ranking.candidate.failed", { ...failure });
    return failure;
  }
}
