import type { CompletionService } from "../ai/completion.service";
import {
  buildResumeScoringV1Prompt,
  RESUME_SCORING_V1_SYSTEM_PROMPT,
} from "../ai/prompts/ranking/resume-scoring.v1.prompt";
import type { Logger } from "../config/logger";
import type { Criterion, ScoreVector } from "../shared/types/ranking.types";
import { parseScores } from "./parsers/score.parser";

export class ResumeScorerService {
  constructor(
    private readonly completionService: CompletionService,
    private readonly logger: Logger,
    private readonly temperature: number,
  ) {}

  /**
   * Always resolves to one score per criterion. A malformed answer degrades to zeros
   * for the scores it is missing; only completion failures reject.
   */
  async scoreResume(resumeText: string, criteria: readonly Criterion[]): Promise<ScoreVector> {
    if (criteria.length === 0) {
      this.logger.debug("scoring.skipped.no_criteria");
      return [];
    }

    const raw = await this.completionService.complete(
      RESUME_SCORING_V1_SYSTEM_PROMPT,
      buildResumeScoringV1Prompt({ resumeText, criteria }),
      this.temperature,
    );
    const parsed = parseScores(raw, criteria.length);

    const meta = {
      promptName: "resume_scoring_v1",
      tier: parsed.tier,
      expected: criteria.length,
      parsed: parsed.parsedCount,
    };
    if (parsed.parsedCount === criteria.length) {
      this.logger.info("scoring.parsed", meta);
    } else {
      this.logger.warn("scoring.parsed.degraded", {
        ...meta,
        padded: Math.max(0, criteria.length - parsed.parsedCount),
        truncated: Math.max(0, parsed.parsedCount - criteria.length),
      });
    }
    return parsed.scores;
  }
}
