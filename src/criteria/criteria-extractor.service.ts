import type { CompletionService } from "../ai/completion.service";
import {
  buildCriteriaExtractionV1Prompt,
  CRITERIA_EXTRACTION_V1_SYSTEM_PROMPT,
} from "../ai/prompts/ranking/criteria-extraction.v1.prompt";
import type { Logger } from "../config/logger";
import type { Criterion } from "../shared/types/ranking.types";
import { parseCriteria } from "./parsers/criteria.parser";

export class CriteriaExtractorService {
  constructor(
    private readonly completionService: CompletionService,
    private readonly logger: Logger,
    private readonly temperature: number,
  ) {}

  async extractCriteria(jobDescriptionText: string): Promise<Criterion[]> {
    const raw = await this.completionService.complete(
      CRITERIA_EXTRACTION_V1_SYSTEM_PROMPT,
      buildCriteriaExtractionV1Prompt({ jobDescription: jobDescriptionText }),
      this.temperature,
    );
    const criteria = parseCriteria(raw);

    if (criteria.length === 0) {
      this.logger.warn("criteria.extracted.empty", {
        promptName: "criteria_extraction_v1",
        rawChars: raw.length,
      });
    } else {
      this.logger.info("criteria.extracted", {
        promptName: "criteria_extraction_v1",
        count: criteria.length,
      });
    }
    return criteria;
  }
}
