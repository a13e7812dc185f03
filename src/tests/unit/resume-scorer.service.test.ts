import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { RESUME_SCORING_V1_SYSTEM_PROMPT } from "../../ai/prompts/ranking/resume-scoring.v1.prompt";
import { noopLogger } from "../../config/logger";
import { ResumeScorerService } from "../../scoring/resume-scorer.service";
import { ServiceError } from "../../shared/errors";
import { FakeCompletionService } from "../helpers/fake-completion.service";

const CRITERIA = ["5 years Python experience", "CS degree"];

describe("ResumeScorerService", () => {
  it("numbers the criteria and embeds the resume", async () => {
    const completion = FakeCompletionService.replying("4\n5");
    const scorer = new ResumeScorerService(completion, noopLogger, 0.1);

    assert.deepEqual(await scorer.scoreResume("Jane Doe, Python since 2015, BSc CS", CRITERIA), [4, 5]);

    const call = completion.calls[0];
    assert.ok(call);
    assert.equal(call.systemInstruction, RESUME_SCORING_V1_SYSTEM_PROMPT);
    assert.equal(call.temperature, 0.1);
    assert.ok(call.userInstruction.includes("CRITERIA:\n1. 5 years Python experience\n2. CS degree\n"));
    assert.ok(call.userInstruction.includes("RESUME:\nJane Doe, Python since 2015, BSc CS\n"));
  });

  it("skips the completion call when there are no criteria", async () => {
    const completion = FakeCompletionService.replying("4");
    const scorer = new ResumeScorerService(completion, noopLogger, 0.1);
    assert.deepEqual(await scorer.scoreResume("resume", []), []);
    assert.equal(completion.calls.length, 0);
  });

  it("pads a short answer with zeros", async () => {
    const scorer = new ResumeScorerService(FakeCompletionService.replying("3"), noopLogger, 0.1);
    assert.deepEqual(await scorer.scoreResume("resume", CRITERIA), [3, 0]);
  });

  it("scores an unreadable answer as zeros", async () => {
    const scorer = new ResumeScorerService(
      FakeCompletionService.replying("I cannot evaluate this resume."),
      noopLogger,
      0.1,
    );
    assert.deepEqual(await scorer.scoreResume("resume", CRITERIA), [0, 0]);
  });

  it("lets completion failures through", async () => {
    const failing = new FakeCompletionService(() => {
      throw new ServiceError("OpenAI request failed: socket hang up", { retryable: true });
    });
    const scorer = new ResumeScorerService(failing, noopLogger, 0.1);
    await assert.rejects(scorer.scoreResume("resume", CRITERIA), ServiceError);
  });
});
