import type { CompletionService } from "../../ai/completion.service";

export interface CompletionCall {
  systemInstruction: string;
  userInstruction: string;
  temperature: number;
}

type Responder = (call: CompletionCall) => string | Promise<string>;

export class FakeCompletionService implements CompletionService {
  readonly calls: CompletionCall[] = [];

  constructor(private readonly respond: Responder) {}

  static replying(...responses: string[]): FakeCompletionService {
    let index = 0;
    return new FakeCompletionService(() => {
      const response = responses[Math.min(index, responses.length - 1)] ?? "";
      index += 1;
      return response;
    });
  }

  getModelName(): string {
    return "fake-model";
  }

  async complete(systemInstruction: string, userInstruction: string, temperature: number): Promise<string> {
    const call = { systemInstruction, userInstruction, temperature };
    this.calls.push(call);
    return this.respond(call);
  }
}
