/**
 * Opaque text-completion service. Implementations surface transport, auth and
 * rate-limit failures as `ServiceError`.
 */
export interface CompletionService {
  complete(systemInstruction: string, userInstruction: string, temperature: number): Promise<string>;
  getModelName?(): string;
}
