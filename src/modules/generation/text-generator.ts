export interface GenerationRequest {
  system: string;
  input: string;
  maxOutputTokens: number;
  model?: string;
}

/**
 * Opaque text-generation service. Injected by class token so tests can swap
 * in a fake without touching process-wide state.
 */
export abstract class TextGenerator {
  abstract generate(request: GenerationRequest): Promise<string>;
}
