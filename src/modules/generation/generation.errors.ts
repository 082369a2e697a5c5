/** The text-generation service failed, timed out or is not configured. */
export class GenerationFailedError extends Error {
  constructor(message: string, readonly details?: unknown) {
    super(message);
    this.name = 'GenerationFailedError';
  }
}

/** Neither a strict decode nor the bounded substring extraction produced a JSON object. */
export class MalformedGenerationOutputError extends Error {
  constructor(message: string, readonly output: string) {
    super(message);
    this.name = 'MalformedGenerationOutputError';
  }
}
