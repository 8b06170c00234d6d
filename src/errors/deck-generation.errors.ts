/**
 * Base class for failures on the keyword → outline → deck path.
 */
export class DeckGenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid or missing setup: credentials, template files, layout indices.
 * Fatal to the current request and never retried.
 */
export class ConfigurationError extends DeckGenerationError {}

/**
 * The LLM service answered with a non-success status or an unusable body.
 */
export class UpstreamServiceError extends DeckGenerationError {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
  }
}
