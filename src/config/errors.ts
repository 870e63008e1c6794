/**
 * Raised while wiring the engine together: bad provider lists, weights that
 * do not sum to one, unparsable environment values. Never raised mid-cycle.
 */
export class ConfigurationError extends Error {
  readonly code = "CONFIGURATION_ERROR";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
