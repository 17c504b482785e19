// ── Error Classes ────────────────────────────────────────────────────────────
//
// Expected failures (a model down, invalid JSON, low quality) never throw;
// they resolve to a failed GenerationResult. These classes mark programmer
// and setup errors that reach the outermost caller.

export class RouterError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'RouterError';
  }
}

export class NoModelsAvailableError extends RouterError {
  constructor(context: string) {
    super(`No enabled models available for ${context}`, 'NO_MODELS_AVAILABLE');
    this.name = 'NoModelsAvailableError';
  }
}

export class UnknownStrategyError extends RouterError {
  constructor(public readonly strategy: string) {
    super(`Unknown strategy type: ${strategy}`, 'UNKNOWN_STRATEGY');
    this.name = 'UnknownStrategyError';
  }
}

export class ConfigurationError extends RouterError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}
