/**
 * Misconfiguration: bad environment, missing prompt templates, unknown target
 * language. Never retried; aborts the whole run before any network call.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class TemplateMissingError extends ConfigurationError {
  constructor(readonly templatePath: string) {
    super(`Prompt template not found or empty: ${templatePath}`);
    this.name = 'TemplateMissingError';
  }
}

export class UnsupportedLanguageError extends ConfigurationError {
  constructor(readonly language: string) {
    super(`Unsupported target language "${language}". Expected one of: csharp, java`);
    this.name = 'UnsupportedLanguageError';
  }
}

export class IllegalTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Illegal job transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}
