/**
 * Invalid formatter configuration. Aborts the whole invocation instead of
 * being handled per line or per file.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
