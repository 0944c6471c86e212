/**
 * Raised for setup mistakes: an empty template catalog, a catalog with no
 * resolvable default template, malformed catalog entries, or out-of-range
 * configuration values.
 *
 * Never caught inside the pipeline. It surfaces to the caller at boot
 * (catalog/config validation) or as a 500 over HTTP.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
