/**
 * Raised for problems that make the whole run meaningless: bad settings, a
 * missing language pack or key, folders that cannot be created. Thrown before
 * any file is touched; per-file problems are never reported this way.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
