export type ConfigErrorContext = {
  index?: number;
  field?: string;
  source?: string;
};

/**
 * Raised before any pipeline starts when the site list, the environment or
 * the storage bucket is unusable.
 */
export class ConfigError extends Error {
  readonly code = "config_invalid";
  readonly context?: ConfigErrorContext;

  constructor(message: string, context?: ConfigErrorContext) {
    super(message);
    this.name = "ConfigError";
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
