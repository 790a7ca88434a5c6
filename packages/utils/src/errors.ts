/**
 * A process cannot start with the configuration it was given.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly fields: Record<string, string[]> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
