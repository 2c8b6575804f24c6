/**
 * Bad arguments from the calling agent. Reported back as a tool error,
 * never logged as a server fault.
 */
export class ToolInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolInputError";
  }
}

/** Missing or invalid process configuration; fatal at startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
