/**
 * Error model.
 * Input problems throw; degraded data is reported as tagged results instead.
 */

export { InvalidBirthInputError } from "../calendar/errors.js";

export class ConfigNotFoundError extends Error {
  constructor(public path: string) {
    super(`Config file not found: ${path}`);
    this.name = "ConfigNotFoundError";
  }
}

export class InvalidConfigError extends Error {
  constructor(
    public path: string,
    public issues: string[]
  ) {
    super(`Invalid config (${path}): ${issues.join("; ")}`);
    this.name = "InvalidConfigError";
  }
}

export class PersistenceError extends Error {
  constructor(
    public writer: string,
    message: string
  ) {
    super(`[${writer}] ${message}`);
    this.name = "PersistenceError";
  }
}
