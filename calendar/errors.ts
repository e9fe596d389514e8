/**
 * Calendar input errors.
 * The calendar raises nothing else; everything downstream is total.
 */

export class InvalidBirthInputError extends Error {
  constructor(
    public field: string,
    public detail: string
  ) {
    super(`Invalid birth input (${field}): ${detail}`);
    this.name = "InvalidBirthInputError";
  }
}
