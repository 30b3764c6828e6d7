/**
 * A present feature value could not be read as a decimal number.
 */
export class EncodingError extends Error {
  constructor(
    readonly feature: string,
    readonly value: string,
  ) {
    super(`Invalid value for feature "${feature}": "${value}" is not a number`);
    this.name = 'EncodingError';
  }
}
