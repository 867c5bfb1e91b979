/**
 * Error for a setting value that is not an integer.
 */
export class InvalidSettingValueError extends Error {
  readonly value: string;

  constructor(value: string) {
    super(`Setting value must be an integer, got "${value}"`);
    this.name = "InvalidSettingValueError";
    this.value = value;
  }
}
