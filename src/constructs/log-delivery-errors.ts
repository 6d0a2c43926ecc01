/**
 * Error thrown when the delivery destination props select no destination, or more than one.
 */
export class DestinationConfigurationError extends Error {
  /**
   * @param message - Error message describing the destination conflict.
   */
  constructor(message: string) {
    super(message);
    this.name = 'DestinationConfigurationError';
  }
}

/**
 * Error thrown when a construct property is malformed.
 */
export class InputPropertyError extends Error {
  /**
   * @param message - Error message describing the property validation failure.
   */
  constructor(message: string) {
    super(message);
    this.name = 'InputPropertyError';
  }
}
