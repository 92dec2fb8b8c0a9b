/**
 * FIT decoder collaborator types
 *
 * The extractor never touches the SDK directly: it reads `record` messages
 * through a field-by-name accessor so any decoder can be plugged in.
 */

/**
 * One decoded message
 */
export interface FitMessage {
  /**
   * Read a field by its profile name (snake_case, e.g. `heart_rate`)
   * @returns the decoded value, or undefined when the message lacks the field
   */
  get(field: string): unknown;
}

/**
 * Decoded messages grouped by kind
 */
export interface DecodedFitFile {
  /** Messages of one kind (profile name, e.g. `record`), in file order */
  messages(kind: string): FitMessage[];
}

/**
 * Turns raw FIT bytes into messages
 */
export interface BinaryMessageDecoder {
  /**
   * @throws FitDecodeError when the payload is not a readable FIT file
   */
  decode(bytes: Uint8Array): DecodedFitFile;
}

/**
 * Raised when a payload cannot be decoded as FIT
 */
export class FitDecodeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FitDecodeError';
  }
}
