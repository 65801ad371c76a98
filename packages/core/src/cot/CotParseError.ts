export type CotParseErrorCode =
  | 'MISSING_FIELD'
  | 'INVALID_TIMESTAMP'
  | 'MALFORMED_XML'
  | 'INVALID_COORDINATE';

/**
 * Describes why a CoT message could not be decoded.
 * Returned inside a parse result, never thrown by the codec.
 */
export class CotParseError extends Error {
  public readonly name = 'CotParseError';

  constructor(
    public readonly code: CotParseErrorCode,
    message: string,
    public readonly field?: string
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CotParseError);
    }
  }

  static missingField(field: string): CotParseError {
    return new CotParseError('MISSING_FIELD', `Missing required field: ${field}`, field);
  }

  static invalidTimestamp(field: string, value: string): CotParseError {
    return new CotParseError('INVALID_TIMESTAMP', `Invalid timestamp in ${field}: "${value}"`, field);
  }

  static malformedXml(reason: string): CotParseError {
    return new CotParseError('MALFORMED_XML', `Malformed XML: ${reason}`);
  }

  static invalidCoordinate(field: string, value: string): CotParseError {
    return new CotParseError('INVALID_COORDINATE', `Invalid coordinate ${field}: "${value}"`, field);
  }
}
