/**
 * Catalog of the error codes raised by the library itself, as opposed to the
 * codes a remote service puts in its error responses.
 */

/** Describes a single entry in the error catalog. */
export interface ErrorCodeEntry {
  /** SCREAMING_SNAKE_CASE code carried on the error (e.g., "MISSING_REQUIRED_FIELD"). */
  readonly code: string;
  /** Human-readable error name (e.g., "MissingRequiredField"). */
  readonly name: string;
  /** Status family the error stands for, or 0 when raised before any request is sent. */
  readonly httpStatus: number;
  /** Default human-readable description. */
  readonly message: string;
  /** True when the fault is detected locally and never reaches the network. */
  readonly local: boolean;
}

function entry(
  code: string,
  name: string,
  httpStatus: number,
  message: string,
  local: boolean,
): ErrorCodeEntry {
  return Object.freeze({ code, name, httpStatus, message, local });
}

// ---------------------------------------------------------------------------
// Local faults
// ---------------------------------------------------------------------------

export const MISSING_REQUIRED_FIELD = entry('MISSING_REQUIRED_FIELD', 'MissingRequiredField', 0, 'A required input field is not set', true);
export const INVALID_ENUM_VALUE = entry('INVALID_ENUM_VALUE', 'InvalidEnumValue', 0, 'An input field holds a value outside its closed value set', true);
export const MALFORMED_RESPONSE = entry('MALFORMED_RESPONSE', 'MalformedResponse', 0, 'The response body could not be hydrated into its result type', true);
export const CONNECTION_ERROR = entry('CONNECTION_ERROR', 'ConnectionError', 0, 'The transport could not reach the service endpoint', true);

// ---------------------------------------------------------------------------
// Remote faults without a recognised service code
// ---------------------------------------------------------------------------

export const REDIRECTION = entry('REDIRECTION', 'Redirection', 300, 'The service answered with a redirect', false);
export const CLIENT_ERROR = entry('CLIENT_ERROR', 'ClientError', 400, 'The service rejected the request', false);
export const SERVER_ERROR = entry('SERVER_ERROR', 'ServerError', 500, 'The service failed to process the request', false);

/** All defined catalog entries. */
export const ALL_ERROR_CODES: ErrorCodeEntry[] = [
  MISSING_REQUIRED_FIELD, INVALID_ENUM_VALUE, MALFORMED_RESPONSE, CONNECTION_ERROR,
  REDIRECTION, CLIENT_ERROR, SERVER_ERROR,
];

/**
 * Look up an ErrorCodeEntry by its code (e.g., "INVALID_ENUM_VALUE").
 * Returns undefined if not found.
 */
export function lookupByCode(code: string): ErrorCodeEntry | undefined {
  return ALL_ERROR_CODES.find((e) => e.code === code);
}
