/**
 * Codec Error Types
 *
 * Every failure raised by a reader, writer or mesh operation is one of these,
 * so callers can branch on `code` (or `instanceof`) instead of parsing messages.
 */

export type CodecErrorCode =
  | 'MAGIC_MISMATCH'
  | 'UNSUPPORTED_FORMAT'
  | 'TRUNCATED'
  | 'PARSE'
  | 'CONSISTENCY'
  | 'RESOURCE'
  | 'CONTRACT'

/**
 * Base class for all codec errors
 */
export abstract class CodecError extends Error {
  abstract readonly code: CodecErrorCode

  constructor(message: string) {
    super(message)
    this.name = this.constructor.name
  }
}

/**
 * A file's magic number does not match the expected value
 */
export class MagicNumberError extends CodecError {
  readonly code = 'MAGIC_MISMATCH'

  constructor(
    readonly expected: number,
    readonly actual: number,
    format: string
  ) {
    super(`Invalid ${format} file: magic number ${actual} does not match expected ${expected}`)
  }
}

/**
 * The input is well-formed but uses a version, layout or data type this library does not read
 */
export class UnsupportedFormatError extends CodecError {
  readonly code = 'UNSUPPORTED_FORMAT'
}

/**
 * The byte source ended before a read completed
 */
export class TruncatedDataError extends CodecError {
  readonly code = 'TRUNCATED'

  constructor(
    readonly requested: number,
    readonly available: number
  ) {
    super(`Unexpected end of data: requested ${requested} bytes, only ${available} available`)
  }
}

/**
 * A line of an ASCII format could not be parsed
 */
export class ParseError extends CodecError {
  readonly code = 'PARSE'

  constructor(message: string, readonly line?: number) {
    super(line === undefined ? message : `Line ${line}: ${message}`)
  }
}

/**
 * Parallel arrays or header fields disagree with each other, or a stored
 * count is negative
 */
export class ConsistencyError extends CodecError {
  readonly code = 'CONSISTENCY'
}

/**
 * A file or archive entry could not be opened or created
 */
export class ResourceError extends CodecError {
  readonly code = 'RESOURCE'

  constructor(message: string, readonly path?: string) {
    super(message)
  }
}

/**
 * The caller passed arguments that violate an operation's contract
 */
export class ContractError extends CodecError {
  readonly code = 'CONTRACT'
}
