/**
 * Minimal logging seam for readers. Non-fatal conditions found while decoding
 * are reported here and decoding carries on.
 */
export interface Logger {
  warn(message: string): void
  info(message: string): void
}

export const consoleLogger: Logger = {
  warn: (message) => console.warn(message),
  info: (message) => console.info(message)
}

/**
 * Options shared by every read operation
 */
export interface ReadOptions {
  /**
   * Receives warnings about recoverable problems in the input
   * @default consoleLogger
   */
  logger?: Logger
}

export const DEFAULT_READ_OPTIONS: Required<ReadOptions> = {
  logger: consoleLogger
}

export function resolveReadOptions(options: ReadOptions = {}): Required<ReadOptions> {
  return { ...DEFAULT_READ_OPTIONS, ...options }
}
