/**
 * Data handler interface for reading and writing files from various sources.
 * Provides a unified interface for file I/O operations.
 */

import * as fs from 'fs/promises'
import JSZip from 'jszip'
import * as path from 'path'

/**
 * Data handler interface for loading and saving data from various sources.
 */
export interface DataHandler {
  /**
   * Read binary content from a file.
   * @param path - File path (e.g., "surf/lh.white")
   * @returns File content as ArrayBuffer or Uint8Array, or undefined if not found
   */
  readBinary(path: string): Promise<ArrayBuffer | Uint8Array | undefined>

  /**
   * Write binary content to a file.
   * @param path - File path
   * @param content - Content to write
   */
  writeBinary?(path: string, content: Uint8Array | ArrayBuffer): Promise<void>

  /**
   * Check if a file exists.
   * @param path - File path
   * @returns true if file exists
   */
  exists?(path: string): Promise<boolean>
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Data handler over a directory on disk. Paths are resolved against `baseDir`.
 */
export class FileSystemDataHandler implements DataHandler {
  constructor(public readonly baseDir: string = '.') { }

  private resolve(filePath: string): string {
    return path.resolve(this.baseDir, filePath)
  }

  async readBinary(filePath: string): Promise<Uint8Array | undefined> {
    try {
      return new Uint8Array(await fs.readFile(this.resolve(filePath)))
    } catch (error) {
      if (isNotFound(error)) {
        return undefined
      }
      throw error
    }
  }

  async writeBinary(filePath: string, content: Uint8Array | ArrayBuffer): Promise<void> {
    const target = this.resolve(filePath)
    await fs.mkdir(path.dirname(target), { recursive: true })
    await fs.writeFile(target, content instanceof Uint8Array ? content : new Uint8Array(content))
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(filePath))
      return true
    } catch {
      return false
    }
  }
}

/**
 * Data handler over the entries of a zip archive, e.g. a bundle holding a
 * subject's surfaces, overlays and labels.
 *
 * @example
 * ```ts
 * const bundle = await ZipDataHandler.fromBytes(zipBytes)
 * const white = await FormatUtils.load(bundle, 'surf/lh.white')
 * await FormatUtils.save(bundle, 'surf/lh.thickness.smoothed', smoothed)
 * const updated = await bundle.toUint8Array()
 * ```
 */
export class ZipDataHandler implements DataHandler {
  constructor(public readonly zip: JSZip = new JSZip()) { }

  static async fromBytes(data: ArrayBuffer | Uint8Array): Promise<ZipDataHandler> {
    return new ZipDataHandler(await JSZip.loadAsync(data))
  }

  async readBinary(filePath: string): Promise<Uint8Array | undefined> {
    const entry = this.zip.file(filePath)
    if (!entry) {
      return undefined
    }
    return entry.async('uint8array')
  }

  async writeBinary(filePath: string, content: Uint8Array | ArrayBuffer): Promise<void> {
    this.zip.file(filePath, content)
  }

  async exists(filePath: string): Promise<boolean> {
    return this.zip.file(filePath) !== null
  }

  /**
   * Names of all file entries, in archive order
   */
  list(): string[] {
    return Object.values(this.zip.files)
      .filter(entry => !entry.dir)
      .map(entry => entry.name)
  }

  /**
   * Serialize the archive, compressing entries with DEFLATE
   */
  async toUint8Array(): Promise<Uint8Array> {
    return this.zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' })
  }
}
