/**
 * Format detection and a single load/save entry point over every codec.
 */

import { Annot, AnnotUtils } from './annot'
import { FormatConstants } from './constants'
import { Curv, CurvUtils } from './curv'
import { DataHandler } from './data-handler'
import { ResourceError, UnsupportedFormatError } from './errors'
import { Label, LabelUtils } from './label'
import { ReadOptions } from './logger'
import { Mesh } from './mesh'
import { Mgh, MghUtils } from './mgh'
import { SurfUtils } from './surf'

export type FileFormat = 'curv' | 'mgh' | 'mgz' | 'surf' | 'label' | 'annot'

/**
 * Decoded content of any supported file, tagged with its format
 */
export type NeuroData =
  | { format: 'curv'; curv: Curv }
  | { format: 'mgh'; mgh: Mgh }
  | { format: 'mgz'; mgh: Mgh }
  | { format: 'surf'; mesh: Mesh }
  | { format: 'label'; label: Label }
  | { format: 'annot'; annot: Annot }

const EXTENSION_FORMATS: Record<string, FileFormat> = {
  '.mgh': 'mgh',
  '.mgz': 'mgz',
  '.label': 'label',
  '.annot': 'annot',
  '.curv': 'curv',
  '.surf': 'surf'
}

function basename(filePath: string): string {
  return filePath.split(/[\\/]/).pop() ?? filePath
}

export class FormatUtils {
  /**
   * Work out a file's format from its name.
   *
   * Extensions decide first (`.mgh`, `.mgz`, `.label`, `.annot`, `.curv`,
   * `.surf`); otherwise the name's suffix is matched against a measure on a
   * surface (`lh.area.pial`), a surface name (`lh.white`, `lh.sphere.reg`)
   * and a morphometry measure (`lh.thickness`), in that order.
   *
   * @throws UnsupportedFormatError when nothing matches
   */
  static detectFormat(filePath: string): FileFormat {
    const name = basename(filePath).toLowerCase()

    for (const [extension, format] of Object.entries(EXTENSION_FORMATS)) {
      if (name.endsWith(extension)) {
        return format
      }
    }
    // Measures computed on a named surface, e.g. 'lh.area.pial'
    for (const measure of FormatConstants.CURV_MEASURES) {
      for (const surface of FormatConstants.SURFACE_NAMES) {
        const suffix = `${measure}.${surface}`
        if (name === suffix || name.endsWith(`.${suffix}`)) {
          return 'curv'
        }
      }
    }
    for (const surface of FormatConstants.SURFACE_NAMES) {
      if (name === surface || name.endsWith(`.${surface}`)) {
        return 'surf'
      }
    }
    for (const measure of FormatConstants.CURV_MEASURES) {
      if (name === measure || name.endsWith(`.${measure}`)) {
        return 'curv'
      }
    }

    throw new UnsupportedFormatError(`cannot tell the format of '${filePath}' from its name`)
  }

  static decode(format: FileFormat, bytes: Uint8Array | ArrayBuffer, options: ReadOptions = {}): NeuroData {
    switch (format) {
      case 'curv':
        return { format, curv: CurvUtils.decode(bytes, options) }
      case 'mgh':
        return { format, mgh: MghUtils.decode(bytes) }
      case 'mgz':
        return { format, mgh: MghUtils.decodeMgz(bytes) }
      case 'surf':
        return { format, mesh: SurfUtils.decode(bytes) }
      case 'label':
        return { format, label: LabelUtils.decode(bytes) }
      case 'annot':
        return { format, annot: AnnotUtils.decode(bytes, options) }
    }
  }

  static encode(data: NeuroData): Uint8Array {
    switch (data.format) {
      case 'curv':
        return CurvUtils.encode(data.curv.data, data.curv.numFaces)
      case 'mgh':
        return MghUtils.encode(data.mgh)
      case 'mgz':
        return MghUtils.encodeMgz(data.mgh)
      case 'surf':
        return SurfUtils.encode(data.mesh)
      case 'label':
        return LabelUtils.encode(data.label)
      case 'annot':
        return AnnotUtils.encode(data.annot)
    }
  }

  /**
   * Read and decode a file through a data handler
   *
   * @param format Overrides detection from the file name
   * @throws ResourceError if the handler has no such file
   */
  static async load(
    handler: DataHandler,
    filePath: string,
    options: ReadOptions & { format?: FileFormat } = {}
  ): Promise<NeuroData> {
    const { format = FormatUtils.detectFormat(filePath), ...readOptions } = options
    const bytes = await handler.readBinary(filePath)
    if (!bytes) {
      throw new ResourceError(`'${filePath}' not found`, filePath)
    }
    return FormatUtils.decode(format, bytes, readOptions)
  }

  /**
   * Encode and write through a data handler
   *
   * @throws ResourceError if the handler cannot write
   */
  static async save(handler: DataHandler, filePath: string, data: NeuroData): Promise<void> {
    if (!handler.writeBinary) {
      throw new ResourceError(`cannot write '${filePath}': the data handler is read-only`, filePath)
    }
    await handler.writeBinary(filePath, FormatUtils.encode(data))
  }
}
