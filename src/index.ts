/**
 * cortexio
 *
 * Readers and writers for cortical surface analysis files (curv, MGH/MGZ,
 * surf, label, annot) and graph operations over the decoded meshes.
 */

export type { Annot } from './annot'
export { AnnotUtils } from './annot'
export type { ByteSink, ByteSource, SeekableByteSource } from './byte-source'
export { BufferByteSink, BufferByteSource, ChunkedByteSource, FileByteSource, isSeekable } from './byte-source'
export type { Colortable, ColortableEntry } from './colortable'
export { ColortableUtils } from './colortable'
export { FormatConstants } from './constants'
export type { Curv } from './curv'
export { CurvUtils } from './curv'
export type { DataHandler } from './data-handler'
export { FileSystemDataHandler, ZipDataHandler } from './data-handler'
export type { Endianness } from './endian'
export { EndianReader, EndianWriter, HOST_ENDIANNESS, detectHostEndianness } from './endian'
export type { CodecErrorCode } from './errors'
export {
  CodecError,
  ConsistencyError,
  ContractError,
  MagicNumberError,
  ParseError,
  ResourceError,
  TruncatedDataError,
  UnsupportedFormatError
} from './errors'
export type { Label } from './label'
export { LabelUtils } from './label'
export type { FileFormat, NeuroData } from './loader'
export { FormatUtils } from './loader'
export type { Logger, ReadOptions } from './logger'
export { consoleLogger, DEFAULT_READ_OPTIONS } from './logger'
export type { BufferGeometryOptions, Mesh } from './mesh'
export { MeshUtils } from './mesh'
export { MeshExportUtils } from './mesh-export'
export type { Mgh, MghData, MghFileHeader, MghHeader, MghRas } from './mgh'
export { MghUtils, MriDtype, isSupportedDtype } from './mgh'
export type { AdjacencyList, AdjacencyMatrix, Submesh } from './topology'
export { EdgeSet, TopologyUtils } from './topology'
