import { ConsistencyError } from './errors'

/**
 * Region metadata of a parcellation. All arrays have one element per region.
 */
export interface Colortable {
  id: number[]
  name: string[]
  r: number[]
  g: number[]
  b: number[]
  a: number[]
  /**
   * Code the parcellation stores per vertex, derived from the color:
   * `r + g * 256 + b * 65536 + a * 16777216` wrapped to a signed 32-bit integer
   */
  label: number[]
}

/**
 * One region, as passed to `ColortableUtils.create`
 */
export interface ColortableEntry {
  id: number
  name: string
  r: number
  g: number
  b: number
  a?: number
}

export class ColortableUtils {
  /**
   * Color code of a region, as a signed 32-bit integer so it compares equal to
   * the per-vertex codes of an annotation (alpha 128 and above gives a negative code)
   */
  static computeLabel(r: number, g: number, b: number, a: number): number {
    return (r + g * 256 + b * 65536 + a * 16777216) | 0
  }

  static numEntries(colortable: Colortable): number {
    return colortable.id.length
  }

  static create(entries: ColortableEntry[]): Colortable {
    const colortable: Colortable = { id: [], name: [], r: [], g: [], b: [], a: [], label: [] }
    const seen = new Set<number>()
    for (const entry of entries) {
      const a = entry.a ?? 0
      const label = ColortableUtils.computeLabel(entry.r, entry.g, entry.b, a)
      if (seen.has(label)) {
        throw new ConsistencyError(`region '${entry.name}' has the same color code ${label} as an earlier region`)
      }
      seen.add(label)
      colortable.id.push(entry.id)
      colortable.name.push(entry.name)
      colortable.r.push(entry.r)
      colortable.g.push(entry.g)
      colortable.b.push(entry.b)
      colortable.a.push(a)
      colortable.label.push(label)
    }
    return colortable
  }

  /**
   * Index of the region called `name`, or -1
   */
  static regionIndexByName(colortable: Colortable, name: string): number {
    return colortable.name.indexOf(name)
  }

  /**
   * Index of the region with color code `label`, or -1
   */
  static regionIndexByLabel(colortable: Colortable, label: number): number {
    return colortable.label.indexOf(label)
  }
}
