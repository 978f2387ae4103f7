import { odataString } from '../../core/utils.ts'
import type { TCellsetAxis, TCellsetResponse, TCellValue } from '../../types/api.ts'

const EXPANSION_LIMIT = 100000
const BOOLEAN_CELL_PROPERTIES = ['RuleDerived', 'Consolidated', 'Updateable'] as const

export type TBooleanCellProperty = (typeof BOOLEAN_CELL_PROPERTIES)[number]

/** Projected properties of one extracted cell. */
export type TCellProperties = {
  Value: TCellValue
  Ordinal: number
  FormattedValue?: string
  RuleDerived?: boolean
  Consolidated?: boolean
  Updateable?: number | boolean
}

/** Extracted cells keyed by the comma-joined unique names of their coordinates. */
export type TCellMap = Map<string, TCellProperties>

/**
 * Splits a cell ordinal into one tuple index per axis. Axis 0 is the most
 * significant digit; an axis without tuples contributes index 0.
 */
export function ordinalToCoordinates(ordinal: number, cardinalities: number[]): number[] {
  const coordinates = new Array<number>(cardinalities.length).fill(0)
  let remaining = ordinal
  for (let axis = cardinalities.length - 1; axis >= 0; axis--) {
    const cardinality = cardinalities[axis] ?? 0
    if (cardinality === 0) continue
    coordinates[axis] = remaining % cardinality
    remaining = Math.floor(remaining / cardinality)
  }
  return coordinates
}

export function coordinatesToOrdinal(coordinates: number[], cardinalities: number[]): number {
  let ordinal = 0
  for (let axis = 0; axis < cardinalities.length; axis++) {
    const cardinality = cardinalities[axis] ?? 0
    if (cardinality === 0) continue
    ordinal = ordinal * cardinality + (coordinates[axis] ?? 0)
  }
  return ordinal
}

function requestedBooleans(cellProperties?: string[]): TBooleanCellProperty[] {
  if (!cellProperties || cellProperties.length === 0) return [...BOOLEAN_CELL_PROPERTIES]
  const wanted = new Set(cellProperties.map((property) => property.toLowerCase()))
  return BOOLEAN_CELL_PROPERTIES.filter((property) => wanted.has(property.toLowerCase()))
}

export function buildCellSelect(cellProperties?: string[]): string {
  return ['Value', 'Ordinal', 'FormattedValue', ...requestedBooleans(cellProperties)].join(',')
}

export function buildCellsetEndpoint(cellsetId: string, cellProperties?: string[]): string {
  const members = `Members($select=Name,UniqueName,Ordinal;$top=${EXPANSION_LIMIT})`
  const axes = `Axes($expand=Tuples($expand=${members};$top=${EXPANSION_LIMIT}))`
  const cells = `Cells($select=${buildCellSelect(cellProperties)};$top=${EXPANSION_LIMIT})`
  return `Cellsets('${cellsetId}')?$expand=${axes},${cells}`
}

function coordinateKey(axes: TCellsetAxis[], coordinates: number[]): string {
  const names: string[] = []
  coordinates.forEach((tupleIndex, axisIndex) => {
    const tuple = axes[axisIndex]?.Tuples[tupleIndex]
    for (const member of tuple?.Members ?? []) names.push(member.UniqueName)
  })
  return names.join(',')
}

/** Maps every returned cell to its coordinate key with the requested properties. */
export function buildCellMap(cellset: TCellsetResponse, cellProperties?: string[]): TCellMap {
  const axes = cellset.Axes ?? []
  const cardinalities = axes.map((axis) => axis.Tuples.length)
  const booleans = requestedBooleans(cellProperties)
  const cellMap: TCellMap = new Map()

  for (const cell of cellset.Cells ?? []) {
    const properties: TCellProperties = { Value: cell.Value ?? null, Ordinal: cell.Ordinal }
    if (cell.FormattedValue) properties.FormattedValue = cell.FormattedValue
    if (booleans.includes('RuleDerived')) properties.RuleDerived = cell.RuleDerived ?? false
    if (booleans.includes('Consolidated')) properties.Consolidated = cell.Consolidated ?? false
    if (booleans.includes('Updateable')) properties.Updateable = cell.Updateable ?? false
    const key = coordinateKey(axes, ordinalToCoordinates(cell.Ordinal, cardinalities))
    cellMap.set(key, properties)
  }

  return cellMap
}

/** Escapes `]` for use inside a bracketed MDX identifier. */
export function escapeMdxName(name: string): string {
  return name.replace(/]/g, ']]')
}

export function memberUniqueName(dimension: string, element: string, hierarchy = dimension): string {
  return `[${escapeMdxName(dimension)}].[${escapeMdxName(hierarchy)}].[${escapeMdxName(element)}]`
}

/** MDX for one cell: the last dimension on columns, the rest crossjoined on rows. */
export function buildSingleCellMdx(cube: string, elements: string[], dimensions: string[]): string {
  const members = elements.map((element, index) => `{${memberUniqueName(dimensions[index] ?? '', element)}}`)
  const columns = members[members.length - 1] ?? '{}'
  const rows = members.length > 1 ? members.slice(0, -1).join('*') : '{}'
  return `SELECT ${rows} ON ROWS, ${columns} ON COLUMNS FROM [${escapeMdxName(cube)}]`
}

export function elementBinding(dimension: string, element: string, hierarchy = dimension): string {
  return `Dimensions('${odataString(dimension)}')/Hierarchies('${odataString(hierarchy)}')/Elements('${odataString(element)}')`
}

/** Splits `[dim].[hier].[elem]` or `[dim].[elem]` into its parts. */
export function parseUniqueElementName(uniqueName: string): {
  dimension: string
  hierarchy: string
  element: string
} {
  const trimmed = uniqueName.trim()
  const parts = trimmed
    .split(']')
    .map((segment) => segment.replace(/^[.[]+/, '').trim())
    .filter((segment) => segment !== '')

  const [first, second, third] = parts
  if (parts.length === 3 && first && second && third) {
    return { dimension: first, hierarchy: second, element: third }
  }
  if (parts.length === 2 && first && second) {
    return { dimension: first, hierarchy: first, element: second }
  }
  return { dimension: trimmed, hierarchy: trimmed, element: trimmed }
}
