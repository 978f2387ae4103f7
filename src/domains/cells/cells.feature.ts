import { ValidationError, withContext } from '../../core/errors.ts'
import { logger as defaultLogger, type TLogger } from '../../core/logger.ts'
import { odataKey } from '../../core/utils.ts'
import type {
  TCellTrace,
  TCellValue,
  TCheckRulesError,
  TFeederCheck,
  TFeederTrace,
} from '../../types/api.ts'
import type { TCellsApi, TTupleBody } from './cells.api.ts'
import {
  buildCellMap,
  buildSingleCellMdx,
  elementBinding,
  escapeMdxName,
  parseUniqueElementName,
  type TCellMap,
} from './cellset.ts'

export type TCellsFeatureOptions = {
  api: TCellsApi
  logger?: TLogger
}

export type TExtractOptions = {
  cellProperties?: string[]
  sandbox?: string
  signal?: AbortSignal
}

export type TCellAddressOptions = {
  /** Dimension names in cube order. Fetched from the cube when omitted. */
  dimensions?: string[]
  sandbox?: string
  signal?: AbortSignal
}

const SANDBOX_DIMENSION_PREFIX = 'Sandboxes'

export class CellsFeature {
  private readonly api: TCellsApi
  private readonly logger: TLogger

  constructor(options: TCellsFeatureOptions) {
    this.api = options.api
    this.logger = options.logger ?? defaultLogger
  }

  // ── Cellsets ──────────────────────────────────────────────

  /** Runs an MDX query and returns its cells keyed by coordinates. */
  async executeMdx(mdx: string, options: TExtractOptions = {}): Promise<TCellMap> {
    const cellsetId = await this.createCellset(mdx, options.sandbox, options.signal)
    return this.extractAndDelete(cellsetId, options)
  }

  async executeView(
    cube: string,
    view: string,
    options: TExtractOptions & { private?: boolean } = {},
  ): Promise<TCellMap> {
    const cellsetId = await this.createCellsetFromView(
      cube,
      view,
      options.private ?? false,
      options.sandbox,
      options.signal,
    )
    return this.extractAndDelete(cellsetId, options)
  }

  async createCellset(mdx: string, sandbox?: string, signal?: AbortSignal): Promise<string> {
    try {
      return await this.api.createCellset(mdx, sandbox, signal)
    } catch (error) {
      throw withContext('create cellset', error)
    }
  }

  async createCellsetFromView(
    cube: string,
    view: string,
    isPrivate: boolean,
    sandbox?: string,
    signal?: AbortSignal,
  ): Promise<string> {
    try {
      return await this.api.createCellsetFromView(cube, view, isPrivate, sandbox, signal)
    } catch (error) {
      throw withContext('create cellset from view', error)
    }
  }

  /** Reads a cellset without deleting it. */
  async extractCellset(cellsetId: string, options: TExtractOptions = {}): Promise<TCellMap> {
    try {
      const cellset = await this.api.getCellset(
        cellsetId,
        options.cellProperties,
        options.sandbox,
        options.signal,
      )
      return buildCellMap(cellset, options.cellProperties)
    } catch (error) {
      throw withContext('extract cellset', error)
    }
  }

  async deleteCellset(cellsetId: string, sandbox?: string, signal?: AbortSignal): Promise<void> {
    await this.api.deleteCellset(cellsetId, sandbox, signal)
  }

  private async extractAndDelete(cellsetId: string, options: TExtractOptions): Promise<TCellMap> {
    try {
      return await this.extractCellset(cellsetId, options)
    } finally {
      await this.deleteQuietly(cellsetId, options.sandbox)
    }
  }

  private async deleteQuietly(cellsetId: string, sandbox?: string): Promise<void> {
    try {
      await this.api.deleteCellset(cellsetId, sandbox)
    } catch (error) {
      this.logger.warn(
        `failed to delete cellset ${cellsetId}`,
        error instanceof Error ? error.message : error,
      )
    }
  }

  // ── Values ────────────────────────────────────────────────

  /** Reads one cell. Returns the first non-null value, or null. */
  async getValue(
    cube: string,
    elements: string[],
    options: TCellAddressOptions = {},
  ): Promise<TCellValue> {
    const dimensions = await this.resolveDimensions(cube, elements, options)
    const cells = await this.executeMdx(buildSingleCellMdx(cube, elements, dimensions), {
      sandbox: options.sandbox,
      signal: options.signal,
      cellProperties: ['Value'],
    })
    for (const cell of cells.values()) {
      if (cell.Value !== null) return cell.Value
    }
    return null
  }

  /** Writes one cell through the cube's tm1.Update action. */
  async writeValue(
    cube: string,
    elements: string[],
    value: TCellValue,
    options: TCellAddressOptions = {},
  ): Promise<void> {
    const dimensions = await this.resolveDimensions(cube, elements, options)
    await this.api.updateCube(
      cube,
      { ...this.tupleBody(elements, dimensions), Value: value },
      options.sandbox,
      options.signal,
    )
  }

  /**
   * Writes many cells, one request per cell in the order given. Keys are
   * comma-separated element names; every key is validated before anything is sent.
   */
  async writeValues(
    cube: string,
    cells: Map<string, TCellValue> | Record<string, TCellValue>,
    options: TCellAddressOptions = {},
  ): Promise<void> {
    const entries = cells instanceof Map ? [...cells.entries()] : Object.entries(cells)
    if (entries.length === 0) return

    const dimensions = options.dimensions?.length
      ? options.dimensions
      : await this.getDimensionNames(cube, options.signal)

    const writes = entries.map(([key, value]) => {
      const elements = key.split(',').map((element) => element.trim())
      this.validateElements(elements, dimensions)
      return { elements, value }
    })

    for (const { elements, value } of writes) {
      await this.api.updateCube(
        cube,
        { ...this.tupleBody(elements, dimensions), Value: value },
        options.sandbox,
        options.signal,
      )
    }
  }

  // ── Diagnostics ───────────────────────────────────────────

  async traceCellCalculation(
    cube: string,
    elements: string[],
    options: TCellAddressOptions & { depth?: number } = {},
  ): Promise<TCellTrace> {
    const depth = options.depth && options.depth > 0 ? options.depth : 1
    const selects: string[] = []
    const expands: string[] = []
    for (let level = 1; level <= depth; level++) {
      const path = Array.from({ length: level }, () => 'Components').join('/')
      selects.push(`${path}/Type,${path}/Value,${path}/Statements`)
      expands.push(`${path}/Tuple($select=Name,UniqueName,Type),${path}/Cube($select=Name)`)
    }
    const query =
      `$select=Type,Value,Statements,${selects.join(',')}` +
      `&$expand=Tuple($select=Name,UniqueName,Type),${expands.join(',')}`

    const dimensions = await this.resolveDimensions(cube, elements, options)
    return this.api.traceCellCalculation(
      cube,
      query,
      this.tupleBody(elements, dimensions),
      options.sandbox,
      options.signal,
    )
  }

  async traceFeeders(
    cube: string,
    elements: string[],
    options: TCellAddressOptions = {},
  ): Promise<TFeederTrace> {
    const dimensions = await this.resolveDimensions(cube, elements, options)
    return this.api.traceFeeders(
      cube,
      this.tupleBody(elements, dimensions),
      options.sandbox,
      options.signal,
    )
  }

  async checkFeeders(
    cube: string,
    elements: string[],
    options: TCellAddressOptions = {},
  ): Promise<TFeederCheck[]> {
    const dimensions = await this.resolveDimensions(cube, elements, options)
    return this.api.checkFeeders(
      cube,
      this.tupleBody(elements, dimensions),
      options.sandbox,
      options.signal,
    )
  }

  /** Checks rule syntax. Without `rules` the cube's current rules are checked. */
  async checkRules(cube: string, rules?: string, signal?: AbortSignal): Promise<TCheckRulesError[]> {
    return this.api.checkRules(cube, rules, signal)
  }

  // ── Spreading ─────────────────────────────────────────────

  async relativeProportionalSpread(
    cube: string,
    value: number,
    uniqueElementNames: string[],
    referenceUniqueElementNames: string[],
    options: { referenceCube?: string; sandbox?: string; signal?: AbortSignal } = {},
  ): Promise<void> {
    const referenceCube = options.referenceCube || cube
    await this.spread(cube, uniqueElementNames, options.sandbox, options.signal, {
      BeginOrdinal: 0,
      Value: `RP${value}`,
      'ReferenceCell@odata.bind': this.referenceBindings(referenceUniqueElementNames),
      'ReferenceCube@odata.bind': `Cubes('${odataKey(referenceCube)}')`,
    })
  }

  async equalSpread(
    cube: string,
    value: number,
    uniqueElementNames: string[],
    options: { sandbox?: string; signal?: AbortSignal } = {},
  ): Promise<void> {
    await this.spread(cube, uniqueElementNames, options.sandbox, options.signal, {
      BeginOrdinal: 0,
      Value: `S${value}`,
      'ReferenceCell@odata.bind': this.referenceBindings(uniqueElementNames),
    })
  }

  async clearSpread(
    cube: string,
    uniqueElementNames: string[],
    options: { sandbox?: string; signal?: AbortSignal } = {},
  ): Promise<void> {
    await this.spread(cube, uniqueElementNames, options.sandbox, options.signal, {
      BeginOrdinal: 0,
      Value: 'C',
      'ReferenceCell@odata.bind': this.referenceBindings(uniqueElementNames),
    })
  }

  private async spread(
    cube: string,
    uniqueElementNames: string[],
    sandbox: string | undefined,
    signal: AbortSignal | undefined,
    body: Record<string, unknown>,
  ): Promise<void> {
    if (uniqueElementNames.length === 0) {
      throw new ValidationError('unique element names cannot be empty')
    }
    const axis = uniqueElementNames.map((name) => `{${name}}`).join('*')
    const mdx = `SELECT ${axis} ON 0 FROM [${escapeMdxName(cube)}]`
    const cellsetId = await this.createCellset(mdx, sandbox, signal)
    try {
      await this.api.updateCellset(cellsetId, body, sandbox, signal)
    } finally {
      await this.deleteQuietly(cellsetId, sandbox)
    }
  }

  private referenceBindings(uniqueElementNames: string[]): string[] {
    return uniqueElementNames.map((uniqueName) => {
      const { dimension, hierarchy, element } = parseUniqueElementName(uniqueName)
      return elementBinding(dimension, element, hierarchy)
    })
  }

  // ── Helpers ───────────────────────────────────────────────

  /** Dimension names of a cube, without the sandbox dimension. */
  async getDimensionNames(cube: string, signal?: AbortSignal): Promise<string[]> {
    const names = await this.api.getCubeDimensionNames(cube, signal)
    return names.filter((name) => !name.startsWith(SANDBOX_DIMENSION_PREFIX))
  }

  private async resolveDimensions(
    cube: string,
    elements: string[],
    options: TCellAddressOptions,
  ): Promise<string[]> {
    if (elements.length === 0) throw new ValidationError('elements cannot be empty')
    const dimensions = options.dimensions?.length
      ? options.dimensions
      : await this.getDimensionNames(cube, options.signal)
    this.validateElements(elements, dimensions)
    return dimensions
  }

  private validateElements(elements: string[], dimensions: string[]): void {
    if (elements.length === 0 || elements.every((element) => element === '')) {
      throw new ValidationError('elements cannot be empty')
    }
    if (elements.length !== dimensions.length) {
      throw new ValidationError(
        `elements count (${elements.length}) must match dimensions count (${dimensions.length})`,
      )
    }
  }

  private tupleBody(elements: string[], dimensions: string[]): TTupleBody {
    return {
      'Tuple@odata.bind': elements.map((element, index) =>
        elementBinding(dimensions[index] ?? '', element),
      ),
    }
  }
}
