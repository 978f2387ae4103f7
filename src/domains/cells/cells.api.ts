import { Transport } from '../../core/transport.ts'
import { appendSandboxParam, odataKey } from '../../core/utils.ts'
import type {
  TCellsetCreatedResponse,
  TCellsetResponse,
  TCellTrace,
  TCheckRulesError,
  TFeederCheck,
  TFeederTrace,
  TNamedEntity,
  TODataCollection,
} from '../../types/api.ts'
import { buildCellsetEndpoint } from './cellset.ts'

export type TCellsApiOptions = {
  transport: Transport
}

export type TTupleBody = {
  'Tuple@odata.bind': string[]
}

/**
 * Minimal cells HTTP client. Mirrors API endpoints exactly.
 */
export interface TCellsApi {
  createCellset(mdx: string, sandbox?: string, signal?: AbortSignal): Promise<string>
  createCellsetFromView(
    cube: string,
    view: string,
    isPrivate: boolean,
    sandbox?: string,
    signal?: AbortSignal,
  ): Promise<string>
  getCellset(
    cellsetId: string,
    cellProperties?: string[],
    sandbox?: string,
    signal?: AbortSignal,
  ): Promise<TCellsetResponse>
  deleteCellset(cellsetId: string, sandbox?: string, signal?: AbortSignal): Promise<void>
  updateCellset(
    cellsetId: string,
    body: Record<string, unknown>,
    sandbox?: string,
    signal?: AbortSignal,
  ): Promise<void>
  getCubeDimensionNames(cube: string, signal?: AbortSignal): Promise<string[]>
  updateCube(
    cube: string,
    body: Record<string, unknown>,
    sandbox?: string,
    signal?: AbortSignal,
  ): Promise<void>
  traceCellCalculation(
    cube: string,
    query: string,
    body: TTupleBody,
    sandbox?: string,
    signal?: AbortSignal,
  ): Promise<TCellTrace>
  traceFeeders(cube: string, body: TTupleBody, sandbox?: string, signal?: AbortSignal): Promise<TFeederTrace>
  checkFeeders(
    cube: string,
    body: TTupleBody,
    sandbox?: string,
    signal?: AbortSignal,
  ): Promise<TFeederCheck[]>
  checkRules(cube: string, rules?: string, signal?: AbortSignal): Promise<TCheckRulesError[]>
}

export class CellsApi implements TCellsApi {
  private transport: Transport

  constructor(options: TCellsApiOptions) {
    this.transport = options.transport
  }

  public async createCellset(mdx: string, sandbox?: string, signal?: AbortSignal): Promise<string> {
    const response = await this.transport.requestJson<TCellsetCreatedResponse>(
      'POST',
      appendSandboxParam('ExecuteMDX', sandbox),
      { body: { MDX: mdx }, signal },
    )
    return response.ID
  }

  public async createCellsetFromView(
    cube: string,
    view: string,
    isPrivate: boolean,
    sandbox?: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const collection = isPrivate ? 'PrivateViews' : 'Views'
    const response = await this.transport.requestJson<TCellsetCreatedResponse>(
      'POST',
      appendSandboxParam(`Cubes('${odataKey(cube)}')/${collection}('${odataKey(view)}')/tm1.Execute`, sandbox),
      { signal },
    )
    return response.ID
  }

  public async getCellset(
    cellsetId: string,
    cellProperties?: string[],
    sandbox?: string,
    signal?: AbortSignal,
  ): Promise<TCellsetResponse> {
    return this.transport.requestJson<TCellsetResponse>(
      'GET',
      appendSandboxParam(buildCellsetEndpoint(cellsetId, cellProperties), sandbox),
      { signal },
    )
  }

  public async deleteCellset(cellsetId: string, sandbox?: string, signal?: AbortSignal): Promise<void> {
    await this.transport.send('DELETE', appendSandboxParam(`Cellsets('${cellsetId}')`, sandbox), {
      signal,
    })
  }

  public async updateCellset(
    cellsetId: string,
    body: Record<string, unknown>,
    sandbox?: string,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.transport.send(
      'POST',
      appendSandboxParam(`Cellsets('${cellsetId}')/tm1.Update`, sandbox),
      { body, signal },
    )
  }

  public async getCubeDimensionNames(cube: string, signal?: AbortSignal): Promise<string[]> {
    const response = await this.transport.requestJson<TODataCollection<TNamedEntity>>(
      'GET',
      `Cubes('${odataKey(cube)}')/Dimensions?$select=Name`,
      { signal },
    )
    return response.value.map((dimension) => dimension.Name)
  }

  public async updateCube(
    cube: string,
    body: Record<string, unknown>,
    sandbox?: string,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.transport.send(
      'POST',
      appendSandboxParam(`Cubes('${odataKey(cube)}')/tm1.Update`, sandbox),
      { body, signal },
    )
  }

  public async traceCellCalculation(
    cube: string,
    query: string,
    body: TTupleBody,
    sandbox?: string,
    signal?: AbortSignal,
  ): Promise<TCellTrace> {
    return this.transport.requestJson<TCellTrace>(
      'POST',
      appendSandboxParam(`Cubes('${odataKey(cube)}')/tm1.TraceCellCalculation?${query}`, sandbox),
      { body, signal },
    )
  }

  public async traceFeeders(
    cube: string,
    body: TTupleBody,
    sandbox?: string,
    signal?: AbortSignal,
  ): Promise<TFeederTrace> {
    const query =
      '$select=Statements,FedCells&$expand=FedCells/Tuple($select=Name,UniqueName,Type),FedCells/Cube($select=Name)'
    return this.transport.requestJson<TFeederTrace>(
      'POST',
      appendSandboxParam(`Cubes('${odataKey(cube)}')/tm1.TraceFeeders?${query}`, sandbox),
      { body, signal },
    )
  }

  public async checkFeeders(
    cube: string,
    body: TTupleBody,
    sandbox?: string,
    signal?: AbortSignal,
  ): Promise<TFeederCheck[]> {
    const query = '$select=Fed&$expand=Tuple($select=Name,UniqueName,Type),Cube($select=Name)'
    const response = await this.transport.requestJson<TODataCollection<TFeederCheck>>(
      'POST',
      appendSandboxParam(`Cubes('${odataKey(cube)}')/tm1.CheckFeeders?${query}`, sandbox),
      { body, signal },
    )
    return response.value
  }

  public async checkRules(
    cube: string,
    rules?: string,
    signal?: AbortSignal,
  ): Promise<TCheckRulesError[]> {
    const response = await this.transport.requestJson<TODataCollection<TCheckRulesError>>(
      'POST',
      `Cubes('${odataKey(cube)}')/tm1.CheckRules`,
      { body: rules ? { Rules: rules } : {}, signal },
    )
    return response.value
  }
}
