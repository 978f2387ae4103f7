import { Transport } from '../../core/transport.ts'
import { odataKey, odataString } from '../../core/utils.ts'
import type { TNamedEntity, TODataCollection } from '../../types/api.ts'

export type TCubesApiOptions = {
  transport: Transport
}

function cubeEndpoint(name: string): string {
  return `Cubes('${odataKey(name)}')`
}

/**
 * Minimal cubes HTTP client. Mirrors API endpoints exactly.
 */
export interface TCubesApi {
  getAllNames(skipControlCubes: boolean, signal?: AbortSignal): Promise<string[]>
  get(name: string, signal?: AbortSignal): Promise<TNamedEntity>
  getDimensionNames(name: string, signal?: AbortSignal): Promise<string[]>
  getStorageDimensionOrder(name: string, signal?: AbortSignal): Promise<string[]>
  reorderDimensions(name: string, dimensions: string[], signal?: AbortSignal): Promise<number>
  invoke(name: string, action: 'Load' | 'Unload' | 'Lock' | 'Unlock', signal?: AbortSignal): Promise<void>
}

export class CubesApi implements TCubesApi {
  private transport: Transport

  constructor(options: TCubesApiOptions) {
    this.transport = options.transport
  }

  public async getAllNames(skipControlCubes: boolean, signal?: AbortSignal): Promise<string[]> {
    const endpoint = skipControlCubes ? 'ModelCubes()?$select=Name' : 'Cubes?$select=Name'
    const response = await this.transport.requestJson<TODataCollection<TNamedEntity>>('GET', endpoint, {
      signal,
    })
    return response.value.map((cube) => cube.Name)
  }

  public async get(name: string, signal?: AbortSignal): Promise<TNamedEntity> {
    return this.transport.requestJson<TNamedEntity>('GET', `${cubeEndpoint(name)}?$select=Name`, {
      signal,
    })
  }

  public async getDimensionNames(name: string, signal?: AbortSignal): Promise<string[]> {
    const response = await this.transport.requestJson<TODataCollection<TNamedEntity>>(
      'GET',
      `${cubeEndpoint(name)}/Dimensions?$select=Name`,
      { signal },
    )
    return response.value.map((dimension) => dimension.Name)
  }

  public async getStorageDimensionOrder(name: string, signal?: AbortSignal): Promise<string[]> {
    const response = await this.transport.requestJson<TODataCollection<TNamedEntity>>(
      'GET',
      `${cubeEndpoint(name)}/tm1.DimensionsStorageOrder()?$select=Name`,
      { signal },
    )
    return response.value.map((dimension) => dimension.Name)
  }

  public async reorderDimensions(
    name: string,
    dimensions: string[],
    signal?: AbortSignal,
  ): Promise<number> {
    const response = await this.transport.requestJson<{ value: number }>(
      'POST',
      `${cubeEndpoint(name)}/tm1.ReorderDimensions`,
      {
        body: {
          'Dimensions@odata.bind': dimensions.map(
            (dimension) => `Dimensions('${odataString(dimension)}')`,
          ),
        },
        signal,
      },
    )
    return response.value
  }

  public async invoke(
    name: string,
    action: 'Load' | 'Unload' | 'Lock' | 'Unlock',
    signal?: AbortSignal,
  ): Promise<void> {
    await this.transport.send('POST', `${cubeEndpoint(name)}/tm1.${action}`, { signal })
  }
}
