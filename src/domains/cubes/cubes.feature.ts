import { isNotFound, TM1Error } from '../../core/errors.ts'
import type { TVersionProvider } from '../../core/types.ts'
import { odataString } from '../../core/utils.ts'
import { requireVersionAtLeast } from '../../core/version.ts'
import type { ProcessesFeature } from '../processes/processes.feature.ts'
import type { UsersFeature } from '../users/users.feature.ts'
import type { TCubesApi } from './cubes.api.ts'

export type TCubesFeatureOptions = {
  api: TCubesApi
  processes: ProcessesFeature
  users: UsersFeature
  getVersion: TVersionProvider
}

const STORAGE_ORDER_MINIMUM_VERSION = '11.4.0'
const LOAD_MINIMUM_VERSION = '11.6.0'

export class CubesFeature {
  private readonly api: TCubesApi
  private readonly processes: ProcessesFeature
  private readonly users: UsersFeature
  private readonly getVersion: TVersionProvider

  constructor(options: TCubesFeatureOptions) {
    this.api = options.api
    this.processes = options.processes
    this.users = options.users
    this.getVersion = options.getVersion
  }

  /** Cube names; control cubes (those starting with `}`) are left out when asked. */
  async getAllNames(skipControlCubes = false, signal?: AbortSignal): Promise<string[]> {
    return this.api.getAllNames(skipControlCubes, signal)
  }

  async exists(name: string, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.api.get(name, signal)
      return true
    } catch (error) {
      if (isNotFound(error)) return false
      throw error
    }
  }

  async getDimensionNames(name: string, signal?: AbortSignal): Promise<string[]> {
    return this.api.getDimensionNames(name, signal)
  }

  async getStorageDimensionOrder(name: string, signal?: AbortSignal): Promise<string[]> {
    await this.requireVersion(STORAGE_ORDER_MINIMUM_VERSION, 'storage dimension order', signal)
    return this.api.getStorageDimensionOrder(name, signal)
  }

  /** Reorders the dimensions in storage. Returns the memory change the server reports, in percent. */
  async updateStorageDimensionOrder(
    name: string,
    dimensions: string[],
    signal?: AbortSignal,
  ): Promise<number> {
    await this.requireVersion(STORAGE_ORDER_MINIMUM_VERSION, 'storage dimension order', signal)
    await this.users.requireDataAdmin(signal)
    return this.api.reorderDimensions(name, dimensions, signal)
  }

  async load(name: string, signal?: AbortSignal): Promise<void> {
    await this.requireVersion(LOAD_MINIMUM_VERSION, 'cube load', signal)
    await this.users.requireDataAdmin(signal)
    await this.api.invoke(name, 'Load', signal)
  }

  async unload(name: string, signal?: AbortSignal): Promise<void> {
    await this.requireVersion(LOAD_MINIMUM_VERSION, 'cube unload', signal)
    await this.users.requireDataAdmin(signal)
    await this.api.invoke(name, 'Unload', signal)
  }

  async lock(name: string, signal?: AbortSignal): Promise<void> {
    await this.api.invoke(name, 'Lock', signal)
  }

  async unlock(name: string, signal?: AbortSignal): Promise<void> {
    await this.api.invoke(name, 'Unlock', signal)
  }

  /** Writes the cube's pending data changes to disk. */
  async saveData(name: string, signal?: AbortSignal): Promise<void> {
    const execution = await this.processes.executeTiCode(
      '',
      `CubeSaveData('${odataString(name)}');`,
      signal,
    )
    if (!execution.success) {
      throw new TM1Error(`CubeSaveData for ${name} did not complete successfully: ${execution.status}`)
    }
  }

  private async requireVersion(minimum: string, feature: string, signal?: AbortSignal): Promise<void> {
    requireVersionAtLeast(await this.getVersion(signal), minimum, feature)
  }
}
