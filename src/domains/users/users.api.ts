import { Transport } from '../../core/transport.ts'
import type { TActiveUserDTO } from '../../types/api.ts'

export type TUsersApiOptions = {
  transport: Transport
}

/**
 * Minimal users HTTP client. Mirrors API endpoints exactly.
 */
export interface TUsersApi {
  getActiveUser(signal?: AbortSignal): Promise<TActiveUserDTO>
}

export class UsersApi implements TUsersApi {
  private transport: Transport

  constructor(options: TUsersApiOptions) {
    this.transport = options.transport
  }

  public async getActiveUser(signal?: AbortSignal): Promise<TActiveUserDTO> {
    return this.transport.requestJson<TActiveUserDTO>('GET', 'ActiveUser?$expand=Groups', { signal })
  }
}
