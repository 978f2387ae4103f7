import { Transport } from '../../core/transport.ts'
import { encodeODataQuery, odataKey } from '../../core/utils.ts'
import type { TODataCollection, TSession, TThread } from '../../types/api.ts'

export type TSessionsApiOptions = {
  transport: Transport
}

export type TSessionExpand = 'User' | 'Threads'

/**
 * Minimal sessions HTTP client. Mirrors API endpoints exactly.
 */
export interface TSessionsApi {
  getAll(expand: TSessionExpand[], signal?: AbortSignal): Promise<TSession[]>
  getActive(signal?: AbortSignal): Promise<TSession>
  getActiveThreads(filter: string, signal?: AbortSignal): Promise<TThread[]>
  close(sessionId: string, signal?: AbortSignal): Promise<void>
}

export class SessionsApi implements TSessionsApi {
  private transport: Transport

  constructor(options: TSessionsApiOptions) {
    this.transport = options.transport
  }

  public async getAll(expand: TSessionExpand[], signal?: AbortSignal): Promise<TSession[]> {
    const endpoint = expand.length > 0 ? `Sessions?$expand=${expand.join(',')}` : 'Sessions'
    const response = await this.transport.requestJson<TODataCollection<TSession>>('GET', endpoint, {
      signal,
    })
    return response.value
  }

  public async getActive(signal?: AbortSignal): Promise<TSession> {
    return this.transport.requestJson<TSession>('GET', 'ActiveSession', { signal })
  }

  public async getActiveThreads(filter: string, signal?: AbortSignal): Promise<TThread[]> {
    const response = await this.transport.requestJson<TODataCollection<TThread>>(
      'GET',
      `ActiveSession/Threads?$filter=${encodeODataQuery(filter)}`,
      { signal },
    )
    return response.value
  }

  public async close(sessionId: string, signal?: AbortSignal): Promise<void> {
    await this.transport.send('POST', `Sessions('${odataKey(sessionId)}')/tm1.Close`, { signal })
  }
}
