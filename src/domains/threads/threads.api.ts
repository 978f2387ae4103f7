import { Transport } from '../../core/transport.ts'
import { encodeODataQuery } from '../../core/utils.ts'
import type { TODataCollection, TThread } from '../../types/api.ts'

export type TThreadsApiOptions = {
  transport: Transport
}

const ACTIVE_THREADS_FILTER = "Function ne 'GET /Threads' and State ne 'Idle'"

/**
 * Minimal threads HTTP client. Mirrors API endpoints exactly.
 */
export interface TThreadsApi {
  getAll(signal?: AbortSignal): Promise<TThread[]>
  getActive(signal?: AbortSignal): Promise<TThread[]>
  cancel(threadId: number, signal?: AbortSignal): Promise<void>
}

export class ThreadsApi implements TThreadsApi {
  private transport: Transport

  constructor(options: TThreadsApiOptions) {
    this.transport = options.transport
  }

  public async getAll(signal?: AbortSignal): Promise<TThread[]> {
    const response = await this.transport.requestJson<TODataCollection<TThread>>('GET', 'Threads', {
      signal,
    })
    return response.value
  }

  public async getActive(signal?: AbortSignal): Promise<TThread[]> {
    const response = await this.transport.requestJson<TODataCollection<TThread>>(
      'GET',
      `Threads?$filter=${encodeODataQuery(ACTIVE_THREADS_FILTER)}`,
      { signal },
    )
    return response.value
  }

  public async cancel(threadId: number, signal?: AbortSignal): Promise<void> {
    await this.transport.send('POST', `Threads('${threadId}')/tm1.CancelOperation`, { signal })
  }
}
