import { Transport } from '../../core/transport.ts'
import type { TJob, TODataCollection } from '../../types/api.ts'

export type TJobsApiOptions = {
  transport: Transport
}

/**
 * Minimal jobs HTTP client. Mirrors API endpoints exactly.
 */
export interface TJobsApi {
  getAll(signal?: AbortSignal): Promise<TJob[]>
  cancel(jobId: string | number, signal?: AbortSignal): Promise<void>
}

export class JobsApi implements TJobsApi {
  private transport: Transport

  constructor(options: TJobsApiOptions) {
    this.transport = options.transport
  }

  public async getAll(signal?: AbortSignal): Promise<TJob[]> {
    const response = await this.transport.requestJson<TODataCollection<TJob>>('GET', 'Jobs', { signal })
    return response.value
  }

  public async cancel(jobId: string | number, signal?: AbortSignal): Promise<void> {
    await this.transport.send('POST', `Jobs('${encodeURIComponent(String(jobId))}')/tm1.Cancel`, {
      signal,
    })
  }
}
