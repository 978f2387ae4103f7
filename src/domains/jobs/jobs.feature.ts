import { requireVersionAtLeast, VERSION_12 } from '../../core/version.ts'
import type { TVersionProvider } from '../../core/types.ts'
import type { TJob } from '../../types/api.ts'
import type { TJobsApi } from './jobs.api.ts'

export type TJobsFeatureOptions = {
  api: TJobsApi
  getVersion: TVersionProvider
}

/** Running jobs on v12 servers. Older servers expose threads instead. */
export class JobsFeature {
  private readonly api: TJobsApi
  private readonly getVersion: TVersionProvider

  constructor(options: TJobsFeatureOptions) {
    this.api = options.api
    this.getVersion = options.getVersion
  }

  async getAll(signal?: AbortSignal): Promise<TJob[]> {
    await this.requireJobs(signal)
    return this.api.getAll(signal)
  }

  async cancel(jobId: string | number, signal?: AbortSignal): Promise<void> {
    await this.requireJobs(signal)
    await this.api.cancel(jobId, signal)
  }

  /** Cancels every running job and returns the cancelled ones. Stops at the first failure. */
  async cancelAll(signal?: AbortSignal): Promise<TJob[]> {
    const jobs = await this.getAll(signal)
    const cancelled: TJob[] = []
    for (const job of jobs) {
      await this.api.cancel(job.ID, signal)
      cancelled.push(job)
    }
    return cancelled
  }

  private async requireJobs(signal?: AbortSignal): Promise<void> {
    requireVersionAtLeast(await this.getVersion(signal), VERSION_12)
  }
}
