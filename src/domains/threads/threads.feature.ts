import { requireVersionBelow, VERSION_12 } from '../../core/version.ts'
import type { TVersionProvider } from '../../core/types.ts'
import type { TThread } from '../../types/api.ts'
import type { TThreadsApi } from './threads.api.ts'

export type TThreadsFeatureOptions = {
  api: TThreadsApi
  getVersion: TVersionProvider
}

const THREADS_REMOVED = 'threads are removed as of TM1 version 12.0.0'
const MONITORING_FUNCTIONS = ['GET /Threads', 'GET /api/v1/Threads']

function isCancellable(thread: TThread): boolean {
  return !(
    thread.State === 'Idle' ||
    thread.Type === 'System' ||
    thread.Name === 'Pseudo' ||
    MONITORING_FUNCTIONS.includes(thread.Function ?? '')
  )
}

/** Server threads on servers before v12. */
export class ThreadsFeature {
  private readonly api: TThreadsApi
  private readonly getVersion: TVersionProvider

  constructor(options: TThreadsFeatureOptions) {
    this.api = options.api
    this.getVersion = options.getVersion
  }

  async getAll(signal?: AbortSignal): Promise<TThread[]> {
    await this.requireThreads(signal)
    return this.api.getAll(signal)
  }

  /** Threads that are not idle, excluding the request that lists them. */
  async getActive(signal?: AbortSignal): Promise<TThread[]> {
    await this.requireThreads(signal)
    return this.api.getActive(signal)
  }

  async cancel(threadId: number, signal?: AbortSignal): Promise<void> {
    await this.requireThreads(signal)
    await this.api.cancel(threadId, signal)
  }

  /**
   * Cancels running user threads and returns them. Idle, system and pseudo
   * threads, thread listings and threads without a numeric ID are skipped.
   */
  async cancelAllRunning(signal?: AbortSignal): Promise<TThread[]> {
    const threads = await this.getAll(signal)
    const cancelled: TThread[] = []
    for (const thread of threads) {
      if (!isCancellable(thread) || typeof thread.ID !== 'number') continue
      await this.api.cancel(Math.trunc(thread.ID), signal)
      cancelled.push(thread)
    }
    return cancelled
  }

  private async requireThreads(signal?: AbortSignal): Promise<void> {
    requireVersionBelow(await this.getVersion(signal), VERSION_12, THREADS_REMOVED)
  }
}
