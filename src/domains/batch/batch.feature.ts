import type { TVersionProvider } from '../../core/types.ts'
import { isV12 } from '../../core/version.ts'
import type { TBatchRequestDTO, TBatchResponseDTO } from '../../types/api.ts'
import type { TBatchApi } from './batch.api.ts'

export type TBatchFeatureOptions = {
  api: TBatchApi
  getVersion: TVersionProvider
}

const LEGACY_API_PREFIX = '/api/v1'

/**
 * Makes a batch request URL absolute from the server root. Servers before v12
 * expect the `/api/v1` prefix; v12 servers resolve URLs against the database.
 */
export function normalizeBatchUrl(url: string, legacy: boolean): string {
  let normalized = url.trim()
  if (!normalized.startsWith('/')) normalized = `/${normalized}`
  if (!legacy || normalized.startsWith(LEGACY_API_PREFIX)) return normalized
  return `${LEGACY_API_PREFIX}${normalized}`
}

export class BatchFeature {
  private readonly api: TBatchApi
  private readonly getVersion: TVersionProvider

  constructor(options: TBatchFeatureOptions) {
    this.api = options.api
    this.getVersion = options.getVersion
  }

  /** Sends the requests in one `$batch` call. The caller's request objects are not modified. */
  async execute(requests: TBatchRequestDTO[], signal?: AbortSignal): Promise<TBatchResponseDTO[]> {
    const legacy = !isV12(await this.getVersion(signal))
    const normalized = requests.map((request) => ({
      ...request,
      url: normalizeBatchUrl(request.url, legacy),
    }))
    return this.api.execute(normalized, signal)
  }
}
