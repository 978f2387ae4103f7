import { Transport } from '../../core/transport.ts'
import type { TBatchRequestDTO, TBatchResponseDTO } from '../../types/api.ts'

export type TBatchApiOptions = {
  transport: Transport
}

/**
 * Minimal batch HTTP client. Mirrors API endpoints exactly.
 */
export interface TBatchApi {
  execute(requests: TBatchRequestDTO[], signal?: AbortSignal): Promise<TBatchResponseDTO[]>
}

export class BatchApi implements TBatchApi {
  private transport: Transport

  constructor(options: TBatchApiOptions) {
    this.transport = options.transport
  }

  public async execute(
    requests: TBatchRequestDTO[],
    signal?: AbortSignal,
  ): Promise<TBatchResponseDTO[]> {
    const response = await this.transport.requestJson<{ responses?: TBatchResponseDTO[] }>(
      'POST',
      '$batch',
      { body: { requests }, signal },
    )
    return response.responses ?? []
  }
}
