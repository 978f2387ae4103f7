import { Transport } from '../../core/transport.ts'
import { odataKey, trimQuotes } from '../../core/utils.ts'
import type { TDeltaResponse, TLogEntry, TLoggerDTO, TODataCollection } from '../../types/api.ts'

export type TServerApiOptions = {
  transport: Transport
}

export type TStaticConfiguration = Record<string, unknown>

/**
 * Minimal server HTTP client. Mirrors API endpoints exactly.
 */
export interface TServerApi {
  getDelta(endpoint: string, signal?: AbortSignal): Promise<TDeltaResponse>
  getLogEntries(endpoint: string, signal?: AbortSignal): Promise<TLogEntry[]>
  getLoggers(signal?: AbortSignal): Promise<TLoggerDTO[]>
  updateLoggerLevel(logger: string, level: number, signal?: AbortSignal): Promise<void>
  getConfigurationValue(property: string, signal?: AbortSignal): Promise<string>
  getStaticConfiguration(signal?: AbortSignal): Promise<TStaticConfiguration>
  updateStaticConfiguration(configuration: TStaticConfiguration, signal?: AbortSignal): Promise<void>
}

export class ServerApi implements TServerApi {
  private transport: Transport

  constructor(options: TServerApiOptions) {
    this.transport = options.transport
  }

  public async getDelta(endpoint: string, signal?: AbortSignal): Promise<TDeltaResponse> {
    return this.transport.requestJson<TDeltaResponse>('GET', endpoint, { signal })
  }

  public async getLogEntries(endpoint: string, signal?: AbortSignal): Promise<TLogEntry[]> {
    const response = await this.transport.requestJson<TODataCollection<TLogEntry>>('GET', endpoint, {
      signal,
    })
    return response.value
  }

  public async getLoggers(signal?: AbortSignal): Promise<TLoggerDTO[]> {
    const response = await this.transport.requestJson<TODataCollection<TLoggerDTO>>('GET', 'Loggers', {
      signal,
    })
    return response.value
  }

  public async updateLoggerLevel(logger: string, level: number, signal?: AbortSignal): Promise<void> {
    await this.transport.send('PATCH', `Loggers('${odataKey(logger)}')`, {
      body: { Level: level },
      signal,
    })
  }

  public async getConfigurationValue(property: string, signal?: AbortSignal): Promise<string> {
    const text = await this.transport.requestText('GET', `Configuration/${property}/$value`, { signal })
    return trimQuotes(text)
  }

  public async getStaticConfiguration(signal?: AbortSignal): Promise<TStaticConfiguration> {
    return this.transport.requestJson<TStaticConfiguration>('GET', 'StaticConfiguration', { signal })
  }

  public async updateStaticConfiguration(
    configuration: TStaticConfiguration,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.transport.send('PATCH', 'StaticConfiguration', { body: configuration, signal })
  }
}
