import { Transport } from '../../core/transport.ts'
import { odataKey } from '../../core/utils.ts'
import type { TProcessExecuteResult } from '../../types/api.ts'

export type TProcessesApiOptions = {
  transport: Transport
}

export type TProcessParameterValue = string | number

export type TProcessParameterBody = {
  Name: string
  Value: TProcessParameterValue
}

export type TExecuteParametersBody = {
  Parameters?: TProcessParameterBody[]
}

/** A process that exists only for the duration of one execution. */
export type TUnboundProcessBody = {
  Name: string
  PrologProcedure: string
  MetadataProcedure?: string
  DataProcedure?: string
  EpilogProcedure?: string
  Parameters: TProcessParameterBody[]
  Variables: unknown[]
}

/**
 * Minimal processes HTTP client. Mirrors API endpoints exactly.
 */
export interface TProcessesApi {
  execute(name: string, body: TExecuteParametersBody, signal?: AbortSignal): Promise<void>
  executeWithReturn(
    name: string,
    body: TExecuteParametersBody,
    signal?: AbortSignal,
  ): Promise<TProcessExecuteResult>
  executeUnbound(process: TUnboundProcessBody, signal?: AbortSignal): Promise<TProcessExecuteResult>
}

export class ProcessesApi implements TProcessesApi {
  private transport: Transport

  constructor(options: TProcessesApiOptions) {
    this.transport = options.transport
  }

  public async execute(name: string, body: TExecuteParametersBody, signal?: AbortSignal): Promise<void> {
    await this.transport.send('POST', `Processes('${odataKey(name)}')/tm1.Execute`, { body, signal })
  }

  public async executeWithReturn(
    name: string,
    body: TExecuteParametersBody,
    signal?: AbortSignal,
  ): Promise<TProcessExecuteResult> {
    return this.transport.requestJson<TProcessExecuteResult>(
      'POST',
      `Processes('${odataKey(name)}')/tm1.ExecuteWithReturn?$expand=*`,
      { body, signal },
    )
  }

  public async executeUnbound(
    process: TUnboundProcessBody,
    signal?: AbortSignal,
  ): Promise<TProcessExecuteResult> {
    return this.transport.requestJson<TProcessExecuteResult>(
      'POST',
      'ExecuteProcessWithReturn?$expand=*',
      { body: { Process: process }, signal },
    )
  }
}
