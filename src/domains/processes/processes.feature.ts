import type { TProcessExecuteResult } from '../../types/api.ts'
import type { TExecuteParametersBody, TProcessesApi, TProcessParameterValue } from './processes.api.ts'

export type TProcessesFeatureOptions = {
  api: TProcessesApi
}

export type TProcessExecution = {
  success: boolean
  status: string
  /** Name of the error log the server wrote, or an empty string. */
  errorLogFile: string
}

export type TProcessParameters = Record<string, TProcessParameterValue>

const COMPLETED_SUCCESSFULLY = 'CompletedSuccessfully'

function toExecution(result: TProcessExecuteResult): TProcessExecution {
  const status = result.ProcessExecuteStatusCode ?? ''
  return {
    success: status === COMPLETED_SUCCESSFULLY,
    status,
    errorLogFile: result.ErrorLogFile?.Filename ?? '',
  }
}

function parametersBody(parameters: TProcessParameters): TExecuteParametersBody {
  const entries = Object.entries(parameters)
  if (entries.length === 0) return {}
  return { Parameters: entries.map(([Name, Value]) => ({ Name, Value })) }
}

export class ProcessesFeature {
  private readonly api: TProcessesApi

  constructor(options: TProcessesFeatureOptions) {
    this.api = options.api
  }

  async execute(name: string, parameters: TProcessParameters = {}, signal?: AbortSignal): Promise<void> {
    await this.api.execute(name, parametersBody(parameters), signal)
  }

  async executeWithReturn(
    name: string,
    parameters: TProcessParameters = {},
    signal?: AbortSignal,
  ): Promise<TProcessExecution> {
    return toExecution(await this.api.executeWithReturn(name, parametersBody(parameters), signal))
  }

  /** Runs TurboIntegrator statements in a temporary, unnamed process. */
  async executeTiCode(
    prolog: string | string[],
    epilog: string | string[] = '',
    signal?: AbortSignal,
  ): Promise<TProcessExecution> {
    const join = (code: string | string[]) => (Array.isArray(code) ? code.join('\r\n') : code)
    const epilogCode = join(epilog)
    const result = await this.api.executeUnbound(
      {
        Name: '',
        PrologProcedure: join(prolog),
        ...(epilogCode ? { EpilogProcedure: epilogCode } : {}),
        Parameters: [],
        Variables: [],
      },
      signal,
    )
    return toExecution(result)
  }
}
