import { TransportError } from '../../core/errors.ts'
import { Transport } from '../../core/transport.ts'
import { encodeODataQuery, odataKey } from '../../core/utils.ts'
import type { TChoreDTO, TChoreTaskDTO, TNamedEntity, TODataCollection } from '../../types/api.ts'
import type { TChoreTaskBody, TLocalStartTime } from './chore.ts'

export type TChoresApiOptions = {
  transport: Transport
}

export type TChorePatchBody = {
  Name: string
  StartTime?: string
  DSTSensitive: boolean
  Active: boolean
  ExecutionMode?: string
  Frequency?: string
}

export type TChoreCreateBody = TChorePatchBody & {
  Tasks: TChoreTaskBody[]
}

const TASK_EXPAND = '$expand=*,Process($select=Name),Chore($select=Name)'
const CHORE_EXPAND = `$expand=Tasks(${TASK_EXPAND})`

function choreEndpoint(name: string): string {
  return `Chores('${odataKey(name)}')`
}

/**
 * Minimal chores HTTP client. Mirrors API endpoints exactly.
 */
export interface TChoresApi {
  get(name: string, signal?: AbortSignal): Promise<TChoreDTO>
  getAll(signal?: AbortSignal): Promise<TChoreDTO[]>
  getAllNames(signal?: AbortSignal): Promise<string[]>
  search(filter: string, signal?: AbortSignal): Promise<TChoreDTO[]>
  create(body: TChoreCreateBody, signal?: AbortSignal): Promise<void>
  patch(name: string, body: TChorePatchBody, signal?: AbortSignal): Promise<void>
  delete(name: string, signal?: AbortSignal): Promise<void>
  activate(name: string, signal?: AbortSignal): Promise<void>
  deactivate(name: string, signal?: AbortSignal): Promise<void>
  execute(name: string, signal?: AbortSignal): Promise<void>
  setServerLocalStartTime(name: string, body: TLocalStartTime, signal?: AbortSignal): Promise<void>
  getTasksCount(name: string, signal?: AbortSignal): Promise<number>
  getTask(name: string, step: number, signal?: AbortSignal): Promise<TChoreTaskDTO>
  addTask(name: string, body: TChoreTaskBody, signal?: AbortSignal): Promise<void>
  updateTask(name: string, step: number, body: TChoreTaskBody, signal?: AbortSignal): Promise<void>
  deleteTask(name: string, step: number, signal?: AbortSignal): Promise<void>
}

export class ChoresApi implements TChoresApi {
  private transport: Transport

  constructor(options: TChoresApiOptions) {
    this.transport = options.transport
  }

  public async get(name: string, signal?: AbortSignal): Promise<TChoreDTO> {
    return this.transport.requestJson<TChoreDTO>('GET', `${choreEndpoint(name)}?${CHORE_EXPAND}`, {
      signal,
    })
  }

  public async getAll(signal?: AbortSignal): Promise<TChoreDTO[]> {
    const response = await this.transport.requestJson<TODataCollection<TChoreDTO>>(
      'GET',
      `Chores?${CHORE_EXPAND}`,
      { signal },
    )
    return response.value
  }

  public async getAllNames(signal?: AbortSignal): Promise<string[]> {
    const response = await this.transport.requestJson<TODataCollection<TNamedEntity>>(
      'GET',
      'Chores?$select=Name',
      { signal },
    )
    return response.value.map((chore) => chore.Name)
  }

  public async search(filter: string, signal?: AbortSignal): Promise<TChoreDTO[]> {
    const response = await this.transport.requestJson<TODataCollection<TChoreDTO>>(
      'GET',
      `Chores?$filter=${encodeODataQuery(filter)}&${CHORE_EXPAND}`,
      { signal },
    )
    return response.value
  }

  public async create(body: TChoreCreateBody, signal?: AbortSignal): Promise<void> {
    await this.transport.send('POST', 'Chores', { body, signal })
  }

  public async patch(name: string, body: TChorePatchBody, signal?: AbortSignal): Promise<void> {
    await this.transport.send('PATCH', choreEndpoint(name), { body, signal })
  }

  public async delete(name: string, signal?: AbortSignal): Promise<void> {
    await this.transport.send('DELETE', choreEndpoint(name), { signal })
  }

  public async activate(name: string, signal?: AbortSignal): Promise<void> {
    await this.transport.send('POST', `${choreEndpoint(name)}/tm1.Activate`, { body: {}, signal })
  }

  public async deactivate(name: string, signal?: AbortSignal): Promise<void> {
    await this.transport.send('POST', `${choreEndpoint(name)}/tm1.Deactivate`, { body: {}, signal })
  }

  public async execute(name: string, signal?: AbortSignal): Promise<void> {
    await this.transport.send('POST', `${choreEndpoint(name)}/tm1.Execute`, { body: {}, signal })
  }

  public async setServerLocalStartTime(
    name: string,
    body: TLocalStartTime,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.transport.send('POST', `${choreEndpoint(name)}/tm1.SetServerLocalStartTime`, {
      body,
      signal,
    })
  }

  public async getTasksCount(name: string, signal?: AbortSignal): Promise<number> {
    const text = await this.transport.requestText('GET', `${choreEndpoint(name)}/Tasks/$count`, {
      signal,
    })
    const count = Number.parseInt(text.trim(), 10)
    if (Number.isNaN(count)) {
      throw new TransportError(`unexpected task count for chore ${name}: ${text.slice(0, 100)}`)
    }
    return count
  }

  public async getTask(name: string, step: number, signal?: AbortSignal): Promise<TChoreTaskDTO> {
    return this.transport.requestJson<TChoreTaskDTO>(
      'GET',
      `${choreEndpoint(name)}/Tasks(${step})?${TASK_EXPAND}`,
      { signal },
    )
  }

  public async addTask(name: string, body: TChoreTaskBody, signal?: AbortSignal): Promise<void> {
    await this.transport.send('POST', `${choreEndpoint(name)}/Tasks`, { body, signal })
  }

  public async updateTask(
    name: string,
    step: number,
    body: TChoreTaskBody,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.transport.send('PATCH', `${choreEndpoint(name)}/Tasks(${step})`, { body, signal })
  }

  public async deleteTask(name: string, step: number, signal?: AbortSignal): Promise<void> {
    await this.transport.send('DELETE', `${choreEndpoint(name)}/Tasks(${step})`, { signal })
  }
}
