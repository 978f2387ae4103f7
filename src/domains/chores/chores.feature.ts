import { isNotFound, mergeErrors, ValidationError } from '../../core/errors.ts'
import { logger as defaultLogger, type TLogger } from '../../core/logger.ts'
import { odataString } from '../../core/utils.ts'
import type { TChorePatchBody, TChoresApi } from './chores.api.ts'
import {
  choreFromDTO,
  localStartTimeBody,
  taskFromDTO,
  tasksEqual,
  taskToBody,
  type TChore,
  type TChoreTask,
} from './chore.ts'

export type TChoresFeatureOptions = {
  api: TChoresApi
  logger?: TLogger
}

function patchBody(chore: TChore): TChorePatchBody {
  return {
    Name: chore.name,
    StartTime: chore.startTime,
    DSTSensitive: chore.dstSensitive,
    Active: chore.active,
    ExecutionMode: chore.executionMode,
    Frequency: chore.frequency,
  }
}

export class ChoresFeature {
  private readonly api: TChoresApi
  private readonly logger: TLogger

  constructor(options: TChoresFeatureOptions) {
    this.api = options.api
    this.logger = options.logger ?? defaultLogger
  }

  // ── Reads ─────────────────────────────────────────────────

  async get(name: string, signal?: AbortSignal): Promise<TChore> {
    return choreFromDTO(await this.api.get(name, signal))
  }

  async getAll(signal?: AbortSignal): Promise<TChore[]> {
    const chores = await this.api.getAll(signal)
    return chores.map(choreFromDTO)
  }

  async getAllNames(signal?: AbortSignal): Promise<string[]> {
    return this.api.getAllNames(signal)
  }

  async exists(name: string, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.api.get(name, signal)
      return true
    } catch (error) {
      if (isNotFound(error)) return false
      throw error
    }
  }

  /** Chores with a task running the process. Case, spaces and quotes are ignored in the match. */
  async searchForProcessName(processName: string, signal?: AbortSignal): Promise<TChore[]> {
    const normalized = odataString(processName.toLowerCase().replace(/ /g, ''))
    const chores = await this.api.search(
      `Tasks/any(t: replace(tolower(t/Process/Name), ' ', '') eq '${normalized}')`,
      signal,
    )
    return chores.map(choreFromDTO)
  }

  /** Chores with a string task parameter containing the value, case-insensitively. */
  async searchForParameterValue(value: string, signal?: AbortSignal): Promise<TChore[]> {
    const needle = odataString(value.toLowerCase())
    const chores = await this.api.search(
      `Tasks/any(t: t/Parameters/any(p: isof(p/Value, Edm.String) and contains(tolower(p/Value), '${needle}')))`,
      signal,
    )
    return chores.map(choreFromDTO)
  }

  // ── Lifecycle ─────────────────────────────────────────────

  /**
   * Creates the chore inactive, applies its local start time when DST-sensitive,
   * then activates it if requested.
   */
  async create(chore: TChore, signal?: AbortSignal): Promise<void> {
    this.validate(chore)
    await this.api.create(
      { ...patchBody(chore), Active: false, Tasks: chore.tasks.map(taskToBody) },
      signal,
    )
    if (chore.dstSensitive && chore.startTime) {
      await this.api.setServerLocalStartTime(chore.name, localStartTimeBody(chore.startTime), signal)
    }
    if (chore.active) await this.api.activate(chore.name, signal)
  }

  /**
   * Replaces the chore's settings and tasks. The chore is deactivated for the
   * duration and ends up in the `active` state of the given chore.
   */
  async update(chore: TChore, signal?: AbortSignal): Promise<void> {
    this.validate(chore)
    await this.withDeactivatedChore(
      chore.name,
      async () => {
        await this.api.patch(chore.name, patchBody(chore), signal)
        await this.syncTasks(chore.name, chore.tasks, signal)
        if (chore.dstSensitive && chore.startTime) {
          await this.api.setServerLocalStartTime(
            chore.name,
            localStartTimeBody(chore.startTime),
            signal,
          )
        }
      },
      { reactivate: chore.active, signal },
    )
  }

  async updateOrCreate(chore: TChore, signal?: AbortSignal): Promise<void> {
    if (await this.exists(chore.name, signal)) {
      await this.update(chore, signal)
      return
    }
    await this.create(chore, signal)
  }

  async delete(name: string, signal?: AbortSignal): Promise<void> {
    await this.api.delete(name, signal)
  }

  async activate(name: string, signal?: AbortSignal): Promise<void> {
    await this.api.activate(name, signal)
  }

  async deactivate(name: string, signal?: AbortSignal): Promise<void> {
    await this.api.deactivate(name, signal)
  }

  async execute(name: string, signal?: AbortSignal): Promise<void> {
    await this.api.execute(name, signal)
  }

  /** Sets the start time in server-local time, keeping the chore's active state. */
  async setLocalStartTime(name: string, startTime: string | Date, signal?: AbortSignal): Promise<void> {
    const body = localStartTimeBody(startTime)
    await this.withDeactivatedChore(name, () => this.api.setServerLocalStartTime(name, body, signal), {
      signal,
    })
  }

  // ── Tasks ─────────────────────────────────────────────────

  async getTasksCount(name: string, signal?: AbortSignal): Promise<number> {
    return this.api.getTasksCount(name, signal)
  }

  async getTask(name: string, step: number, signal?: AbortSignal): Promise<TChoreTask> {
    return taskFromDTO(await this.api.getTask(name, step, signal), step)
  }

  async addTask(name: string, task: TChoreTask, signal?: AbortSignal): Promise<void> {
    await this.withDeactivatedChore(name, () => this.api.addTask(name, taskToBody(task), signal), {
      signal,
    })
  }

  async updateTask(name: string, step: number, task: TChoreTask, signal?: AbortSignal): Promise<void> {
    await this.withDeactivatedChore(
      name,
      () => this.api.updateTask(name, step, taskToBody(task), signal),
      { signal },
    )
  }

  async deleteTask(name: string, step: number, signal?: AbortSignal): Promise<void> {
    await this.withDeactivatedChore(name, () => this.api.deleteTask(name, step, signal), { signal })
  }

  /**
   * Runs `operation` with the chore deactivated. Afterwards the chore is activated
   * when `reactivate` is true, or when it was active before and no override is given.
   * A failed reactivation is appended to the operation's own error.
   */
  async withDeactivatedChore<T>(
    name: string,
    operation: () => Promise<T>,
    options: { reactivate?: boolean; signal?: AbortSignal } = {},
  ): Promise<T> {
    const state = await this.api.get(name, options.signal)
    const wasActive = state.Active ?? false
    const shouldReactivate = options.reactivate ?? wasActive
    if (wasActive) await this.api.deactivate(name, options.signal)

    let result: T
    try {
      result = await operation()
    } catch (error) {
      if (shouldReactivate) {
        try {
          await this.api.activate(name, options.signal)
        } catch (activationError) {
          throw mergeErrors(error, activationError, 'reactivation failed')
        }
      }
      throw error
    }

    if (shouldReactivate) await this.api.activate(name, options.signal)
    return result
  }

  private async syncTasks(name: string, tasks: TChoreTask[], signal?: AbortSignal): Promise<void> {
    const existingCount = await this.api.getTasksCount(name, signal)

    for (const [step, task] of tasks.entries()) {
      if (step >= existingCount) {
        await this.api.addTask(name, taskToBody(task), signal)
        continue
      }
      const existing = taskFromDTO(await this.api.getTask(name, step, signal), step)
      if (!tasksEqual(existing, task)) {
        this.logger.debug(`chore ${name}: replacing task ${step}`)
        await this.api.updateTask(name, step, taskToBody(task), signal)
      }
    }

    // the server re-indexes after each deletion, so the tail index stays the same
    for (let step = tasks.length; step < existingCount; step++) {
      await this.api.deleteTask(name, tasks.length, signal)
    }
  }

  private validate(chore: TChore): void {
    if (!chore.name) throw new ValidationError('chore name cannot be empty')
    for (const task of chore.tasks) {
      if (!task.processName) throw new ValidationError(`chore ${chore.name}: task process name cannot be empty`)
    }
  }
}
