import { ValidationError } from '../../core/errors.ts'
import { odataString } from '../../core/utils.ts'
import type { TChoreDTO, TChoreParameter, TChoreTaskDTO } from '../../types/api.ts'

export type TChoreExecutionMode = 'SingleCommit' | 'MultipleCommit'

export type TChoreTask = {
  /** Position in the chore, 0-based. */
  step?: number
  processName: string
  parameters: TChoreParameter[]
}

export type TChore = {
  name: string
  /** ISO-8601 start time, e.g. 2025-01-01T12:00:00Z. */
  startTime?: string
  dstSensitive: boolean
  active: boolean
  executionMode?: TChoreExecutionMode | string
  /** ISO-8601 duration as TM1 writes it, e.g. P01DT00H00M00S. */
  frequency?: string
  tasks: TChoreTask[]
}

export type TChoreTaskBody = {
  'Process@odata.bind': string
  Parameters: TChoreParameter[]
}

const PROCESS_BINDING_PATTERN = /^Processes\('(.*)'\)$/

/** Process name from an expanded task or from its `Process@odata.bind` value. */
export function taskProcessName(task: TChoreTaskDTO): string {
  if (task.Process?.Name) return task.Process.Name
  const binding = task['Process@odata.bind'] ?? ''
  const match = PROCESS_BINDING_PATTERN.exec(binding)
  return match?.[1] !== undefined ? match[1].replace(/''/g, "'") : binding
}

export function taskFromDTO(task: TChoreTaskDTO, index: number): TChoreTask {
  return {
    step: task.Step ?? index,
    processName: taskProcessName(task),
    parameters: (task.Parameters ?? []).map(({ Name, Value }) => ({ Name, Value })),
  }
}

export function choreFromDTO(chore: TChoreDTO): TChore {
  return {
    name: chore.Name,
    startTime: chore.StartTime,
    dstSensitive: chore.DSTSensitive ?? false,
    active: chore.Active ?? false,
    executionMode: chore.ExecutionMode,
    frequency: chore.Frequency,
    tasks: (chore.Tasks ?? []).map(taskFromDTO),
  }
}

export function taskToBody(task: TChoreTask): TChoreTaskBody {
  return {
    'Process@odata.bind': `Processes('${odataString(task.processName)}')`,
    Parameters: task.parameters.map(({ Name, Value }) => ({ Name, Value })),
  }
}

/** Same process and the same parameters in the same order, values compared as strings. */
export function tasksEqual(left: TChoreTask, right: TChoreTask): boolean {
  if (left.processName !== right.processName) return false
  if (left.parameters.length !== right.parameters.length) return false
  return left.parameters.every((parameter, index) => {
    const other = right.parameters[index]
    return (
      other !== undefined &&
      parameter.Name === other.Name &&
      String(parameter.Value) === String(other.Value)
    )
  })
}

export type TLocalStartTime = {
  StartDate: string
  StartTime: string
}

const START_TIME_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{2})(?::(\d{2}))?/

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * Body of tm1.SetServerLocalStartTime. Strings keep the wall-clock fields as
 * written; Date values use their UTC fields.
 */
export function localStartTimeBody(startTime: string | Date): TLocalStartTime {
  let fields: [number, number, number, number, number, number]
  if (startTime instanceof Date) {
    if (Number.isNaN(startTime.getTime())) throw new ValidationError('invalid chore start time')
    fields = [
      startTime.getUTCFullYear(),
      startTime.getUTCMonth() + 1,
      startTime.getUTCDate(),
      startTime.getUTCHours(),
      startTime.getUTCMinutes(),
      startTime.getUTCSeconds(),
    ]
  } else {
    const match = START_TIME_PATTERN.exec(startTime.trim())
    if (!match) throw new ValidationError(`unable to parse chore time: ${startTime}`)
    const [, year, month, day, hour, minute, second] = match
    fields = [
      Number(year),
      Number(month),
      Number(day),
      Number(hour),
      Number(minute),
      Number(second ?? 0),
    ]
  }
  const [year, month, day, hour, minute, second] = fields
  return {
    StartDate: `${year}-${month}-${day}`,
    StartTime: `${pad(hour)}:${pad(minute)}:${pad(second)}`,
  }
}
