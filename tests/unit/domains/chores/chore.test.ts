import { describe, expect, it } from 'vitest'
import { ValidationError } from '../../../../src/core/errors.ts'
import {
  choreFromDTO,
  localStartTimeBody,
  taskProcessName,
  tasksEqual,
  taskToBody,
} from '../../../../src/domains/chores/chore.ts'
import { makeChoreDTO, makeTaskDTO } from '../../../helpers/index.ts'

describe('chore mapping', () => {
  it('maps the wire shape with task steps', () => {
    const dto = makeChoreDTO({
      Name: 'Nightly',
      Active: true,
      Tasks: [
        makeTaskDTO({ Step: undefined, Process: { Name: 'load' }, Parameters: [] }),
        makeTaskDTO({ Step: 1, Process: { Name: 'report' }, Parameters: [{ Name: 'p', Value: 1 }] }),
      ],
    })

    const chore = choreFromDTO(dto)

    expect(chore.name).toBe('Nightly')
    expect(chore.active).toBe(true)
    expect(chore.tasks).toEqual([
      { step: 0, processName: 'load', parameters: [] },
      { step: 1, processName: 'report', parameters: [{ Name: 'p', Value: 1 }] },
    ])
  })

  it('reads the process name from the binding when not expanded', () => {
    expect(taskProcessName({ 'Process@odata.bind': "Processes('O''Brien load')" })).toBe(
      "O'Brien load",
    )
  })

  it('binds the task to its process', () => {
    expect(taskToBody({ processName: "O'Brien", parameters: [{ Name: 'p', Value: 'x' }] })).toEqual({
      'Process@odata.bind': "Processes('O''Brien')",
      Parameters: [{ Name: 'p', Value: 'x' }],
    })
  })

  it('compares parameter values as strings', () => {
    const left = { processName: 'load', parameters: [{ Name: 'pYear', Value: 2025 }] }
    expect(tasksEqual(left, { processName: 'load', parameters: [{ Name: 'pYear', Value: '2025' }] })).toBe(
      true,
    )
    expect(tasksEqual(left, { processName: 'load', parameters: [] })).toBe(false)
    expect(tasksEqual(left, { processName: 'other', parameters: left.parameters })).toBe(false)
  })
})

describe('localStartTimeBody', () => {
  it('keeps wall-clock fields of a string, unpadded date and padded time', () => {
    expect(localStartTimeBody('2025-01-01T12:00:00Z')).toEqual({
      StartDate: '2025-1-1',
      StartTime: '12:00:00',
    })
    expect(localStartTimeBody('2025-11-03T7:05')).toEqual({
      StartDate: '2025-11-3',
      StartTime: '07:05:00',
    })
  })

  it('uses the UTC fields of a Date', () => {
    expect(localStartTimeBody(new Date(Date.UTC(2025, 5, 9, 23, 4, 5)))).toEqual({
      StartDate: '2025-6-9',
      StartTime: '23:04:05',
    })
  })

  it('rejects unparseable input', () => {
    expect(() => localStartTimeBody('tomorrow')).toThrow(
      new ValidationError('unable to parse chore time: tomorrow'),
    )
    expect(() => localStartTimeBody(new Date('nope'))).toThrow('invalid chore start time')
  })
})
