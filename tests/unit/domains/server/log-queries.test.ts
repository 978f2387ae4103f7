import { describe, expect, it } from 'vitest'
import { ValidationError } from '../../../../src/core/errors.ts'
import {
  auditLogEndpoint,
  loggerLevelIndex,
  messageLogEndpoint,
  messageLogLevelIndex,
  messageLogOutputLevel,
  nextDeltaEndpoint,
  tailEndpoint,
  transactionLogEndpoint,
} from '../../../../src/domains/server/log-queries.ts'

describe('message log endpoint', () => {
  it('orders ascending without filters', () => {
    expect(messageLogEndpoint()).toBe('MessageLogEntries?$orderby=TimeStamp%20asc')
  })

  it('combines time, logger, level and message filters', () => {
    expect(
      messageLogEndpoint({
        reverse: true,
        since: '2025-01-01T00:00:00Z',
        logger: 'TM1.Process',
        level: 'ERROR',
        messageContains: ['load', 'fail'],
        messageContainsOperator: 'or',
        top: 10,
      }),
    ).toBe(
      'MessageLogEntries?$orderby=TimeStamp%20desc&$filter=' +
        'TimeStamp%20ge%202025-01-01T00%3A00%3A00Z%20and%20Logger%20eq%20%27TM1.Process%27%20and%20' +
        'Level%20eq%201%20and%20%28contains%28toupper%28Message%29%2Ctoupper%28%27load%27%29%29%20or%20' +
        'contains%28toupper%28Message%29%2Ctoupper%28%27fail%27%29%29%29&$top=10',
    )
  })

  it('rejects unknown levels', () => {
    expect(() => messageLogLevelIndex('LOUD')).toThrow(
      new ValidationError('LOUD is not a valid message log level'),
    )
    expect(messageLogLevelIndex('warning')).toBe(2)
  })
})

describe('transaction and audit log endpoints', () => {
  it('filters transactions by user, cube and tuple', () => {
    expect(
      transactionLogEndpoint({ user: 'admin', cube: 'Sales', elementTupleFilter: { Jan: 'eq' }, top: 5 }),
    ).toBe(
      'TransactionLogEntries?$orderby=TimeStamp%20asc&$filter=' +
        'User%20eq%20%27admin%27%20and%20Cube%20eq%20%27Sales%27%20and%20Tuple%2Fany%28e%3A%20e%20eq%20%27Jan%27%29' +
        '&$top=5',
    )
  })

  it('expands audit details', () => {
    expect(auditLogEndpoint({ objectType: 'Cube' })).toBe(
      'AuditLogEntries?$expand=AuditDetails&$filter=ObjectType%20eq%20%27Cube%27',
    )
  })
})

describe('levels', () => {
  it('maps logger levels case-insensitively', () => {
    expect(loggerLevelIndex('fatal')).toBe(0)
    expect(loggerLevelIndex(' off ')).toBe(6)
    expect(() => loggerLevelIndex('TRACE')).toThrow('TRACE is not a valid logger level')
  })

  it('accepts the LogOutput levels only', () => {
    expect(messageLogOutputLevel('warn')).toBe('WARN')
    expect(() => messageLogOutputLevel('WARNING')).toThrow('invalid message level: WARNING')
  })
})

describe('log tails', () => {
  it('starts a tail with an optional filter', () => {
    expect(tailEndpoint('TailMessageLog')).toBe('TailMessageLog()')
    expect(tailEndpoint('TailTransactionLog', "Cube eq 'Sales'")).toBe(
      'TailTransactionLog()?$filter=Cube%20eq%20%27Sales%27',
    )
  })

  it('follows the delta link relative to the service root', () => {
    expect(
      nextDeltaEndpoint("https://tm1.test:8010/api/v1/TailMessageLog()?$deltatoken='abc'"),
    ).toBe("TailMessageLog()?$deltatoken='abc'")
    expect(nextDeltaEndpoint("/TailAuditLog()?$deltatoken='x'")).toBe("TailAuditLog()?$deltatoken='x'")
    expect(nextDeltaEndpoint(undefined)).toBe('')
  })
})
