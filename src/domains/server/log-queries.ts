import { ValidationError } from '../../core/errors.ts'
import { encodeODataQuery, odataString } from '../../core/utils.ts'

export type TMessageLogLevel = 'ERROR' | 'WARNING' | 'INFO' | 'DEBUG' | 'UNKNOWN'
export type TLoggerLevel = 'FATAL' | 'ERROR' | 'WARNING' | 'INFO' | 'DEBUG' | 'UNKNOWN' | 'OFF'
export type TMessageLogOutputLevel = 'FATAL' | 'ERROR' | 'WARN' | 'INFO' | 'DEBUG'

export type TMessageLogQuery = {
  /** Newest entries first. */
  reverse?: boolean
  /** OData datetime literal, e.g. 2025-01-01T00:00:00Z. */
  since?: string
  until?: string
  top?: number
  logger?: string
  level?: TMessageLogLevel
  messageContains?: string[]
  messageContainsOperator?: 'and' | 'or'
}

export type TTransactionLogQuery = {
  reverse?: boolean
  user?: string
  cube?: string
  since?: string
  until?: string
  top?: number
  /** Element name to comparison operator, e.g. `{ Jan: 'eq' }`. */
  elementTupleFilter?: Record<string, string>
}

export type TAuditLogQuery = {
  user?: string
  objectType?: string
  objectName?: string
  since?: string
  until?: string
  top?: number
}

const MESSAGE_LOG_LEVELS: Record<TMessageLogLevel, number> = {
  ERROR: 1,
  WARNING: 2,
  INFO: 3,
  DEBUG: 4,
  UNKNOWN: 5,
}

const LOGGER_LEVELS: Record<TLoggerLevel, number> = {
  FATAL: 0,
  ERROR: 1,
  WARNING: 2,
  INFO: 3,
  DEBUG: 4,
  UNKNOWN: 5,
  OFF: 6,
}

const OUTPUT_LEVELS: TMessageLogOutputLevel[] = ['FATAL', 'ERROR', 'WARN', 'INFO', 'DEBUG']

function isKeyOf<T extends object>(record: T, key: string): key is Extract<keyof T, string> {
  return Object.prototype.hasOwnProperty.call(record, key)
}

export function messageLogLevelIndex(level: string): number {
  const normalized = level.trim().toUpperCase()
  if (!isKeyOf(MESSAGE_LOG_LEVELS, normalized)) {
    throw new ValidationError(`${level} is not a valid message log level`)
  }
  return MESSAGE_LOG_LEVELS[normalized]
}

export function loggerLevelIndex(level: string): number {
  const normalized = level.trim().toUpperCase()
  if (!isKeyOf(LOGGER_LEVELS, normalized)) {
    throw new ValidationError(`${level} is not a valid logger level`)
  }
  return LOGGER_LEVELS[normalized]
}

export function messageLogOutputLevel(level: string): TMessageLogOutputLevel {
  const normalized = level.trim().toUpperCase()
  const match = OUTPUT_LEVELS.find((candidate) => candidate === normalized)
  if (!match) throw new ValidationError(`invalid message level: ${level}`)
  return match
}

function timeFilters(since?: string, until?: string): string[] {
  const filters: string[] = []
  if (since) filters.push(`TimeStamp ge ${since}`)
  if (until) filters.push(`TimeStamp le ${until}`)
  return filters
}

/** Appends `$filter` and `$top` to an endpoint that already carries a query. */
function withFilters(endpoint: string, filters: string[], top?: number): string {
  let result = endpoint
  if (filters.length > 0) result += `&$filter=${encodeODataQuery(filters.join(' and '))}`
  if (top && top > 0) result += `&$top=${top}`
  return result
}

function orderBy(reverse?: boolean): string {
  return `$orderby=${encodeODataQuery(`TimeStamp ${reverse ? 'desc' : 'asc'}`)}`
}

export function messageLogEndpoint(query: TMessageLogQuery = {}): string {
  const filters = timeFilters(query.since, query.until)
  if (query.logger) filters.push(`Logger eq '${odataString(query.logger)}'`)
  if (query.level) filters.push(`Level eq ${messageLogLevelIndex(query.level)}`)
  if (query.messageContains && query.messageContains.length > 0) {
    const operator = query.messageContainsOperator ?? 'and'
    if (operator !== 'and' && operator !== 'or') {
      throw new ValidationError("message contains operator must be 'and' or 'or'")
    }
    const contains = query.messageContains.map(
      (text) => `contains(toupper(Message),toupper('${odataString(text)}'))`,
    )
    filters.push(`(${contains.join(` ${operator} `)})`)
  }
  return withFilters(`MessageLogEntries?${orderBy(query.reverse)}`, filters, query.top)
}

export function transactionLogEndpoint(query: TTransactionLogQuery = {}): string {
  const filters: string[] = []
  if (query.user) filters.push(`User eq '${odataString(query.user)}'`)
  if (query.cube) filters.push(`Cube eq '${odataString(query.cube)}'`)
  const tuple = Object.entries(query.elementTupleFilter ?? {})
  if (tuple.length > 0) {
    const conditions = tuple.map(([element, operator]) => `e ${operator} '${odataString(element)}'`)
    filters.push(`Tuple/any(e: ${conditions.join(' or ')})`)
  }
  filters.push(...timeFilters(query.since, query.until))
  return withFilters(`TransactionLogEntries?${orderBy(query.reverse)}`, filters, query.top)
}

export function auditLogEndpoint(query: TAuditLogQuery = {}): string {
  const filters: string[] = []
  if (query.user) filters.push(`UserName eq '${odataString(query.user)}'`)
  if (query.objectType) filters.push(`ObjectType eq '${odataString(query.objectType)}'`)
  if (query.objectName) filters.push(`ObjectName eq '${odataString(query.objectName)}'`)
  filters.push(...timeFilters(query.since, query.until))
  return withFilters('AuditLogEntries?$expand=AuditDetails', filters, query.top)
}

/** Initial endpoint of a log tail, e.g. `TailMessageLog()`. */
export function tailEndpoint(functionName: string, filter?: string): string {
  const endpoint = `${functionName}()`
  return filter?.trim() ? `${endpoint}?$filter=${encodeODataQuery(filter)}` : endpoint
}

/** Next endpoint from an `@odata.deltaLink`, relative to the service root. */
export function nextDeltaEndpoint(deltaLink: string | undefined): string {
  const link = deltaLink?.trim() ?? ''
  const marker = '/api/v1/'
  const index = link.indexOf(marker)
  const relative = index >= 0 ? link.slice(index + marker.length) : link
  return relative.replace(/^\/+/, '')
}
