/**
 * Wire shapes of the TM1 REST API as the client reads and writes them.
 * Property names follow the server's casing.
 */

export type TODataCollection<T> = {
  value: T[]
}

// ── Cellsets ─────────────────────────────────────────────────

export type TCellsetMember = {
  Name?: string
  UniqueName: string
  Ordinal?: number
}

export type TCellsetTuple = {
  Ordinal?: number
  Members: TCellsetMember[]
}

export type TCellsetAxis = {
  Ordinal?: number
  Tuples: TCellsetTuple[]
}

export type TCellValue = string | number | boolean | null

export type TCellsetCell = {
  Ordinal: number
  Value?: TCellValue
  FormattedValue?: string
  RuleDerived?: boolean
  Consolidated?: boolean
  Updateable?: number | boolean
}

export type TCellsetResponse = {
  ID?: string
  Axes?: TCellsetAxis[]
  Cells?: TCellsetCell[]
}

export type TCellsetCreatedResponse = {
  ID: string
}

export type TNamedEntity = {
  Name: string
}

export type TCheckRulesError = {
  LineNumber?: number
  Message?: string
}

export type TTupleMember = {
  Name?: string
  UniqueName?: string
  Type?: string
}

export type TCellTraceComponent = {
  Type?: string
  Value?: TCellValue
  Statements?: string[]
  Tuple?: TTupleMember[]
  Cube?: TNamedEntity
  Components?: TCellTraceComponent[]
}

export type TCellTrace = {
  Type?: string
  Value?: TCellValue
  Statements?: string[]
  Tuple?: TTupleMember[]
  Components?: TCellTraceComponent[]
}

export type TFedCell = {
  Tuple?: TTupleMember[]
  Cube?: TNamedEntity
}

export type TFeederTrace = {
  Statements?: string[]
  FedCells?: TFedCell[]
}

export type TFeederCheck = {
  Fed?: boolean
  Tuple?: TTupleMember[]
  Cube?: TNamedEntity
}

// ── Chores ───────────────────────────────────────────────────

export type TChoreParameterValue = string | number

export type TChoreParameter = {
  Name: string
  Value: TChoreParameterValue
}

export type TChoreTaskDTO = {
  Step?: number
  Process?: TNamedEntity
  'Process@odata.bind'?: string
  Parameters?: TChoreParameter[]
  Chore?: TNamedEntity
}

export type TChoreDTO = {
  Name: string
  StartTime?: string
  DSTSensitive?: boolean
  Active?: boolean
  ExecutionMode?: string
  Frequency?: string
  Tasks?: TChoreTaskDTO[]
}

// ── Users ────────────────────────────────────────────────────

export type TActiveUserDTO = Record<string, unknown>

// ── Jobs & threads ───────────────────────────────────────────

export type TJob = {
  ID: string | number
  [property: string]: unknown
}

export type TThread = {
  ID: string | number
  Type?: string
  Name?: string
  Context?: string
  State?: string
  Function?: string
  ObjectType?: string
  ObjectName?: string
  RLocks?: number
  IXLocks?: number
  WLocks?: number
  ElapsedTime?: string
  WaitTime?: string
  Info?: string
}

// ── Sessions ─────────────────────────────────────────────────

export type TSession = {
  ID: string | number
  Context?: string
  Active?: boolean
  User?: { Name?: string; [property: string]: unknown }
  Threads?: TThread[]
  [property: string]: unknown
}

// ── Server ───────────────────────────────────────────────────

export type TLogEntry = Record<string, unknown>

export type TDeltaResponse = {
  value?: TLogEntry[]
  '@odata.deltaLink'?: string
}

export type TLoggerDTO = {
  Name: string
  Level: number | string
}

export type TProcessExecuteResult = {
  ProcessExecuteStatusCode?: string
  ErrorLogFile?: { Filename?: string } | null
}

// ── Files ────────────────────────────────────────────────────

export type TContentEntry = {
  ID?: string
  Name: string
  Contents?: TContentEntry[]
}

// ── Batch ────────────────────────────────────────────────────

export type TBatchRequestDTO = {
  id: string
  method: string
  url: string
  headers?: Record<string, string>
  body?: unknown
  dependsOn?: string[]
}

export type TBatchResponseDTO = {
  id: string
  status: number
  headers?: Record<string, string>
  body?: unknown
}
