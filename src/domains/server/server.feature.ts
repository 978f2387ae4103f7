import { TM1Error } from '../../core/errors.ts'
import type { TVersionProvider } from '../../core/types.ts'
import { odataString } from '../../core/utils.ts'
import { requireVersionAtLeast, requireVersionBelow, VERSION_12 } from '../../core/version.ts'
import type { TLogEntry, TLoggerDTO } from '../../types/api.ts'
import type { ProcessesFeature } from '../processes/processes.feature.ts'
import type { UsersFeature } from '../users/users.feature.ts'
import {
  auditLogEndpoint,
  loggerLevelIndex,
  messageLogEndpoint,
  messageLogOutputLevel,
  nextDeltaEndpoint,
  tailEndpoint,
  transactionLogEndpoint,
  type TAuditLogQuery,
  type TLoggerLevel,
  type TMessageLogOutputLevel,
  type TMessageLogQuery,
  type TTransactionLogQuery,
} from './log-queries.ts'
import type { TServerApi, TStaticConfiguration } from './server.api.ts'

export type TServerFeatureOptions = {
  api: TServerApi
  processes: ProcessesFeature
  users: UsersFeature
  getVersion: TVersionProvider
}

export type TLogKind = 'transaction' | 'audit' | 'message'

const DEPRECATED_IN_V12 = 'operation is deprecated and unavailable in TM1 version 12.0.0+'
const AUDIT_LOG_MINIMUM_VERSION = '11.6'

const TAIL_FUNCTIONS: Record<TLogKind, string> = {
  transaction: 'TailTransactionLog',
  audit: 'TailAuditLog',
  message: 'TailMessageLog',
}

export class ServerFeature {
  private readonly api: TServerApi
  private readonly processes: ProcessesFeature
  private readonly users: UsersFeature
  private readonly getVersion: TVersionProvider
  private readonly deltaEndpoints: Record<TLogKind, string> = {
    transaction: '',
    audit: '',
    message: '',
  }

  constructor(options: TServerFeatureOptions) {
    this.api = options.api
    this.processes = options.processes
    this.users = options.users
    this.getVersion = options.getVersion
  }

  // ── Log tails ─────────────────────────────────────────────

  /** Starts tailing a log. Entries written before this call are not returned later. */
  async initializeDeltaRequests(kind: TLogKind, filter?: string, signal?: AbortSignal): Promise<void> {
    await this.requirePreV12(signal)
    if (kind === 'audit') await this.requireAuditLogVersion(signal)
    const response = await this.api.getDelta(tailEndpoint(TAIL_FUNCTIONS[kind], filter), signal)
    this.deltaEndpoints[kind] = nextDeltaEndpoint(response['@odata.deltaLink'])
  }

  /** Entries written since the previous call, or since initialization. */
  async executeDeltaRequest(kind: TLogKind, signal?: AbortSignal): Promise<TLogEntry[]> {
    const endpoint = this.deltaEndpoints[kind]
    if (!endpoint) throw new TM1Error(`${kind} delta request not initialized`)
    const response = await this.api.getDelta(endpoint, signal)
    this.deltaEndpoints[kind] = nextDeltaEndpoint(response['@odata.deltaLink'])
    return response.value ?? []
  }

  // ── Log queries ───────────────────────────────────────────

  async getMessageLogEntries(query: TMessageLogQuery = {}, signal?: AbortSignal): Promise<TLogEntry[]> {
    await this.requirePreV12(signal)
    await this.users.requireOpsAdmin(signal)
    return this.api.getLogEntries(messageLogEndpoint(query), signal)
  }

  async getTransactionLogEntries(
    query: TTransactionLogQuery = {},
    signal?: AbortSignal,
  ): Promise<TLogEntry[]> {
    await this.requirePreV12(signal)
    await this.users.requireDataAdmin(signal)
    return this.api.getLogEntries(transactionLogEndpoint(query), signal)
  }

  async getAuditLogEntries(query: TAuditLogQuery = {}, signal?: AbortSignal): Promise<TLogEntry[]> {
    await this.requirePreV12(signal)
    await this.users.requireDataAdmin(signal)
    await this.requireAuditLogVersion(signal)
    return this.api.getLogEntries(auditLogEndpoint(query), signal)
  }

  /** Latest message-log line the process wrote, or an empty string. */
  async getLastProcessMessageFromMessageLog(processName: string, signal?: AbortSignal): Promise<string> {
    await this.requirePreV12(signal)
    await this.users.requireOpsAdmin(signal)
    const entries = await this.api.getLogEntries(
      messageLogEndpoint({
        reverse: true,
        logger: 'TM1.Process',
        messageContains: [processName],
        top: 1,
      }),
      signal,
    )
    const message = entries[0]?.Message
    return typeof message === 'string' ? message : ''
  }

  async writeToMessageLog(
    level: TMessageLogOutputLevel | string,
    message: string,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.users.requireDataAdmin(signal)
    const outputLevel = messageLogOutputLevel(level)
    await this.runTiCode(
      `LogOutput('${outputLevel}', '${odataString(message)}');`,
      'failed to write to message log',
      signal,
    )
  }

  // ── Maintenance ───────────────────────────────────────────

  async saveData(signal?: AbortSignal): Promise<void> {
    await this.requirePreV12(signal)
    await this.users.requireDataAdmin(signal)
    await this.runTiCode('SaveDataAll;', 'SaveDataAll did not complete successfully', signal)
  }

  async deletePersistentFeeders(signal?: AbortSignal): Promise<void> {
    await this.requirePreV12(signal)
    await this.users.requireDataAdmin(signal)
    await this.runTiCode(
      'DeleteAllPersistentFeeders;',
      'DeleteAllPersistentFeeders did not complete successfully',
      signal,
    )
  }

  // ── Loggers ───────────────────────────────────────────────

  async updateMessageLoggerLevel(
    logger: string,
    level: TLoggerLevel | string,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.users.requireAdmin(signal)
    await this.api.updateLoggerLevel(logger, loggerLevelIndex(level), signal)
  }

  async getAllMessageLoggerLevels(signal?: AbortSignal): Promise<TLoggerDTO[]> {
    await this.users.requireAdmin(signal)
    return this.api.getLoggers(signal)
  }

  // ── Configuration ─────────────────────────────────────────

  async getProductVersion(signal?: AbortSignal): Promise<string> {
    return this.api.getConfigurationValue('ProductVersion', signal)
  }

  async getServerName(signal?: AbortSignal): Promise<string> {
    return this.api.getConfigurationValue('ServerName', signal)
  }

  async getStaticConfiguration(signal?: AbortSignal): Promise<TStaticConfiguration> {
    return this.api.getStaticConfiguration(signal)
  }

  async updateStaticConfiguration(
    configuration: TStaticConfiguration,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.api.updateStaticConfiguration(configuration, signal)
  }

  async startPerformanceMonitor(signal?: AbortSignal): Promise<void> {
    await this.updateStaticConfiguration({ Administration: { PerformanceMonitorOn: true } }, signal)
  }

  async stopPerformanceMonitor(signal?: AbortSignal): Promise<void> {
    await this.updateStaticConfiguration({ Administration: { PerformanceMonitorOn: false } }, signal)
  }

  async activateAuditLog(signal?: AbortSignal): Promise<void> {
    await this.updateStaticConfiguration({ Administration: { AuditLog: { Enable: true } } }, signal)
  }

  async deactivateAuditLog(signal?: AbortSignal): Promise<void> {
    await this.users.requireOpsAdmin(signal)
    await this.updateStaticConfiguration({ Administration: { AuditLog: { Enable: false } } }, signal)
  }

  // ── Helpers ───────────────────────────────────────────────

  private async runTiCode(code: string, failure: string, signal?: AbortSignal): Promise<void> {
    const execution = await this.processes.executeTiCode(code, '', signal)
    if (!execution.success) throw new TM1Error(`${failure}, status: ${execution.status}`)
  }

  private async requirePreV12(signal?: AbortSignal): Promise<void> {
    requireVersionBelow(await this.getVersion(signal), VERSION_12, DEPRECATED_IN_V12)
  }

  private async requireAuditLogVersion(signal?: AbortSignal): Promise<void> {
    requireVersionAtLeast(await this.getVersion(signal), AUDIT_LOG_MINIMUM_VERSION, 'audit log')
  }
}
