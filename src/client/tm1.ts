import { createConnectionPool } from '../core/connection-pool.ts'
import { resolveConfig, type TConnectionConfig, type TResolvedConfig } from '../core/config.ts'
import { ConfigurationError } from '../core/errors.ts'
import { logger as defaultLogger, silentLogger, type TLogger } from '../core/logger.ts'
import { Transport } from '../core/transport.ts'
import type { TAuthProvider, TVersionProvider } from '../core/types.ts'
import { BatchApi } from '../domains/batch/batch.api.ts'
import { BatchFeature } from '../domains/batch/batch.feature.ts'
import { CellsApi } from '../domains/cells/cells.api.ts'
import { CellsFeature } from '../domains/cells/cells.feature.ts'
import { ChoresApi } from '../domains/chores/chores.api.ts'
import { ChoresFeature } from '../domains/chores/chores.feature.ts'
import { CubesApi } from '../domains/cubes/cubes.api.ts'
import { CubesFeature } from '../domains/cubes/cubes.feature.ts'
import { FilesApi } from '../domains/files/files.api.ts'
import { FilesFeature } from '../domains/files/files.feature.ts'
import { JobsApi } from '../domains/jobs/jobs.api.ts'
import { JobsFeature } from '../domains/jobs/jobs.feature.ts'
import { ProcessesApi } from '../domains/processes/processes.api.ts'
import { ProcessesFeature } from '../domains/processes/processes.feature.ts'
import { SessionsApi } from '../domains/sessions/sessions.api.ts'
import { SessionsFeature } from '../domains/sessions/sessions.feature.ts'
import { ServerApi } from '../domains/server/server.api.ts'
import { ServerFeature } from '../domains/server/server.feature.ts'
import { ThreadsApi } from '../domains/threads/threads.api.ts'
import { ThreadsFeature } from '../domains/threads/threads.feature.ts'
import type { TActiveUser } from '../domains/users/active-user.ts'
import { UsersApi } from '../domains/users/users.api.ts'
import { UsersFeature } from '../domains/users/users.feature.ts'
import { createAuthProvider, selectAuthMode, type TAuthMode } from '../providers/auth/auth-mode.ts'
import { DEFAULT_SESSION_COOKIE_NAME } from '../providers/auth/session-cookie-auth.ts'
import { resolveServiceRoot, type TServiceRoot } from '../providers/endpoint/service-root.ts'

const V12_SESSION_COOKIE_NAME = 'paSession'

export type TTM1ClientOptions = TConnectionConfig & {
  /** Replaces the provider derived from the credentials. `null` is rejected. */
  authProvider?: TAuthProvider | null
  /** `null` turns logging off. */
  logger?: TLogger | null
  /** Used for every request, including IAM token exchange. Defaults to the global fetch. */
  fetchImplementation?: typeof fetch
}

/**
 * Client for the TM1 REST API.
 *
 * @example
 * ```typescript
 * const tm1 = new TM1Client({ address: 'localhost', port: 8010, user: 'admin', password: 'apple' })
 *
 * const cells = await tm1.cells.executeMdx('SELECT {[Period].[Jan]} ON 0 FROM [Sales]')
 * await tm1.close()
 * ```
 */
export class TM1Client {
  protected readonly config: TResolvedConfig
  protected readonly serviceRoot: TServiceRoot
  protected readonly authMode: TAuthMode
  /** Raw REST access: typed requests, the async protocol and the session. */
  public readonly transport: Transport
  protected readonly logger: TLogger

  public readonly cells: CellsFeature
  public readonly chores: ChoresFeature
  public readonly cubes: CubesFeature
  public readonly files: FilesFeature
  public readonly jobs: JobsFeature
  public readonly threads: ThreadsFeature
  public readonly server: ServerFeature
  public readonly sessions: SessionsFeature
  public readonly processes: ProcessesFeature
  public readonly users: UsersFeature
  public readonly batch: BatchFeature

  constructor(options: TTM1ClientOptions) {
    const { authProvider, logger, fetchImplementation, ...connection } = options
    if (authProvider === null) throw new ConfigurationError('auth provider cannot be null')

    this.logger = logger === null ? silentLogger : (logger ?? defaultLogger)
    this.config = resolveConfig(connection)
    this.serviceRoot = resolveServiceRoot(this.config)
    this.authMode = authProvider ? { kind: 'custom' } : selectAuthMode(this.config)

    if (!this.config.verifySsl) {
      this.logger.warn('TLS certificate verification is disabled')
    }

    const sessionCookieName =
      this.serviceRoot.topology === 'legacy' ? DEFAULT_SESSION_COOKIE_NAME : V12_SESSION_COOKIE_NAME

    const connectionPool = createConnectionPool(this.config)
    this.transport = new Transport({
      config: this.config,
      serviceRoot: this.serviceRoot,
      authMode: this.authMode,
      authProvider:
        authProvider ??
        createAuthProvider(this.authMode, {
          sessionCookieName,
          fetchImplementation,
          dispatcher: connectionPool,
        }),
      logger: this.logger,
      fetchImplementation,
      connectionPool,
    })

    const transport = this.transport
    const getVersion: TVersionProvider = (signal) => transport.getVersion(signal)

    this.users = new UsersFeature({ api: new UsersApi({ transport }) })
    this.processes = new ProcessesFeature({ api: new ProcessesApi({ transport }) })
    this.cells = new CellsFeature({ api: new CellsApi({ transport }), logger: this.logger })
    this.chores = new ChoresFeature({ api: new ChoresApi({ transport }), logger: this.logger })
    this.cubes = new CubesFeature({
      api: new CubesApi({ transport }),
      processes: this.processes,
      users: this.users,
      getVersion,
    })
    this.files = new FilesFeature({ api: new FilesApi({ transport }), getVersion })
    this.jobs = new JobsFeature({ api: new JobsApi({ transport }), getVersion })
    this.threads = new ThreadsFeature({ api: new ThreadsApi({ transport }), getVersion })
    this.server = new ServerFeature({
      api: new ServerApi({ transport }),
      processes: this.processes,
      users: this.users,
      getVersion,
    })
    this.sessions = new SessionsFeature({ api: new SessionsApi({ transport }), users: this.users })
    this.batch = new BatchFeature({ api: new BatchApi({ transport }), getVersion })
  }

  /** Service root every relative endpoint resolves against. */
  get baseUrl(): string {
    return this.serviceRoot.baseUrl
  }

  get isConnected(): boolean {
    return this.transport.isConnected
  }

  /**
   * Opens the server session and reads the server version. Other calls connect
   * on first use, so calling this is optional.
   */
  public async connect(signal?: AbortSignal): Promise<string> {
    return this.transport.connect(signal)
  }

  public async version(signal?: AbortSignal): Promise<string> {
    return this.transport.getVersion(signal)
  }

  /** Current session cookie value, for handing the session to another client. */
  public sessionId(): string {
    return this.transport.sessionId()
  }

  public async whoAmI(signal?: AbortSignal): Promise<TActiveUser> {
    return this.users.getActiveUser(signal)
  }

  public async logout(signal?: AbortSignal): Promise<void> {
    await this.transport.logout(signal)
  }

  /** Logs out unless `keepAlive` is set. Never throws. */
  public async close(): Promise<void> {
    await this.transport.close()
  }
}
