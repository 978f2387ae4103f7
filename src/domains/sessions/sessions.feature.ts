import { PrivilegeRequiredError } from '../../core/errors.ts'
import { sameObjectName } from '../../core/utils.ts'
import type { TSession, TThread } from '../../types/api.ts'
import { isAdmin } from '../users/active-user.ts'
import type { UsersFeature } from '../users/users.feature.ts'
import type { TSessionExpand, TSessionsApi } from './sessions.api.ts'

export type TSessionsFeatureOptions = {
  api: TSessionsApi
  users: UsersFeature
}

const LIST_THREADS_FUNCTION = 'GET /ActiveSession/Threads'

function isSession(value: unknown): value is TSession {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && 'ID' in value
}

/** Server sessions: listing, the caller's own session and closing other users' sessions. */
export class SessionsFeature {
  private readonly api: TSessionsApi
  private readonly users: UsersFeature

  constructor(options: TSessionsFeatureOptions) {
    this.api = options.api
    this.users = options.users
  }

  async getAll(
    options: { includeUser?: boolean; includeThreads?: boolean; signal?: AbortSignal } = {},
  ): Promise<TSession[]> {
    const expand: TSessionExpand[] = []
    if (options.includeUser) expand.push('User')
    if (options.includeThreads) expand.push('Threads')
    return this.api.getAll(expand, options.signal)
  }

  /** The session this client runs in. Some servers wrap it in `value`. */
  async getCurrent(signal?: AbortSignal): Promise<TSession> {
    const response = await this.api.getActive(signal)
    return isSession(response.value) ? response.value : response
  }

  /** Threads of the current session, without the request that lists them. */
  async getThreadsForCurrent(
    options: { excludeIdle?: boolean; signal?: AbortSignal } = {},
  ): Promise<TThread[]> {
    let filter = `Function ne '${LIST_THREADS_FUNCTION}'`
    if (options.excludeIdle) filter += " and State ne 'Idle'"
    return this.api.getActiveThreads(filter, options.signal)
  }

  async close(sessionId: string | number, signal?: AbortSignal): Promise<void> {
    await this.api.close(String(sessionId), signal)
  }

  /**
   * Closes the sessions of every other user and returns them. Sessions without
   * a user and those of the current user stay open. Requires admin.
   */
  async closeAll(signal?: AbortSignal): Promise<TSession[]> {
    const currentUser = await this.users.getActiveUser(signal)
    if (!isAdmin(currentUser)) throw new PrivilegeRequiredError('admin privileges required')

    const sessions = await this.getAll({ includeUser: true, includeThreads: true, signal })
    const closed: TSession[] = []
    for (const session of sessions) {
      const userName = session.User?.Name
      if (typeof userName !== 'string' || sameObjectName(userName, currentUser.name)) continue
      await this.close(session.ID, signal)
      closed.push(session)
    }
    return closed
  }
}
