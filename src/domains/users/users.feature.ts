import { PrivilegeRequiredError } from '../../core/errors.ts'
import type { TUsersApi } from './users.api.ts'
import {
  isAdmin,
  isDataAdmin,
  isOpsAdmin,
  isSecurityAdmin,
  parseActiveUser,
  type TActiveUser,
} from './active-user.ts'

export type TUsersFeatureOptions = {
  api: TUsersApi
}

/**
 * Reads the authenticated user and checks its privileges. Every check reads
 * `/ActiveUser` again, so role changes on the server take effect immediately.
 */
export class UsersFeature {
  private readonly api: TUsersApi

  constructor(options: TUsersFeatureOptions) {
    this.api = options.api
  }

  async getActiveUser(signal?: AbortSignal): Promise<TActiveUser> {
    return parseActiveUser(await this.api.getActiveUser(signal))
  }

  async isAdmin(signal?: AbortSignal): Promise<boolean> {
    return isAdmin(await this.getActiveUser(signal))
  }

  async isDataAdmin(signal?: AbortSignal): Promise<boolean> {
    return isDataAdmin(await this.getActiveUser(signal))
  }

  async isOpsAdmin(signal?: AbortSignal): Promise<boolean> {
    return isOpsAdmin(await this.getActiveUser(signal))
  }

  async isSecurityAdmin(signal?: AbortSignal): Promise<boolean> {
    return isSecurityAdmin(await this.getActiveUser(signal))
  }

  async requireAdmin(signal?: AbortSignal): Promise<void> {
    if (!(await this.isAdmin(signal))) throw new PrivilegeRequiredError('admin privileges required')
  }

  async requireDataAdmin(signal?: AbortSignal): Promise<void> {
    if (!(await this.isDataAdmin(signal))) {
      throw new PrivilegeRequiredError('data admin privileges required')
    }
  }

  async requireOpsAdmin(signal?: AbortSignal): Promise<void> {
    if (!(await this.isOpsAdmin(signal))) {
      throw new PrivilegeRequiredError('operations admin privileges required')
    }
  }

  async requireSecurityAdmin(signal?: AbortSignal): Promise<void> {
    if (!(await this.isSecurityAdmin(signal))) {
      throw new PrivilegeRequiredError('security admin privileges required')
    }
  }
}
