import type { TActiveUserDTO } from '../../types/api.ts'

export type TUserType = 'User' | 'SecurityAdmin' | 'DataAdmin' | 'Admin' | 'OperationsAdmin'

/** The authenticated user. Properties the client does not model land in `extensions`. */
export type TActiveUser = {
  name: string
  friendlyName?: string
  type: TUserType | string
  enabled?: boolean
  groups: string[]
  isDataAdmin: boolean
  isOpsAdmin: boolean
  isSecurityAdmin: boolean
  extensions: Record<string, unknown>
}

const KNOWN_PROPERTIES = new Set([
  'Name',
  'FriendlyName',
  'Type',
  'Enabled',
  'Groups',
  'IsDataAdmin',
  'IsOpsAdmin',
  'IsSecurityAdmin',
])

function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function readGroupNames(value: unknown): string[] {
  if (!Array.isArray(value)) return []
  const names: string[] = []
  for (const group of value) {
    if (typeof group === 'object' && group !== null && 'Name' in group && typeof group.Name === 'string') {
      names.push(group.Name)
    }
  }
  return names
}

export function parseActiveUser(dto: TActiveUserDTO): TActiveUser {
  const extensions: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(dto)) {
    if (!KNOWN_PROPERTIES.has(key) && !key.startsWith('@odata.')) extensions[key] = value
  }
  return {
    name: readString(dto.Name) ?? '',
    friendlyName: readString(dto.FriendlyName),
    type: readString(dto.Type)?.trim() ?? '',
    enabled: typeof dto.Enabled === 'boolean' ? dto.Enabled : undefined,
    groups: readGroupNames(dto.Groups),
    isDataAdmin: dto.IsDataAdmin === true,
    isOpsAdmin: dto.IsOpsAdmin === true,
    isSecurityAdmin: dto.IsSecurityAdmin === true,
    extensions,
  }
}

function hasType(user: TActiveUser, ...types: TUserType[]): boolean {
  const actual = user.type.toLowerCase()
  return types.some((type) => type.toLowerCase() === actual)
}

export function isAdmin(user: TActiveUser): boolean {
  return hasType(user, 'Admin')
}

export function isDataAdmin(user: TActiveUser): boolean {
  return hasType(user, 'Admin', 'DataAdmin') || user.isDataAdmin
}

export function isOpsAdmin(user: TActiveUser): boolean {
  return hasType(user, 'Admin', 'OperationsAdmin') || user.isOpsAdmin
}

export function isSecurityAdmin(user: TActiveUser): boolean {
  return hasType(user, 'Admin', 'SecurityAdmin') || user.isSecurityAdmin
}
