import { VersionUnsupportedError } from './errors.ts'

export const VERSION_12 = '12.0.0'

function parseSegments(version: string): number[] {
  return version
    .trim()
    .split('.')
    .map((segment) => {
      const parsed = Number.parseInt(segment, 10)
      return Number.isNaN(parsed) ? 0 : parsed
    })
}

/** Orders dotted versions numerically. Missing segments count as zero. */
export function compareVersions(left: string, right: string): -1 | 0 | 1 {
  const a = parseSegments(left)
  const b = parseSegments(right)
  const length = Math.max(a.length, b.length)
  for (let index = 0; index < length; index++) {
    const x = a[index] ?? 0
    const y = b[index] ?? 0
    if (x > y) return 1
    if (x < y) return -1
  }
  return 0
}

export function isVersionAtLeast(version: string, minimum: string): boolean {
  if (!version.trim()) return false
  return compareVersions(version, minimum) >= 0
}

export function majorVersion(version: string): number {
  if (!version.trim()) return 0
  return parseSegments(version)[0] ?? 0
}

export function isV12(version: string): boolean {
  return isVersionAtLeast(version, VERSION_12)
}

/** Throws unless the version is known and at least `minimum`. */
export function requireVersionAtLeast(version: string, minimum: string, feature?: string): void {
  if (!version.trim()) {
    throw new VersionUnsupportedError('TM1 server version is unknown', version)
  }
  if (compareVersions(version, minimum) < 0) {
    const subject = feature ?? 'operation'
    throw new VersionUnsupportedError(
      `${subject} requires TM1 version >= ${minimum}, current version: ${version}`,
      version,
    )
  }
}

/** Throws when the version is known and at least `maximum`. Unknown versions pass. */
export function requireVersionBelow(version: string, maximum: string, message: string): void {
  if (isVersionAtLeast(version, maximum)) {
    throw new VersionUnsupportedError(message, version)
  }
}
