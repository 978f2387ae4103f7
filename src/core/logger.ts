const PREFIX = '[tm1-client]'

export type TLogger = {
  debug(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

function isDebugEnabled(): boolean {
  const flag = process.env.TM1_CLIENT_DEBUG
  return flag === 'true' || flag === '1'
}

export const logger: TLogger = {
  debug(message: string, ...args: unknown[]): void {
    if (isDebugEnabled()) console.debug(PREFIX, message, ...args)
  },

  warn(message: string, ...args: unknown[]): void {
    console.warn(PREFIX, message, ...args)
  },

  error(message: string, ...args: unknown[]): void {
    console.error(PREFIX, message, ...args)
  },
}

export const silentLogger: TLogger = {
  debug(): void {},
  warn(): void {},
  error(): void {},
}
