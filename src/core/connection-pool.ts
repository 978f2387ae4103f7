import { Agent, type Dispatcher } from 'undici'
import type { TResolvedConfig } from './config.ts'

/** Fetch options accepted by Node's fetch, which routes the request through `dispatcher`. */
export type TDispatchInit = RequestInit & { dispatcher?: Dispatcher }

/**
 * Keep-alive pool for every connection the client opens. `connectionPoolSize`
 * caps the sockets per origin and `verifySsl: false` accepts any certificate.
 */
export function createConnectionPool(
  config: Pick<TResolvedConfig, 'connectionPoolSize' | 'verifySsl'>,
): Agent {
  return new Agent({
    connections: config.connectionPoolSize,
    connect: { rejectUnauthorized: config.verifySsl },
  })
}
