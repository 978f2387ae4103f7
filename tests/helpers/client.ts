import { TM1Client, type TTM1ClientOptions } from '../../src/client/tm1.ts'
import { TEST_CONFIG } from './constants.ts'
import type { TFetchMock } from './mocks/fetch.mock.ts'

export type TCreateClientOptions = Partial<TTM1ClientOptions>

/**
 * Creates a TM1 client with test defaults and logging off.
 * All options can be overridden.
 */
export function createTestClient(overrides?: TCreateClientOptions): TM1Client {
  return new TM1Client({
    address: TEST_CONFIG.address,
    port: TEST_CONFIG.port,
    user: TEST_CONFIG.user,
    password: TEST_CONFIG.password,
    logger: null,
    ...overrides,
  })
}

/**
 * Queues the version answer and connects, so the next queued response serves
 * the first call under test. Recorded calls are cleared afterwards.
 */
export async function connectTestClient(
  fetchMock: TFetchMock,
  opts?: { version?: string; clientOverrides?: TCreateClientOptions },
): Promise<TM1Client> {
  const client = createTestClient(opts?.clientOverrides)
  fetchMock.pushVersion(opts?.version ?? TEST_CONFIG.version)
  await client.connect()
  fetchMock.calls.length = 0
  return client
}
