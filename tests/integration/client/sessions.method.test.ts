import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { PrivilegeRequiredError } from '../../../src/core/errors.ts'
import {
  connectTestClient,
  installFetchMock,
  makeActiveUserDTO,
  TEST_CONFIG,
  type TFetchMock,
} from '../../helpers/index.ts'

const BASE = TEST_CONFIG.baseUrl

describe('TM1Client.sessions', () => {
  let fetchMock: TFetchMock

  beforeEach(() => {
    fetchMock = installFetchMock()
  })

  afterEach(() => {
    fetchMock.restore()
  })

  describe('getAll', () => {
    it('expands users and threads on request', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson({ value: [{ ID: 1, User: { Name: 'admin' }, Threads: [] }] })
      fetchMock.pushJson({ value: [] })

      const sessions = await client.sessions.getAll({ includeUser: true, includeThreads: true })
      await client.sessions.getAll()

      expect(sessions).toEqual([{ ID: 1, User: { Name: 'admin' }, Threads: [] }])
      expect(fetchMock.calls.map(({ url }) => url)).toEqual([
        `${BASE}Sessions?$expand=User,Threads`,
        `${BASE}Sessions`,
      ])
    })
  })

  describe('getCurrent', () => {
    it('unwraps a session answered inside value', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson({ value: { ID: 9, Context: 'tm1-client' } })
      fetchMock.pushJson({ ID: 9, Context: 'tm1-client' })

      await expect(client.sessions.getCurrent()).resolves.toEqual({ ID: 9, Context: 'tm1-client' })
      await expect(client.sessions.getCurrent()).resolves.toEqual({ ID: 9, Context: 'tm1-client' })
      expect(fetchMock.calls[0]?.url).toBe(`${BASE}ActiveSession`)
    })
  })

  describe('getThreadsForCurrent', () => {
    it('leaves out its own request and, on request, idle threads', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson({ value: [{ ID: 5, State: 'Run' }] })

      const threads = await client.sessions.getThreadsForCurrent({ excludeIdle: true })

      expect(threads).toEqual([{ ID: 5, State: 'Run' }])
      const url = new URL(fetchMock.calls[0]?.url ?? '')
      expect(url.pathname).toBe('/api/v1/ActiveSession/Threads')
      expect(url.searchParams.get('$filter')).toBe(
        "Function ne 'GET /ActiveSession/Threads' and State ne 'Idle'",
      )
    })
  })

  describe('close', () => {
    it('closes a session by ID', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.push({ status: 204 })

      await client.sessions.close(42)

      expect(fetchMock.calls[0]).toMatchObject({ method: 'POST', url: `${BASE}Sessions('42')/tm1.Close` })
    })
  })

  describe('closeAll', () => {
    it("closes other users' sessions and keeps the caller's", async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson(makeActiveUserDTO({ Name: 'admin', Type: 'Admin' }))
      fetchMock.pushJson({
        value: [{ ID: 1, User: { Name: 'AD MIN' } }, { ID: 2, User: { Name: 'bob' } }, { ID: 3 }],
      })
      fetchMock.push({ status: 204 })

      const closed = await client.sessions.closeAll()

      expect(closed).toEqual([{ ID: 2, User: { Name: 'bob' } }])
      expect(fetchMock.calls.map(({ method, url }) => `${method} ${url}`)).toEqual([
        `GET ${BASE}ActiveUser?$expand=Groups`,
        `GET ${BASE}Sessions?$expand=User,Threads`,
        `POST ${BASE}Sessions('2')/tm1.Close`,
      ])
    })

    it('requires admin privileges', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson(makeActiveUserDTO({ Name: 'bob', Type: 'User' }))

      const promise = client.sessions.closeAll()

      await expect(promise).rejects.toBeInstanceOf(PrivilegeRequiredError)
      await expect(promise).rejects.toThrow('admin privileges required')
      expect(fetchMock.calls).toHaveLength(1)
    })
  })
})
