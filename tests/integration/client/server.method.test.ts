import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { PrivilegeRequiredError, TM1Error, VersionUnsupportedError } from '../../../src/core/errors.ts'
import {
  connectTestClient,
  installFetchMock,
  makeActiveUserDTO,
  TEST_CONFIG,
  type TFetchMock,
} from '../../helpers/index.ts'

const BASE = TEST_CONFIG.baseUrl

describe('TM1Client.server', () => {
  let fetchMock: TFetchMock

  beforeEach(() => {
    fetchMock = installFetchMock()
  })

  afterEach(() => {
    fetchMock.restore()
  })

  describe('writeToMessageLog', () => {
    it('checks privileges, then runs LogOutput with the message quoted', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson(makeActiveUserDTO({ Type: 'Admin' }))
      fetchMock.pushJson({ ProcessExecuteStatusCode: 'CompletedSuccessfully' })

      await client.server.writeToMessageLog('info', "it's done")

      expect(fetchMock.calls.map(({ method, url }) => `${method} ${url}`)).toEqual([
        `GET ${BASE}ActiveUser?$expand=Groups`,
        `POST ${BASE}ExecuteProcessWithReturn?$expand=*`,
      ])
      expect(JSON.parse(fetchMock.bodyOf(1))).toEqual({
        Process: {
          Name: '',
          PrologProcedure: "LogOutput('INFO', 'it''s done');",
          Parameters: [],
          Variables: [],
        },
      })
    })

    it('rejects an unknown level before running anything', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson(makeActiveUserDTO({ Type: 'Admin' }))

      await expect(client.server.writeToMessageLog('loud', 'x')).rejects.toThrow('invalid message level: loud')
      expect(fetchMock.calls).toHaveLength(1)
    })
  })

  describe('saveData', () => {
    it('requires data admin privileges', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson(makeActiveUserDTO({ Type: 'User' }))

      const promise = client.server.saveData()

      await expect(promise).rejects.toBeInstanceOf(PrivilegeRequiredError)
      await expect(promise).rejects.toThrow('data admin privileges required')
    })

    it('is unavailable on v12', async () => {
      const client = await connectTestClient(fetchMock, { version: TEST_CONFIG.v12Version })

      const promise = client.server.saveData()

      await expect(promise).rejects.toBeInstanceOf(VersionUnsupportedError)
      await expect(promise).rejects.toThrow('operation is deprecated and unavailable in TM1 version 12.0.0+')
      expect(fetchMock.calls).toHaveLength(0)
    })

    it('reports an unsuccessful run', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson(makeActiveUserDTO({ Type: 'DataAdmin' }))
      fetchMock.pushJson({ ProcessExecuteStatusCode: 'Aborted' })

      const promise = client.server.saveData()

      await expect(promise).rejects.toBeInstanceOf(TM1Error)
      await expect(promise).rejects.toThrow('SaveDataAll did not complete successfully, status: Aborted')
    })
  })

  describe('deletePersistentFeeders', () => {
    it('is unavailable on v12', async () => {
      const client = await connectTestClient(fetchMock, { version: TEST_CONFIG.v12Version })

      const promise = client.server.deletePersistentFeeders()

      await expect(promise).rejects.toBeInstanceOf(VersionUnsupportedError)
      await expect(promise).rejects.toThrow('operation is deprecated and unavailable in TM1 version 12.0.0+')
      expect(fetchMock.calls).toHaveLength(0)
    })

    it('runs DeleteAllPersistentFeeders for a data admin', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson(makeActiveUserDTO({ Type: 'Admin' }))
      fetchMock.pushJson({ ProcessExecuteStatusCode: 'CompletedSuccessfully' })

      await client.server.deletePersistentFeeders()

      expect(JSON.parse(fetchMock.bodyOf(1))).toEqual({
        Process: {
          Name: '',
          PrologProcedure: 'DeleteAllPersistentFeeders;',
          Parameters: [],
          Variables: [],
        },
      })
    })
  })

  describe('log tails', () => {
    it('refuses a delta request before initialization', async () => {
      const client = await connectTestClient(fetchMock)

      await expect(client.server.executeDeltaRequest('message')).rejects.toThrow(
        'message delta request not initialized',
      )
    })

    it('follows the delta links', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson({ value: [], '@odata.deltaLink': "TailMessageLog()?$deltatoken='t1'" })
      fetchMock.pushJson({
        value: [{ Message: 'first' }],
        '@odata.deltaLink': "http://localhost:8010/api/v1/TailMessageLog()?$deltatoken='t2'",
      })
      fetchMock.pushJson({ value: [] })

      await client.server.initializeDeltaRequests('message')
      const entries = await client.server.executeDeltaRequest('message')
      await client.server.executeDeltaRequest('message')

      expect(entries).toEqual([{ Message: 'first' }])
      expect(fetchMock.calls.map(({ url }) => url)).toEqual([
        `${BASE}TailMessageLog()`,
        `${BASE}TailMessageLog()?$deltatoken=%27t1%27`,
        `${BASE}TailMessageLog()?$deltatoken=%27t2%27`,
      ])
    })

    it('needs 11.6 for the audit log', async () => {
      const client = await connectTestClient(fetchMock, { version: '11.5.0' })

      await expect(client.server.initializeDeltaRequests('audit')).rejects.toThrow(
        'audit log requires TM1 version >= 11.6, current version: 11.5.0',
      )
    })
  })

  describe('log queries', () => {
    it('reads the latest message of a process', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson(makeActiveUserDTO({ Type: 'OperationsAdmin' }))
      fetchMock.pushJson({ value: [{ Message: 'load finished' }] })

      const message = await client.server.getLastProcessMessageFromMessageLog('load')

      expect(message).toBe('load finished')
      const url = new URL(fetchMock.calls[1]?.url ?? '')
      expect(url.pathname).toBe('/api/v1/MessageLogEntries')
      expect(url.searchParams.get('$orderby')).toBe('TimeStamp desc')
      expect(url.searchParams.get('$filter')).toBe(
        "Logger eq 'TM1.Process' and (contains(toupper(Message),toupper('load')))",
      )
      expect(url.searchParams.get('$top')).toBe('1')
    })

    it('returns an empty string when nothing was logged', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson(makeActiveUserDTO({ Type: 'Admin' }))
      fetchMock.pushJson({ value: [] })

      await expect(client.server.getLastProcessMessageFromMessageLog('load')).resolves.toBe('')
    })
  })

  describe('configuration', () => {
    it('reads the product version without quotes', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson('11.8.01300.1')

      await expect(client.server.getProductVersion()).resolves.toBe('11.8.01300.1')
      expect(fetchMock.calls[0]?.url).toBe(`${BASE}Configuration/ProductVersion/$value`)
    })

    it('sets a logger level by its index', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson(makeActiveUserDTO({ Type: 'Admin' }))
      fetchMock.push({ status: 204 })

      await client.server.updateMessageLoggerLevel('TM1.Server', 'debug')

      expect(fetchMock.calls[1]).toMatchObject({ method: 'PATCH', url: `${BASE}Loggers('TM1.Server')` })
      expect(JSON.parse(fetchMock.bodyOf(1))).toEqual({ Level: 4 })
    })

    it('turns the audit log on through the static configuration', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.push({ status: 204 })

      await client.server.activateAuditLog()

      expect(fetchMock.calls[0]).toMatchObject({ method: 'PATCH', url: `${BASE}StaticConfiguration` })
      expect(JSON.parse(fetchMock.bodyOf(0))).toEqual({ Administration: { AuditLog: { Enable: true } } })
    })
  })
})
