import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { HTTPError, ValidationError } from '../../../src/core/errors.ts'
import {
  connectTestClient,
  installFetchMock,
  makeCellset,
  TEST_CONFIG,
  type TFetchMock,
} from '../../helpers/index.ts'

const BASE = TEST_CONFIG.baseUrl

describe('TM1Client.cells', () => {
  let fetchMock: TFetchMock

  beforeEach(() => {
    fetchMock = installFetchMock()
  })

  afterEach(() => {
    fetchMock.restore()
  })

  describe('executeMdx', () => {
    it('creates, reads and deletes the cellset', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson({ ID: 'cs1' })
      fetchMock.pushJson(makeCellset([['[Period].[Jan]', '[Period].[Feb]'], ['[Year].[2025]']], [10, null]))
      fetchMock.push({ status: 204 })

      const cells = await client.cells.executeMdx('SELECT {[Period].[Jan],[Period].[Feb]} ON 0 FROM [Sales]')

      expect([...cells.keys()]).toEqual(['[Period].[Jan],[Year].[2025]', '[Period].[Feb],[Year].[2025]'])
      expect(cells.get('[Period].[Jan],[Year].[2025]')?.Value).toBe(10)
      expect(cells.get('[Period].[Feb],[Year].[2025]')?.Value).toBeNull()

      expect(fetchMock.calls[0]).toMatchObject({ method: 'POST', url: `${BASE}ExecuteMDX` })
      expect(JSON.parse(fetchMock.bodyOf(0))).toEqual({
        MDX: 'SELECT {[Period].[Jan],[Period].[Feb]} ON 0 FROM [Sales]',
      })
      expect(fetchMock.calls[1]?.url.startsWith(`${BASE}Cellsets('cs1')?$expand=`)).toBe(true)
      expect(fetchMock.calls[2]).toMatchObject({ method: 'DELETE', url: `${BASE}Cellsets('cs1')` })
    })

    it('still deletes the cellset when reading it fails', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson({ ID: 'cs1' })
      fetchMock.pushText('boom', { status: 500 })
      fetchMock.push({ status: 204 })

      const promise = client.cells.executeMdx('SELECT {[Period].[Jan]} ON 0 FROM [Sales]')

      await expect(promise).rejects.toBeInstanceOf(HTTPError)
      await expect(promise).rejects.toThrow(/^extract cellset: tm1 api GET /)
      expect(fetchMock.calls).toHaveLength(3)
      expect(fetchMock.calls[2]).toMatchObject({ method: 'DELETE', url: `${BASE}Cellsets('cs1')` })
    })

    it('ignores a failed cleanup after a successful read', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson({ ID: 'cs1' })
      fetchMock.pushJson(makeCellset([['[Period].[Jan]']], [5]))
      fetchMock.pushText('gone', { status: 500 })

      const cells = await client.cells.executeMdx('SELECT {[Period].[Jan]} ON 0 FROM [Sales]')

      expect(cells.get('[Period].[Jan]')?.Value).toBe(5)
    })

    it('passes the sandbox on every request', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson({ ID: 'cs1' })
      fetchMock.pushJson(makeCellset([['[Period].[Jan]']], [5]))
      fetchMock.push({ status: 204 })

      await client.cells.executeMdx('SELECT {[Period].[Jan]} ON 0 FROM [Sales]', { sandbox: 'Plan A' })

      expect(fetchMock.calls[0]?.url).toBe(`${BASE}ExecuteMDX?!sandbox=Plan%20A`)
      expect(fetchMock.calls[1]?.url.endsWith('&!sandbox=Plan%20A')).toBe(true)
      expect(fetchMock.calls[2]?.url).toBe(`${BASE}Cellsets('cs1')?!sandbox=Plan%20A`)
    })
  })

  describe('getValue', () => {
    it('reads a single cell through MDX', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson({ ID: 'cs2' })
      fetchMock.pushJson(makeCellset([['[Period].[Period].[Jan]'], ['[Year].[Year].[2025]']], [42]))
      fetchMock.push({ status: 204 })

      const value = await client.cells.getValue('Sales', ['2025', 'Jan'], { dimensions: ['Year', 'Period'] })

      expect(value).toBe(42)
      expect(JSON.parse(fetchMock.bodyOf(0))).toEqual({
        MDX: 'SELECT {[Year].[Year].[2025]} ON ROWS, {[Period].[Period].[Jan]} ON COLUMNS FROM [Sales]',
      })
    })
  })

  describe('writeValues', () => {
    it('looks up dimensions without the sandbox dimension and writes each cell', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson({ value: [{ Name: 'Year' }, { Name: 'Period' }, { Name: 'Sandboxes' }] })
      fetchMock.push({ status: 204 })
      fetchMock.push({ status: 204 })

      await client.cells.writeValues('Sales', { '2025, Jan': 10, '2025,Feb': 20 })

      expect(fetchMock.calls.map(({ method, url }) => `${method} ${url}`)).toEqual([
        `GET ${BASE}Cubes('Sales')/Dimensions?$select=Name`,
        `POST ${BASE}Cubes('Sales')/tm1.Update`,
        `POST ${BASE}Cubes('Sales')/tm1.Update`,
      ])
      expect(JSON.parse(fetchMock.bodyOf(1))).toEqual({
        'Tuple@odata.bind': [
          "Dimensions('Year')/Hierarchies('Year')/Elements('2025')",
          "Dimensions('Period')/Hierarchies('Period')/Elements('Jan')",
        ],
        Value: 10,
      })
      expect(JSON.parse(fetchMock.bodyOf(2))).toMatchObject({ Value: 20 })
    })

    it('validates every key before writing', async () => {
      const client = await connectTestClient(fetchMock)

      const promise = client.cells.writeValues(
        'Sales',
        { '2025,Jan': 1, '2025': 2 },
        { dimensions: ['Year', 'Period'] },
      )

      await expect(promise).rejects.toBeInstanceOf(ValidationError)
      await expect(promise).rejects.toThrow('elements count (1) must match dimensions count (2)')
      expect(fetchMock.calls).toHaveLength(0)
    })
  })

  describe('equalSpread', () => {
    it('spreads through a temporary cellset', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson({ ID: 'cs3' })
      fetchMock.push({ status: 204 })
      fetchMock.push({ status: 204 })

      await client.cells.equalSpread('Sales', 100, ['[Year].[2025]', '[Period].[Jan]'])

      expect(JSON.parse(fetchMock.bodyOf(0))).toEqual({
        MDX: 'SELECT {[Year].[2025]}*{[Period].[Jan]} ON 0 FROM [Sales]',
      })
      expect(fetchMock.calls[1]).toMatchObject({ method: 'POST', url: `${BASE}Cellsets('cs3')/tm1.Update` })
      expect(JSON.parse(fetchMock.bodyOf(1))).toEqual({
        BeginOrdinal: 0,
        Value: 'S100',
        'ReferenceCell@odata.bind': [
          "Dimensions('Year')/Hierarchies('Year')/Elements('2025')",
          "Dimensions('Period')/Hierarchies('Period')/Elements('Jan')",
        ],
      })
      expect(fetchMock.calls[2]).toMatchObject({ method: 'DELETE', url: `${BASE}Cellsets('cs3')` })
    })

    it('escapes closing brackets in the cube name', async () => {
      const client = await connectTestClient(fetchMock)
      fetchMock.pushJson({ ID: 'cs4' })
      fetchMock.push({ status: 204 })
      fetchMock.push({ status: 204 })

      await client.cells.clearSpread('Plan [v2]', ['[Year].[2025]'])

      expect(JSON.parse(fetchMock.bodyOf(0))).toEqual({
        MDX: 'SELECT {[Year].[2025]} ON 0 FROM [Plan [v2]]]',
      })
    })
  })
})
