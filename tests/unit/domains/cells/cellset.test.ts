import { describe, expect, it } from 'vitest'
import {
  buildCellMap,
  buildCellSelect,
  buildCellsetEndpoint,
  buildSingleCellMdx,
  coordinatesToOrdinal,
  elementBinding,
  ordinalToCoordinates,
  parseUniqueElementName,
} from '../../../../src/domains/cells/cellset.ts'
import { makeCellset } from '../../../helpers/index.ts'

describe('ordinalToCoordinates', () => {
  it('treats axis 0 as the most significant digit', () => {
    expect(ordinalToCoordinates(13, [2, 3, 4])).toEqual([1, 0, 1])
    expect(ordinalToCoordinates(4, [2, 3])).toEqual([1, 1])
  })

  it('returns no coordinates without axes', () => {
    expect(ordinalToCoordinates(7, [])).toEqual([])
  })

  it('keeps every index in range and recomposes to the ordinal', () => {
    const shapes = [[1], [5], [2, 3], [3, 1, 4], [2, 2, 2, 2]]
    for (const cardinalities of shapes) {
      const total = cardinalities.reduce((product, c) => product * c, 1)
      for (let ordinal = 0; ordinal < total; ordinal++) {
        const coordinates = ordinalToCoordinates(ordinal, cardinalities)
        coordinates.forEach((index, axis) => {
          expect(index).toBeGreaterThanOrEqual(0)
          expect(index).toBeLessThan(cardinalities[axis] ?? 0)
        })
        expect(coordinatesToOrdinal(coordinates, cardinalities)).toBe(ordinal)
      }
    }
  })
})

describe('buildCellMap', () => {
  it('keys every cell by the unique names of its coordinates', () => {
    const cellset = makeCellset(
      [
        ['[Period].[Period].[Jan]', '[Period].[Period].[Feb]'],
        ['[Region].[Region].[North]', '[Region].[Region].[South]', '[Region].[Region].[West]'],
      ],
      [1, 2, 3, 4, null, 6],
    )

    const cells = buildCellMap(cellset, ['Value'])

    expect(cells.size).toBe(6)
    expect(cells.get('[Period].[Period].[Jan],[Region].[Region].[South]')).toEqual({
      Value: 2,
      Ordinal: 1,
    })
    expect(cells.get('[Period].[Period].[Feb],[Region].[Region].[South]')).toEqual({
      Value: null,
      Ordinal: 4,
    })
  })

  it('defaults the boolean properties when all are requested', () => {
    const cells = buildCellMap(makeCellset([['[d].[d].[a]']], [5]))
    expect(cells.get('[d].[d].[a]')).toEqual({
      Value: 5,
      Ordinal: 0,
      RuleDerived: false,
      Consolidated: false,
      Updateable: false,
    })
  })
})

describe('cellset queries', () => {
  it('selects only the requested boolean properties', () => {
    expect(buildCellSelect(['Value', 'consolidated'])).toBe('Value,Ordinal,FormattedValue,Consolidated')
    expect(buildCellSelect()).toBe('Value,Ordinal,FormattedValue,RuleDerived,Consolidated,Updateable')
  })

  it('expands axes and cells of a cellset', () => {
    expect(buildCellsetEndpoint('abc', ['Value'])).toBe(
      "Cellsets('abc')?$expand=Axes($expand=Tuples($expand=Members($select=Name,UniqueName,Ordinal;$top=100000);$top=100000)),Cells($select=Value,Ordinal,FormattedValue;$top=100000)",
    )
  })

  it('puts the last dimension on columns for a single cell', () => {
    expect(buildSingleCellMdx('Sales', ['2025', 'Jan]'], ['Year', 'Period'])).toBe(
      'SELECT {[Year].[Year].[2025]} ON ROWS, {[Period].[Period].[Jan]]]} ON COLUMNS FROM [Sales]',
    )
  })

  it('binds elements with escaped names', () => {
    expect(elementBinding("Cust'omer", 'A')).toBe(
      "Dimensions('Cust''omer')/Hierarchies('Cust''omer')/Elements('A')",
    )
  })
})

describe('parseUniqueElementName', () => {
  it('reads dimension, hierarchy and element', () => {
    expect(parseUniqueElementName('[Period].[Fiscal].[Q1]')).toEqual({
      dimension: 'Period',
      hierarchy: 'Fiscal',
      element: 'Q1',
    })
  })

  it('uses the dimension as hierarchy for two parts', () => {
    expect(parseUniqueElementName('[Period].[Q1]')).toEqual({
      dimension: 'Period',
      hierarchy: 'Period',
      element: 'Q1',
    })
  })
})
