import { describe, expect, it } from 'vitest'
import {
  contentsEndpoint,
  contentTreeEndpoint,
  flattenContentNames,
} from '../../../../src/domains/files/files.feature.ts'

describe('files helpers', () => {
  it('addresses nested folders with escaped names', () => {
    expect(contentsEndpoint('Files', ['reports', "Q1 O'Brien"])).toBe(
      "Contents('Files')/Contents('reports')/Contents('Q1%20O''Brien')",
    )
    expect(contentsEndpoint('Blobs')).toBe("Contents('Blobs')")
  })

  it('expands one level per requested depth', () => {
    expect(contentTreeEndpoint('Blobs', 0)).toBe(
      "Contents('Blobs')?$select=ID,Name&$expand=tm1.Folder/Contents",
    )
    expect(contentTreeEndpoint('Files', 2)).toBe(
      "Contents('Files')?$select=ID,Name&$expand=tm1.Folder/Contents" +
        '($select=ID,Name;$expand=tm1.Folder/Contents($select=ID,Name;$expand=tm1.Folder/Contents))',
    )
  })

  it('flattens the tree into paths below the root', () => {
    const names = flattenContentNames({
      Name: 'Files',
      Contents: [
        { Name: 'plan.csv' },
        { Name: 'reports', Contents: [{ Name: '2025', Contents: [{ Name: 'q1.xlsx' }] }] },
      ],
    })
    expect(names).toEqual(['plan.csv', 'reports', 'reports/2025', 'reports/2025/q1.xlsx'])
  })
})
