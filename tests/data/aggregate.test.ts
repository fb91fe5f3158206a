import { describe, expect, it } from 'vitest'
import { aggregate, countMatching, matchesSelection } from '../../src/data/aggregate'
import type { RansomwareMode } from '../../src/types/kev'
import { rec, select } from '../helpers'

const scenario = Object.freeze([
  rec('2023-01-15', 'Acme', 'CWE-79', 'known'),
  rec('2023-01-20', 'Acme', 'CWE-89', ''),
  rec('2023-02-01', 'Globex', 'CWE-79', 'known')
])

const wider = Object.freeze([
  rec('2022-12-31', 'Initech', 'CWE-79,CWE-89', 'unknown'),
  rec('2023-03-02', undefined, '', 'known'),
  rec('2022-01-05', 'Acme', 'CWE-20, CWE-22', 'nan'),
  rec('2023-03-28', 'Acme', 'CWE-787', 'known'),
  ...scenario
])

describe('aggregate', () => {
  it('counts every record per month when nothing is selected', () => {
    expect(aggregate(scenario, select())).toEqual([
      { month: '2023-01', count: 2 },
      { month: '2023-02', count: 1 }
    ])
  })

  it('keeps only known ransomware use in Known mode', () => {
    expect(aggregate(scenario, select({ ransomware: 'Known' }))).toEqual([
      { month: '2023-01', count: 1 },
      { month: '2023-02', count: 1 }
    ])
  })

  it('restricts to the selected vendors', () => {
    expect(aggregate(scenario, select({ vendors: new Set(['Acme']) }))).toEqual([{ month: '2023-01', count: 2 }])
  })

  it('returns an empty series when no raw CWE text contains the fragment', () => {
    expect(aggregate(scenario, select({ cwes: new Set(['CWE-9']) }))).toEqual([])
  })

  it('combines year restriction with Unknown mode', () => {
    expect(aggregate(scenario, select({ years: new Set([2023]), ransomware: 'Unknown' }))).toEqual([
      { month: '2023-01', count: 1 }
    ])
  })

  it('matches CWE fragments as substrings of the unsplit text', () => {
    const data = [rec('2023-05-01', 'Acme', 'CWE-79,CWE-89', '')]
    expect(aggregate(data, select({ cwes: new Set(['CWE-7']) }))).toEqual([{ month: '2023-05', count: 1 }])
  })

  it('accepts a record when any one of several fragments matches', () => {
    const s = select({ cwes: new Set(['CWE-502', 'CWE-22']) })
    expect(aggregate(wider, s)).toEqual([{ month: '2022-01', count: 1 }])
  })

  it('sorts months ascending across years', () => {
    expect(aggregate(wider, select()).map((m) => m.month)).toEqual([
      '2022-01',
      '2022-12',
      '2023-01',
      '2023-02',
      '2023-03'
    ])
  })

  it('never selects records without a vendor when vendors are restricted', () => {
    const s = select({ vendors: new Set(['Acme', 'Globex']) })
    expect(countMatching(wider, s)).toBe(5)
    expect(matchesSelection(wider[1], s)).toBe(false)
  })

  it('treats every non-"known" value as Unknown', () => {
    expect(aggregate(wider, select({ ransomware: 'Unknown' }))).toEqual([
      { month: '2022-01', count: 1 },
      { month: '2022-12', count: 1 },
      { month: '2023-01', count: 1 }
    ])
  })

  it('splits the dataset between Known and Unknown without overlap', () => {
    const selections = [select(), select({ years: new Set([2023]) }), select({ vendors: new Set(['Acme']) })]
    for (const base of selections) {
      const count = (mode: RansomwareMode) => countMatching(wider, { ...base, ransomware: mode })
      expect(count('Known') + count('Unknown')).toBe(count('All'))
    }
  })

  it('sums to the number of records matching every predicate', () => {
    const s = select({ years: new Set([2022, 2023]), vendors: new Set(['Acme']), cwes: new Set(['CWE-']) })
    const series = aggregate(wider, s)
    expect(series.reduce((n, m) => n + m.count, 0)).toBe(countMatching(wider, s))
    expect(series).toEqual([
      { month: '2022-01', count: 1 },
      { month: '2023-01', count: 2 },
      { month: '2023-03', count: 1 }
    ])
  })

  it('returns nothing for an empty dataset', () => {
    expect(aggregate([], select({ ransomware: 'Known' }))).toEqual([])
  })
})
