import { describe, expect, it, vi } from 'vitest'
import { createKevApi, type ApiRequest, type ApiResponse } from '../../src/server/kevApi'
import { rec } from '../helpers'

const data = [
  rec('2023-01-15', 'Acme', 'CWE-79', 'known'),
  rec('2023-01-20', 'Acme', 'CWE-89', ''),
  rec('2023-02-01', 'Globex', 'CWE-79', 'known')
]

class FakeResponse implements ApiResponse {
  statusCode = 200
  headers: Record<string, string> = {}
  body = ''

  setHeader(name: string, value: string) {
    this.headers[name.toLowerCase()] = value
  }

  end(body: string) {
    this.body = body
  }

  json(): unknown {
    return JSON.parse(this.body)
  }
}

function call(req: ApiRequest) {
  const api = createKevApi(() => data)
  const res = new FakeResponse()
  const next = vi.fn()
  api({ method: 'GET', ...req }, res, next)
  return { res, next }
}

describe('createKevApi', () => {
  it('serves filter options', () => {
    const { res } = call({ url: '/api/v1/options' })
    expect(res.statusCode).toBe(200)
    expect(res.headers['content-type']).toBe('application/json')
    expect(res.headers['access-control-allow-origin']).toBe('*')
    expect(res.json()).toEqual({
      years: [2023],
      vendors: ['Acme', 'Globex'],
      cwes: ['CWE-79', 'CWE-89'],
      ransomware: ['All', 'Known', 'Unknown']
    })
  })

  it('serves the dataset summary', () => {
    const { res } = call({ url: '/api/v1/summary/' })
    expect(res.json()).toEqual({ total: 3, knownRansomware: 2, firstMonth: '2023-01', lastMonth: '2023-02' })
  })

  it('serves the filtered monthly series', () => {
    const { res } = call({ url: '/api/v1/series?vendor=Acme&ransomware=Unknown' })
    expect(res.json()).toEqual({ total: 1, series: [{ month: '2023-01', count: 1 }] })
  })

  it('prefers originalUrl when the middleware is mounted under a path', () => {
    const { res } = call({ url: '/series', originalUrl: '/api/v1/series?cwe=CWE-7' })
    expect(res.json()).toEqual({
      total: 2,
      series: [
        { month: '2023-01', count: 1 },
        { month: '2023-02', count: 1 }
      ]
    })
  })

  it('rejects an unknown ransomware mode', () => {
    const { res } = call({ url: '/api/v1/series?ransomware=sometimes' })
    expect(res.statusCode).toBe(400)
    expect(res.json()).toEqual({ error: 'invalid ransomware', allowed: ['All', 'Known', 'Unknown'] })
  })

  it('rejects a year that is not an integer instead of widening the result', () => {
    const { res } = call({ url: '/api/v1/series?year=2023&year=2O23' })
    expect(res.statusCode).toBe(400)
    expect(res.json()).toEqual({ error: 'invalid year', value: '2O23' })
  })

  it('rejects an empty year value', () => {
    const { res } = call({ url: '/api/v1/series?year=' })
    expect(res.statusCode).toBe(400)
    expect(res.json()).toEqual({ error: 'invalid year', value: '' })
  })

  it('answers 404 inside the prefix and defers outside it', () => {
    const inside = call({ url: '/api/v1/vulns' })
    expect(inside.res.statusCode).toBe(404)
    expect(inside.res.json()).toEqual({ error: 'not found' })
    expect(inside.next).not.toHaveBeenCalled()

    const outside = call({ url: '/api/v10/options' })
    expect(outside.next).toHaveBeenCalledTimes(1)
    expect(outside.res.body).toBe('')
  })

  it('only accepts GET', () => {
    const { res } = call({ url: '/api/v1/series', method: 'POST' })
    expect(res.statusCode).toBe(405)
    expect(res.json()).toEqual({ error: 'method not allowed' })
  })

  it('loads the dataset lazily', () => {
    const load = vi.fn(() => data)
    const api = createKevApi(load, '/kev')
    expect(load).not.toHaveBeenCalled()
    api({ url: '/kev/summary' }, new FakeResponse(), vi.fn())
    expect(load).toHaveBeenCalledTimes(1)
  })
})
