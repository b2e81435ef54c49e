import { describe, expect, it } from 'vitest'
import { ParseError } from '../../lib/errors.js'
import type { JsonObject } from '../../schema/game-record.js'
import { collectListingItems, parseEmbeddedData } from '../embedded-data.js'
import { loadHtml } from '../html.js'

function nextDataPage(payload: string, id = '__NEXT_DATA__'): string {
  return `<html><body><script id="${id}" type="application/json">${payload}</script></body></html>`
}

describe('collectListingItems', () => {
  it('collects every listing module at any depth, depth-first', () => {
    const payload: JsonObject = {
      props: {
        pageProps: {
          page: {
            modules: [
              { products: [{ title: 'A' }, { title: 'B' }] },
              { carousel: { tiles: [{ title: 'C' }] } },
            ],
            results: [{ title: 'D', items: [{ title: 'E' }] }],
          },
        },
      },
    }

    expect(collectListingItems(payload).map(item => item.title)).toEqual(['D', 'A', 'B', 'C', 'E'])
  })

  it('skips non-object entries', () => {
    expect(collectListingItems({ products: ['x', 1, null, { title: 'Kept' }] })).toEqual([
      { title: 'Kept' },
    ])
  })

  it('walks very deep payloads', () => {
    let node: JsonObject = { products: [{ title: 'Deep' }] }
    for (let i = 0; i < 20_000; i++) node = { child: node }

    expect(collectListingItems(node)).toEqual([{ title: 'Deep' }])
  })
})

describe('parseEmbeddedData', () => {
  it('reads items from the embedded script', () => {
    const $ = loadHtml(nextDataPage(JSON.stringify({ props: { items: [{ name: 'Tetris' }] } })))
    expect(parseEmbeddedData($)).toEqual([{ name: 'Tetris' }])
  })

  it('honours a custom script id', () => {
    const $ = loadHtml(nextDataPage(JSON.stringify({ tiles: [{ name: 'Zelda' }] }), 'page-state'))
    expect(parseEmbeddedData($)).toEqual([])
    expect(parseEmbeddedData($, 'page-state')).toEqual([{ name: 'Zelda' }])
  })

  it('returns nothing when the page has no embedded script', () => {
    expect(parseEmbeddedData(loadHtml('<html><body></body></html>'))).toEqual([])
  })

  it('throws ParseError for a malformed payload', () => {
    const $ = loadHtml(nextDataPage('{"props": '))
    expect(() => parseEmbeddedData($)).toThrow(ParseError)
    try {
      parseEmbeddedData($)
    } catch (err) {
      expect(err).toMatchObject({ source: 'embedded', code: 'PARSE' })
    }
  })
})
