import { mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  PAGE_URL,
  PLACEHOLDER,
  htmlResponse,
  jsonResponse,
  linkedDataScript,
  page,
  testConfig,
  testProfile,
} from '../../__tests__/helpers/fixtures.js'
import { DomainLimiter } from '../../core/rate-limiter.js'
import { runStore } from '../../core/runner.js'
import type { CanonicalRecord } from '../../schema/game-record.js'
import type { StoreProfile } from '../../schema/store-profile.js'
import { createListingAdapter, type ListingAdapterDeps } from '../listing-adapter.js'
import type { StoreAdapter } from '../types.js'

const SEED_TEMPLATE = 'https://shop.example.com/{locale}/store/games'

type FetchImpl = (input: string | URL | Request, init?: RequestInit) => Promise<Response>

function stubFetch(impl: FetchImpl) {
  const fetchMock = vi.fn(impl)
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

function adapterFor(profile: StoreProfile, deps: Partial<ListingAdapterDeps> = {}) {
  return createListingAdapter(profile, testConfig, {
    limiter: new DomainLimiter(0),
    seedPageDelayMs: 0,
    pageDelayMs: 0,
    queryDelayMs: 0,
    ...deps,
  })
}

async function drain(adapter: StoreAdapter): Promise<CanonicalRecord[]> {
  const records: CanonicalRecord[] = []
  await adapter.open()
  try {
    for await (const record of adapter.iterGames()) records.push(record)
  } finally {
    await adapter.close()
  }
  return records
}

afterEach(() => {
  vi.unstubAllGlobals()
})

describe('createListingAdapter', () => {
  it('turns a linked-data listing into a written catalog entry', async () => {
    stubFetch(async () =>
      htmlResponse(
        page(
          linkedDataScript({
            '@context': 'https://schema.org',
            '@type': 'VideoGame',
            name: 'Super Game™: Deluxe Edition',
            offers: { '@type': 'Offer', price: '29.99', priceCurrency: 'USD' },
          })
        )
      )
    )
    const adapter = adapterFor(testProfile({ seedPages: [SEED_TEMPLATE] }))
    const outDir = mkdtempSync(join(tmpdir(), 'listing-adapter-'))

    try {
      const result = await runStore(adapter, outDir)
      expect(result.itemCount).toBe(1)

      const bucket = JSON.parse(readFileSync(join(outDir, 'nintendo', 's.json'), 'utf-8'))
      expect(bucket).toEqual([
        {
          name: 'Super Game',
          type: 'game',
          price: '$29.99',
          image: PLACEHOLDER,
          href: PAGE_URL,
          platforms: ['Switch'],
        },
      ])
    } finally {
      rmSync(outDir, { recursive: true, force: true })
    }
  })

  it('still yields linked-data records when the embedded payload is malformed', async () => {
    stubFetch(async () =>
      htmlResponse(
        page(
          '<script id="__NEXT_DATA__" type="application/json">{"props": {</script>',
          linkedDataScript({ '@type': 'VideoGame', name: 'Alpha' }),
          linkedDataScript({
            '@type': 'Product',
            name: 'Beta',
            image: 'https://cdn.example.com/beta.png',
          })
        )
      )
    )

    const records = await drain(adapterFor(testProfile({ seedPages: [SEED_TEMPLATE] })))

    expect(records.map(r => [r.name, r.image, r.extra.source])).toEqual([
      ['Alpha', PLACEHOLDER, 'linked-data'],
      ['Beta', 'https://cdn.example.com/beta.png', 'linked-data'],
    ])
  })

  it('runs the search API before the seed pages', async () => {
    const fetchMock = stubFetch(async input => {
      const url = String(input)
      if (url.startsWith('https://api.example.com/')) {
        return jsonResponse({ products: [{ title: 'From API', nsuid: 'p-1', price: { regular: 9.99, currency: 'USD' } }] })
      }
      return htmlResponse(
        page(
          `<script id="__NEXT_DATA__" type="application/json">${JSON.stringify({
            props: { tiles: [{ name: 'From Page', slug: 'from-page' }] },
          })}</script>`
        )
      )
    })
    const profile = testProfile({
      searchApi: 'https://api.example.com/search?q={query}&n={count}&p={page}',
      queryTokens: ['a'],
      pageSize: 10,
      seedPages: [SEED_TEMPLATE],
      capabilities: { pagination: true, returnsPartialPrice: false },
    })

    const records = await drain(adapterFor(profile))

    expect(fetchMock.mock.calls.map(([input]) => String(input))).toEqual([
      'https://api.example.com/search?q=a&n=10&p=0',
      PAGE_URL,
    ])
    expect(records.map(r => [r.name, r.href, r.price, r.extra.source])).toEqual([
      ['From API', 'https://shop.example.com/en-us/products/p-1/', '$9.99', 'search-api'],
      ['From Page', 'https://shop.example.com/en-us/products/from-page/', 'Unavailable', 'embedded'],
    ])
  })

  it('skips items that fail validation and keeps going', async () => {
    stubFetch(async () =>
      jsonResponse({
        products: [{ title: 'Broken', productUrl: 'http://' }, { title: '™' }, { title: 'Fine' }],
      })
    )
    const profile = testProfile({
      searchApi: 'https://api.example.com/search?q={query}',
      queryTokens: ['a'],
      pageSize: 10,
    })

    const records = await drain(adapterFor(profile))

    expect(records.map(r => r.name)).toEqual(['Fine'])
  })

  it('sends the configured headers', async () => {
    const fetchMock = stubFetch(async () => htmlResponse(page()))

    await drain(
      adapterFor(testProfile({ seedPages: [SEED_TEMPLATE] }), { userAgent: 'test-agent' })
    )

    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
      'User-Agent': 'test-agent',
      'Accept-Language': 'en_US',
      Accept: 'text/html',
    })
  })

  it('registers the profile rate limit with the shared limiter', () => {
    const limiter = new DomainLimiter(2000)
    adapterFor(testProfile({ rateLimitMs: 500 }), { limiter })
    expect(limiter.getInterval('shop.example.com')).toBe(500)
  })

  it('refuses to iterate before open()', async () => {
    const adapter = adapterFor(testProfile())
    await expect(adapter.iterGames()[Symbol.asyncIterator]().next()).rejects.toThrow(
      'nintendo adapter used before open()'
    )
  })
})
