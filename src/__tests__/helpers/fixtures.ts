import { createRecord, type CanonicalRecord, type GameRecordInput } from '../../schema/game-record.js'
import {
  storeProfileSchema,
  type AdapterConfig,
  type StoreProfile,
  type StoreProfileInput,
} from '../../schema/store-profile.js'

export const PLACEHOLDER = 'https://shop.example.com/img/placeholder.svg'
export const PAGE_URL = 'https://shop.example.com/en-us/store/games'

export const testConfig: AdapterConfig = { country: 'US', locale: 'en_US' }

export function testProfile(overrides: Partial<StoreProfileInput> = {}): StoreProfile {
  return storeProfileSchema.parse({
    slug: 'nintendo',
    name: 'Test Shop',
    domain: 'shop.example.com',
    placeholderImage: PLACEHOLDER,
    defaultPlatforms: ['Switch'],
    productUrl: 'https://shop.example.com/{locale}/products/{slug}/',
    storeRootUrl: 'https://shop.example.com/{locale}/',
    seedPages: [],
    capabilities: { pagination: true, returnsPartialPrice: true },
    ...overrides,
  })
}

export function makeRecord(overrides: Partial<GameRecordInput> = {}): CanonicalRecord {
  return createRecord({
    store: 'nintendo',
    name: 'Tetris',
    price: '$4.99',
    image: 'https://cdn.example.com/tetris.png',
    href: 'https://shop.example.com/en-us/products/tetris/',
    platforms: ['Switch'],
    type: 'game',
    ...overrides,
  })
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json; charset=utf-8' },
  })
}

export function htmlResponse(html: string, status = 200): Response {
  return new Response(html, {
    status,
    headers: { 'content-type': 'text/html; charset=utf-8' },
  })
}

export function linkedDataScript(value: unknown): string {
  return `<script type="application/ld+json">${JSON.stringify(value)}</script>`
}

export function page(...scripts: string[]): string {
  return `<!DOCTYPE html><html><head><title>Games</title>${scripts.join('\n')}</head><body></body></html>`
}
