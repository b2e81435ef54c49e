import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'
import { DomainLimiter } from '../../core/rate-limiter.js'
import { ConfigError } from '../../lib/errors.js'
import {
  createAdapter,
  getStoreProfile,
  listStores,
  loadStoreProfiles,
  registerStore,
} from '../registry.js'

const deps = { limiter: new DomainLimiter(0) }
const config = { country: 'US', locale: 'en_US' }

describe('store registry', () => {
  it('loads the bundled store profiles', () => {
    const loaded = loadStoreProfiles()

    expect(loaded.map(p => p.slug).sort()).toEqual(['nintendo', 'psn', 'steam', 'xbox'])
    expect(listStores()).toEqual(['nintendo', 'psn', 'steam', 'xbox'])
    expect(getStoreProfile('STEAM')?.capabilities.pagination).toBe(false)
    expect(getStoreProfile('nintendo')?.capabilities.returnsPartialPrice).toBe(true)
  })

  it('creates an adapter for a known store', () => {
    loadStoreProfiles()
    const adapter = createAdapter('xbox', config, deps)
    expect(adapter.store).toBe('xbox')
  })

  it('rejects an unknown store with ConfigError', () => {
    loadStoreProfiles()
    expect(() => createAdapter('gog', config, deps)).toThrow(ConfigError)
    expect(() => createAdapter('gog', config, deps)).toThrow(
      'Unknown store "gog". Available: nintendo, psn, steam, xbox'
    )
  })

  it('rejects an invalid registered profile', () => {
    expect(() =>
      registerStore({
        slug: 'steam',
        name: 'Broken',
        domain: 'store.example.com',
        placeholderImage: 'not-a-url',
        defaultPlatforms: [],
        productUrl: 'https://store.example.com/{slug}',
        storeRootUrl: 'https://store.example.com/',
      })
    ).toThrow(ConfigError)
  })

  it('reports a store.json that is not JSON', () => {
    const dir = mkdtempSync(join(tmpdir(), 'stores-'))
    try {
      mkdirSync(join(dir, 'psn'))
      writeFileSync(join(dir, 'psn', 'store.json'), '{ "slug": ')
      expect(() => loadStoreProfiles(dir)).toThrow(ConfigError)
    } finally {
      rmSync(dir, { recursive: true, force: true })
    }
  })

  it('returns nothing for a missing directory', () => {
    expect(loadStoreProfiles(join(tmpdir(), 'no-such-stores-dir'))).toEqual([])
  })
})
