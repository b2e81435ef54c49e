/**
 * Store registry — maps store slugs to their profiles.
 *
 * Profiles live in stores/<slug>/store.json and are loaded on demand;
 * tests and embedders can register profiles directly.
 */

import { existsSync, readFileSync, readdirSync } from 'node:fs'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { ConfigError } from '../lib/errors.js'
import type { AdapterConfig, StoreProfile, StoreProfileInput } from '../schema/store-profile.js'
import { storeProfileSchema } from '../schema/store-profile.js'
import { createListingAdapter, type ListingAdapterDeps } from './listing-adapter.js'
import type { StoreAdapter } from './types.js'

export const STORES_DIR = fileURLToPath(new URL('../../stores/', import.meta.url))

const profiles = new Map<string, StoreProfile>()

export function registerStore(input: StoreProfileInput): StoreProfile {
  const parsed = storeProfileSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new ConfigError(`Invalid store profile: ${issues}`)
  }
  profiles.set(parsed.data.slug, parsed.data)
  return parsed.data
}

/** Read and register every stores/<slug>/store.json */
export function loadStoreProfiles(dir: string = STORES_DIR): StoreProfile[] {
  if (!existsSync(dir)) return []

  const loaded: StoreProfile[] = []
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue
    const profilePath = join(dir, entry.name, 'store.json')
    if (!existsSync(profilePath)) continue

    let raw: unknown
    try {
      raw = JSON.parse(readFileSync(profilePath, 'utf-8'))
    } catch (err) {
      throw new ConfigError(`Failed to parse ${profilePath}`, { cause: err })
    }
    const parsed = storeProfileSchema.safeParse(raw)
    if (!parsed.success) {
      throw new ConfigError(`Invalid store profile ${profilePath}: ${parsed.error.message}`)
    }
    profiles.set(parsed.data.slug, parsed.data)
    loaded.push(parsed.data)
  }
  return loaded
}

export function getStoreProfile(slug: string): StoreProfile | null {
  return profiles.get(slug.toLowerCase()) ?? null
}

export function listStores(): string[] {
  return [...profiles.keys()].sort()
}

/** Build an adapter for a registered store; unknown slugs are a ConfigError */
export function createAdapter(
  slug: string,
  config: AdapterConfig,
  deps: ListingAdapterDeps
): StoreAdapter {
  const profile = getStoreProfile(slug)
  if (!profile) {
    throw new ConfigError(
      `Unknown store "${slug}". Available: ${listStores().join(', ') || 'none'}`
    )
  }
  return createListingAdapter(profile, config, deps)
}
