/**
 * Store profile schema — one stores/<slug>/store.json per storefront.
 *
 * A profile carries everything store-specific (domain, seed pages, search API
 * template, URL patterns, placeholder art); the generic listing adapter turns
 * it into endpoints for one run.
 */

import { z } from 'zod'
import { STORES } from './game-record.js'

/** Region settings for one crawl run, used verbatim in URL templates */
export interface AdapterConfig {
  readonly country: string
  readonly locale: string
}

export interface Capabilities {
  /** The search API can be paged through */
  readonly pagination: boolean
  /** Prices may come as display strings rather than numeric amounts */
  readonly returnsPartialPrice: boolean
}

/** Built once per adapter from the profile and the AdapterConfig */
export interface EndpointConfig {
  /** Template with {query} {count} {country} {locale} {page} */
  readonly searchApi: string | null
  readonly seedPages: readonly string[]
}

export const storeProfileSchema = z.object({
  slug: z.enum(STORES),
  name: z.string().min(1),
  domain: z.string().min(1),
  placeholderImage: z.string().url(),
  defaultPlatforms: z.array(z.string().min(1)).min(1),
  /** Product page pattern; {locale} and {slug} are substituted */
  productUrl: z.string().min(1),
  /** Fallback link when an item has neither URL nor id; {locale} is substituted */
  storeRootUrl: z.string().min(1),
  searchApi: z.string().url().optional(),
  /** Listing pages; {locale} and {country} are substituted */
  seedPages: z.array(z.string().min(1)).default([]),
  queryTokens: z.array(z.string().min(1)).default([...'abcdefghijklmnopqrstuvwxyz']),
  pageSize: z.number().int().positive().default(60),
  /** Per-domain spacing override for this store's host */
  rateLimitMs: z.number().int().nonnegative().optional(),
  embeddedScriptId: z.string().min(1).default('__NEXT_DATA__'),
  type: z.string().min(1).default('game'),
  capabilities: z
    .object({
      pagination: z.boolean().default(true),
      returnsPartialPrice: z.boolean().default(false),
    })
    .default({}),
})

export type StoreProfileInput = z.input<typeof storeProfileSchema>
export type StoreProfile = z.output<typeof storeProfileSchema>

/** Locale as it appears in store paths: "en_US" → "en-us" */
export function localePath(locale: string): string {
  return locale.replace(/_/g, '-').toLowerCase()
}

/** Substitute {name} placeholders; unknown names are left untouched */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) =>
    key in values ? encodeURIComponent(String(values[key])) : whole
  )
}

export function buildEndpoints(profile: StoreProfile, config: AdapterConfig): EndpointConfig {
  const region = { locale: localePath(config.locale), country: config.country.toLowerCase() }
  return Object.freeze({
    searchApi: profile.searchApi ?? null,
    seedPages: Object.freeze(profile.seedPages.map(page => fillTemplate(page, region))),
  })
}
