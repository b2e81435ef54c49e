/**
 * Raw (search-API-shaped) item → CanonicalRecord.
 *
 * Items from the embedded-data and linked-data parsers are coerced into the
 * same shape first, so this is the only place field priorities live.
 */

import type { CanonicalRecord, JsonObject, JsonValue, Rating } from '../schema/game-record.js'
import { RATINGS, UNAVAILABLE, createRecord } from '../schema/game-record.js'
import type { AdapterConfig, StoreProfile } from '../schema/store-profile.js'
import { fillTemplate, localePath } from '../schema/store-profile.js'
import { dedupePlatforms, parseAmount, priceToString, stripEditionNoise } from '../lib/normalize.js'
import { absoluteUrl, firstId, firstList, firstObject, firstString, isJsonObject } from './json.js'

export type ItemSource = 'search-api' | 'embedded' | 'linked-data'

export interface NormalizeContext {
  profile: StoreProfile
  config: AdapterConfig
  /** Page or API URL the item came from; relative links resolve against it */
  baseUrl: string
  source: ItemSource
}

const BOX_ART_RX = /box|pack|cover/i
const SINGLE_IMAGE_KEYS = ['image', 'imageUrl', 'boxArt', 'heroBanner'] as const
const AMOUNT_KEYS = ['discounted', 'current', 'regular', 'amount'] as const

/** Explicit single image, else box art from an image list, else the first image */
export function pickImage(item: JsonObject): string | undefined {
  const single = firstString(item, SINGLE_IMAGE_KEYS)
  if (single) return single

  const images = firstList(item, ['images', 'keyImages'], { nonEmpty: true })
  if (!images) return undefined

  for (const img of images) {
    if (!isJsonObject(img)) continue
    const kind = firstString(img, ['type', 'purpose', 'tag']) ?? ''
    const url = firstString(img, ['url'])
    if (url && BOX_ART_RX.test(kind)) return url
  }

  const [first] = images
  if (typeof first === 'string') return first || undefined
  return isJsonObject(first) ? firstString(first, ['url']) : undefined
}

/** Explicit URL, else a product URL built from slug or native id, else the store root */
export function pickLink(item: JsonObject, ctx: NormalizeContext): string {
  const locale = localePath(ctx.config.locale)
  const explicit = firstString(item, ['productUrl', 'url', 'webUrl'])
  if (explicit) return absoluteUrl(explicit, ctx.baseUrl) ?? explicit

  const slug = firstString(item, ['slug', 'seoName']) ?? firstId(item, ['nsuid', 'id'])
  if (slug) return fillTemplate(ctx.profile.productUrl, { locale, slug })

  return fillTemplate(ctx.profile.storeRootUrl, { locale })
}

/**
 * A price flag ("Free") wins, then the source's display string; a numeric
 * amount with its currency is only formatted when there is no display string.
 */
export function pickPrice(item: JsonObject): string {
  const priceObj = firstObject(item, ['price'])

  const flag = firstString(item, ['priceFlag']) ?? (item.isFree === true ? 'Free' : undefined)
  if (flag) return flag

  const display =
    (priceObj && firstString(priceObj, ['display'])) ??
    firstString(item, ['displayPrice', 'priceDisplay']) ??
    (typeof item.price === 'string' && item.price.trim() ? item.price.trim() : undefined)
  if (display) return display

  if (!priceObj) return UNAVAILABLE
  let amount: number | null = null
  for (const key of AMOUNT_KEYS) {
    amount = parseAmount(priceObj[key])
    if (amount !== null) break
  }
  return priceToString(amount, firstString(priceObj, ['currency', 'currencyCode']))
}

function platformNames(list: JsonValue[] | undefined): Array<string | number> {
  const out: Array<string | number> = []
  for (const entry of list ?? []) {
    if (typeof entry === 'string' || typeof entry === 'number') out.push(entry)
    else if (isJsonObject(entry)) {
      const name = firstString(entry, ['name', 'label'])
      if (name) out.push(name)
    }
  }
  return out
}

function isRating(value: string): value is Rating {
  return RATINGS.some(r => r === value)
}

/**
 * Build a record, or return null when the item has no usable title.
 * Throws ValidationError when another invariant fails (e.g. a malformed URL).
 */
export function normalizeItem(item: JsonObject, ctx: NormalizeContext): CanonicalRecord | null {
  const name = stripEditionNoise(firstString(item, ['title', 'name', 'productTitle']))
  if (!name) return null

  const rawImage = pickImage(item)
  const image = absoluteUrl(rawImage, ctx.baseUrl) ?? ctx.profile.placeholderImage

  const platforms = dedupePlatforms(platformNames(firstList(item, ['platforms'])))

  const extra: JsonObject = { source: ctx.source }
  const slug = firstString(item, ['slug', 'seoName'])
  if (slug) extra.slug = slug

  const rawRating = firstString(item, ['rating'])?.toLowerCase()
  let rating: Rating | undefined
  if (rawRating && isRating(rawRating)) rating = rawRating
  else if (rawRating) extra.rating = rawRating

  return createRecord({
    store: ctx.profile.slug,
    name,
    price: pickPrice(item),
    image,
    href: pickLink(item, ctx),
    uuid: firstId(item, ['nsuid', 'id', 'productId']),
    platforms: platforms.length > 0 ? platforms : ctx.profile.defaultPlatforms,
    rating,
    type: ctx.profile.type,
    extra,
  })
}
