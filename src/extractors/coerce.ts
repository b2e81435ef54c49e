/**
 * Coercion of scraped items onto the search-API field surface.
 *
 * Tiles from embedded page state and schema.org entities name their fields
 * differently (title/name/productTitle, url/href/productUrl, nested offers…).
 * Both are rewritten here into the shape the search API returns, so one
 * normalizer handles every source.
 */

import type { JsonObject, JsonValue } from '../schema/game-record.js'
import { absoluteUrl, firstId, firstList, firstObject, firstString, isJsonObject } from './json.js'

const TITLE_KEYS = ['title', 'name', 'productTitle'] as const
const LINK_KEYS = ['url', 'href', 'productUrl'] as const
const ID_KEYS = ['nsuid', 'id', 'productId'] as const

/** A single image field may be a plain URL or an ImageObject */
function imageUrl(value: JsonValue | undefined): string | undefined {
  if (typeof value === 'string' && value.trim()) return value.trim()
  if (isJsonObject(value)) return firstString(value, ['url', 'contentUrl', 'src'])
  if (Array.isArray(value)) {
    for (const entry of value) {
      const url = imageUrl(entry)
      if (url) return url
    }
  }
  return undefined
}

/** Heterogeneous listing tile → search-API-like item */
export function coerceTile(tile: JsonObject, baseUrl: string): JsonObject {
  const guess: JsonObject = {
    title: firstString(tile, TITLE_KEYS) ?? '',
  }

  const single = imageUrl(tile.imageUrl) ?? imageUrl(tile.image)
  if (single) {
    guess.imageUrl = single
  } else {
    const images = firstList(tile, ['images', 'keyImages'], { nonEmpty: true })
    if (images) guess.keyImages = images
  }

  const id = firstId(tile, ID_KEYS)
  if (id) guess.nsuid = id
  const slug = firstString(tile, ['slug', 'seoName'])
  if (slug) guess.slug = slug

  // No link, slug or id: fall back to the listing page
  const link = absoluteUrl(firstString(tile, LINK_KEYS), baseUrl)
  if (link) guess.productUrl = link
  else if (!slug && !id) guess.productUrl = baseUrl

  const price = tile.price ?? tile.displayPrice ?? tile.priceDisplay
  if (isJsonObject(price)) guess.price = price
  else if (typeof price === 'string') guess.displayPrice = price

  const platforms = firstList(tile, ['platforms'], { nonEmpty: true })
  if (platforms) guess.platforms = platforms

  const rating = firstString(tile, ['rating', 'contentRating'])
  if (rating) guess.rating = rating

  return guess
}

/** schema.org Product/VideoGame → search-API-like item */
export function coerceLinkedData(entity: JsonObject, baseUrl: string): JsonObject {
  const guess: JsonObject = {
    title: firstString(entity, ['name']) ?? '',
    productUrl: absoluteUrl(firstString(entity, ['url']), baseUrl) ?? baseUrl,
  }

  const image = imageUrl(entity.image)
  if (image) guess.imageUrl = image

  const offers = Array.isArray(entity.offers) ? entity.offers[0] : entity.offers
  if (isJsonObject(offers)) {
    const spec = firstObject(offers, ['priceSpecification'])
    const amount = offers.price ?? offers.lowPrice ?? spec?.price ?? null
    const currency = offers.priceCurrency ?? spec?.priceCurrency ?? null
    guess.price = { amount, currency }
  }

  const id = firstId(entity, ['sku', 'productID', 'mpn'])
  if (id) guess.nsuid = id

  const platform = entity.gamePlatform
  if (typeof platform === 'string' && platform.trim()) guess.platforms = [platform]
  else if (Array.isArray(platform) && platform.length > 0) guess.platforms = platform

  const rating = firstString(entity, ['contentRating'])
  if (rating) guess.rating = rating

  return guess
}
