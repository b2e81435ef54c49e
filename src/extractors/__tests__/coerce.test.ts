import { describe, expect, it } from 'vitest'
import { PAGE_URL } from '../../__tests__/helpers/fixtures.js'
import { coerceLinkedData, coerceTile } from '../coerce.js'

describe('coerceTile', () => {
  it('maps tile field names onto the search item shape', () => {
    const keyImages = [{ type: 'boxart', url: 'https://cdn.example.com/box.png' }]

    expect(
      coerceTile(
        {
          name: 'Tile Game',
          href: '/en-us/products/tile-game/',
          keyImages,
          price: '$9.99',
          id: 1234,
          platforms: ['Switch'],
          contentRating: 'Everyone',
        },
        PAGE_URL
      )
    ).toEqual({
      title: 'Tile Game',
      keyImages,
      productUrl: 'https://shop.example.com/en-us/products/tile-game/',
      displayPrice: '$9.99',
      nsuid: '1234',
      platforms: ['Switch'],
      rating: 'Everyone',
    })
  })

  it('keeps a structured price and reads ImageObject urls', () => {
    expect(
      coerceTile(
        {
          title: 'Object Game',
          image: { url: 'https://cdn.example.com/o.png' },
          price: { regular: 10, currency: 'USD' },
        },
        PAGE_URL
      )
    ).toEqual({
      title: 'Object Game',
      imageUrl: 'https://cdn.example.com/o.png',
      productUrl: PAGE_URL,
      price: { regular: 10, currency: 'USD' },
    })
  })

  it('leaves the link to the normalizer when the tile has a slug', () => {
    expect(coerceTile({ name: 'Slugged', slug: 'slugged' }, PAGE_URL)).toEqual({
      title: 'Slugged',
      slug: 'slugged',
    })
  })

  it('falls back to an empty title and the page URL', () => {
    expect(coerceTile({}, PAGE_URL)).toEqual({ title: '', productUrl: PAGE_URL })
  })
})

describe('coerceLinkedData', () => {
  it('maps schema.org fields onto the search item shape', () => {
    expect(
      coerceLinkedData(
        {
          '@type': 'VideoGame',
          name: 'LD Game',
          url: 'https://shop.example.com/en-us/products/ld-game/',
          image: ['https://cdn.example.com/ld.jpg'],
          offers: [{ '@type': 'Offer', price: '29.99', priceCurrency: 'USD' }],
          sku: 'SKU-1',
          gamePlatform: ['Nintendo Switch'],
          contentRating: 'Teen',
        },
        PAGE_URL
      )
    ).toEqual({
      title: 'LD Game',
      productUrl: 'https://shop.example.com/en-us/products/ld-game/',
      imageUrl: 'https://cdn.example.com/ld.jpg',
      price: { amount: '29.99', currency: 'USD' },
      nsuid: 'SKU-1',
      platforms: ['Nintendo Switch'],
      rating: 'Teen',
    })
  })

  it('reads aggregate offers and price specifications', () => {
    expect(
      coerceLinkedData({ name: 'Low', offers: { lowPrice: 5, priceCurrency: 'EUR' } }, PAGE_URL).price
    ).toEqual({ amount: 5, currency: 'EUR' })
    expect(
      coerceLinkedData(
        { name: 'Spec', offers: { priceSpecification: { price: 7.5, priceCurrency: 'GBP' } } },
        PAGE_URL
      ).price
    ).toEqual({ amount: 7.5, currency: 'GBP' })
  })

  it('wraps a single platform string', () => {
    expect(coerceLinkedData({ name: 'One', gamePlatform: 'PC' }, PAGE_URL).platforms).toEqual(['PC'])
  })
})
