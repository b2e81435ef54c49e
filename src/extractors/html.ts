import * as cheerio from 'cheerio'

export type HtmlDocument = cheerio.CheerioAPI

export function loadHtml(payload: string): HtmlDocument {
  return cheerio.load(payload)
}

/** Raw contents of every <script> whose attribute matches (case-insensitive) */
export function scriptContents($: HtmlDocument, attr: string, value: string): string[] {
  const wanted = value.toLowerCase()
  const out: string[] = []
  $('script').each((_, el) => {
    const actual = $(el).attr(attr)?.trim().toLowerCase()
    if (actual === wanted) out.push($(el).html() ?? '')
  })
  return out
}
