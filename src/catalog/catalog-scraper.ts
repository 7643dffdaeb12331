export const CATALOG_CAPABILITIES = ["vision", "tools", "thinking", "embedding", "cloud"] as const

export type CatalogCapability = (typeof CATALOG_CAPABILITIES)[number]

export type CatalogEntry = {
  name: string
  description: string
  capabilities: CatalogCapability[]
  sizes: string[]
  pulls: string
  tagCount: number | null
  updatedAt: string
}

type CardChunk = {
  name: string
  html: string
}

const MODEL_LINK_PATTERN = /href\s*=\s*["']\/library\/([^"'?#\s/]+)/gi
const PARAGRAPH_PATTERN = /<p\b[^>]*>([\s\S]*?)<\/p>/gi
const CHIP_PATTERN = /<span\b[^>]*>([^<]{1,40})<\/span>/gi
const SIZE_PATTERN = /^(\d+x)?\d+(\.\d+)?[kmbt]$/i
const COUNTER_SUFFIX_PATTERN = /^\s*(pulls?|tags?|downloads?)\b/i
const PULLS_PATTERN = /(\d[\d.,]*\s?[kmb]?)\s+pulls?\b/i
const TAGS_PATTERN = /(\d[\d,]*)\s+tags?\b/i
const UPDATED_RELATIVE_PATTERN = /updated\s+(.{1,30}?\bago)\b/i
const UPDATED_DATE_PATTERN = /updated\s+([a-z]{3,9}\.?\s+\d{1,2},?\s+\d{4})/i

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
}

const isCatalogCapability = (value: string): value is CatalogCapability => {
  return CATALOG_CAPABILITIES.some((capability) => capability === value)
}

const decodeEntities = (value: string): string => {
  return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    const lower = entity.toLowerCase()
    if (lower.startsWith("#x")) {
      const codePoint = Number.parseInt(lower.slice(2), 16)
      return Number.isFinite(codePoint) && codePoint <= 0x10ffff
        ? String.fromCodePoint(codePoint)
        : match
    }

    if (lower.startsWith("#")) {
      const codePoint = Number.parseInt(lower.slice(1), 10)
      return Number.isFinite(codePoint) && codePoint <= 0x10ffff
        ? String.fromCodePoint(codePoint)
        : match
    }

    return NAMED_ENTITIES[lower] ?? match
  })
}

/** Drops markup and collapses whitespace into single spaces. */
export const htmlToText = (html: string): string => {
  return decodeEntities(html.replace(/<[^>]*>/g, " "))
    .replace(/\s+/g, " ")
    .trim()
}

const decodeModelName = (raw: string): string => {
  try {
    return decodeURIComponent(raw).trim()
  } catch {
    return raw.trim()
  }
}

/**
 * Splits the listing into one chunk per model card. Each model link starts a card;
 * consecutive links to the same model stay in the same card.
 */
const splitCards = (html: string): CardChunk[] => {
  const starts: Array<{ name: string; index: number }> = []

  for (const match of html.matchAll(MODEL_LINK_PATTERN)) {
    const name = decodeModelName(match[1] ?? "")
    const previous = starts[starts.length - 1]
    if (name.length === 0 || match.index === undefined || previous?.name === name) {
      continue
    }

    starts.push({ name, index: match.index })
  }

  return starts.map((start, position) => ({
    name: start.name,
    html: html.slice(start.index, starts[position + 1]?.index ?? html.length),
  }))
}

const extractChips = (cardHtml: string): { capabilities: CatalogCapability[]; sizes: string[] } => {
  const capabilities: CatalogCapability[] = []
  const sizes: string[] = []

  for (const match of cardHtml.matchAll(CHIP_PATTERN)) {
    const token = htmlToText(match[1] ?? "").toLowerCase()
    if (token.length === 0) {
      continue
    }

    if (isCatalogCapability(token)) {
      if (!capabilities.includes(token)) {
        capabilities.push(token)
      }
      continue
    }

    if (!SIZE_PATTERN.test(token)) {
      continue
    }

    // "20.5M Pulls" looks like a size tag; the word after the chip tells them apart.
    const chipEnd = (match.index ?? 0) + match[0].length
    const following = htmlToText(cardHtml.slice(chipEnd, chipEnd + 80))
    if (COUNTER_SUFFIX_PATTERN.test(following)) {
      continue
    }

    if (!sizes.includes(token)) {
      sizes.push(token)
    }
  }

  return { capabilities, sizes }
}

const isMetadataText = (text: string): boolean => {
  return (
    PULLS_PATTERN.test(text) ||
    TAGS_PATTERN.test(text) ||
    UPDATED_RELATIVE_PATTERN.test(text) ||
    UPDATED_DATE_PATTERN.test(text)
  )
}

/** The first paragraph with text that is not the pulls/tags/updated line. */
const findDescription = (cardHtml: string): { html: string; text: string } | null => {
  for (const match of cardHtml.matchAll(PARAGRAPH_PATTERN)) {
    const text = htmlToText(match[1] ?? "")
    if (text.length > 0 && !isMetadataText(text)) {
      return { html: match[0], text }
    }
  }

  return null
}

const parseCard = (card: CardChunk): CatalogEntry => {
  const paragraph = findDescription(card.html)
  const description = paragraph?.text ?? ""
  const metadataHtml = paragraph ? card.html.replace(paragraph.html, " ") : card.html
  const metadataText = htmlToText(metadataHtml)

  const pulls = PULLS_PATTERN.exec(metadataText)?.[1]?.replace(/\s+/g, "") ?? ""
  const tagsMatch = TAGS_PATTERN.exec(metadataText)?.[1]
  const tagCount = tagsMatch ? Number.parseInt(tagsMatch.replaceAll(",", ""), 10) : null
  const updatedAt =
    UPDATED_RELATIVE_PATTERN.exec(metadataText)?.[1] ??
    UPDATED_DATE_PATTERN.exec(metadataText)?.[1] ??
    ""

  return {
    name: card.name,
    description,
    ...extractChips(card.html),
    pulls,
    tagCount: tagCount !== null && Number.isFinite(tagCount) ? tagCount : null,
    updatedAt: updatedAt.trim(),
  }
}

/**
 * Parses a model listing page into catalog entries in document order, keeping the first
 * card for every model name. Missing fields come back empty; markup that matches nothing
 * yields an empty list.
 *
 * @param html Listing page markup.
 * @returns Deduplicated catalog entries.
 */
export const parseCatalogHtml = (html: string): CatalogEntry[] => {
  const entries: CatalogEntry[] = []
  const seen = new Set<string>()

  for (const card of splitCards(html)) {
    if (seen.has(card.name)) {
      continue
    }

    seen.add(card.name)
    entries.push(parseCard(card))
  }

  return entries
}

/**
 * Case-insensitive search over name, description, capabilities and sizes.
 */
export const filterCatalogEntries = (
  entries: readonly CatalogEntry[],
  query: string
): CatalogEntry[] => {
  const search = query.trim().toLowerCase()
  if (search.length === 0) {
    return [...entries]
  }

  return entries.filter(
    (entry) =>
      entry.name.toLowerCase().includes(search) ||
      entry.description.toLowerCase().includes(search) ||
      entry.capabilities.some((capability) => capability.includes(search)) ||
      entry.sizes.some((size) => size.includes(search))
  )
}
