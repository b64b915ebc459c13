export const sizeUnits = ["B", "KB", "MB", "GB", "TB", "PB"] as const
export const durationUnits = ["ms", "s", "m", "min", "h", "d"] as const

export type SizeUnit = (typeof sizeUnits)[number]
export type DurationUnit = (typeof durationUnits)[number]
export type Unit = SizeUnit | DurationUnit

export type Dimension = "size" | "duration"

export interface Quantity {
  readonly amount: number
  readonly unit: Unit
}

const sizeFactors: Record<SizeUnit, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
  TB: 1024 ** 4,
  PB: 1024 ** 5,
}

const durationFactors: Record<DurationUnit, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  min: 60_000,
  h: 3_600_000,
  d: 86_400_000,
}

function isDurationUnit(text: string): text is DurationUnit {
  return durationUnits.some((unit) => unit === text)
}

function isSizeUnit(text: string): text is SizeUnit {
  return sizeUnits.some((unit) => unit === text)
}

/**
 * Canonical unit for `text`, or `undefined` when it names none.
 *
 * Duration units are matched exactly (`m` is minutes); size units are
 * case-insensitive and canonicalised to uppercase (`gb` is `GB`).
 */
export function canonicalUnit(text: string): Unit | undefined {
  if (isDurationUnit(text)) return text

  const upper = text.toUpperCase()

  return isSizeUnit(upper) ? upper : undefined
}

export function dimensionOf(unit: Unit): Dimension {
  return isSizeUnit(unit) ? "size" : "duration"
}

/** Amount in bytes (sizes) or milliseconds (durations) */
export function toBaseAmount(quantity: Quantity): number {
  const { amount, unit } = quantity

  return isSizeUnit(unit) ? amount * sizeFactors[unit] : amount * durationFactors[unit]
}

const AMOUNT_PRECISION = 1e6

/**
 * Writes a quantity the way {@link parseQuantity} reads it, with the amount
 * rounded to six decimals (`0.1.GB * 3` is `0.3GB`).
 *
 * @throws RangeError when the rounded amount has no such spelling: not
 * finite, exponent notation, or a non-zero amount rounded to zero.
 */
export function formatQuantity(quantity: Quantity): string {
  const amount = Math.round(quantity.amount * AMOUNT_PRECISION) / AMOUNT_PRECISION
  const text = String(amount)

  if (!Number.isFinite(amount) || text.includes("e") || (amount === 0 && quantity.amount !== 0)) {
    throw new RangeError(`Quantity ${quantity.amount} ${quantity.unit} cannot be written`)
  }

  return `${text}${quantity.unit}`
}

const QUANTITY_PATTERN = /^\s*(\d+(?:\.\d+)?)\s*\.?\s*([A-Za-z]+)\s*$/

/**
 * Parses quantity text in any of the accepted spellings.
 *
 * @example parseQuantity("4.GB") // { amount: 4, unit: "GB" }
 * @example parseQuantity("30 min") // { amount: 30, unit: "min" }
 * @throws RangeError on anything else, negative amounts included.
 */
export function parseQuantity(text: string): Quantity {
  const match = QUANTITY_PATTERN.exec(text)
  const unit = match?.[2] === undefined ? undefined : canonicalUnit(match[2])

  if (!match?.[1] || !unit) {
    throw new RangeError(`Invalid quantity: '${text}'`)
  }

  return { amount: Number(match[1]), unit }
}

function parseDimension(text: string, dimension: Dimension): number {
  const quantity = parseQuantity(text)

  if (dimensionOf(quantity.unit) !== dimension) {
    throw new RangeError(`Expected a ${dimension} but got '${text}'`)
  }

  return toBaseAmount(quantity)
}

/**
 * Size in bytes, 1024 based.
 *
 * @example parseSize("4 GB") // 4294967296
 */
export function parseSize(text: string): number {
  return Math.round(parseDimension(text, "size"))
}

/**
 * Duration in milliseconds.
 *
 * @example parseDuration("1.5h") // 5400000
 */
export function parseDuration(text: string): number {
  return parseDimension(text, "duration")
}
