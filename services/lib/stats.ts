import { known, type Maybe } from './closed'

export function mean(values: readonly Maybe[]): number | null {
  const xs = values.filter(known)
  if (xs.length === 0) return null
  return xs.reduce((a, b) => a + b, 0) / xs.length
}

export function median(values: readonly Maybe[]): number | null {
  const xs = values.filter(known).sort((a, b) => a - b)
  if (xs.length === 0) return null
  const mid = Math.floor(xs.length / 2)
  return xs.length % 2 === 1 ? xs[mid] : (xs[mid - 1] + xs[mid]) / 2
}

/** Sample standard deviation (n - 1); null below two values. */
export function sampleStd(values: readonly Maybe[]): number | null {
  const xs = values.filter(known)
  if (xs.length < 2) return null
  const m = xs.reduce((a, b) => a + b, 0) / xs.length
  const ss = xs.reduce((acc, x) => acc + (x - m) * (x - m), 0)
  return Math.sqrt(ss / (xs.length - 1))
}

/**
 * z-score of every value against its peers.
 * Zero or undefined dispersion maps the whole group to 0.
 */
export function zscore(values: readonly Maybe[]): Array<number | null> {
  const m = mean(values)
  const sd = sampleStd(values)
  if (m === null || sd === null || sd === 0) return values.map(() => 0)
  return values.map(v => (known(v) ? (v - m) / sd : null))
}

/**
 * Group-wise standardize: z-scores computed within each group of `key`,
 * returned aligned with `rows`.
 */
export function standardizeBy<T>(rows: readonly T[], key: (r: T) => string, value: (r: T) => Maybe): Array<number | null> {
  const groups = new Map<string, number[]>()
  rows.forEach((r, i) => {
    const k = key(r)
    const idx = groups.get(k)
    if (idx) idx.push(i)
    else groups.set(k, [i])
  })
  const out: Array<number | null> = new Array(rows.length).fill(null)
  for (const idx of groups.values()) {
    const z = zscore(idx.map(i => value(rows[i])))
    idx.forEach((rowIdx, j) => { out[rowIdx] = z[j] })
  }
  return out
}

/** Trailing mean over exactly `window` values; null until full or when any is missing. */
export function rollingMean(values: readonly Maybe[], window: number): Array<number | null> {
  return rolling(values, window, xs => xs.reduce((a, b) => a + b, 0) / xs.length)
}

export function rollingMax(values: readonly Maybe[], window: number): Array<number | null> {
  return rolling(values, window, xs => Math.max(...xs))
}

function rolling(values: readonly Maybe[], window: number, agg: (xs: number[]) => number): Array<number | null> {
  return values.map((_, i) => {
    if (i + 1 < window) return null
    const slice = values.slice(i + 1 - window, i + 1)
    const xs = slice.filter(known)
    if (xs.length < window) return null
    return agg(xs)
  })
}

export function groupBy<T>(rows: readonly T[], key: (r: T) => string): Map<string, T[]> {
  const out = new Map<string, T[]>()
  for (const r of rows) {
    const k = key(r)
    const bucket = out.get(k)
    if (bucket) bucket.push(r)
    else out.set(k, [r])
  }
  return out
}
