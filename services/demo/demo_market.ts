import type { DailyBar, MarketHistory, RawStockMeta } from '../../types/market'

export type DemoMarketOptions = {
  asof: string
  num_stocks: number
  num_sectors: number
  history_days: number
  seed: number
}

export const DEMO_DEFAULTS: Omit<DemoMarketOptions, 'asof'> = {
  num_stocks: 220,
  num_sectors: 12,
  history_days: 40,
  seed: 7,
}

type Rng = {
  next: () => number
  uniform: (lo: number, hi: number) => number
  normal: (mu: number, sigma: number) => number
  pick: <T>(items: readonly T[]) => T
}

// mulberry32
export function createRng(seed: number): Rng {
  let s = seed >>> 0
  const next = () => {
    s = (s + 0x6d2b79f5) >>> 0
    let t = s
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
  const uniform = (lo: number, hi: number) => lo + (hi - lo) * next()
  const normal = (mu: number, sigma: number) => {
    const u = Math.max(next(), Number.EPSILON)
    const v = next()
    return mu + sigma * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v)
  }
  const pick = <T>(items: readonly T[]): T => items[Math.min(items.length - 1, Math.floor(next() * items.length))]
  return { next, uniform, normal, pick }
}

/** The `count` weekdays ending at `asof` (inclusive when it is a weekday), ascending. */
export function businessDaysEnding(asof: string, count: number): string[] {
  const out: string[] = []
  const d = new Date(`${asof}T00:00:00Z`)
  if (Number.isNaN(d.getTime())) throw new RangeError(`invalid asof date: ${asof}`)
  while (out.length < count) {
    const dow = d.getUTCDay()
    if (dow !== 0 && dow !== 6) out.push(d.toISOString().slice(0, 10))
    d.setUTCDate(d.getUTCDate() - 1)
  }
  return out.reverse()
}

/**
 * Random-walk market where every sector carries its own daily drift, so some
 * sectors trend together on any given day. Same seed, same market.
 */
export function makeDemoMarket(opts: DemoMarketOptions): MarketHistory {
  const rng = createRng(opts.seed)
  const stockIds = Array.from({ length: opts.num_stocks }, (_, i) => String(1000 + i))
  const sectorIds = Array.from({ length: opts.num_sectors }, (_, j) => `S${String(j).padStart(2, '0')}`)
  const sectorOf = stockIds.map(() => rng.pick(sectorIds))

  const meta: RawStockMeta[] = stockIds.map((id, i) => ({
    stock_id: id,
    stock_name: `Stock${id}`,
    market: rng.next() < 0.7 ? 'TWSE' : 'TPEX',
    industry: sectorOf[i],
    themes: sectorOf[i],
  }))

  const dates = businessDaysEnding(opts.asof, opts.history_days)
  const basePrice = stockIds.map(() => rng.uniform(18, 220))
  const baseTurnover = stockIds.map(() => rng.uniform(1.5e7, 2.5e8))
  const drift = new Map(sectorIds.map(s => [s, dates.map(() => rng.normal(0.001, 0.02))]))

  const bars: DailyBar[] = []
  const lastClose = basePrice.slice()
  dates.forEach((date, t) => {
    stockIds.forEach((id, i) => {
      const ret = (drift.get(sectorOf[i])?.[t] ?? 0) + rng.normal(0, 0.025)
      const prevClose = lastClose[i]
      const close = Math.max(2, prevClose * (1 + ret))
      const open = close * (1 + rng.normal(0, 0.01))
      const high = Math.max(open, close) * (1 + Math.abs(rng.normal(0, 0.01)))
      const low = Math.min(open, close) * (1 - Math.abs(rng.normal(0, 0.01)))
      const volume = Math.floor(rng.uniform(2000, 80000) * (1 + Math.abs(ret) * 10))
      const turnover = baseTurnover[i] * (0.4 + Math.abs(ret) * 8) * rng.uniform(0.7, 1.3)
      bars.push({
        trade_date: date,
        stock_id: id,
        open,
        high,
        low,
        close,
        pct_change: (close / prevClose - 1) * 100,
        volume,
        turnover,
        is_limit_up: false,
        is_limit_down: false,
      })
      lastClose[i] = close
    })
  })

  return { bars, meta }
}
