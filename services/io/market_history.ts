import Ajv from 'ajv'
import addFormats from 'ajv-formats'
import { promises as fs } from 'node:fs'
import path from 'node:path'
import rowSchema from '../../schemas/market_day.schema.json'
import themesSchema from '../../schemas/themes_mapping.schema.json'
import type { DailyBar, MarketHistory, RawStockMeta, SectorMode, StockMeta } from '../../types/market'
import { UNKNOWN_SECTOR } from '../../types/market'
import { MarketDataError, formatAjvError } from '../lib/errors'

export type MarketDayRow = DailyBar & {
  stock_name?: string
  market?: string
  industry?: string | null
}

export type ThemeMappingRow = { stock_id: string; themes: string | null }

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true })
addFormats(ajv)
const validateRow = ajv.compile<MarketDayRow>(rowSchema)
const validateThemes = ajv.compile<ThemeMappingRow[]>(themesSchema)

const FILE_RE = /^market_(\d{4}-\d{2}-\d{2})\.json$/

export function dateFromMarketFile(name: string): string | null {
  const m = FILE_RE.exec(name)
  return m ? m[1] : null
}

async function readJson(file: string): Promise<unknown> {
  const text = await fs.readFile(file, 'utf8')
  try {
    return JSON.parse(text)
  } catch (e) {
    throw new MarketDataError(`not_json:${e instanceof Error ? e.message : String(e)}`, file)
  }
}

/** Keeps the rows that match the daily report schema and have a sane range; the rest are logged and dropped. */
export function parseMarketDay(raw: unknown, file: string): MarketDayRow[] {
  if (!Array.isArray(raw)) throw new MarketDataError('market_day_not_array', file)
  const rows: MarketDayRow[] = []
  let dropped = 0
  raw.forEach((r: unknown, i) => {
    if (!validateRow(r)) {
      dropped += 1
      console.warn('[LOADER] invalid row', { file, index: i, errors: (validateRow.errors ?? []).slice(0, 3).map(formatAjvError) })
      return
    }
    if (r.high < r.low) {
      dropped += 1
      console.warn('[LOADER] high below low', { file, index: i, stock_id: r.stock_id })
      return
    }
    rows.push(r)
  })
  if (dropped > 0) console.warn('[LOADER] dropped rows', { file, dropped, kept: rows.length })
  return rows
}

function toBar(r: MarketDayRow): DailyBar {
  return {
    trade_date: r.trade_date,
    stock_id: r.stock_id,
    open: r.open,
    high: r.high,
    low: r.low,
    close: r.close,
    pct_change: r.pct_change,
    volume: r.volume,
    turnover: r.turnover,
    is_limit_up: r.is_limit_up,
    is_limit_down: r.is_limit_down,
  }
}

/**
 * Reads `market_YYYY-MM-DD.json` snapshots up to `endDate`, newest
 * `historyDays` of them. Stock metadata comes from the latest file.
 */
export async function loadMarketHistory(dir: string, endDate: string, historyDays: number): Promise<MarketHistory> {
  const abs = path.resolve(process.cwd(), dir)
  let names: string[]
  try {
    names = await fs.readdir(abs)
  } catch (e) {
    throw new MarketDataError(`market_dir_unreadable:${e instanceof Error ? e.message : String(e)}`, abs)
  }
  const dated = names
    .map(name => ({ name, date: dateFromMarketFile(name) }))
    .filter((d): d is { name: string; date: string } => d.date !== null && d.date <= endDate)
    .sort((a, b) => a.date.localeCompare(b.date))
    .slice(-historyDays)
  if (dated.length === 0) throw new MarketDataError(`no_market_files_until:${endDate}`, abs)

  const bars: DailyBar[] = []
  let latest: MarketDayRow[] = []
  for (const d of dated) {
    const file = path.join(abs, d.name)
    const rows = parseMarketDay(await readJson(file), file)
    bars.push(...rows.map(toBar))
    latest = rows
  }

  const seen = new Set<string>()
  const meta: RawStockMeta[] = []
  for (const r of latest) {
    if (seen.has(r.stock_id)) continue
    seen.add(r.stock_id)
    meta.push({ stock_id: r.stock_id, stock_name: r.stock_name ?? '', market: r.market ?? '', industry: r.industry ?? null })
  }
  return { bars, meta }
}

/** First `;`-separated theme per stock. */
export function parseThemesMapping(raw: unknown, file: string): Map<string, string> {
  if (!validateThemes(raw)) {
    throw new MarketDataError(`themes_mapping_invalid:${(validateThemes.errors ?? []).slice(0, 3).map(formatAjvError).join('; ')}`, file)
  }
  const out = new Map<string, string>()
  for (const r of raw) {
    const first = (r.themes ?? '').split(';')[0].trim()
    out.set(r.stock_id.trim(), first || UNKNOWN_SECTOR)
  }
  return out
}

export async function loadThemesMapping(file: string): Promise<Map<string, string>> {
  const abs = path.resolve(process.cwd(), file)
  return parseThemesMapping(await readJson(abs), abs)
}

export function resolveStockMeta(raw: readonly RawStockMeta[], mode: SectorMode, themes?: ReadonlyMap<string, string> | null): StockMeta[] {
  return raw.map(m => {
    const picked = mode === 'themes' ? (themes?.get(m.stock_id) ?? m.themes) : m.industry
    const sector = (picked ?? '').trim()
    return {
      stock_id: m.stock_id,
      stock_name: m.stock_name,
      market: m.market,
      sector_id: sector || UNKNOWN_SECTOR,
    }
  })
}

export async function writeCandidates(outDir: string, tradeDate: string, payload: unknown): Promise<string> {
  const abs = path.resolve(process.cwd(), outDir)
  await fs.mkdir(abs, { recursive: true })
  const file = path.join(abs, `candidates_${tradeDate}.json`)
  await fs.writeFile(file, `${JSON.stringify(payload, null, 2)}\n`, 'utf8')
  return file
}
