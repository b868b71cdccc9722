export type DailyBar = Readonly<{
  trade_date: string
  stock_id: string
  open: number
  high: number
  low: number
  close: number
  pct_change: number | null
  volume: number | null
  turnover: number | null
  is_limit_up: boolean
  is_limit_down: boolean
}>

export type SectorMode = 'industry' | 'themes'

export const UNKNOWN_SECTOR = 'UNKNOWN'

export type StockMeta = Readonly<{
  stock_id: string
  stock_name: string
  market: string
  sector_id: string
}>

// As it arrives from the daily report, before a sector column is picked
export type RawStockMeta = Readonly<{
  stock_id: string
  stock_name: string
  market: string
  industry?: string | null
  themes?: string | null
}>

export type RiskFlags = Readonly<{
  stock_id: string
  is_disposed: boolean | null
  is_full_margin: boolean | null
  liquidity_score: number | null
  is_blacklist: boolean | null
}>

export type MarketHistory = {
  bars: DailyBar[]
  meta: RawStockMeta[]
}
