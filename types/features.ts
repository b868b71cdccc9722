import type { DailyBar } from './market'

export type DailyFeatures = Readonly<{
  trade_date: string
  stock_id: string
  ma_5: number | null
  ma_10: number | null
  ma_20: number | null
  vol_20d_avg: number | null
  vol_ratio_20d: number | null
  high_20d: number | null
  is_20d_high: boolean | null
  distance_to_20d_high: number | null
  pos_in_day: number | null
}>

export type SectorDailyAggregate = Readonly<{
  trade_date: string
  sector_id: string
  num_stocks: number
  avg_pct_change: number | null
  median_pct_change: number | null
  up_ratio: number
  num_up_3: number
  sector_mtm: number | null
  sector_mtm_z: number | null
}>

export type StrongSector = Readonly<{
  sector_id: string
  sector_score: number
  avg_pct_change: number | null
  avg_pct_change_z: number | null
  up_ratio: number
  sector_mtm_z: number | null
}>

// One eligible stock on the evaluation date, joined with its features and sector
export type StockDayRow = Readonly<DailyBar & Omit<DailyFeatures, 'trade_date' | 'stock_id'> & {
  sector_id: string
}>

// StockDayRow inside a strong sector, with sector-relative z-scores attached
export type SectorPeerRow = Readonly<StockDayRow & {
  sector_score: number
  pct_change_z: number | null
  vol_ratio_z: number | null
}>

export type LeaderPick = Readonly<{
  sector_id: string
  stock_id: string
  score_leader: number
  rank: number
  via: 'strict' | 'top_pct' | 'full_sector'
}>

export type FollowerPick = Readonly<{
  row: SectorPeerRow
  score_follow: number
}>
