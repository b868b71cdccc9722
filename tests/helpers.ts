import type { DailyBar, StockMeta } from '../types/market'
import type { PickerConfig, PickerConfigInput } from '../types/config'
import type { SectorPeerRow } from '../types/features'
import { loadPickerConfig } from '../services/config/picker_config'

export function day(n: number): string {
  return `2024-01-${String(n).padStart(2, '0')}`
}

export function bar(stockId: string, tradeDate: string, over: Partial<DailyBar> = {}): DailyBar {
  return {
    trade_date: tradeDate,
    stock_id: stockId,
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    pct_change: 0,
    volume: 1000,
    turnover: 1_000_000,
    is_limit_up: false,
    is_limit_down: false,
    ...over,
  }
}

/** Flat history for days 1..days-1, then `last` on the final day. */
export function series(stockId: string, days: number, last: Partial<DailyBar>): DailyBar[] {
  const out: DailyBar[] = []
  for (let d = 1; d < days; d++) out.push(bar(stockId, day(d)))
  out.push(bar(stockId, day(days), last))
  return out
}

export function meta(stockId: string, sectorId: string): StockMeta {
  return { stock_id: stockId, stock_name: `Name ${stockId}`, market: 'TWSE', sector_id: sectorId }
}

export function baseConfigInput(): PickerConfigInput {
  return {
    sector_mode: 'industry',
    universe: { min_turnover: 0, min_price: 1 },
    sector: {
      mtm_lookback: 3,
      thresh_avg_pct: 3,
      thresh_up_ratio: 0.6,
      thresh_mtm_z: 1,
      weights: { avg_pct_change_z: 0.4, sector_mtm_z: 0.4, up_ratio: 0.2 },
    },
    leader: {
      thresh_leader_pct: 7,
      thresh_leader_vol_ratio: 2,
      thresh_leader_pos: 0.8,
      top_n_per_sector: 2,
      weights: { pct_change_z: 0.5, vol_ratio_z: 0.3, pos_in_day: 0.2 },
    },
    follower: {
      pct_change_min: 2,
      pct_change_max: 6,
      vol_ratio_min: 1.2,
      vol_ratio_max: 2,
      thresh_dist_20d_high: 0.05,
      weights: { pct_change_z: 0.4, vol_ratio_z: 0.2, one_minus_dist_20d_high: 0.2, pos_in_day: 0.2 },
    },
    total_score_weights: { score_sector: 0.3, score_leader: 0.2, score_follow: 0.5 },
    position_sizing: {
      capital: 10_000_000,
      risk_per_trade: 0.01,
      max_position_pct: 0.1,
      stop_buffer_pct: 0.01,
      lot_size: 1000,
    },
    fallback: { mode: 'strict' },
  }
}

export function testConfig(edit?: (c: PickerConfigInput) => void): PickerConfig {
  const c = baseConfigInput()
  if (edit) edit(c)
  return loadPickerConfig(c)
}

/**
 * Three sectors of ten stocks over 21 days, flat until the last day.
 * Sector A on the last day: A0 breaks out (+9%), A1-A3 follow (+4, +3, +5),
 * A4-A8 drift +2% on flat volume, A9 slips -1%. Sector B is flat, C is -1%.
 */
export function threeSectorMarket(): { history: DailyBar[]; meta: StockMeta[] } {
  const D = 21
  const history: DailyBar[] = []
  const metas: StockMeta[] = []
  const add = (id: string, sector: string, last: Partial<DailyBar>) => {
    history.push(...series(id, D, last))
    metas.push(meta(id, sector))
  }
  add('A0', 'A', { close: 109, high: 109, low: 100, pct_change: 9, volume: 2500 })
  add('A1', 'A', { close: 104, high: 105, low: 100, pct_change: 4, volume: 1500 })
  add('A2', 'A', { close: 103, high: 104, low: 100, pct_change: 3, volume: 1800 })
  add('A3', 'A', { close: 105, high: 106, low: 101, pct_change: 5, volume: 1300 })
  for (const id of ['A4', 'A5', 'A6', 'A7', 'A8']) add(id, 'A', { close: 102, high: 102, low: 100, pct_change: 2 })
  add('A9', 'A', { close: 99, high: 100, low: 98, pct_change: -1 })
  for (let i = 0; i < 10; i++) add(`B${i}`, 'B', { close: 100, high: 101, low: 99, pct_change: 0 })
  for (let i = 0; i < 10; i++) add(`C${i}`, 'C', { close: 99, high: 100, low: 98, pct_change: -1 })
  return { history, meta: metas }
}

export function peer(stockId: string, sectorId: string, over: Partial<SectorPeerRow> = {}): SectorPeerRow {
  return {
    ...bar(stockId, day(21)),
    sector_id: sectorId,
    ma_5: 100,
    ma_10: 100,
    ma_20: 100,
    vol_20d_avg: 1000,
    vol_ratio_20d: 1,
    high_20d: 110,
    is_20d_high: false,
    distance_to_20d_high: 0.1,
    pos_in_day: 0.5,
    sector_score: 1,
    pct_change_z: 0,
    vol_ratio_z: 0,
    ...over,
  }
}
