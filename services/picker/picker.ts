import type { DailyBar, RiskFlags, StockMeta } from '../../types/market'
import { UNKNOWN_SECTOR } from '../../types/market'
import type { DailyFeatures, SectorDailyAggregate, SectorPeerRow, StockDayRow, StrongSector } from '../../types/features'
import type { CandidateRow, FallbackTier, PickerResult } from '../../types/candidates'
import { emptyCandidateTable } from '../../types/candidates'
import type { PickerConfig } from '../../types/config'
import { computeDailyFeatures, featureKey, indexFeatures } from '../features/daily_features'
import { computeSectorDaily } from '../sector/sector_daily'
import { selectStrongSectors } from '../sector/strong_sectors'
import { applyUniverseFilter } from '../universe/universe_filter'
import { bestLeaderBySector, selectLeaders } from '../signals/leader_selector'
import { pairFollowers, selectFollowers } from '../signals/follower_selector'
import { sizePosition, suggestStop } from '../sizing/position_sizer'
import { standardizeBy } from '../lib/stats'

export type PickerInput = {
  history: readonly DailyBar[]
  meta: readonly StockMeta[]
  riskFlags?: readonly RiskFlags[] | null
}

/** Everything computed once per history window and shared by every evaluation date in it. */
export type PickerWindow = {
  history: readonly DailyBar[]
  riskFlags: readonly RiskFlags[] | null
  dates: string[]
  sectorOf: (stockId: string) => string
  features: Map<string, DailyFeatures>
  sectorDaily: SectorDailyAggregate[]
}

function isDebugPicker(): boolean {
  const v = String(process.env.DEBUG_PICKER || '').toLowerCase()
  return v === 'true' || v === '1' || v === 'yes'
}

function debug(msg: string, data: Record<string, unknown>): void {
  // eslint-disable-next-line no-console
  if (isDebugPicker()) console.info(`[PICKER] ${msg}`, data)
}

export function buildPickerWindow(input: PickerInput, cfg: PickerConfig): PickerWindow {
  const sectors = new Map(input.meta.map(m => [m.stock_id, m.sector_id]))
  const sectorOf = (stockId: string) => sectors.get(stockId) ?? UNKNOWN_SECTOR
  const riskFlags = input.riskFlags && input.riskFlags.length > 0 ? input.riskFlags : null
  const eligibleHistory = applyUniverseFilter(input.history, cfg.universe, riskFlags)
  return {
    history: input.history,
    riskFlags,
    dates: Array.from(new Set(input.history.map(b => b.trade_date))).sort(),
    sectorOf,
    features: indexFeatures(computeDailyFeatures(input.history)),
    sectorDaily: computeSectorDaily(eligibleHistory, sectorOf, cfg.sector.mtm_lookback),
  }
}

function joinDay(window: PickerWindow, bars: readonly DailyBar[]): StockDayRow[] {
  return bars.map(b => {
    const f = window.features.get(featureKey(b.trade_date, b.stock_id))
    return {
      ...b,
      sector_id: window.sectorOf(b.stock_id),
      ma_5: f?.ma_5 ?? null,
      ma_10: f?.ma_10 ?? null,
      ma_20: f?.ma_20 ?? null,
      vol_20d_avg: f?.vol_20d_avg ?? null,
      vol_ratio_20d: f?.vol_ratio_20d ?? null,
      high_20d: f?.high_20d ?? null,
      is_20d_high: f?.is_20d_high ?? null,
      distance_to_20d_high: f?.distance_to_20d_high ?? null,
      pos_in_day: f?.pos_in_day ?? null,
    }
  })
}

function toPeerRows(rows: readonly StockDayRow[], strong: readonly StrongSector[]): SectorPeerRow[] {
  const score = new Map(strong.map(s => [s.sector_id, s.sector_score]))
  const inStrong = rows.filter(r => score.has(r.sector_id))
  const pctZ = standardizeBy(inStrong, r => r.sector_id, r => r.pct_change)
  const volZ = standardizeBy(inStrong, r => r.sector_id, r => r.vol_ratio_20d)
  return inStrong.map((r, i) => ({
    ...r,
    sector_score: score.get(r.sector_id) ?? 0,
    pct_change_z: pctZ[i],
    vol_ratio_z: volZ[i],
  }))
}

function previousDate(dates: readonly string[], tradeDate: string): string | null {
  const idx = dates.indexOf(tradeDate)
  return idx > 0 ? dates[idx - 1] : null
}

/**
 * Candidates for one evaluation date. Empty stages yield an empty table with
 * the full column set; data conditions never throw.
 */
export function pickForDate(window: PickerWindow, tradeDate: string, cfg: PickerConfig): PickerResult {
  const fallbacks: FallbackTier[] = []
  const sectorDay = window.sectorDaily.filter(s => s.trade_date === tradeDate)
  const result = (partial: Partial<PickerResult>): PickerResult => ({
    trade_date: tradeDate,
    candidates: emptyCandidateTable(),
    strong_sectors: [],
    sector_daily: sectorDay,
    leaders: [],
    fallbacks_used: fallbacks,
    ...partial,
  })

  const dayBars = window.history.filter(b => b.trade_date === tradeDate)
  const eligible = applyUniverseFilter(joinDay(window, dayBars), cfg.universe, window.riskFlags)
  debug('universe', { trade_date: tradeDate, rows: dayBars.length, eligible: eligible.length })

  const strongPick = selectStrongSectors(sectorDay, cfg.sector, cfg.fallback)
  if (strongPick.fallback) {
    fallbacks.push('sector_top_k')
    console.warn('[PICKER] fallback', { trade_date: tradeDate, tier: 'sector_top_k', sectors: strongPick.sectors.map(s => s.sector_id) })
  }
  const strong = strongPick.sectors
  debug('sectors', { trade_date: tradeDate, sectors: sectorDay.length, strong: strong.length })
  if (strong.length === 0) return result({})

  const base = toPeerRows(eligible, strong)
  const leaderSel = selectLeaders(base, cfg.leader, cfg.fallback)
  const followerSel = selectFollowers(base, cfg.follower, cfg.fallback)
  for (const tier of leaderSel.fallbacks) {
    fallbacks.push(tier)
    console.warn('[PICKER] fallback', { trade_date: tradeDate, tier })
  }
  if (followerSel.relaxed) {
    fallbacks.push('follower_relaxed')
    console.warn('[PICKER] fallback', { trade_date: tradeDate, tier: 'follower_relaxed' })
  }
  debug('signals', { trade_date: tradeDate, base: base.length, leaders: leaderSel.leaders.length, followers: followerSel.followers.length })

  if (leaderSel.leaders.length === 0 || followerSel.followers.length === 0) {
    return result({ strong_sectors: strong, leaders: leaderSel.leaders })
  }

  const paired = pairFollowers(followerSel.followers, bestLeaderBySector(leaderSel.leaders), cfg.total_score_weights)

  const prev = previousDate(window.dates, tradeDate)
  const prevBars: readonly DailyBar[] = prev === null ? [] : window.history.filter(b => b.trade_date === prev)
  const prevLow = new Map(prevBars.map(b => [b.stock_id, b.low] as const))
  const ps = cfg.position_sizing

  const rows: CandidateRow[] = paired.map(p => {
    const entry = p.row.close
    const stop = suggestStop(prevLow.get(p.row.stock_id), ps.stop_buffer_pct)
    const size = sizePosition(entry, stop, ps)
    return {
      trade_date: tradeDate,
      stock_id: p.row.stock_id,
      leader_id: p.leader.stock_id,
      sector_id: p.row.sector_id,
      score_sector: p.score_sector,
      score_leader: p.score_leader,
      score_follow: p.score_follow,
      score_total: p.score_total,
      suggest_entry: entry,
      suggest_stop: stop,
      position_value: size.position_value,
      shares: size.shares,
      lots: size.lots,
    }
  })

  return result({
    candidates: { ...emptyCandidateTable(), rows },
    strong_sectors: strong,
    leaders: leaderSel.leaders,
  })
}

export function runPicker(input: PickerInput, tradeDate: string, cfg: PickerConfig): PickerResult {
  return pickForDate(buildPickerWindow(input, cfg), tradeDate, cfg)
}
