import type { DailyBar } from '../../types/market'
import type { SectorDailyAggregate } from '../../types/features'
import { atLeast, known } from '../lib/closed'
import { groupBy, mean, median, rollingMean, standardizeBy } from '../lib/stats'

export const UP_MOVE_PCT = 3

type SectorDayBase = Omit<SectorDailyAggregate, 'sector_mtm' | 'sector_mtm_z'>

/**
 * Per (date, sector) breadth and momentum over an already-filtered universe.
 * `sector_mtm` averages the sector's daily mean move over its trailing
 * `lookback` rows; `sector_mtm_z` standardizes it across sectors on each date.
 */
export function computeSectorDaily(
  eligible: readonly DailyBar[],
  sectorOf: (stockId: string) => string,
  lookback: number,
): SectorDailyAggregate[] {
  const days: SectorDayBase[] = []
  for (const [key, rows] of groupBy(eligible, r => `${r.trade_date}|${sectorOf(r.stock_id)}`)) {
    const sep = key.indexOf('|')
    const pcts = rows.map(r => r.pct_change)
    days.push({
      trade_date: key.slice(0, sep),
      sector_id: key.slice(sep + 1),
      num_stocks: rows.length,
      avg_pct_change: mean(pcts),
      median_pct_change: median(pcts),
      up_ratio: pcts.filter(p => known(p) && p > 0).length / rows.length,
      num_up_3: pcts.filter(p => atLeast(p, UP_MOVE_PCT)).length,
    })
  }

  const withMtm: Array<SectorDayBase & { sector_mtm: number | null }> = []
  const bySector = groupBy(days, d => d.sector_id)
  for (const sectorId of Array.from(bySector.keys()).sort()) {
    const series = (bySector.get(sectorId) ?? []).slice().sort((a, b) => a.trade_date.localeCompare(b.trade_date))
    const mtm = rollingMean(series.map(d => d.avg_pct_change), lookback)
    series.forEach((d, i) => withMtm.push({ ...d, sector_mtm: mtm[i] }))
  }

  const z = standardizeBy(withMtm, d => d.trade_date, d => d.sector_mtm)
  return withMtm.map((d, i) => ({ ...d, sector_mtm_z: z[i] }))
}
