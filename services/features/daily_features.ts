import type { DailyBar } from '../../types/market'
import type { DailyFeatures } from '../../types/features'
import { known } from '../lib/closed'
import { groupBy, rollingMax, rollingMean } from '../lib/stats'

export const MA_WINDOWS = [5, 10, 20] as const
export const VOLUME_WINDOW = 20
export const HIGH_WINDOW = 20

const byDate = (a: DailyBar, b: DailyBar) => (a.trade_date < b.trade_date ? -1 : a.trade_date > b.trade_date ? 1 : 0)

export function featureKey(tradeDate: string, stockId: string): string {
  return `${tradeDate}|${stockId}`
}

/**
 * Rolling technical features per stock over the supplied history.
 * Windows count the stock's own rows, so a missing day just shortens its history.
 */
export function computeDailyFeatures(history: readonly DailyBar[]): DailyFeatures[] {
  const out: DailyFeatures[] = []
  const byStock = groupBy(history, b => b.stock_id)
  const stockIds = Array.from(byStock.keys()).sort()
  for (const stockId of stockIds) {
    const bars = (byStock.get(stockId) ?? []).slice().sort(byDate)
    const closes = bars.map(b => b.close)
    const [ma5, ma10, ma20] = MA_WINDOWS.map(w => rollingMean(closes, w))
    const volAvg = rollingMean(bars.map(b => b.volume), VOLUME_WINDOW)
    const high20 = rollingMax(bars.map(b => b.high), HIGH_WINDOW)

    bars.forEach((b, i) => {
      const avg = volAvg[i]
      const hi = high20[i]
      const ratio = known(b.volume) && known(avg) && avg > 0 ? b.volume / avg : null
      const range = b.high - b.low
      const pos = range !== 0 ? (b.close - b.low) / range : null
      out.push({
        trade_date: b.trade_date,
        stock_id: stockId,
        ma_5: ma5[i],
        ma_10: ma10[i],
        ma_20: ma20[i],
        vol_20d_avg: avg,
        vol_ratio_20d: known(ratio) ? ratio : null,
        high_20d: hi,
        is_20d_high: known(hi) ? b.close >= hi : null,
        distance_to_20d_high: known(hi) && hi !== 0 ? (hi - b.close) / hi : null,
        pos_in_day: known(pos) ? pos : null,
      })
    })
  }
  return out
}

export function indexFeatures(features: readonly DailyFeatures[]): Map<string, DailyFeatures> {
  return new Map(features.map(f => [featureKey(f.trade_date, f.stock_id), f]))
}
