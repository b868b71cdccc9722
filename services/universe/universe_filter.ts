import type { DailyBar, RiskFlags } from '../../types/market'
import type { UniverseConfig } from '../../types/config'
import { atLeast, atMost, isSet, orZero } from '../lib/closed'

type Predicate<T> = (r: T) => boolean

/**
 * Eligibility predicates, applied in order: turnover floor, price floor, price
 * ceiling, risk flags. Unconfigured thresholds are skipped; a stock without a
 * flags row is unrestricted.
 */
export function buildUniversePredicates<T extends DailyBar>(
  cfg: Readonly<UniverseConfig>,
  riskFlags?: readonly RiskFlags[] | null,
): Array<Predicate<T>> {
  const preds: Array<Predicate<T>> = []
  const { min_turnover, min_price, max_price, min_liquidity_score } = cfg

  // missing turnover counts as zero
  if (min_turnover !== undefined) preds.push(r => atLeast(orZero(r.turnover), min_turnover))
  if (min_price !== undefined) preds.push(r => atLeast(r.close, min_price))
  if (max_price !== undefined) preds.push(r => atMost(r.close, max_price))

  if (riskFlags && riskFlags.length > 0) {
    const flags = new Map(riskFlags.map(f => [f.stock_id, f]))
    preds.push(r => {
      const f = flags.get(r.stock_id)
      if (!f) return true
      return !isSet(f.is_disposed) && !isSet(f.is_full_margin) && !isSet(f.is_blacklist)
    })
    if (min_liquidity_score !== undefined) {
      preds.push(r => {
        const f = flags.get(r.stock_id)
        return !f || atLeast(f.liquidity_score, min_liquidity_score)
      })
    }
  }
  return preds
}

export function applyUniverseFilter<T extends DailyBar>(
  rows: readonly T[],
  cfg: Readonly<UniverseConfig>,
  riskFlags?: readonly RiskFlags[] | null,
): T[] {
  const preds = buildUniversePredicates<T>(cfg, riskFlags)
  return rows.filter(r => preds.every(p => p(r)))
}
