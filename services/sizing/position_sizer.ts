import type { PositionSizingConfig } from '../../types/config'
import { known, type Maybe } from '../lib/closed'

export const DEFAULT_LOT_SIZE = 1000

export type PositionSize = {
  position_value: number | null
  shares: number | null
  lots: number | null
}

const NO_SIZE: PositionSize = { position_value: null, shares: null, lots: null }

/** Previous session's low less a buffer; null when there is no usable low. */
export function suggestStop(prevLow: Maybe, bufferPct: number): number | null {
  if (!known(prevLow)) return null
  const stop = prevLow * (1 - bufferPct)
  return Number.isFinite(stop) ? stop : null
}

/**
 * Shares bounded by both the risk budget (capital * risk_per_trade over the
 * per-share risk) and the position cap. Undefined unless 0 < stop < entry.
 */
export function sizePosition(entry: Maybe, stop: Maybe, cfg: Readonly<PositionSizingConfig>): PositionSize {
  if (!known(entry) || !known(stop) || entry <= 0 || stop <= 0 || stop >= entry) return { ...NO_SIZE }

  const byRisk = Math.floor((cfg.capital * cfg.risk_per_trade) / (entry - stop))
  const byCap = Math.floor((cfg.capital * cfg.max_position_pct) / entry)
  const shares = Math.max(0, Math.min(byRisk, byCap))
  const lotSize = cfg.lot_size > 0 ? cfg.lot_size : DEFAULT_LOT_SIZE
  return {
    position_value: shares * entry,
    shares,
    lots: Math.floor(shares / lotSize),
  }
}
