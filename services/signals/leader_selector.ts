import type { LeaderPick, SectorPeerRow } from '../../types/features'
import type { FallbackPolicy, LeaderConfig } from '../../types/config'
import type { FallbackTier } from '../../types/candidates'
import { atLeast, isSet, known, orZero } from '../lib/closed'
import { groupBy } from '../lib/stats'

export type LeaderSelection = {
  // ranked within each sector; the first entry of a sector is its best leader
  leaders: LeaderPick[]
  fallbacks: FallbackTier[]
}

export function isLeader(r: SectorPeerRow, cfg: Readonly<LeaderConfig>): boolean {
  return atLeast(r.pct_change, cfg.thresh_leader_pct)
    && atLeast(r.vol_ratio_20d, cfg.thresh_leader_vol_ratio)
    && isSet(r.is_20d_high)
    && atLeast(r.pos_in_day, cfg.thresh_leader_pos)
}

export function leaderScore(r: SectorPeerRow, cfg: Readonly<LeaderConfig>): number {
  const w = cfg.weights
  return w.pct_change_z * orZero(r.pct_change_z) + w.vol_ratio_z * orZero(r.vol_ratio_z) + w.pos_in_day * orZero(r.pos_in_day)
}

// Strongest move first; rows without a pct_change sink to the bottom
function byPctChange(a: SectorPeerRow, b: SectorPeerRow): number {
  const pa = known(a.pct_change) ? a.pct_change : -Infinity
  const pb = known(b.pct_change) ? b.pct_change : -Infinity
  if (pa !== pb) return pb - pa
  return a.stock_id.localeCompare(b.stock_id)
}

// Banker's rounding: exact halves go to the even neighbour
function roundHalfEven(x: number): number {
  const r = Math.round(x)
  return Math.abs(x % 1) === 0.5 && r % 2 !== 0 ? r - 1 : r
}

export function topPctCount(n: number, pct: number): number {
  return Math.max(1, roundHalfEven(n * pct))
}

/**
 * Leaders per strong sector. Sectors without a strict leader only get one
 * through the permissive tiers: top percentile by pct_change, else the whole
 * sector.
 */
export function selectLeaders(
  base: readonly SectorPeerRow[],
  cfg: Readonly<LeaderConfig>,
  policy: Readonly<FallbackPolicy>,
): LeaderSelection {
  const leaders: LeaderPick[] = []
  const fallbacks = new Set<FallbackTier>()
  const bySector = groupBy(base, r => r.sector_id)

  for (const sectorId of Array.from(bySector.keys()).sort()) {
    const peers = bySector.get(sectorId) ?? []
    let picked = peers.filter(r => isLeader(r, cfg))
    let via: LeaderPick['via'] = 'strict'

    if (picked.length === 0 && policy.mode === 'permissive' && peers.length > 0) {
      const ranked = peers.slice().sort(byPctChange)
      if (policy.leader_top_pct > 0) {
        picked = ranked.slice(0, topPctCount(peers.length, policy.leader_top_pct))
        via = 'top_pct'
        fallbacks.add('leader_top_pct')
      } else if (policy.leader_full_sector) {
        picked = ranked
        via = 'full_sector'
        fallbacks.add('leader_full_sector')
      }
    }

    const scored = picked
      .map(r => ({ stock_id: r.stock_id, score_leader: leaderScore(r, cfg) }))
      .sort((a, b) => (b.score_leader - a.score_leader) || a.stock_id.localeCompare(b.stock_id))
      .slice(0, cfg.top_n_per_sector)
    scored.forEach((s, i) => leaders.push({ sector_id: sectorId, stock_id: s.stock_id, score_leader: s.score_leader, rank: i + 1, via }))
  }

  return { leaders, fallbacks: Array.from(fallbacks) }
}

export function bestLeaderBySector(leaders: readonly LeaderPick[]): Map<string, LeaderPick> {
  const best = new Map<string, LeaderPick>()
  for (const l of leaders) {
    const cur = best.get(l.sector_id)
    if (!cur || l.rank < cur.rank) best.set(l.sector_id, l)
  }
  return best
}
