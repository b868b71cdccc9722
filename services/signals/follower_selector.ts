import type { FollowerPick, LeaderPick, SectorPeerRow } from '../../types/features'
import type { FallbackPolicy, FollowerConfig, TotalScoreWeights } from '../../types/config'
import { above, atMost, orValue, orZero, within } from '../lib/closed'

export type FollowerSelection = {
  followers: FollowerPick[]
  relaxed: boolean
}

export type PairedFollower = Readonly<{
  row: SectorPeerRow
  leader: LeaderPick
  score_sector: number
  score_leader: number
  score_follow: number
  score_total: number
}>

function inMoveBand(r: SectorPeerRow, cfg: Readonly<FollowerConfig>): boolean {
  return within(r.pct_change, cfg.pct_change_min, cfg.pct_change_max)
}

export function isFollower(r: SectorPeerRow, cfg: Readonly<FollowerConfig>): boolean {
  return inMoveBand(r, cfg)
    && within(r.vol_ratio_20d, cfg.vol_ratio_min, cfg.vol_ratio_max)
    && above(r.close, r.ma_5)
    && above(r.close, r.ma_20)
    && atMost(r.distance_to_20d_high, cfg.thresh_dist_20d_high)
}

export function followerScore(r: SectorPeerRow, cfg: Readonly<FollowerConfig>): number {
  const w = cfg.weights
  return w.pct_change_z * orZero(r.pct_change_z)
    + w.vol_ratio_z * orZero(r.vol_ratio_z)
    + w.one_minus_dist_20d_high * (1 - orValue(r.distance_to_20d_high, 1))
    + w.pos_in_day * orZero(r.pos_in_day)
}

/**
 * Stocks still moving inside the band, on rising volume, above their short
 * averages and close to the 20-day high. With `follower_relaxed` an empty set
 * falls back to the move band alone.
 */
export function selectFollowers(
  base: readonly SectorPeerRow[],
  cfg: Readonly<FollowerConfig>,
  policy: Readonly<FallbackPolicy>,
): FollowerSelection {
  let rows = base.filter(r => isFollower(r, cfg))
  let relaxed = false
  if (rows.length === 0 && policy.mode === 'permissive' && policy.follower_relaxed) {
    rows = base.filter(r => inMoveBand(r, cfg))
    relaxed = rows.length > 0
  }
  return { followers: rows.map(row => ({ row, score_follow: followerScore(row, cfg) })), relaxed }
}

/**
 * Joins each follower to its sector's best leader and ranks by total score.
 * A follower without a leader in its sector is dropped; a leader that also
 * passes the follower filter is paired with itself.
 */
export function pairFollowers(
  followers: readonly FollowerPick[],
  bestLeaders: ReadonlyMap<string, LeaderPick>,
  tw: Readonly<TotalScoreWeights>,
): PairedFollower[] {
  const paired: PairedFollower[] = []
  for (const f of followers) {
    const leader = bestLeaders.get(f.row.sector_id)
    if (!leader) continue
    const score_sector = f.row.sector_score
    paired.push({
      row: f.row,
      leader,
      score_sector,
      score_leader: leader.score_leader,
      score_follow: f.score_follow,
      score_total: tw.score_sector * score_sector + tw.score_leader * leader.score_leader + tw.score_follow * f.score_follow,
    })
  }
  return paired.sort((a, b) => (b.score_total - a.score_total) || a.row.stock_id.localeCompare(b.row.stock_id))
}
