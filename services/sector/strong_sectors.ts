import type { SectorDailyAggregate, StrongSector } from '../../types/features'
import type { FallbackPolicy, SectorConfig } from '../../types/config'
import { atLeast, orZero } from '../lib/closed'
import { zscore } from '../lib/stats'

export type SectorRanking = {
  ranked: StrongSector[]
  strong: StrongSector[]
}

const byScore = (a: StrongSector, b: StrongSector) => (b.sector_score - a.sector_score) || a.sector_id.localeCompare(b.sector_id)

/** Composite score for one date's sectors and the subset passing every threshold. */
export function rankSectors(day: readonly SectorDailyAggregate[], cfg: Readonly<SectorConfig>): SectorRanking {
  const w = cfg.weights
  const avgZ = zscore(day.map(d => d.avg_pct_change))
  const scored: Array<{ sector: StrongSector; pass: boolean }> = day.map((d, i) => {
    const sector: StrongSector = {
      sector_id: d.sector_id,
      avg_pct_change: d.avg_pct_change,
      avg_pct_change_z: avgZ[i],
      up_ratio: d.up_ratio,
      sector_mtm_z: d.sector_mtm_z,
      sector_score: w.avg_pct_change_z * orZero(avgZ[i]) + w.sector_mtm_z * orZero(d.sector_mtm_z) + w.up_ratio * orZero(d.up_ratio),
    }
    // sector_mtm_z is 0 on dates where no sector has momentum yet, so thresh_mtm_z <= 0 lets those through
    const pass = atLeast(d.avg_pct_change, cfg.thresh_avg_pct)
      && atLeast(d.up_ratio, cfg.thresh_up_ratio)
      && atLeast(d.sector_mtm_z, cfg.thresh_mtm_z)
    return { sector, pass }
  })
  return {
    ranked: scored.map(s => s.sector).sort(byScore),
    strong: scored.filter(s => s.pass).map(s => s.sector).sort(byScore),
  }
}

export type StrongSectorPick = {
  sectors: StrongSector[]
  fallback: boolean
}

/** Strong sectors, or the top-K by score when none pass and the policy allows it. */
export function selectStrongSectors(
  day: readonly SectorDailyAggregate[],
  cfg: Readonly<SectorConfig>,
  policy: Readonly<FallbackPolicy>,
): StrongSectorPick {
  const { ranked, strong } = rankSectors(day, cfg)
  if (strong.length > 0 || policy.mode === 'strict') return { sectors: strong, fallback: false }
  const sectors = ranked.slice(0, policy.sector_top_k)
  return { sectors, fallback: sectors.length > 0 }
}
