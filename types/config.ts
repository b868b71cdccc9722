import type { SectorMode } from './market'

export type StrictPolicy = { mode: 'strict' }

// Relaxations that keep a dry run non-empty. Never reachable unless opted into.
export type PermissivePolicy = {
  mode: 'permissive'
  sector_top_k: number
  leader_top_pct: number
  leader_full_sector: boolean
  follower_relaxed: boolean
}

export type FallbackPolicy = StrictPolicy | PermissivePolicy

export type UniverseConfig = {
  min_turnover?: number
  min_price?: number
  max_price?: number
  min_liquidity_score?: number
}

export type SectorConfig = {
  mtm_lookback: number
  thresh_avg_pct: number
  thresh_up_ratio: number
  thresh_mtm_z: number
  weights: {
    avg_pct_change_z: number
    sector_mtm_z: number
    up_ratio: number
  }
}

export type LeaderConfig = {
  thresh_leader_pct: number
  thresh_leader_vol_ratio: number
  thresh_leader_pos: number
  top_n_per_sector: number
  weights: {
    pct_change_z: number
    vol_ratio_z: number
    pos_in_day: number
  }
}

export type FollowerConfig = {
  pct_change_min: number
  pct_change_max: number
  vol_ratio_min: number
  vol_ratio_max: number
  thresh_dist_20d_high: number
  weights: {
    pct_change_z: number
    vol_ratio_z: number
    one_minus_dist_20d_high: number
    pos_in_day: number
  }
}

export type TotalScoreWeights = {
  score_sector: number
  score_leader: number
  score_follow: number
}

export type PositionSizingConfig = {
  capital: number
  risk_per_trade: number
  max_position_pct: number
  stop_buffer_pct: number
  lot_size: number
}

export type PickerConfigInput = {
  sector_mode: SectorMode
  universe: UniverseConfig
  sector: SectorConfig
  leader: LeaderConfig
  follower: FollowerConfig
  total_score_weights: TotalScoreWeights
  position_sizing: PositionSizingConfig
  fallback: FallbackPolicy
}

type DeepReadonly<T> = T extends object ? { readonly [K in keyof T]: DeepReadonly<T[K]> } : T

export type PickerConfig = DeepReadonly<PickerConfigInput>
