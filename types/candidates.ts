import type { LeaderPick, SectorDailyAggregate, StrongSector } from './features'

export const CANDIDATE_COLUMNS = [
  'trade_date',
  'stock_id',
  'leader_id',
  'sector_id',
  'score_sector',
  'score_leader',
  'score_follow',
  'score_total',
  'suggest_entry',
  'suggest_stop',
  'position_value',
  'shares',
  'lots',
] as const

export type CandidateColumn = typeof CANDIDATE_COLUMNS[number]

export type CandidateRow = Readonly<{
  trade_date: string
  stock_id: string
  leader_id: string
  sector_id: string
  score_sector: number
  score_leader: number
  score_follow: number
  score_total: number
  suggest_entry: number
  suggest_stop: number | null
  position_value: number | null
  shares: number | null
  lots: number | null
}>

export type CandidateTable = {
  columns: readonly CandidateColumn[]
  rows: CandidateRow[]
}

export type FallbackTier = 'sector_top_k' | 'leader_top_pct' | 'leader_full_sector' | 'follower_relaxed'

export type PickerResult = {
  trade_date: string
  candidates: CandidateTable
  strong_sectors: StrongSector[]
  sector_daily: SectorDailyAggregate[]
  leaders: LeaderPick[]
  fallbacks_used: FallbackTier[]
}

export function emptyCandidateTable(): CandidateTable {
  return { columns: CANDIDATE_COLUMNS, rows: [] }
}
