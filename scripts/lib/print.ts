import type { CandidateRow } from '../../types/candidates'
import type { StockMeta } from '../../types/market'

const round = (v: number | null, dp = 3): number | null => (v === null ? null : Math.round(v * 10 ** dp) / 10 ** dp)

export function printTop(rows: readonly CandidateRow[], meta: readonly StockMeta[], n = 10): void {
  const names = new Map(meta.map(m => [m.stock_id, m.stock_name]))
  console.table(rows.slice(0, n).map(r => ({
    stock_id: r.stock_id,
    stock_name: names.get(r.stock_id) ?? '',
    sector_id: r.sector_id,
    leader_id: r.leader_id,
    score_total: round(r.score_total),
    score_sector: round(r.score_sector),
    score_leader: round(r.score_leader),
    score_follow: round(r.score_follow),
    suggest_entry: round(r.suggest_entry, 2),
    suggest_stop: round(r.suggest_stop, 2),
    shares: r.shares,
    lots: r.lots,
  })))
}
