import { describe, expect, it } from 'vitest'
import { followerScore, isFollower, pairFollowers, selectFollowers } from '../services/signals/follower_selector'
import type { LeaderPick } from '../types/features'
import type { PermissivePolicy } from '../types/config'
import { peer, testConfig } from './helpers'

const full = testConfig()
const cfg = full.follower
const trailing = { pct_change: 4, vol_ratio_20d: 1.5, close: 104, ma_5: 101, ma_20: 100, distance_to_20d_high: 0.01, pos_in_day: 0.8 }
const relaxed: PermissivePolicy = { mode: 'permissive', sector_top_k: 3, leader_top_pct: 0, leader_full_sector: false, follower_relaxed: true }

describe('isFollower', () => {
  it('accepts a stock trailing inside every band', () => {
    expect(isFollower(peer('F', 'A', trailing), cfg)).toBe(true)
    expect(isFollower(peer('F', 'A', { ...trailing, pct_change: 2, vol_ratio_20d: 2 }), cfg)).toBe(true)
  })

  it('rejects a blow-off move, thin volume, a close under its averages or far from the high', () => {
    expect(isFollower(peer('F', 'A', { ...trailing, pct_change: 6.5 }), cfg)).toBe(false)
    expect(isFollower(peer('F', 'A', { ...trailing, vol_ratio_20d: 1.1 }), cfg)).toBe(false)
    expect(isFollower(peer('F', 'A', { ...trailing, ma_5: 104 }), cfg)).toBe(false)
    expect(isFollower(peer('F', 'A', { ...trailing, ma_20: 105 }), cfg)).toBe(false)
    expect(isFollower(peer('F', 'A', { ...trailing, distance_to_20d_high: 0.06 }), cfg)).toBe(false)
  })

  it('fails closed when a window feature is undefined', () => {
    expect(isFollower(peer('F', 'A', { ...trailing, ma_20: null }), cfg)).toBe(false)
    expect(isFollower(peer('F', 'A', { ...trailing, vol_ratio_20d: null }), cfg)).toBe(false)
    expect(isFollower(peer('F', 'A', { ...trailing, distance_to_20d_high: null }), cfg)).toBe(false)
  })
})

describe('followerScore', () => {
  it('rewards proximity to the high', () => {
    const r = peer('F', 'A', { ...trailing, pct_change_z: 1, vol_ratio_z: 0.5 })
    expect(followerScore(r, cfg)).toBeCloseTo(0.4 * 1 + 0.2 * 0.5 + 0.2 * 0.99 + 0.2 * 0.8, 12)
    const blank = peer('F', 'A', { pct_change_z: null, vol_ratio_z: null, distance_to_20d_high: null, pos_in_day: null })
    expect(followerScore(blank, cfg)).toBe(0)
  })
})

describe('selectFollowers', () => {
  const base = [peer('F1', 'A', trailing), peer('F2', 'A', { ...trailing, ma_5: 200 })]

  it('keeps only stocks passing the predicate', () => {
    const sel = selectFollowers(base, cfg, { mode: 'strict' })
    expect(sel.followers.map(f => f.row.stock_id)).toEqual(['F1'])
    expect(sel.relaxed).toBe(false)
  })

  it('relaxes to the move band only when nothing passes and the policy allows it', () => {
    const none = base.map(r => ({ ...r, ma_20: 500 }))
    expect(selectFollowers(none, cfg, { mode: 'strict' }).followers).toEqual([])
    const sel = selectFollowers(none, cfg, relaxed)
    expect(sel.relaxed).toBe(true)
    expect(sel.followers.map(f => f.row.stock_id)).toEqual(['F1', 'F2'])
    expect(selectFollowers(base, cfg, relaxed).relaxed).toBe(false)
  })
})

describe('pairFollowers', () => {
  const leader = (sector: string, id: string, score: number): LeaderPick => ({ sector_id: sector, stock_id: id, score_leader: score, rank: 1, via: 'strict' })

  it('joins each follower to its sector leader and ranks by total score', () => {
    const followers = [
      { row: peer('A1', 'A', { sector_score: 1 }), score_follow: 0.2 },
      { row: peer('A2', 'A', { sector_score: 1 }), score_follow: 0.6 },
      { row: peer('C1', 'C', { sector_score: 3 }), score_follow: 0.1 },
    ]
    const best = new Map([['A', leader('A', 'A0', 2)]])
    const out = pairFollowers(followers, best, full.total_score_weights)
    expect(out.map(p => `${p.row.stock_id}<-${p.leader.stock_id}`)).toEqual(['A2<-A0', 'A1<-A0'])
    expect(out[0].score_total).toBeCloseTo(0.3 * 1 + 0.2 * 2 + 0.5 * 0.6, 12)
    expect(out[1].score_sector).toBe(1)
    expect(out[1].score_leader).toBe(2)
  })

  it('pairs a leader that also follows with itself', () => {
    const followers = [{ row: peer('A0', 'A'), score_follow: 1 }, { row: peer('A1', 'A'), score_follow: 0.5 }]
    const out = pairFollowers(followers, new Map([['A', leader('A', 'A0', 2)]]), full.total_score_weights)
    expect(out.map(p => [p.row.stock_id, p.leader.stock_id])).toEqual([['A0', 'A0'], ['A1', 'A0']])
  })

  it('orders equal totals by stock id', () => {
    const followers = [{ row: peer('A9', 'A'), score_follow: 0.5 }, { row: peer('A3', 'A'), score_follow: 0.5 }]
    const out = pairFollowers(followers, new Map([['A', leader('A', 'A0', 1)]]), full.total_score_weights)
    expect(out.map(p => p.row.stock_id)).toEqual(['A3', 'A9'])
  })
})
