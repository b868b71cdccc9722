import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import pickerJson from '../config/picker.json'
import demoJson from '../config/picker.demo.json'
import { loadPickerConfig, readPickerConfig } from '../services/config/picker_config'
import { ConfigError } from '../services/lib/errors'
import { baseConfigInput } from './helpers'

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn()
  } catch (e) {
    if (e instanceof ConfigError) return e
    throw e
  }
  throw new Error('expected ConfigError')
}

describe('loadPickerConfig', () => {
  it('accepts the shipped configs', () => {
    const live = loadPickerConfig(pickerJson)
    expect(live.sector_mode).toBe('themes')
    expect(live.fallback).toEqual({ mode: 'strict' })
    const demo = loadPickerConfig(demoJson)
    expect(demo.fallback.mode).toBe('permissive')
  })

  it('rejects a missing section', () => {
    const raw: Record<string, unknown> = { ...baseConfigInput() }
    delete raw.leader
    const err = configErrorOf(() => loadPickerConfig(raw))
    expect(err.message).toBe('schema_invalid:picker_config')
    expect(err.stage).toBe('config')
    expect(err.details).toContain("/ must have required property 'leader'")
  })

  it('rejects unknown keys and wrong types', () => {
    const raw = { ...baseConfigInput(), extra: 1 }
    expect(() => loadPickerConfig(raw)).toThrow(ConfigError)
    const input = baseConfigInput()
    const bad = { ...input, sector: { ...input.sector, mtm_lookback: 'five' } }
    expect(configErrorOf(() => loadPickerConfig(bad)).details).toContain('/sector/mtm_lookback must be integer')
  })

  it('rejects an unknown fallback mode', () => {
    const raw = { ...baseConfigInput(), fallback: { mode: 'loose' } }
    expect(configErrorOf(() => loadPickerConfig(raw)).message).toBe('schema_invalid:picker_config')
  })

  it('rejects inverted bands', () => {
    const input = baseConfigInput()
    input.follower.pct_change_min = 7
    input.universe.max_price = 0.5
    const err = configErrorOf(() => loadPickerConfig(input))
    expect(err.message).toBe('range_invalid:picker_config')
    expect(err.details).toEqual([
      '/follower pct_change_min exceeds pct_change_max',
      '/universe min_price exceeds max_price',
    ])
  })

  it('returns a frozen copy detached from the input', () => {
    const input = baseConfigInput()
    const cfg = loadPickerConfig(input)
    input.sector.thresh_avg_pct = 99
    expect(cfg.sector.thresh_avg_pct).toBe(3)
    expect(Object.isFrozen(cfg)).toBe(true)
    expect(Object.isFrozen(cfg.sector.weights)).toBe(true)
  })
})

describe('readPickerConfig', () => {
  let dir = ''
  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'picker-config-'))
  })
  afterAll(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('reads and validates a file', async () => {
    const file = path.join(dir, 'ok.json')
    await writeFile(file, JSON.stringify(baseConfigInput()), 'utf8')
    const cfg = await readPickerConfig(file)
    expect(cfg.position_sizing.lot_size).toBe(1000)
  })

  it('reports unreadable and malformed files', async () => {
    await expect(readPickerConfig(path.join(dir, 'missing.json'))).rejects.toThrow(/^config_unreadable:/)
    const file = path.join(dir, 'broken.json')
    await writeFile(file, '{ "sector_mode": ', 'utf8')
    await expect(readPickerConfig(file)).rejects.toThrow(/^config_not_json:/)
  })
})
