import Ajv from 'ajv'
import { promises as fs } from 'node:fs'
import path from 'node:path'
import configSchema from '../../schemas/picker_config.schema.json'
import type { PickerConfig, PickerConfigInput } from '../../types/config'
import { ConfigError } from '../lib/errors'

const ajv = new Ajv({ allErrors: true })
const validateConfig = ajv.compile<PickerConfigInput>(configSchema)

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const v of Object.values(value)) deepFreeze(v)
    Object.freeze(value)
  }
  return value
}

function checkRanges(cfg: PickerConfigInput): string[] {
  const problems: string[] = []
  const f = cfg.follower
  if (f.pct_change_min > f.pct_change_max) problems.push('/follower pct_change_min exceeds pct_change_max')
  if (f.vol_ratio_min > f.vol_ratio_max) problems.push('/follower vol_ratio_min exceeds vol_ratio_max')
  const u = cfg.universe
  if (u.min_price !== undefined && u.max_price !== undefined && u.min_price > u.max_price) {
    problems.push('/universe min_price exceeds max_price')
  }
  return problems
}

/**
 * Validates a parsed config once and hands back a frozen copy; everything
 * downstream reads typed fields and never re-checks for missing keys.
 */
export function loadPickerConfig(raw: unknown): PickerConfig {
  const copy: unknown = JSON.parse(JSON.stringify(raw ?? null))
  if (!validateConfig(copy)) {
    throw new ConfigError('schema_invalid:picker_config', validateConfig.errors)
  }
  const problems = checkRanges(copy)
  if (problems.length > 0) {
    const err = new ConfigError('range_invalid:picker_config')
    err.details.push(...problems)
    throw err
  }
  return deepFreeze(copy)
}

export async function readPickerConfig(file: string): Promise<PickerConfig> {
  const abs = path.resolve(process.cwd(), file)
  let text: string
  try {
    text = await fs.readFile(abs, 'utf8')
  } catch (e) {
    throw new ConfigError(`config_unreadable:${abs}:${e instanceof Error ? e.message : String(e)}`)
  }
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (e) {
    throw new ConfigError(`config_not_json:${abs}:${e instanceof Error ? e.message : String(e)}`)
  }
  return loadPickerConfig(parsed)
}
