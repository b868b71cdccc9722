import fs from 'node:fs'
import path from 'node:path'
import dotenv from 'dotenv'

// .env.local wins over .env: dotenv never overrides a variable already set
export function loadEnv(): void {
  const tryLoad = (p: string) => { if (fs.existsSync(p)) dotenv.config({ path: p }) }
  tryLoad(path.resolve(process.cwd(), '.env.local'))
  tryLoad(path.resolve(process.cwd(), '.env'))
}

export function envString(name: string, fallback: string): string {
  const v = process.env[name]
  return v && v.trim() ? v.trim() : fallback
}

export function envInt(name: string, fallback: number): number {
  const n = Number(process.env[name])
  return Number.isInteger(n) && n > 0 ? n : fallback
}

export function todayIso(): string {
  return new Date().toISOString().slice(0, 10)
}

export function parseDateArg(argv: readonly string[]): string | null {
  const idx = argv.indexOf('--date')
  const v = idx >= 0 ? argv[idx + 1] : undefined
  if (!v) return null
  if (!/^\d{4}-\d{2}-\d{2}$/.test(v)) throw new RangeError(`--date expects YYYY-MM-DD, got ${v}`)
  return v
}
