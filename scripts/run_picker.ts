import { readPickerConfig } from '../services/config/picker_config'
import { loadMarketHistory, loadThemesMapping, resolveStockMeta, writeCandidates } from '../services/io/market_history'
import { runPicker } from '../services/picker/picker'
import { ConfigError, PickerError } from '../services/lib/errors'
import { envInt, envString, loadEnv, parseDateArg, todayIso } from './lib/env'
import { printTop } from './lib/print'

async function main() {
  loadEnv()
  const tradeDate = parseDateArg(process.argv) ?? todayIso()
  const cfg = await readPickerConfig(envString('PICKER_CONFIG', 'config/picker.json'))
  const history = await loadMarketHistory(envString('PICKER_MARKET_DIR', 'fixtures/market'), tradeDate, envInt('PICKER_HISTORY_DAYS', 60))
  const themes = cfg.sector_mode === 'themes'
    ? await loadThemesMapping(envString('PICKER_THEMES_MAPPING', 'fixtures/themes_mapping.json'))
    : null
  const meta = resolveStockMeta(history.meta, cfg.sector_mode, themes)

  const res = runPicker({ history: history.bars, meta }, tradeDate, cfg)
  const file = await writeCandidates(envString('PICKER_OUT_DIR', 'out'), tradeDate, {
    trade_date: res.trade_date,
    columns: res.candidates.columns,
    rows: res.candidates.rows,
    strong_sectors: res.strong_sectors,
    fallbacks_used: res.fallbacks_used,
  })
  console.log(`PICKER ${tradeDate}: candidates=${res.candidates.rows.length} -> ${file}`)
  printTop(res.candidates.rows, meta)
}

main().catch(e => {
  if (e instanceof ConfigError) console.error('PICKER config error', { message: e.message, details: e.details })
  else if (e instanceof PickerError) console.error('PICKER error', { stage: e.stage, message: e.message })
  else console.error('PICKER error', e)
  process.exit(1)
})
