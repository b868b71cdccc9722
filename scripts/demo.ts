import { readPickerConfig } from '../services/config/picker_config'
import { DEMO_DEFAULTS, makeDemoMarket } from '../services/demo/demo_market'
import { resolveStockMeta } from '../services/io/market_history'
import { runPicker } from '../services/picker/picker'
import { PickerError } from '../services/lib/errors'
import { envString, loadEnv, parseDateArg, todayIso } from './lib/env'
import { printTop } from './lib/print'

async function main() {
  loadEnv()
  const cfg = await readPickerConfig(envString('PICKER_CONFIG', 'config/picker.demo.json'))
  const market = makeDemoMarket({ ...DEMO_DEFAULTS, asof: parseDateArg(process.argv) ?? todayIso() })
  const meta = resolveStockMeta(market.meta, cfg.sector_mode)
  // the synthetic calendar skips weekends, so evaluate its last session
  const tradeDate = market.bars[market.bars.length - 1]?.trade_date
  if (!tradeDate) {
    console.log('DEMO: no bars generated')
    return
  }
  const res = runPicker({ history: market.bars, meta }, tradeDate, cfg)
  console.log(`DEMO ${tradeDate}: strong=${res.strong_sectors.map(s => s.sector_id).join(',') || '-'} leaders=${res.leaders.length} candidates=${res.candidates.rows.length} fallbacks=${res.fallbacks_used.join(',') || '-'}`)
  printTop(res.candidates.rows, meta)
}

main().catch(e => {
  console.error('DEMO error', e instanceof PickerError ? { stage: e.stage, message: e.message } : e)
  process.exit(1)
})
