import type { ErrorObject } from 'ajv'

export type PickerStage = 'config' | 'load'

export class PickerError extends Error {
  constructor(message: string, readonly stage: PickerStage) {
    super(message)
    this.name = new.target.name
  }
}

export class ConfigError extends PickerError {
  readonly details: string[]
  constructor(message: string, errors?: ErrorObject[] | null) {
    super(message, 'config')
    this.details = (errors ?? []).map(formatAjvError)
  }
}

export class MarketDataError extends PickerError {
  constructor(message: string, readonly file: string | null = null) {
    super(message, 'load')
  }
}

export function formatAjvError(e: ErrorObject): string {
  const where = e.instancePath || '/'
  return `${where} ${e.message ?? e.keyword}`
}
