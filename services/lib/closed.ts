// Fail-closed comparisons: a missing operand never satisfies a threshold,
// whichever side of the threshold the filter checks.

export type Maybe = number | null | undefined

export function known(v: Maybe): v is number {
  return typeof v === 'number' && Number.isFinite(v)
}

export function atLeast(v: Maybe, threshold: number): boolean {
  return known(v) && v >= threshold
}

export function atMost(v: Maybe, threshold: number): boolean {
  return known(v) && v <= threshold
}

export function within(v: Maybe, min: number, max: number): boolean {
  return known(v) && v >= min && v <= max
}

export function above(v: Maybe, ref: Maybe): boolean {
  return known(v) && known(ref) && v > ref
}

export function isSet(flag: boolean | null | undefined): boolean {
  return flag === true
}

// Scoring only: filters must go through the comparisons above
export function orValue(v: Maybe, fallback: number): number {
  return known(v) ? v : fallback
}

export function orZero(v: Maybe): number {
  return orValue(v, 0)
}
