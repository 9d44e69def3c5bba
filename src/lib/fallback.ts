import { getErrorMessage } from './errors'

export type FallbackStrategy<TInput, TOutput> = {
  label: string
  // null means "not my shape / no answer", try the next one
  attempt: (input: TInput) => TOutput | null
}

export type FallbackResult<TOutput> =
  | { ok: true; value: TOutput; label: string; reasons: string[] }
  | { ok: false; reasons: string[] }

/**
 * Runs strategies in order and returns the first non-null answer.
 * A strategy that throws is recorded as a reason and skipped.
 */
export const firstSuccessful = <TInput, TOutput>(
  strategies: ReadonlyArray<FallbackStrategy<TInput, TOutput>>,
  input: TInput
): FallbackResult<TOutput> => {
  const reasons: string[] = []
  for (const strategy of strategies) {
    try {
      const value = strategy.attempt(input)
      if (value !== null) return { ok: true, value, label: strategy.label, reasons }
      reasons.push(`${strategy.label}: no_match`)
    } catch (error) {
      reasons.push(`${strategy.label}: ${getErrorMessage(error)}`)
    }
  }
  return { ok: false, reasons }
}
