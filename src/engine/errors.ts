export class SpellDataError extends Error {
  code = 'SPELL_DATA_INTEGRITY'
  details?: Record<string, unknown>

  constructor(message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = 'SpellDataError'
    this.details = details
  }
}

export function isSpellDataError(error: unknown): error is SpellDataError {
  return error instanceof SpellDataError
}
