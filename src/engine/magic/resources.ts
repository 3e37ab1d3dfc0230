import type { RuntimeSpell } from '@content/adapters'
import { fatigueDurationMs } from './rules'
import type { Character } from './types'

// Each check returns the rejection text, or null when the gate is open.

export function checkCooldown(caster: Character, spell: RuntimeSpell): string | null {
  const remaining = caster.cooldowns[spell.id] ?? 0
  if (remaining > 0) {
    return `${spell.name} is still on cooldown (${remaining} rounds remaining).`
  }
  return null
}

export function fatigueRemainingMs(caster: Character, now: number): number {
  return caster.fatigueUntil > now ? caster.fatigueUntil - now : 0
}

export function checkFatigue(caster: Character, now: number): string | null {
  const remaining = fatigueRemainingMs(caster, now)
  if (remaining > 0) {
    return `You are too magically exhausted to cast spells! Wait ${(remaining / 1000).toFixed(1)} more seconds.`
  }
  return null
}

export function checkMana(caster: Character, spell: RuntimeSpell): string | null {
  if (caster.mana < spell.manaCost) {
    return `You don't have enough mana to cast ${spell.name}. (Need ${spell.manaCost}, have ${caster.mana})`
  }
  return null
}

/** Spends the cast. Runs once per accepted cast, before the failure roll. */
export function commitCast(caster: Character, spell: RuntimeSpell, now: number): void {
  caster.mana = Math.max(0, caster.mana - spell.manaCost)
  caster.fatigueUntil = now + fatigueDurationMs(spell.cooldown)
  if (spell.cooldown > 0) {
    caster.cooldowns[spell.id] = spell.cooldown
  }
}

/** Called once per game round by the scheduler. */
export function tickCooldowns(caster: Character): void {
  for (const [spellId, remaining] of Object.entries(caster.cooldowns)) {
    const next = Math.max(0, Math.floor(remaining) - 1)
    if (next <= 0) {
      delete caster.cooldowns[spellId]
    } else {
      caster.cooldowns[spellId] = next
    }
  }
}
