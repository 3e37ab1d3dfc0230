import { CONFIG } from '@config/store'
import type { RandomSource } from './dice'

export function failureChance(spellLevel: number, casterLevel: number, castingStat: number): number {
  const { FAILURE } = CONFIG().balance
  const levelGap = Math.max(0, spellLevel - casterLevel)
  const statModifier = (castingStat - 10) / 2
  const raw = FAILURE.BASE + FAILURE.PER_LEVEL * levelGap - FAILURE.PER_STAT_POINT * statModifier
  return clamp(raw, 0, FAILURE.CAP)
}

export function rollFizzle(chance: number, random: RandomSource): boolean {
  return random() < chance
}

/** Fatigue in milliseconds: a base per round, counting at least one round. */
export function fatigueDurationMs(cooldownRounds: number): number {
  const { FATIGUE_SECONDS_PER_ROUND } = CONFIG().balance
  return FATIGUE_SECONDS_PER_ROUND * Math.max(1, cooldownRounds) * 1000
}

export function mobMaxMana(level: number, skill: number): number {
  const { MOB_CASTING } = CONFIG().balance
  return MOB_CASTING.BASE_MANA + level * MOB_CASTING.MANA_PER_LEVEL + Math.floor(skill / 2)
}

export function mobFatigueSeconds(spellLevel: number, mobLevel: number): number {
  const { MOB_CASTING } = CONFIG().balance
  return Math.max(MOB_CASTING.FATIGUE_MIN_SECONDS, (spellLevel - mobLevel) * MOB_CASTING.FATIGUE_PER_LEVEL_SECONDS)
}

export function mobFailureChance(spellLevel: number, mobLevel: number, castingStat: number, skill: number): number {
  const { FAILURE } = CONFIG().balance.MOB_CASTING
  const levelGap = Math.max(0, spellLevel - mobLevel)
  const statModifier = Math.floor((castingStat - 10) / 2)
  const raw =
    FAILURE.BASE +
    FAILURE.PER_LEVEL * levelGap -
    FAILURE.PER_STAT_MOD * statModifier -
    ((skill - 50) / 10) * FAILURE.PER_SKILL_STEP
  return clamp(raw, FAILURE.FLOOR, FAILURE.CEIL)
}

export function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) {
    return min
  }
  if (value < min) return min
  if (value > max) return max
  return value
}
