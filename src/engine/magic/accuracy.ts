import type { RandomSource } from './dice'
import type { AttackOutcome, CombatAccuracyOracle } from './ports'
import { clamp } from './rules'
import type { StatBlock } from './types'

export function hitChance(attacker: StatBlock, defender: StatBlock, baseHitChance: number): number {
  return clamp(baseHitChance + (attacker.dexterity - defender.dexterity) * 0.02, 0.05, 0.95)
}

export function dodgeChance(defender: StatBlock): number {
  return Math.min(0.25, 0.05 + Math.max(0, defender.dexterity - 10) * 0.01)
}

export function deflectChance(armor: number): number {
  return Math.min(0.3, Math.max(0, armor) * 0.03)
}

/** Miss, then dodge, then armor deflection, each with its own draw. */
export class DefaultAccuracyOracle implements CombatAccuracyOracle {
  constructor(private readonly random: RandomSource) {}

  checkOutcome(attackerStats: StatBlock, defenderStats: StatBlock, defenderArmor: number, baseHitChance: number): AttackOutcome {
    if (this.random() > hitChance(attackerStats, defenderStats, baseHitChance)) return 'miss'
    if (this.random() < dodgeChance(defenderStats)) return 'dodge'
    if (this.random() < deflectChance(defenderArmor)) return 'deflect'
    return 'hit'
  }
}
