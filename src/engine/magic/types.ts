import type { StatKey } from '@config/schema'

export type { StatKey }

export type StatBlock = Record<StatKey, number>

export type EffectKind =
  | 'poison' | 'burning' | 'bleeding' | 'acid'
  | 'paralyze' | 'charm'
  | 'stat_drain' | 'ac_bonus' | 'invisibility' | 'stat_buff'

export interface StatusEffect {
  /** Spell name, or the hazard kind for traps and consumables. */
  source: string
  /** Sub-variant the effect was created from, e.g. `ac_bonus` or `drain_mental`. */
  effect: string
  kind: EffectKind
  magnitude: number
  remaining: number
  casterId?: string
  /** Damage rolled each tick for damage-over-time kinds. */
  dice?: string
  stats?: StatKey[]
  /** What a stat_drain actually removed, restored on expiry or cure. */
  deltas?: Partial<StatBlock>
  /** Permanent change made when an enhancement landed; never reverted. */
  applied?: Partial<StatBlock>
  stateText?: string
  removalText?: string
}

interface EntityBase {
  id: string; name: string; roomId: string
  level: number
  hp: number; maxHp: number
  mana: number; maxMana: number
  armorClass: number
  stats: StatBlock
  effects: StatusEffect[]
}

export interface Character extends EntityBase {
  kind: 'player'
  className: string
  knownSpells: string[]
  cooldowns: Record<string, number>
  /** Epoch milliseconds; 0 when not fatigued. */
  fatigueUntil: number
  hunger: number; thirst: number
  partyLeaderId?: string
}

export interface Mob extends EntityBase {
  kind: 'mob'
  templateId: string
  type?: string
  hostile: boolean
  aggroTarget?: string
  aggroLastAttack?: number
  summonerId?: string
  partyLeaderId?: string
}

export type Entity = Character | Mob

export type CastOutcome = 'rejected' | 'fizzled' | 'resolved' | 'error'

export interface CastResult { ok: boolean; outcome: CastOutcome; spellId?: string }
