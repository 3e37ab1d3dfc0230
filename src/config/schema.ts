export const STAT_KEYS = ['strength', 'dexterity', 'constitution', 'vitality', 'intellect', 'wisdom', 'charisma'] as const
export type StatKey = typeof STAT_KEYS[number]

export const SPELL_FAMILIES = ['damage', 'heal', 'buff', 'enhancement', 'debuff', 'drain', 'summon'] as const
export type SpellFamily = typeof SPELL_FAMILIES[number]

export type AreaOfEffect = 'single' | 'area'

export interface SummonFilter {
  minLevel: number; maxLevel: number
  type?: string
  allowSpecialTerrain: boolean
}

export interface SpellMessages { cast?: string; hit?: string }

export interface SpellDef {
  id: string; name: string; description?: string
  family: SpellFamily
  effect?: string
  level: number
  manaCost: number; cooldown: number
  area: AreaOfEffect; requiresTarget: boolean
  classRestriction?: string
  scalesWithLevel: boolean; scalesSummonWithLevel: boolean
  damage?: string; damageType?: string
  healAmount?: string
  effectAmount?: string; bonusAmount: number
  duration: number; effectDuration?: number
  summon: SummonFilter
  messages: SpellMessages
}

export interface ClassDef { maxSpellLevel: number; castingStat: StatKey }

export type CreatureStats = Record<StatKey, number>

export interface CreatureDef {
  id: string; name: string; level: number
  type?: string; terrain?: string
  maxHp: number; armorClass: number; maxMana: number
  stats: CreatureStats
}

export interface MobSpellListDef { spells: string[]; healThreshold: number; skill: number }

export interface Balance {
  BASE_HIT_CHANCE: number
  MAX_ROOM_MOBS: number
  FATIGUE_SECONDS_PER_ROUND: number
  FAILURE: { BASE: number; PER_LEVEL: number; PER_STAT_POINT: number; CAP: number }
  HUNGER_MAX: number
  THIRST_MAX: number
  POISON: { DURATION: number; DICE: string }
  DEBUFF_DURATION: number
  DRAIN_DURATION: number
  DEFAULT_DICE: { damage: string; heal: string; drainMana: string; drainStat: string }
  MOB_CASTING: {
    BASE_MANA: number; MANA_PER_LEVEL: number; REGEN_PER_SECOND: number
    FATIGUE_MIN_SECONDS: number; FATIGUE_PER_LEVEL_SECONDS: number
    DEFAULT_COOLDOWN_SECONDS: number
    FAILURE: { BASE: number; PER_LEVEL: number; PER_STAT_MOD: number; PER_SKILL_STEP: number; FLOOR: number; CEIL: number }
  }
}

export interface GameConfig {
  __version: number
  classes: Record<string, ClassDef>
  spells: Record<string, SpellDef>
  creatures: Record<string, CreatureDef>
  mobSpellLists: Record<string, MobSpellListDef>
  balance: Balance
}
