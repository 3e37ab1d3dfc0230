import type { CreatureStats, GameConfig } from './schema'

export const DEFAULTS: GameConfig = {
  __version: 1,
  classes: {
    Mage: { maxSpellLevel: 0, castingStat: 'intellect' },
    Cleric: { maxSpellLevel: 0, castingStat: 'wisdom' },
    Fighter: { maxSpellLevel: 5, castingStat: 'intellect' },
  },
  spells: {},
  creatures: {},
  mobSpellLists: {},
  balance: {
    BASE_HIT_CHANCE: 0.5,
    MAX_ROOM_MOBS: 50,
    FATIGUE_SECONDS_PER_ROUND: 10,
    FAILURE: { BASE: 0.05, PER_LEVEL: 0.1, PER_STAT_POINT: 0.01, CAP: 0.5 },
    HUNGER_MAX: 100,
    THIRST_MAX: 100,
    POISON: { DURATION: 5, DICE: '1d2' },
    DEBUFF_DURATION: 5,
    DRAIN_DURATION: 10,
    DEFAULT_DICE: { damage: '1d6', heal: '1d8', drainMana: '-1d2', drainStat: '-1d5' },
    MOB_CASTING: {
      BASE_MANA: 50, MANA_PER_LEVEL: 10, REGEN_PER_SECOND: 5,
      FATIGUE_MIN_SECONDS: 15, FATIGUE_PER_LEVEL_SECONDS: 15,
      DEFAULT_COOLDOWN_SECONDS: 10,
      FAILURE: { BASE: 0.1, PER_LEVEL: 0.15, PER_STAT_MOD: 0.02, PER_SKILL_STEP: 0.01, FLOOR: 0.05, CEIL: 0.95 },
    },
  },
}

export const DEFAULT_CREATURE_STATS: CreatureStats = {
  strength: 12, dexterity: 10, constitution: 12, vitality: 10, intellect: 8, wisdom: 10, charisma: 6,
}
