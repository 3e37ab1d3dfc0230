import { DEFAULT_CREATURE_STATS, DEFAULTS } from '@config/defaults';
import { SPELL_FAMILIES, STAT_KEYS } from '@config/schema';
import type {
  Balance,
  ClassDef,
  CreatureDef,
  GameConfig,
  MobSpellListDef,
  SpellDef,
  SummonFilter,
} from '@config/schema';
import { logger } from '@engine/logger';
import { z } from 'zod';

const log = logger.child({ module: 'validate' });

const STAT_ALIASES: Record<string, string> = {
  intelligence: 'intellect',
  int: 'intellect',
  wis: 'wisdom',
  cha: 'charisma',
  str: 'strength',
  dex: 'dexterity',
  agility: 'dexterity',
  con: 'constitution',
  physique: 'constitution',
  stamina: 'vitality',
};

const toNumber = (val: unknown): number | undefined => {
  if (val === '' || val === null || val === undefined || typeof val === 'boolean') return undefined;
  const num = Number(val);
  return Number.isFinite(num) ? num : undefined;
};

const toLower = (val: unknown): unknown => (typeof val === 'string' ? val.trim().toLowerCase() : val);

const toStatKey = (val: unknown): unknown => {
  const lower = toLower(val);
  return typeof lower === 'string' ? STAT_ALIASES[lower] ?? lower : lower;
};

const coerceNumber = () => z.preprocess(toNumber, z.number().finite().optional());

const numberOr = (fallback: number) =>
  coerceNumber()
    .transform((val) => val ?? fallback)
    .catch(fallback);

const booleanOr = (fallback: boolean) =>
  z
    .preprocess((val) => {
      if (typeof val === 'boolean') return val;
      if (val === 'true' || val === 1) return true;
      if (val === 'false' || val === 0) return false;
      return undefined;
    }, z.boolean().optional())
    .transform((val) => val ?? fallback)
    .catch(fallback);

const optionalString = () =>
  z
    .preprocess((val) => {
      if (typeof val === 'string') return val.trim() === '' ? undefined : val;
      if (typeof val === 'number') return String(val);
      return undefined;
    }, z.string().optional())
    .catch(undefined);

const stringOr = (fallback: string) => optionalString().transform((val) => val ?? fallback);

const rows = () => z.record(z.unknown()).catch({});

const SummonSchema = z
  .object({
    minLevel: numberOr(1),
    maxLevel: numberOr(1),
    type: optionalString(),
    allowSpecialTerrain: booleanOr(false),
  })
  .strip()
  .catch({ minLevel: 1, maxLevel: 1, allowSpecialTerrain: false });

const SpellSchema = z
  .object({
    id: optionalString(),
    name: optionalString(),
    description: optionalString(),
    family: z.preprocess(toLower, z.enum(SPELL_FAMILIES)),
    effect: z.preprocess(toLower, z.string().optional()).catch(undefined),
    level: numberOr(1),
    manaCost: numberOr(0),
    cooldown: numberOr(0),
    area: z.preprocess(toLower, z.enum(['single', 'area'])).catch('single'),
    requiresTarget: booleanOr(false),
    classRestriction: optionalString(),
    scalesWithLevel: booleanOr(false),
    scalesSummonWithLevel: booleanOr(false),
    damage: optionalString(),
    damageType: z.preprocess(toLower, z.string().optional()).catch(undefined),
    healAmount: optionalString(),
    effectAmount: optionalString(),
    bonusAmount: numberOr(0),
    duration: numberOr(0),
    effectDuration: coerceNumber().catch(undefined),
    summon: SummonSchema,
    messages: z.object({ cast: optionalString(), hit: optionalString() }).strip().catch({}),
  })
  .strip();

const ClassSchema = z
  .object({
    maxSpellLevel: numberOr(0),
    castingStat: z.preprocess(toStatKey, z.enum(STAT_KEYS)).catch('intellect'),
  })
  .strip();

const CreatureSchema = z
  .object({
    id: optionalString(),
    name: optionalString(),
    level: numberOr(1),
    type: optionalString(),
    terrain: optionalString(),
    maxHp: numberOr(10),
    armorClass: numberOr(0),
    maxMana: numberOr(0),
    stats: z
      .object({
        strength: numberOr(DEFAULT_CREATURE_STATS.strength),
        dexterity: numberOr(DEFAULT_CREATURE_STATS.dexterity),
        constitution: numberOr(DEFAULT_CREATURE_STATS.constitution),
        vitality: numberOr(DEFAULT_CREATURE_STATS.vitality),
        intellect: numberOr(DEFAULT_CREATURE_STATS.intellect),
        wisdom: numberOr(DEFAULT_CREATURE_STATS.wisdom),
        charisma: numberOr(DEFAULT_CREATURE_STATS.charisma),
      })
      .strip()
      .catch({ ...DEFAULT_CREATURE_STATS }),
  })
  .strip();

const MobSpellListSchema = z
  .object({
    spells: z.array(optionalString()).catch([]),
    healThreshold: numberOr(0.3),
    skill: numberOr(50),
  })
  .strip();

const B = DEFAULTS.balance;

const BalanceSchema = z
  .object({
    BASE_HIT_CHANCE: numberOr(B.BASE_HIT_CHANCE),
    MAX_ROOM_MOBS: numberOr(B.MAX_ROOM_MOBS),
    FATIGUE_SECONDS_PER_ROUND: numberOr(B.FATIGUE_SECONDS_PER_ROUND),
    FAILURE: z
      .object({
        BASE: numberOr(B.FAILURE.BASE),
        PER_LEVEL: numberOr(B.FAILURE.PER_LEVEL),
        PER_STAT_POINT: numberOr(B.FAILURE.PER_STAT_POINT),
        CAP: numberOr(B.FAILURE.CAP),
      })
      .strip()
      .catch({ ...B.FAILURE }),
    HUNGER_MAX: numberOr(B.HUNGER_MAX),
    THIRST_MAX: numberOr(B.THIRST_MAX),
    POISON: z
      .object({ DURATION: numberOr(B.POISON.DURATION), DICE: stringOr(B.POISON.DICE) })
      .strip()
      .catch({ ...B.POISON }),
    DEBUFF_DURATION: numberOr(B.DEBUFF_DURATION),
    DRAIN_DURATION: numberOr(B.DRAIN_DURATION),
    DEFAULT_DICE: z
      .object({
        damage: stringOr(B.DEFAULT_DICE.damage),
        heal: stringOr(B.DEFAULT_DICE.heal),
        drainMana: stringOr(B.DEFAULT_DICE.drainMana),
        drainStat: stringOr(B.DEFAULT_DICE.drainStat),
      })
      .strip()
      .catch({ ...B.DEFAULT_DICE }),
    MOB_CASTING: z
      .object({
        BASE_MANA: numberOr(B.MOB_CASTING.BASE_MANA),
        MANA_PER_LEVEL: numberOr(B.MOB_CASTING.MANA_PER_LEVEL),
        REGEN_PER_SECOND: numberOr(B.MOB_CASTING.REGEN_PER_SECOND),
        FATIGUE_MIN_SECONDS: numberOr(B.MOB_CASTING.FATIGUE_MIN_SECONDS),
        FATIGUE_PER_LEVEL_SECONDS: numberOr(B.MOB_CASTING.FATIGUE_PER_LEVEL_SECONDS),
        DEFAULT_COOLDOWN_SECONDS: numberOr(B.MOB_CASTING.DEFAULT_COOLDOWN_SECONDS),
        FAILURE: z
          .object({
            BASE: numberOr(B.MOB_CASTING.FAILURE.BASE),
            PER_LEVEL: numberOr(B.MOB_CASTING.FAILURE.PER_LEVEL),
            PER_STAT_MOD: numberOr(B.MOB_CASTING.FAILURE.PER_STAT_MOD),
            PER_SKILL_STEP: numberOr(B.MOB_CASTING.FAILURE.PER_SKILL_STEP),
            FLOOR: numberOr(B.MOB_CASTING.FAILURE.FLOOR),
            CEIL: numberOr(B.MOB_CASTING.FAILURE.CEIL),
          })
          .strip()
          .catch({ ...B.MOB_CASTING.FAILURE }),
      })
      .strip()
      .catch({ ...B.MOB_CASTING, FAILURE: { ...B.MOB_CASTING.FAILURE } }),
  })
  .strip()
  .catch(structuredClone(B));

const DocumentSchema = z
  .object({
    __version: numberOr(1),
    classes: rows(),
    spells: rows(),
    creatures: rows(),
    mobSpellLists: rows(),
    balance: BalanceSchema,
  })
  .strip()
  .catch({
    __version: 1,
    classes: {},
    spells: {},
    creatures: {},
    mobSpellLists: {},
    balance: structuredClone(B),
  });

function repairRows<S extends z.ZodTypeAny, T>(
  input: Record<string, unknown>,
  schema: S,
  scope: string,
  build: (key: string, row: z.output<S>) => T,
): Record<string, T> {
  const out: Record<string, T> = {};
  for (const [key, value] of Object.entries(input)) {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      log.warn({ scope, key, issues: parsed.error.issues.length }, 'dropping unrepairable row');
      continue;
    }
    out[key] = build(key, parsed.data);
  }
  return out;
}

const nonNegativeInt = (value: number) => Math.max(0, Math.floor(value));

function toSpellDef(key: string, row: z.output<typeof SpellSchema>): SpellDef {
  const id = row.id ?? key;
  const summon: SummonFilter = {
    ...row.summon,
    minLevel: nonNegativeInt(row.summon.minLevel),
    maxLevel: nonNegativeInt(row.summon.maxLevel),
  };
  return {
    ...row,
    id,
    name: row.name ?? id,
    level: nonNegativeInt(row.level),
    manaCost: nonNegativeInt(row.manaCost),
    cooldown: nonNegativeInt(row.cooldown),
    duration: nonNegativeInt(row.duration),
    summon,
  };
}

function toCreatureDef(key: string, row: z.output<typeof CreatureSchema>): CreatureDef {
  const id = row.id ?? key;
  return {
    ...row,
    id,
    name: row.name ?? id,
    level: nonNegativeInt(row.level),
    maxHp: Math.max(1, Math.floor(row.maxHp)),
  };
}

function toClassDef(_key: string, row: z.output<typeof ClassSchema>): ClassDef {
  return { ...row, maxSpellLevel: nonNegativeInt(row.maxSpellLevel) };
}

function toMobSpellList(_key: string, row: z.output<typeof MobSpellListSchema>): MobSpellListDef {
  return { ...row, spells: row.spells.filter((id): id is string => typeof id === 'string') };
}

export function migrate(cfg: GameConfig): GameConfig {
  if (!cfg.__version || cfg.__version === 1) {
    return { ...cfg, __version: 1 };
  }
  return cfg;
}

export function validateAndRepair(input: unknown): GameConfig {
  const doc = DocumentSchema.parse(input ?? {});
  const balance: Balance = doc.balance;
  const merged: GameConfig = {
    __version: doc.__version,
    classes: { ...DEFAULTS.classes, ...repairRows(doc.classes, ClassSchema, 'classes', toClassDef) },
    spells: repairRows(doc.spells, SpellSchema, 'spells', toSpellDef),
    creatures: repairRows(doc.creatures, CreatureSchema, 'creatures', toCreatureDef),
    mobSpellLists: repairRows(doc.mobSpellLists, MobSpellListSchema, 'mobSpellLists', toMobSpellList),
    balance,
  };
  return migrate(merged);
}
