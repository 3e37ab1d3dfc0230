import type {
  AreaOfEffect,
  Balance,
  GameConfig,
  SpellDef,
  SpellFamily,
  SpellMessages,
  StatKey,
} from '@config/schema';

type AnyRecord<T> = Record<string, T>;

export type CureKind = 'poison' | 'hunger' | 'thirst' | 'paralysis' | 'drain';
export type DamageOverTimeKind = 'poison' | 'burning' | 'bleeding' | 'acid';

export type BuffEffect =
  | { kind: 'ac_bonus' }
  | { kind: 'invisibility' }
  | { kind: 'stat_buff'; stats: StatKey[] };

export type DebuffEffect =
  | { kind: 'paralyze' }
  | { kind: 'charm' }
  | { kind: DamageOverTimeKind; dice: string }
  | { kind: 'stat_drain'; stats: StatKey[]; dice: string };

export type DrainEffect =
  | { kind: 'mana'; dice: string }
  | { kind: 'health' }
  | { kind: 'stat'; stats: StatKey[]; dice: string; duration: number };

export interface DamageRoll {
  dice: string;
  damageType: string;
}

export type Resolution =
  | { type: 'damage'; roll: DamageRoll; poison: { duration: number; dice: string } | null }
  | { type: 'heal'; dice: string }
  | { type: 'cure'; cure: CureKind }
  | { type: 'buff'; buff: BuffEffect; amount: number; duration: number }
  | { type: 'enhancement'; buff: BuffEffect; dice: string | null; fallbackAmount: number; duration: number }
  | { type: 'debuff'; debuff: DebuffEffect; duration: number; damage: DamageRoll | null }
  | { type: 'drain'; roll: DamageRoll; drain: DrainEffect | null }
  | {
      type: 'summon';
      scaled: boolean;
      minLevel: number;
      maxLevel: number;
      creatureType?: string;
      allowSpecialTerrain: boolean;
    }
  | { type: 'unsupported'; reason: string };

export interface RuntimeSpell {
  id: string;
  name: string;
  description?: string;
  family: SpellFamily;
  effectKind: string;
  level: number;
  manaCost: number;
  cooldown: number;
  area: AreaOfEffect;
  requiresTarget: boolean;
  classRestriction?: string;
  scalesWithLevel: boolean;
  messages: SpellMessages;
  resolution: Resolution;
}

const STAT_GROUPS: Record<string, StatKey[]> = {
  agility: ['dexterity'],
  dexterity: ['dexterity'],
  strength: ['strength'],
  constitution: ['constitution'],
  physique: ['constitution'],
  vitality: ['vitality'],
  stamina: ['vitality'],
  intelligence: ['intellect'],
  intellect: ['intellect'],
  wisdom: ['wisdom'],
  charisma: ['charisma'],
  mental: ['intellect', 'wisdom', 'charisma'],
  body: ['strength', 'dexterity', 'constitution'],
};

const DOT_KINDS: readonly DamageOverTimeKind[] = ['poison', 'burning', 'bleeding', 'acid'];

export function statGroup(name: string): StatKey[] | null {
  const group = STAT_GROUPS[name.toLowerCase()];
  return group ? group.slice() : null;
}

function isDotKind(value: string): value is DamageOverTimeKind {
  return DOT_KINDS.some((kind) => kind === value);
}

function defaultEffect(family: SpellFamily): string {
  switch (family) {
    case 'heal':
      return 'heal_hit_points';
    case 'damage':
      return 'damage';
    case 'summon':
      return 'summon';
    default:
      return '';
  }
}

function damageRoll(def: SpellDef, balance: Balance): DamageRoll {
  return {
    dice: def.damage ?? balance.DEFAULT_DICE.damage,
    damageType: def.damageType ?? 'magical',
  };
}

function unsupported(def: SpellDef, effect: string): Resolution {
  return {
    type: 'unsupported',
    reason: `${def.family} spell ${def.id} has unsupported effect '${effect || '(none)'}'`,
  };
}

function compileBuffEffect(effect: string): BuffEffect | null {
  if (effect === 'ac_bonus') return { kind: 'ac_bonus' };
  if (effect === 'invisible' || effect === 'invisibility') return { kind: 'invisibility' };
  const bonus = /^(\w+)_bonus$/.exec(effect);
  const stats = bonus ? statGroup(bonus[1]) : null;
  return stats ? { kind: 'stat_buff', stats } : null;
}

function compileEnhancementEffect(effect: string): BuffEffect | null {
  if (effect === 'ac_bonus') return { kind: 'ac_bonus' };
  const stats = statGroup(effect.replace(/^enhance_/, ''));
  return stats ? { kind: 'stat_buff', stats } : null;
}

function compileDebuffEffect(def: SpellDef, effect: string, balance: Balance): DebuffEffect | null {
  if (effect === 'paralyze' || effect === 'charm') {
    return { kind: effect };
  }
  if (isDotKind(effect)) {
    return { kind: effect, dice: def.effectAmount ?? balance.POISON.DICE };
  }
  const drained = /^(?:drain|stat_drain)_(\w+)$/.exec(effect);
  const stats = drained ? statGroup(drained[1]) : null;
  return stats ? { kind: 'stat_drain', stats, dice: def.effectAmount ?? balance.DEFAULT_DICE.drainStat } : null;
}

function compileDrainEffect(def: SpellDef, effect: string, balance: Balance): DrainEffect | null | undefined {
  if (!effect) return null;
  if (effect === 'drain_mana') {
    return { kind: 'mana', dice: def.effectAmount ?? balance.DEFAULT_DICE.drainMana };
  }
  if (effect === 'drain_health') {
    return { kind: 'health' };
  }
  const drained = /^drain_(\w+)$/.exec(effect);
  const stats = drained ? statGroup(drained[1]) : null;
  if (!stats) return undefined;
  return {
    kind: 'stat',
    stats,
    dice: def.effectAmount ?? balance.DEFAULT_DICE.drainStat,
    duration: def.effectDuration ?? balance.DRAIN_DURATION,
  };
}

function compileResolution(def: SpellDef, effect: string, balance: Balance): Resolution {
  switch (def.family) {
    case 'damage': {
      const roll = damageRoll(def, balance);
      const poison = roll.damageType === 'poison'
        ? {
            duration: def.effectDuration ?? balance.POISON.DURATION,
            dice: def.effectAmount ?? balance.POISON.DICE,
          }
        : null;
      return { type: 'damage', roll, poison };
    }
    case 'heal': {
      if (!effect.startsWith('cure_')) {
        return { type: 'heal', dice: def.healAmount ?? balance.DEFAULT_DICE.heal };
      }
      const cure = /^cure_(poison|hunger|thirst|paralysis|drain)$/.exec(effect);
      if (!cure) return unsupported(def, effect);
      const kinds: Record<string, CureKind> = {
        poison: 'poison',
        hunger: 'hunger',
        thirst: 'thirst',
        paralysis: 'paralysis',
        drain: 'drain',
      };
      return { type: 'cure', cure: kinds[cure[1]] };
    }
    case 'buff': {
      const buff = compileBuffEffect(effect);
      if (!buff) return unsupported(def, effect);
      return { type: 'buff', buff, amount: def.bonusAmount, duration: def.duration };
    }
    case 'enhancement': {
      const buff = compileEnhancementEffect(effect);
      if (!buff) return unsupported(def, effect);
      const dice = def.effectAmount ? def.effectAmount.replace(/^\+/, '') : null;
      return { type: 'enhancement', buff, dice, fallbackAmount: def.bonusAmount, duration: def.duration };
    }
    case 'debuff': {
      const debuff = compileDebuffEffect(def, effect, balance);
      if (!debuff) return unsupported(def, effect);
      return {
        type: 'debuff',
        debuff,
        duration: def.effectDuration ?? balance.DEBUFF_DURATION,
        damage: def.damage ? damageRoll(def, balance) : null,
      };
    }
    case 'drain': {
      const drain = compileDrainEffect(def, effect, balance);
      if (drain === undefined) return unsupported(def, effect);
      return { type: 'drain', roll: damageRoll(def, balance), drain };
    }
    case 'summon':
      return {
        type: 'summon',
        scaled: def.scalesSummonWithLevel,
        minLevel: def.summon.minLevel,
        maxLevel: def.summon.maxLevel,
        creatureType: def.summon.type,
        allowSpecialTerrain: def.summon.allowSpecialTerrain,
      };
  }
}

export function compileSpell(def: SpellDef, balance: Balance): RuntimeSpell {
  const effectKind = def.effect ?? defaultEffect(def.family);
  return {
    id: def.id,
    name: def.name,
    description: def.description,
    family: def.family,
    effectKind,
    level: def.level,
    manaCost: def.manaCost,
    cooldown: def.cooldown,
    area: def.area,
    requiresTarget: def.requiresTarget,
    classRestriction: def.classRestriction,
    scalesWithLevel: def.scalesWithLevel,
    messages: { ...def.messages },
    resolution: compileResolution(def, effectKind, balance),
  };
}

export function toSpells(cfg: GameConfig): AnyRecord<RuntimeSpell> {
  const out: AnyRecord<RuntimeSpell> = {};
  for (const [id, def] of Object.entries(cfg.spells)) {
    out[id] = compileSpell(def, cfg.balance);
  }
  return out;
}
