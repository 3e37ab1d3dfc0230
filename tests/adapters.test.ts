import { describe, expect, it } from 'vitest';

import { DEFAULTS } from '@config/defaults';
import { compileSpell, statGroup } from '@content/adapters';
import type { SpellDef } from '@config/schema';

function def(overrides: Partial<SpellDef> & Pick<SpellDef, 'family'>): SpellDef {
  return {
    id: 'test_spell',
    name: 'Test Spell',
    level: 1,
    manaCost: 0,
    cooldown: 0,
    area: 'single',
    requiresTarget: false,
    scalesWithLevel: false,
    scalesSummonWithLevel: false,
    bonusAmount: 0,
    duration: 0,
    summon: { minLevel: 1, maxLevel: 1, allowSpecialTerrain: false },
    messages: {},
    ...overrides,
  };
}

const balance = DEFAULTS.balance;

describe('compileSpell', () => {
  it('defaults damage spells to magical damage with the default dice', () => {
    const spell = compileSpell(def({ family: 'damage' }), balance);
    expect(spell.effectKind).toBe('damage');
    expect(spell.resolution).toEqual({ type: 'damage', roll: { dice: '1d6', damageType: 'magical' }, poison: null });
  });

  it('adds a lingering poison to poison damage', () => {
    const spell = compileSpell(def({ family: 'damage', damage: '1d4', damageType: 'poison' }), balance);
    expect(spell.resolution).toEqual({
      type: 'damage',
      roll: { dice: '1d4', damageType: 'poison' },
      poison: { duration: 5, dice: '1d2' },
    });
  });

  it('splits heal spells into healing and cures', () => {
    expect(compileSpell(def({ family: 'heal' }), balance).resolution).toEqual({ type: 'heal', dice: '1d8' });
    expect(compileSpell(def({ family: 'heal', effect: 'cure_thirst' }), balance).resolution).toEqual({
      type: 'cure',
      cure: 'thirst',
    });
    expect(compileSpell(def({ family: 'heal', effect: 'cure_sleep' }), balance).resolution.type).toBe('unsupported');
  });

  it('treats any other heal effect as hit point healing', () => {
    const spell = compileSpell(def({ family: 'heal', effect: 'regeneration', healAmount: '8d2-6' }), balance);
    expect(spell.effectKind).toBe('regeneration');
    expect(spell.resolution).toEqual({ type: 'heal', dice: '8d2-6' });
  });

  it('reads buff variants', () => {
    const invisible = compileSpell(def({ family: 'buff', effect: 'invisible', duration: 6 }), balance);
    expect(invisible.resolution).toEqual({ type: 'buff', buff: { kind: 'invisibility' }, amount: 0, duration: 6 });
    const wise = compileSpell(def({ family: 'buff', effect: 'wisdom_bonus', bonusAmount: 2 }), balance);
    expect(wise.resolution).toMatchObject({ buff: { kind: 'stat_buff', stats: ['wisdom'] }, amount: 2 });
  });

  it('reads enhancement stat groups and strips a leading plus', () => {
    const spell = compileSpell(def({ family: 'enhancement', effect: 'enhance_mental', effectAmount: '+1d3' }), balance);
    expect(spell.resolution).toMatchObject({
      type: 'enhancement',
      buff: { kind: 'stat_buff', stats: ['intellect', 'wisdom', 'charisma'] },
      dice: '1d3',
    });
  });

  it('reads debuffs with optional damage', () => {
    const burn = compileSpell(def({ family: 'debuff', effect: 'burning', damage: '1d6', effectDuration: 3 }), balance);
    expect(burn.resolution).toEqual({
      type: 'debuff',
      debuff: { kind: 'burning', dice: '1d2' },
      duration: 3,
      damage: { dice: '1d6', damageType: 'magical' },
    });
    const drain = compileSpell(def({ family: 'debuff', effect: 'drain_agility' }), balance);
    expect(drain.resolution).toMatchObject({ debuff: { kind: 'stat_drain', stats: ['dexterity'], dice: '-1d5' }, duration: 5 });
  });

  it('reads drains, with or without a secondary effect', () => {
    expect(compileSpell(def({ family: 'drain' }), balance).resolution).toMatchObject({ type: 'drain', drain: null });
    expect(compileSpell(def({ family: 'drain', effect: 'drain_mana' }), balance).resolution).toMatchObject({
      drain: { kind: 'mana', dice: '-1d2' },
    });
    expect(compileSpell(def({ family: 'drain', effect: 'drain_stamina' }), balance).resolution).toMatchObject({
      drain: { kind: 'stat', stats: ['vitality'], dice: '-1d5', duration: 10 },
    });
    expect(compileSpell(def({ family: 'drain', effect: 'drain_luck' }), balance).resolution.type).toBe('unsupported');
  });

  it('carries the summon filter', () => {
    const spell = compileSpell(
      def({ family: 'summon', summon: { minLevel: 2, maxLevel: 4, type: 'beast', allowSpecialTerrain: true } }),
      balance,
    );
    expect(spell.resolution).toEqual({
      type: 'summon',
      scaled: false,
      minLevel: 2,
      maxLevel: 4,
      creatureType: 'beast',
      allowSpecialTerrain: true,
    });
  });
});

describe('statGroup', () => {
  it('maps aliases and groups to stat keys', () => {
    expect(statGroup('Physique')).toEqual(['constitution']);
    expect(statGroup('body')).toEqual(['strength', 'dexterity', 'constitution']);
    expect(statGroup('luck')).toBeNull();
  });
});
