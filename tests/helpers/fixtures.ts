export const TEST_CONFIG = {
  __version: 1,
  classes: {
    Mage: { maxSpellLevel: 0, castingStat: 'intellect' },
    Fighter: { maxSpellLevel: 2, castingStat: 'intellect' },
    Cleric: { maxSpellLevel: 0, castingStat: 'wisdom' },
  },
  spells: {
    bolt: {
      name: 'Bolt',
      description: 'A crackling bolt.',
      family: 'damage',
      level: 1,
      manaCost: 15,
      cooldown: 2,
      requiresTarget: true,
      damage: '1d6',
      damageType: 'fire',
    },
    deep_bolt: { name: 'Deep Bolt', family: 'damage', level: 4, manaCost: 5, requiresTarget: true, damage: '1d6' },
    warlord_strike: {
      name: 'Warlord Strike',
      family: 'damage',
      level: 1,
      manaCost: 5,
      requiresTarget: true,
      classRestriction: 'Warlord',
    },
    firestorm: { name: 'Firestorm', family: 'damage', level: 3, manaCost: 10, area: 'Area', damage: '2d6', damageType: 'fire' },
    venom: {
      name: 'Venom',
      family: 'damage',
      level: 1,
      manaCost: 5,
      requiresTarget: true,
      damage: '1d4',
      damageType: 'poison',
      effectAmount: '1d2',
      effectDuration: 3,
    },
    mend: { name: 'Mend', family: 'heal', level: 1, manaCost: 5, healAmount: '1d8' },
    mass_mend: { name: 'Mass Mend', family: 'heal', level: 2, manaCost: 10, area: 'Area', healAmount: '1d8' },
    antidote: { name: 'Antidote', family: 'heal', effect: 'cure_poison', level: 1, manaCost: 5 },
    renew: { name: 'Renew', family: 'heal', effect: 'regeneration', level: 1, manaCost: 5, healAmount: '1d8' },
    feast: { name: 'Feast', family: 'heal', effect: 'cure_hunger', level: 1, manaCost: 5, area: 'Area' },
    quench: { name: 'Quench', family: 'heal', effect: 'cure_thirst', level: 1, manaCost: 5 },
    unbind: { name: 'Unbind', family: 'heal', effect: 'cure_paralysis', level: 1, manaCost: 5, area: 'Area' },
    restore: { name: 'Restore', family: 'heal', effect: 'cure_drain', level: 1, manaCost: 5 },
    shield: { name: 'Shield', family: 'buff', effect: 'ac_bonus', level: 1, manaCost: 5, bonusAmount: 2, duration: 4 },
    might: { name: 'Might', family: 'enhancement', effect: 'enhance_strength', level: 1, manaCost: 5, effectAmount: '1d4', duration: 5 },
    ward: { name: 'Ward', family: 'buff', effect: 'ac_bonus', level: 1, manaCost: 5, area: 'Area', bonusAmount: 1, duration: 3 },
    glow: { name: 'Glow', family: 'buff', effect: 'glow', level: 1, manaCost: 5 },
    hold: { name: 'Hold', family: 'debuff', effect: 'paralyze', level: 1, manaCost: 5, effectDuration: 2 },
    acid_cloud: {
      name: 'Acid Cloud',
      family: 'debuff',
      effect: 'acid',
      level: 1,
      manaCost: 5,
      area: 'Area',
      damage: '1d4',
      damageType: 'acid',
      effectAmount: '1d3',
      effectDuration: 2,
    },
    leech: { name: 'Leech', family: 'drain', effect: 'drain_mana', level: 1, manaCost: 6, damage: '1d4', effectAmount: '-1d6' },
    siphon: { name: 'Siphon', family: 'drain', effect: 'drain_health', level: 1, manaCost: 5, damage: '2d6' },
    sap: {
      name: 'Sap',
      family: 'drain',
      effect: 'drain_body',
      level: 1,
      manaCost: 5,
      damage: '1d4',
      effectAmount: '-1d3',
      effectDuration: 4,
    },
    familiar: { name: 'Familiar', family: 'summon', level: 2, manaCost: 15, cooldown: 5, scalesSummonWithLevel: true },
  },
  creatures: {
    rat: { name: 'rat', level: 1, type: 'beast', maxHp: 6 },
    imp: { name: 'imp', level: 3, type: 'demon', maxHp: 12, armorClass: 1, maxMana: 10 },
    wolf: { name: 'wolf', level: 6, type: 'beast', maxHp: 30 },
    bear: { name: 'bear', level: 7, type: 'beast', maxHp: 40 },
    wyrm: { name: 'wyrm', level: 4, type: 'beast', terrain: 'special', maxHp: 35 },
  },
  mobSpellLists: {
    generic_caster: { spells: ['bolt'], healThreshold: 0.3, skill: 50 },
    shaman: { spells: ['bolt', 'mend'], healThreshold: 0.4, skill: 50 },
  },
  balance: {},
}
