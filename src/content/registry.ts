import type { ClassDef, CreatureDef, GameConfig, MobSpellListDef } from '@config/schema';
import { subscribe } from '@config/store';
import { toSpells } from '@content/adapters';
import type { RuntimeSpell } from '@content/adapters';
import { logger } from '@engine/logger';
import type { ClassCatalog, CreatureCatalog, SpellCatalog } from '@engine/magic/ports';

type SpellMap = Record<string, RuntimeSpell>;
type ClassMap = Record<string, ClassDef>;
type CreatureMap = Record<string, CreatureDef>;
type MobSpellListMap = Record<string, MobSpellListDef>;

const log = logger.child({ module: 'registry' });

let spells: SpellMap = {};
let classes: ClassMap = {};
let creatures: CreatureMap = {};
let mobSpellLists: MobSpellListMap = {};

export function rebuildFromConfig(cfg: GameConfig) {
  spells = toSpells(cfg);
  classes = { ...cfg.classes };
  creatures = { ...cfg.creatures };
  mobSpellLists = { ...cfg.mobSpellLists };
  const unsupported = Object.values(spells).filter((spell) => spell.resolution.type === 'unsupported');
  log.info(
    { spells: Object.keys(spells).length, unsupported: unsupported.map((spell) => spell.id) },
    'spell registry rebuilt',
  );
}

export function bindToConfigStore() {
  return subscribe(rebuildFromConfig);
}

export const Spells = () => spells;
export const Classes = () => classes;
export const Creatures = () => creatures;
export const MobSpellLists = () => mobSpellLists;

function findClass(className: string): ClassDef | undefined {
  const exact = classes[className];
  if (exact) return exact;
  const lower = className.toLowerCase();
  const key = Object.keys(classes).find((name) => name.toLowerCase() === lower);
  return key ? classes[key] : undefined;
}

export const spellCatalog: SpellCatalog = {
  get: (spellId) => spells[spellId] ?? null,
};

export const classCatalog: ClassCatalog = {
  maxCastableSpellLevel: (className) => findClass(className)?.maxSpellLevel ?? 0,
  castingStat: (className) => findClass(className)?.castingStat ?? 'intellect',
};

export const creatureCatalog: CreatureCatalog = {
  all: () => Object.values(creatures),
};
