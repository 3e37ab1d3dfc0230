import { load } from '@config/store'
import {
  bindToConfigStore,
  classCatalog,
  creatureCatalog,
  MobSpellLists,
  spellCatalog,
} from '@content/registry'
import { logger } from '@engine/logger'
import { DefaultAccuracyOracle } from '@engine/magic/accuracy'
import { castSpell } from '@engine/magic/cast'
import { mathRandom, RandomDiceRoller } from '@engine/magic/dice'
import { MobSpellcaster } from '@engine/magic/mobCasting'
import type {
  CharacterRegistry,
  MagicContext,
  Messaging,
  MobLifecycle,
  PartyRegistry,
  RoomOccupancy,
} from '@engine/magic/ports'
import { systemClock } from '@engine/magic/ports'
import { tickCooldowns } from '@engine/magic/resources'
import { showSpellbook, unlearnSpell } from '@engine/magic/spellbook'
import { attachEffect, cure, tick, type EffectFilter } from '@engine/magic/status'
import { RoomTargetFinder } from '@engine/magic/targeting'
import type { CastResult, Entity, StatusEffect } from '@engine/magic/types'

export { applyConfig, CONFIG, exportConfig, importConfig, load, subscribe } from '@config/store'
export { validateAndRepair } from '@content/validate'
export { compileSpell } from '@content/adapters'
export type { Resolution, RuntimeSpell } from '@content/adapters'
export { rebuildFromConfig } from '@content/registry'
export { SpellDataError, isSpellDataError } from '@engine/errors'
export { logger } from '@engine/logger'
export { DefaultAccuracyOracle } from '@engine/magic/accuracy'
export { FixedDiceRoller, RandomDiceRoller, SeededDiceRoller, rollDice, seededRandom } from '@engine/magic/dice'
export type { DiceRoller, RandomSource } from '@engine/magic/dice'
export { MobSpellcaster } from '@engine/magic/mobCasting'
export type * from '@engine/magic/ports'
export { RoomTargetFinder } from '@engine/magic/targeting'
export type * from '@engine/magic/types'
export type { EffectFilter, TickReport } from '@engine/magic/status'

export interface SpellEngine {
  castSpell(casterId: string, spellText: string, targetText?: string | null): CastResult
  tick(entity: Entity): void
  cure(entity: Entity, filter: EffectFilter): number
  /** For traps and consumables that afflict outside a cast. */
  afflict(entity: Entity, effect: StatusEffect): StatusEffect
  tickCooldowns(casterId: string): void
  showSpellbook(casterId: string): boolean
  unlearnSpell(casterId: string, input: string): boolean
}

export function createSpellEngine(ctx: MagicContext): SpellEngine {
  return {
    castSpell: (casterId, spellText, targetText = null) => castSpell(ctx, casterId, spellText, targetText),
    tick: (entity) => {
      tick(ctx, entity)
    },
    cure: (entity, filter) => cure(entity, filter),
    afflict: (entity, effect) => attachEffect(entity, effect),
    tickCooldowns: (casterId) => {
      const caster = ctx.characters.get(casterId)
      if (caster) tickCooldowns(caster)
    },
    showSpellbook: (casterId) => showSpellbook(ctx, casterId),
    unlearnSpell: (casterId, input) => unlearnSpell(ctx, casterId, input),
  }
}

/** What the host game supplies; the rest comes from the config registry. */
export interface HostServices {
  characters: CharacterRegistry
  rooms: RoomOccupancy
  mobs: MobLifecycle
  parties: PartyRegistry
  messaging: Messaging
}

export function createMagicContext(host: HostServices, overrides: Partial<MagicContext> = {}): MagicContext {
  const random = overrides.random ?? mathRandom
  return {
    spells: spellCatalog,
    classes: classCatalog,
    creatures: creatureCatalog,
    targets: new RoomTargetFinder(host.rooms),
    accuracy: new DefaultAccuracyOracle(random),
    dice: new RandomDiceRoller(random),
    clock: systemClock,
    ...host,
    ...overrides,
    random,
  }
}

export function createMobSpellcaster(ctx: Pick<MagicContext, 'spells' | 'clock' | 'random'>): MobSpellcaster {
  return new MobSpellcaster({ spells: ctx.spells, clock: ctx.clock, random: ctx.random, lists: MobSpellLists })
}

/** Loads the config file and keeps the spell registry in step with later edits. */
export async function bootstrap(options?: { path?: string }) {
  const cfg = await load(options)
  const unsubscribe = bindToConfigStore()
  logger.info({ spells: Object.keys(cfg.spells).length }, 'spell engine ready')
  return unsubscribe
}
