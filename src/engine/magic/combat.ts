import type { Resolution, RuntimeSpell } from '@content/adapters'
import { CONFIG } from '@config/store'
import { rollDice, scaledValue } from './dice'
import type { AttackOutcome, MagicContext } from './ports'
import { effectiveArmor, effectiveStat, effectiveStats } from './status'
import type { Character, Entity, Mob } from './types'

export interface CastRequest {
  caster: Character
  spell: RuntimeSpell
  /** Resolved before resources were spent, when the spell names one. */
  target: Entity | null
  targetText: string | null
}

export type ResolutionOf<T extends Resolution['type']> = Extract<Resolution, { type: T }>

export function tellCaster(ctx: MagicContext, caster: Character, text: string) {
  ctx.messaging.sendToPlayer(caster.id, text)
}

export function tellRoom(ctx: MagicContext, caster: Character, text: string) {
  ctx.messaging.broadcastRoomExcept(caster.roomId, caster.id, text)
}

/** Rolls a spell's dice and applies level scaling; never negative. */
export function rollSpellAmount(ctx: MagicContext, dice: string, spell: RuntimeSpell, caster: Character): number {
  const base = rollDice(dice, ctx.dice)
  return Math.max(0, Math.floor(scaledValue(base, spell.scalesWithLevel, caster.level)))
}

/** Spells aim with the caster's casting stat where weapons would use dexterity. */
export function rollSpellAccuracy(ctx: MagicContext, caster: Character, target: Entity): AttackOutcome {
  const castingStat = ctx.classes.castingStat(caster.className)
  const attacker = { ...effectiveStats(caster), dexterity: effectiveStat(caster, castingStat) }
  return ctx.accuracy.checkOutcome(
    attacker,
    effectiveStats(target),
    effectiveArmor(target),
    CONFIG().balance.BASE_HIT_CHANCE,
  )
}

export function reportAvoided(ctx: MagicContext, caster: Character, spell: RuntimeSpell, target: Entity, outcome: AttackOutcome) {
  const who = caster.name
  switch (outcome) {
    case 'miss':
      tellCaster(ctx, caster, `You cast ${spell.name}, but it misses ${target.name}!`)
      tellRoom(ctx, caster, `${who}'s ${spell.name} misses ${target.name}!`)
      return
    case 'dodge':
      tellCaster(ctx, caster, `You cast ${spell.name}, but ${target.name} dodges it!`)
      tellRoom(ctx, caster, `${target.name} dodges ${who}'s ${spell.name}!`)
      return
    case 'deflect':
      tellCaster(ctx, caster, `You cast ${spell.name}, but ${target.name}'s defenses deflect it!`)
      tellRoom(ctx, caster, `${target.name}'s defenses deflect ${who}'s ${spell.name}!`)
      return
    case 'hit':
      return
  }
}

/** Subtracts HP, floored at 0, and returns what was actually taken. */
export function applyDamage(target: Entity, amount: number): number {
  const dealt = Math.min(target.hp, Math.max(0, amount))
  target.hp -= dealt
  return dealt
}

export function markAggro(ctx: MagicContext, mob: Mob, caster: Character) {
  if (!mob.aggroTarget) {
    mob.aggroTarget = caster.id
  }
  if (mob.aggroTarget === caster.id) {
    mob.aggroLastAttack = ctx.clock.now()
  }
}

/**
 * Announces and hands a kill to the lifecycle collaborator, which owns the
 * room's mob collection. Callers iterating a room snapshot defer this until
 * their loop is done.
 */
export function handleDefeat(ctx: MagicContext, caster: Character, target: Entity, announce = true) {
  if (announce) {
    tellCaster(ctx, caster, `${target.name} has been defeated!`)
    tellRoom(ctx, caster, `${target.name} has been defeated!`)
  }
  if (target.kind === 'mob') {
    ctx.mobs.onDeath(target, target.roomId, caster.id)
  }
}

/** Single-target aftermath: defeat, or the survivor turns on the caster. */
export function settleHit(ctx: MagicContext, caster: Character, target: Entity) {
  if (target.hp <= 0) {
    handleDefeat(ctx, caster, target)
  } else if (target.kind === 'mob') {
    markAggro(ctx, target, caster)
  }
}

export function stillInRoom(ctx: MagicContext, mob: Mob): boolean {
  return ctx.rooms.listMobs(mob.roomId).some((entry) => entry.id === mob.id)
}
