import type { RuntimeSpell } from '@content/adapters'
import { SpellDataError, isSpellDataError } from '@engine/errors'
import { logger } from '@engine/logger'
import { resolveBuff } from './buff'
import type { CastRequest } from './combat'
import { resolveDamage } from './damage'
import { resolveDebuff } from './debuff'
import { resolveDrain } from './drain'
import { resolveCure, resolveHeal } from './heal'
import type { MagicContext } from './ports'
import { checkCooldown, checkFatigue, checkMana, commitCast } from './resources'
import { failureChance, rollFizzle } from './rules'
import { effectiveStat, findDuplicate, hasEffect } from './status'
import { resolveSummon } from './summon'
import { findMobInRoom, findPlayerInRoom, matchSpell } from './targeting'
import type { CastResult, Character, Entity } from './types'

const log = logger.child({ module: 'cast' })

const GENERIC_FAILURE = 'Something went wrong with that spell.'

type TargetLookup = { ok: true; target: Entity | null } | { ok: false; message: string }

function reject(ctx: MagicContext, caster: Character, message: string, spellId?: string): CastResult {
  log.debug({ casterId: caster.id, spellId, reason: message }, 'cast rejected')
  ctx.messaging.sendToPlayer(caster.id, message)
  return { ok: false, outcome: 'rejected', spellId }
}

/** Drain and single-target debuffs always name a victim. */
function needsNamedTarget(spell: RuntimeSpell): boolean {
  if (spell.requiresTarget) return true
  if (spell.family === 'drain') return true
  return spell.family === 'debuff' && spell.area === 'single'
}

function isSupportFamily(spell: RuntimeSpell): boolean {
  return spell.family === 'heal' || spell.family === 'buff' || spell.family === 'enhancement'
}

function lookupTarget(ctx: MagicContext, caster: Character, spell: RuntimeSpell, targetText: string | null): TargetLookup {
  if (spell.family === 'summon') {
    return { ok: true, target: null }
  }

  if (needsNamedTarget(spell)) {
    if (!targetText) {
      return { ok: false, message: `You need a target to cast ${spell.name}. Use: cast ${spell.name} <target>` }
    }
    let target: Entity | null
    if (isSupportFamily(spell)) {
      target = findPlayerInRoom(ctx.rooms, caster.roomId, targetText)
    } else if (spell.family === 'debuff') {
      target = findMobInRoom(ctx.rooms, caster.roomId, targetText)
    } else {
      target = ctx.targets.findCombatTarget(caster.roomId, targetText)
    }
    return target ? { ok: true, target } : { ok: false, message: `You don't see '${targetText}' here.` }
  }

  // Optional targets for single heals and buffs are checked up front too, so
  // a typo costs nothing.
  if (targetText && spell.area === 'single' && isSupportFamily(spell)) {
    const target = findPlayerInRoom(ctx.rooms, caster.roomId, targetText)
    return target ? { ok: true, target } : { ok: false, message: `You don't see '${targetText}' here.` }
  }
  return { ok: true, target: null }
}

function assertSupported(spell: RuntimeSpell) {
  if (spell.resolution.type === 'unsupported') {
    throw new SpellDataError(spell.resolution.reason, { spellId: spell.id, family: spell.family, effect: spell.effectKind })
  }
}

function dispatch(ctx: MagicContext, request: CastRequest): void {
  const resolution = request.spell.resolution
  switch (resolution.type) {
    case 'damage':
      return resolveDamage(ctx, request, resolution)
    case 'heal':
      return resolveHeal(ctx, request, resolution)
    case 'cure':
      return resolveCure(ctx, request, resolution)
    case 'buff':
    case 'enhancement':
      return resolveBuff(ctx, request, resolution)
    case 'debuff':
      return resolveDebuff(ctx, request, resolution)
    case 'drain':
      return resolveDrain(ctx, request, resolution)
    case 'summon':
      return resolveSummon(ctx, request, resolution)
    case 'unsupported':
      throw new SpellDataError(resolution.reason, { spellId: request.spell.id })
    default: {
      const unreachable: never = resolution
      throw new SpellDataError('unknown spell resolution', { resolution: unreachable })
    }
  }
}

/**
 * Runs one cast to completion. Every rejection before the commit leaves the
 * caster untouched; once mana, fatigue and cooldown are spent they stay spent,
 * fizzle or not.
 */
export function castSpell(
  ctx: MagicContext,
  casterId: string,
  spellText: string,
  targetText: string | null = null,
): CastResult {
  const caster = ctx.characters.get(casterId)
  if (!caster) {
    log.warn({ casterId }, 'cast from unknown character')
    return { ok: false, outcome: 'rejected' }
  }

  const match = matchSpell(ctx.spells, caster, spellText)
  if (!match.ok) {
    return reject(ctx, caster, match.message)
  }
  const { spell } = match
  const namedTarget = targetText?.trim() || match.targetText

  if (spell.classRestriction && spell.classRestriction.toLowerCase() !== caster.className.toLowerCase()) {
    return reject(ctx, caster, `Only ${spell.classRestriction}s can cast ${spell.name}.`, spell.id)
  }
  const maxLevel = ctx.classes.maxCastableSpellLevel(caster.className)
  if (maxLevel > 0 && spell.level > maxLevel) {
    return reject(
      ctx,
      caster,
      `As a ${caster.className}, you can only cast spells up to level ${maxLevel}. ${spell.name} is level ${spell.level}.`,
      spell.id,
    )
  }

  if (hasEffect(caster, 'paralyze')) {
    return reject(ctx, caster, 'You are paralyzed and cannot cast spells!', spell.id)
  }

  const now = ctx.clock.now()
  const gate = checkCooldown(caster, spell) ?? checkFatigue(caster, now)
  if (gate) {
    return reject(ctx, caster, gate, spell.id)
  }

  const lookup = lookupTarget(ctx, caster, spell, namedTarget)
  if (!lookup.ok) {
    return reject(ctx, caster, lookup.message, spell.id)
  }

  if ((spell.family === 'buff' || spell.family === 'enhancement') && !namedTarget && spell.area !== 'area') {
    if (findDuplicate(caster, spell.name, spell.effectKind)) {
      return reject(ctx, caster, `You are already under the effect of ${spell.name}!`, spell.id)
    }
  }

  if (spell.family === 'summon') {
    if (namedTarget) {
      return reject(ctx, caster, 'That spell does not need to be cast at a specific person or creature.', spell.id)
    }
    if (ctx.rooms.isSafeRoom(caster.roomId)) {
      return reject(ctx, caster, 'Sorry, summoning spells are not permitted here.', spell.id)
    }
  }

  const short = checkMana(caster, spell)
  if (short) {
    return reject(ctx, caster, short, spell.id)
  }

  try {
    assertSupported(spell)
    commitCast(caster, spell, now)

    const castingStat = effectiveStat(caster, ctx.classes.castingStat(caster.className))
    const chance = failureChance(spell.level, caster.level, castingStat)
    if (rollFizzle(chance, ctx.random)) {
      log.debug({ casterId, spellId: spell.id, chance }, 'spell fizzled')
      ctx.messaging.sendToPlayer(caster.id, `You attempt to cast ${spell.name}, but the spell fizzles and fails!`)
      ctx.messaging.broadcastRoomExcept(caster.roomId, caster.id, `${caster.name}'s spell fizzles and fails!`)
      return { ok: false, outcome: 'fizzled', spellId: spell.id }
    }

    dispatch(ctx, { caster, spell, target: lookup.target, targetText: namedTarget })
    return { ok: true, outcome: 'resolved', spellId: spell.id }
  } catch (err) {
    if (!isSpellDataError(err)) {
      throw err
    }
    log.error({ err, casterId, spellId: spell.id, details: err.details }, 'spell data integrity error')
    ctx.messaging.sendToPlayer(caster.id, GENERIC_FAILURE)
    return { ok: false, outcome: 'error', spellId: spell.id }
  }
}
