import {
  applyDamage,
  handleDefeat,
  markAggro,
  reportAvoided,
  rollSpellAccuracy,
  rollSpellAmount,
  settleHit,
  stillInRoom,
  tellCaster,
  tellRoom,
  type CastRequest,
  type ResolutionOf,
} from './combat'
import { fillTemplate } from './messages'
import type { MagicContext } from './ports'
import { attachEffect } from './status'
import type { Entity, Mob } from './types'

type DamageResolution = ResolutionOf<'damage'>

export function resolveDamage(ctx: MagicContext, request: CastRequest, resolution: DamageResolution): void {
  if (request.spell.requiresTarget && request.target) {
    resolveSingle(ctx, request, request.target, resolution)
  } else {
    resolveArea(ctx, request, resolution)
  }
}

function poisonTarget(request: CastRequest, target: Entity, resolution: DamageResolution): boolean {
  if (!resolution.poison || target.hp <= 0) {
    return false
  }
  attachEffect(target, {
    source: request.spell.name,
    effect: 'poison',
    kind: 'poison',
    magnitude: 0,
    remaining: resolution.poison.duration,
    dice: resolution.poison.dice,
    casterId: request.caster.id,
  })
  return true
}

function resolveSingle(ctx: MagicContext, request: CastRequest, target: Entity, resolution: DamageResolution) {
  const { caster, spell } = request
  const outcome = rollSpellAccuracy(ctx, caster, target)
  if (outcome !== 'hit') {
    reportAvoided(ctx, caster, spell, target, outcome)
    return
  }

  const damage = rollSpellAmount(ctx, resolution.roll.dice, spell, caster)
  applyDamage(target, damage)
  const poisoned = poisonTarget(request, target, resolution)

  const values = {
    spell: spell.name,
    target: target.name,
    damage,
    damage_type: resolution.roll.damageType,
  }
  const castLine = spell.messages.cast
    ? fillTemplate(spell.messages.cast, { ...values, caster: 'You' })
    : fillTemplate('You cast {spell} at {target}!', values)
  const hitLine = fillTemplate(spell.messages.hit ?? 'It strikes for {damage} {damage_type} damage!', values)
  const poisonLine = poisoned ? ` ${target.name} is poisoned!` : ''
  tellCaster(ctx, caster, `${castLine} ${hitLine}${poisonLine}`)
  tellRoom(ctx, caster, fillTemplate(spell.messages.cast ?? '{caster} casts {spell} at {target}!', { ...values, caster: caster.name }))

  settleHit(ctx, caster, target)
}

function resolveArea(ctx: MagicContext, request: CastRequest, resolution: DamageResolution) {
  const { caster, spell } = request
  const snapshot: Mob[] = [...ctx.rooms.listMobs(caster.roomId)]
  if (snapshot.length === 0) {
    tellCaster(ctx, caster, `You cast ${spell.name}, but there are no enemies to affect!`)
    return
  }

  const damage = rollSpellAmount(ctx, resolution.roll.dice, spell, caster)
  const values = { spell: spell.name, damage, damage_type: resolution.roll.damageType }
  const castLine = spell.messages.cast
    ? fillTemplate(spell.messages.cast, { ...values, caster: 'You' })
    : fillTemplate('You cast {spell}!', values)
  const waveLine = fillTemplate(spell.messages.hit ?? 'A wave of {damage_type} energy fills the room!', values)

  const lines: string[] = [`${castLine} ${waveLine}`]
  const defeated: Mob[] = []
  for (const mob of snapshot) {
    if (mob.hp <= 0 || !stillInRoom(ctx, mob)) continue
    const dealt = applyDamage(mob, damage)
    const poisoned = poisonTarget(request, mob, resolution)
    lines.push(`  ${mob.name} takes ${dealt} ${resolution.roll.damageType} damage!${poisoned ? ' (poisoned!)' : ''}`)
    if (mob.hp <= 0) {
      defeated.push(mob)
    } else {
      markAggro(ctx, mob, caster)
    }
  }
  for (const mob of defeated) {
    lines.push(`  ${mob.name} has been defeated!`)
  }

  tellCaster(ctx, caster, lines.join('\n'))
  tellRoom(ctx, caster, fillTemplate(spell.messages.cast ?? '{caster} casts {spell}!', { ...values, caster: caster.name }))
  for (const mob of defeated) {
    tellRoom(ctx, caster, `${mob.name} has been defeated!`)
    handleDefeat(ctx, caster, mob, false)
  }
}
