import { rollDice } from './dice'
import {
  applyDamage,
  handleDefeat,
  markAggro,
  rollSpellAmount,
  settleHit,
  stillInRoom,
  tellCaster,
  tellRoom,
  type CastRequest,
  type ResolutionOf,
} from './combat'
import { fillTemplate, titleCase } from './messages'
import type { MagicContext } from './ports'
import { applyStatDrain, attachEffect } from './status'
import type { Entity, Mob, StatusEffect } from './types'

type DebuffResolution = ResolutionOf<'debuff'>

function afflict(ctx: MagicContext, request: CastRequest, target: Entity, resolution: DebuffResolution): StatusEffect {
  const { debuff } = resolution
  const entry: StatusEffect = {
    source: request.spell.name,
    effect: request.spell.effectKind,
    kind: debuff.kind,
    magnitude: 0,
    remaining: resolution.duration,
    casterId: request.caster.id,
  }
  switch (debuff.kind) {
    case 'paralyze':
    case 'charm':
      break
    case 'poison':
    case 'burning':
    case 'bleeding':
    case 'acid':
      entry.dice = debuff.dice
      break
    case 'stat_drain': {
      const amount = Math.abs(rollDice(debuff.dice, ctx.dice))
      entry.magnitude = amount
      entry.stats = debuff.stats.slice()
      entry.deltas = applyStatDrain(target, debuff.stats, amount)
      break
    }
  }
  return attachEffect(target, entry)
}

export function resolveDebuff(ctx: MagicContext, request: CastRequest, resolution: DebuffResolution): void {
  if (request.spell.area === 'area') {
    resolveArea(ctx, request, resolution)
    return
  }
  if (request.target) {
    resolveSingle(ctx, request, request.target, resolution)
  }
}

function resolveSingle(ctx: MagicContext, request: CastRequest, target: Entity, resolution: DebuffResolution) {
  const { caster, spell } = request
  const effect = titleCase(spell.effectKind)
  const lines: string[] = []

  if (resolution.damage) {
    const dealt = applyDamage(target, rollSpellAmount(ctx, resolution.damage.dice, spell, caster))
    lines.push(`${target.name} takes ${dealt} ${resolution.damage.damageType} damage!`)
  }
  if (target.hp > 0) {
    afflict(ctx, request, target, resolution)
    lines.unshift(fillTemplate(spell.messages.hit ?? '{target} is afflicted with {effect}!', {
      target: target.name,
      effect,
      spell: spell.name,
      caster: caster.name,
    }))
  }

  const castLine = fillTemplate(spell.messages.cast ?? 'You cast {spell} at {target}!', {
    caster: 'You',
    spell: spell.name,
    target: target.name,
  })
  tellCaster(ctx, caster, [castLine, ...lines].join(' '))
  tellRoom(ctx, caster, fillTemplate(spell.messages.cast ?? '{caster} casts {spell} at {target}!', {
    caster: caster.name,
    spell: spell.name,
    target: target.name,
  }))
  settleHit(ctx, caster, target)
}

function resolveArea(ctx: MagicContext, request: CastRequest, resolution: DebuffResolution) {
  const { caster, spell } = request
  const snapshot: Mob[] = [...ctx.rooms.listMobs(caster.roomId)]
  if (snapshot.length === 0) {
    tellCaster(ctx, caster, 'There are no targets in range.')
    return
  }

  const damage = resolution.damage ? rollSpellAmount(ctx, resolution.damage.dice, spell, caster) : 0
  const effect = titleCase(spell.effectKind)
  const lines = [fillTemplate(spell.messages.hit ?? '{effect} affects all enemies!', { effect, spell: spell.name, caster: caster.name })]
  const defeated: Mob[] = []
  for (const mob of snapshot) {
    if (mob.hp <= 0 || !stillInRoom(ctx, mob)) continue
    if (resolution.damage) {
      const dealt = applyDamage(mob, damage)
      lines.push(`  ${mob.name} takes ${dealt} ${resolution.damage.damageType} damage!`)
    }
    if (mob.hp <= 0) {
      defeated.push(mob)
      continue
    }
    afflict(ctx, request, mob, resolution)
    markAggro(ctx, mob, caster)
  }
  for (const mob of defeated) {
    lines.push(`  ${mob.name} has been defeated!`)
  }

  tellCaster(ctx, caster, lines.join('\n'))
  tellRoom(ctx, caster, fillTemplate(spell.messages.cast ?? '{caster} casts {spell}!', { caster: caster.name, spell: spell.name }))
  for (const mob of defeated) {
    tellRoom(ctx, caster, `${mob.name} has been defeated!`)
    handleDefeat(ctx, caster, mob, false)
  }
}
