import { rollDice } from './dice'
import {
  applyDamage,
  reportAvoided,
  rollSpellAccuracy,
  rollSpellAmount,
  settleHit,
  tellCaster,
  tellRoom,
  type CastRequest,
  type ResolutionOf,
} from './combat'
import { fillTemplate } from './messages'
import type { MagicContext } from './ports'
import { applyStatDrain, attachEffect } from './status'
import type { Character, Entity } from './types'

type DrainResolution = ResolutionOf<'drain'>

export function resolveDrain(ctx: MagicContext, request: CastRequest, resolution: DrainResolution): void {
  const { caster, spell, target } = request
  if (!target) {
    return
  }

  const outcome = rollSpellAccuracy(ctx, caster, target)
  if (outcome !== 'hit') {
    reportAvoided(ctx, caster, spell, target, outcome)
    return
  }

  const dealt = applyDamage(target, rollSpellAmount(ctx, resolution.roll.dice, spell, caster))
  const extra = siphon(ctx, request, caster, target, resolution, dealt)

  const values = { spell: spell.name, target: target.name, damage: dealt, damage_type: resolution.roll.damageType }
  const castLine = fillTemplate(spell.messages.cast ?? 'You cast {spell} at {target}!', { ...values, caster: 'You' })
  const hitLine = fillTemplate(spell.messages.hit ?? 'It strikes for {damage} {damage_type} damage!', values)
  tellCaster(ctx, caster, `${castLine} ${hitLine}${extra}`)
  tellRoom(ctx, caster, fillTemplate(spell.messages.cast ?? '{caster} casts {spell} at {target}!', { ...values, caster: caster.name }))

  settleHit(ctx, caster, target)
}

/**
 * Moves the drained resource. Whatever the caster gains is bounded by what
 * the target actually had or lost.
 */
function siphon(
  ctx: MagicContext,
  request: CastRequest,
  caster: Character,
  target: Entity,
  resolution: DrainResolution,
  dealt: number,
): string {
  const { drain } = resolution
  if (!drain) {
    return ''
  }
  switch (drain.kind) {
    case 'mana': {
      const rolled = Math.abs(rollDice(drain.dice, ctx.dice))
      const actual = Math.min(rolled, target.mana)
      target.mana -= actual
      caster.mana = Math.min(caster.mana + actual, caster.maxMana)
      return ` You drain ${actual} mana!`
    }
    case 'health': {
      const healed = Math.max(0, Math.min(dealt, caster.maxHp - caster.hp))
      caster.hp += healed
      return ` You absorb ${healed} HP!`
    }
    case 'stat': {
      const amount = Math.abs(rollDice(drain.dice, ctx.dice))
      const deltas = applyStatDrain(target, drain.stats, amount)
      attachEffect(target, {
        source: request.spell.name,
        effect: request.spell.effectKind,
        kind: 'stat_drain',
        magnitude: amount,
        remaining: drain.duration,
        casterId: caster.id,
        stats: drain.stats.slice(),
        deltas,
      })
      return ` ${target.name}'s stats are drained by ${amount}!`
    }
  }
}
