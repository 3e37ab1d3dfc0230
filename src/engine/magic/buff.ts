import type { BuffEffect } from '@content/adapters'
import { rollDice } from './dice'
import { tellCaster, tellRoom, type CastRequest, type ResolutionOf } from './combat'
import { fillTemplate, titleCase } from './messages'
import type { MagicContext } from './ports'
import { attachEffect, findDuplicate } from './status'
import type { Character, StatBlock, StatusEffect } from './types'

type BuffResolution = ResolutionOf<'buff'> | ResolutionOf<'enhancement'>

function recipients(ctx: MagicContext, request: CastRequest): Character[] {
  const { caster, spell, target } = request
  if (spell.area === 'area') {
    const others = ctx.rooms.listPlayers(caster.roomId).filter((player) => player.id !== caster.id)
    return [caster, ...others]
  }
  return [target && target.kind === 'player' ? target : caster]
}

function rollAmount(ctx: MagicContext, resolution: BuffResolution): number {
  if (resolution.type === 'buff') {
    return resolution.amount
  }
  return resolution.dice ? rollDice(resolution.dice, ctx.dice) : resolution.fallbackAmount
}

function ledgerEntry(request: CastRequest, buff: BuffEffect, amount: number, duration: number): StatusEffect {
  return {
    source: request.spell.name,
    effect: request.spell.effectKind,
    kind: buff.kind,
    magnitude: amount,
    remaining: duration,
    casterId: request.caster.id,
    stats: buff.kind === 'stat_buff' ? buff.stats.slice() : undefined,
  }
}

/** Enhancements raise the stats once, up front, and nothing takes it back. */
function enhance(target: Character, buff: BuffEffect, amount: number): Partial<StatBlock> | undefined {
  if (buff.kind !== 'stat_buff' || amount <= 0) {
    return undefined
  }
  const applied: Partial<StatBlock> = {}
  for (const stat of buff.stats) {
    target.stats[stat] += amount
    applied[stat] = amount
  }
  return applied
}

export function resolveBuff(ctx: MagicContext, request: CastRequest, resolution: BuffResolution): void {
  const { caster, spell } = request
  const targets = recipients(ctx, request)
  const amount = rollAmount(ctx, resolution)
  const single = spell.area !== 'area' ? targets[0] : undefined
  const defaultHit = resolution.type === 'enhancement' ? '{target} is enhanced!' : '{target} gains magical protection!'

  const castValues = {
    caster: 'You',
    spell: spell.name,
    target: single ? (single.id === caster.id ? 'yourself' : single.name) : '',
  }
  const castLine = spell.messages.cast
    ? fillTemplate(spell.messages.cast, castValues)
    : fillTemplate(single ? 'You cast {spell} on {target}!' : 'You cast {spell}!', castValues)
  const lines = [castLine]

  for (const target of targets) {
    if (findDuplicate(target, spell.name, spell.effectKind)) {
      lines.push(`${target.name} is already under the effect of ${spell.name}!`)
      continue
    }
    const entry = ledgerEntry(request, resolution.buff, amount, resolution.duration)
    const applied = resolution.type === 'enhancement' ? enhance(target, resolution.buff, amount) : undefined
    if (resolution.type === 'enhancement') {
      // Marks the entry as already spent so reads never add it again.
      entry.applied = applied ?? {}
    }
    attachEffect(target, entry)

    let hit = fillTemplate(spell.messages.hit ?? defaultHit, { target: target.name, spell: spell.name, caster: caster.name })
    if (applied && resolution.buff.kind === 'stat_buff') {
      hit += ` (${resolution.buff.stats.map(titleCase).join('/')} +${amount})`
    }
    lines.push(hit)
    if (target.id !== caster.id) {
      ctx.messaging.sendToPlayer(target.id, `${caster.name} casts ${spell.name} on you! ${hit}`)
    }
  }

  tellCaster(ctx, caster, lines.join('\n'))
  tellRoom(
    ctx,
    caster,
    fillTemplate(spell.messages.cast ?? (single && single.id !== caster.id ? '{caster} casts {spell} on {target}!' : '{caster} casts {spell}!'), {
      caster: caster.name,
      spell: spell.name,
      target: single?.name ?? '',
    }),
  )
}
