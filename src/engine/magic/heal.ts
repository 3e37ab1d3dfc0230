import type { CureKind } from '@content/adapters'
import { CONFIG } from '@config/store'
import { rollSpellAmount, tellCaster, tellRoom, type CastRequest, type ResolutionOf } from './combat'
import { fillTemplate } from './messages'
import type { MagicContext } from './ports'
import { cure } from './status'
import type { Character, Entity } from './types'

interface CureRule {
  /** Phrases completing "…, but you are not poisoned!" and friends. */
  selfClear: string
  otherClear: (name: string) => string
  nobody: string
  /** Room line after an area cure reaches someone. */
  washes: string
  apply(target: Character): number
  success(count: number): string
}

const CURES: Record<CureKind, CureRule> = {
  poison: {
    selfClear: 'you are not poisoned',
    otherClear: (name) => `${name} is not poisoned`,
    nobody: 'no one is poisoned',
    washes: 'and a purifying mist washes over the room',
    apply: (target) => cure(target, 'poison'),
    success: (count) => `You are cured of ${count} poison effect(s)!`,
  },
  hunger: {
    selfClear: 'you are not hungry',
    otherClear: (name) => `${name} is not hungry`,
    nobody: 'no one is hungry',
    washes: 'and a brownish mist fills the room',
    apply: (target) => refill(target, 'hunger', CONFIG().balance.HUNGER_MAX),
    success: () => 'Your hunger is completely satisfied!',
  },
  thirst: {
    selfClear: 'you are not thirsty',
    otherClear: (name) => `${name} is not thirsty`,
    nobody: 'no one is thirsty',
    washes: 'and a cool blue mist fills the room',
    apply: (target) => refill(target, 'thirst', CONFIG().balance.THIRST_MAX),
    success: () => 'Your thirst is completely quenched!',
  },
  paralysis: {
    selfClear: 'you are not paralyzed',
    otherClear: (name) => `${name} is not paralyzed`,
    nobody: 'no one is paralyzed',
    washes: 'and a soothing warmth fills the room',
    apply: (target) => cure(target, 'paralyze'),
    success: () => 'You can move freely again!',
  },
  drain: {
    selfClear: 'you have no drained stats',
    otherClear: (name) => `${name} has no drained stats`,
    nobody: 'no one has drained stats',
    washes: 'and a restoring glow fills the room',
    apply: (target) => cure(target, 'stat_drain'),
    success: () => 'Your drained stats are restored!',
  },
}

function refill(target: Character, need: 'hunger' | 'thirst', max: number): number {
  if (target[need] >= max) {
    return 0
  }
  target[need] = max
  return 1
}

/** Everyone in the caster's room, caster first. */
function roomPlayers(ctx: MagicContext, caster: Character): Character[] {
  const others = ctx.rooms.listPlayers(caster.roomId).filter((player) => player.id !== caster.id)
  return [caster, ...others]
}

function singleTarget(request: CastRequest): Character {
  const target: Entity | null = request.target
  return target && target.kind === 'player' ? target : request.caster
}

function healthLine(target: Entity): string {
  return `Health: ${target.hp} / ${target.maxHp}`
}

export function resolveHeal(ctx: MagicContext, request: CastRequest, resolution: ResolutionOf<'heal'>): void {
  const { caster, spell } = request
  const amount = rollSpellAmount(ctx, resolution.dice, spell, caster)
  const hitTemplate = spell.messages.hit ?? 'Healing energy restores {damage} hit points!'

  if (spell.area === 'area') {
    tellRoom(ctx, caster, fillTemplate(spell.messages.cast ?? '{caster} casts {spell}!', { caster: caster.name, spell: spell.name }))
    for (const target of roomPlayers(ctx, caster)) {
      const self = target.id === caster.id
      if (target.hp >= target.maxHp) {
        ctx.messaging.sendToPlayer(
          target.id,
          self
            ? `You cast ${spell.name}, but you are already at full health!`
            : `${caster.name} casts ${spell.name}, but you are already at full health!`,
        )
        continue
      }
      const restored = restoreHp(target, amount)
      const hit = fillTemplate(hitTemplate, { damage: restored, spell: spell.name, target: target.name, caster: caster.name })
      const lead = self ? `You cast ${spell.name}!` : `${caster.name} casts ${spell.name}!`
      ctx.messaging.sendToPlayer(target.id, `${lead} ${hit}\n${healthLine(target)}`)
    }
    return
  }

  const target = singleTarget(request)
  const self = target.id === caster.id
  if (target.hp >= target.maxHp) {
    tellCaster(
      ctx,
      caster,
      self
        ? `You cast ${spell.name}, but you are already at full health!`
        : `You cast ${spell.name} on ${target.name}, but they are already at full health!`,
    )
    return
  }

  const restored = restoreHp(target, amount)
  const values = { spell: spell.name, target: self ? 'yourself' : target.name, damage: restored }
  const castLine = spell.messages.cast
    ? fillTemplate(spell.messages.cast, { ...values, caster: 'You' })
    : fillTemplate('You cast {spell} on {target}!', values)
  const hitLine = fillTemplate(hitTemplate, values)
  if (self) {
    tellCaster(ctx, caster, `${castLine} ${hitLine}\n${healthLine(target)}`)
  } else {
    tellCaster(ctx, caster, `${castLine} ${hitLine}`)
    ctx.messaging.sendToPlayer(target.id, `${caster.name} casts ${spell.name} on you! ${hitLine}\n${healthLine(target)}`)
  }
  tellRoom(
    ctx,
    caster,
    fillTemplate(spell.messages.cast ?? '{caster} casts {spell} on {target}!', {
      ...values,
      caster: caster.name,
      target: self ? caster.name : target.name,
    }),
  )
}

function restoreHp(target: Entity, amount: number): number {
  const next = Math.min(target.maxHp, target.hp + amount)
  const restored = next - target.hp
  target.hp = next
  return restored
}

export function resolveCure(ctx: MagicContext, request: CastRequest, resolution: ResolutionOf<'cure'>): void {
  const { caster, spell } = request
  const rule = CURES[resolution.cure]

  if (spell.area === 'area') {
    let cured = 0
    for (const target of roomPlayers(ctx, caster)) {
      const count = rule.apply(target)
      if (count <= 0) continue
      cured += 1
      const lead = target.id === caster.id ? `You cast ${spell.name}!` : `${caster.name} casts ${spell.name} on you!`
      ctx.messaging.sendToPlayer(target.id, `${lead} ${rule.success(count)}`)
    }
    if (cured === 0) {
      tellCaster(ctx, caster, `You cast ${spell.name}, but ${rule.nobody}!`)
      tellRoom(ctx, caster, `${caster.name} casts ${spell.name}, but ${rule.nobody}!`)
      return
    }
    tellRoom(ctx, caster, `${caster.name} casts ${spell.name}, ${rule.washes}!`)
    return
  }

  const target = singleTarget(request)
  const self = target.id === caster.id
  const count = rule.apply(target)
  if (count <= 0) {
    tellCaster(ctx, caster, `You cast ${spell.name}, but ${self ? rule.selfClear : rule.otherClear(target.name)}!`)
    return
  }
  if (!self) {
    tellCaster(ctx, caster, `You cast ${spell.name} on ${target.name}.`)
  }
  ctx.messaging.sendToPlayer(target.id, rule.success(count))
  tellRoom(ctx, caster, `${caster.name} casts ${spell.name}${self ? '' : ` on ${target.name}`}!`)
}
