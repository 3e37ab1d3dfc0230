import { STAT_KEYS } from '@config/schema'
import { logger } from '@engine/logger'
import { rollDice } from './dice'
import { notifyHolder, titleCase } from './messages'
import type { MagicContext } from './ports'
import type { EffectKind, Entity, StatBlock, StatKey, StatusEffect } from './types'

const log = logger.child({ module: 'status' })

const DAMAGE_OVER_TIME: ReadonlySet<EffectKind> = new Set<EffectKind>(['poison', 'burning', 'bleeding', 'acid'])

export type StatusContext = Pick<MagicContext, 'messaging' | 'dice' | 'mobs'>

export type EffectFilter = EffectKind | EffectKind[] | ((effect: StatusEffect) => boolean)

export interface TickReport {
  damage: number
  expired: StatusEffect[]
  died: boolean
}

export function isDamageOverTime(kind: EffectKind): boolean {
  return DAMAGE_OVER_TIME.has(kind)
}

export function attachEffect(entity: Entity, effect: StatusEffect): StatusEffect {
  const entry: StatusEffect = { ...effect, remaining: Math.max(1, Math.floor(effect.remaining)) }
  entity.effects.push(entry)
  return entry
}

export function hasEffect(entity: Entity, kind: EffectKind): boolean {
  return entity.effects.some((effect) => effect.kind === kind)
}

/** An active effect created by the same spell or the same sub-variant. */
export function findDuplicate(entity: Entity, spellName: string, effectKind: string): StatusEffect | undefined {
  return entity.effects.find((effect) => effect.source === spellName || effect.effect === effectKind)
}

export function effectiveStat(entity: Entity, stat: StatKey): number {
  let total = entity.stats[stat]
  for (const effect of entity.effects) {
    if (effect.kind === 'stat_buff' && !effect.applied && effect.stats?.includes(stat)) {
      total += effect.magnitude
    }
  }
  return total
}

export function effectiveStats(entity: Entity): StatBlock {
  const out = { ...entity.stats }
  for (const stat of STAT_KEYS) {
    out[stat] = effectiveStat(entity, stat)
  }
  return out
}

export function effectiveArmor(entity: Entity): number {
  return entity.effects.reduce(
    (total, effect) => (effect.kind === 'ac_bonus' ? total + effect.magnitude : total),
    entity.armorClass,
  )
}

/**
 * Lowers each stat by `amount`, never below 1, and returns what was actually
 * taken so the drain can be reversed exactly.
 */
export function applyStatDrain(entity: Entity, stats: StatKey[], amount: number): Partial<StatBlock> {
  const deltas: Partial<StatBlock> = {}
  for (const stat of stats) {
    const before = entity.stats[stat]
    const after = Math.max(1, before - amount)
    if (after < before) {
      entity.stats[stat] = after
      deltas[stat] = (deltas[stat] ?? 0) + (before - after)
    }
  }
  return deltas
}

function restoreStatDrain(entity: Entity, effect: StatusEffect) {
  const deltas = effect.deltas
  if (!deltas) {
    return
  }
  for (const stat of STAT_KEYS) {
    const delta = deltas[stat]
    if (delta) {
      entity.stats[stat] += delta
    }
  }
  effect.deltas = undefined
}

function expireEffect(entity: Entity, effect: StatusEffect) {
  if (effect.kind === 'stat_drain') {
    restoreStatDrain(entity, effect)
  }
}

function matchesFilter(effect: StatusEffect, filter: EffectFilter): boolean {
  if (typeof filter === 'function') return filter(effect)
  if (Array.isArray(filter)) return filter.includes(effect.kind)
  return effect.kind === filter
}

function applyDamageOverTime(ctx: StatusContext, entity: Entity, effect: StatusEffect): number {
  if (entity.hp <= 0) {
    return 0
  }
  const rolled = Math.max(0, rollDice(effect.dice ?? '0', ctx.dice))
  const dealt = Math.min(entity.hp, rolled)
  if (dealt <= 0) {
    return 0
  }
  entity.hp -= dealt
  notifyHolder(
    ctx.messaging,
    entity,
    `${titleCase(effect.kind)} deals ${dealt} damage to you!`,
    `${entity.name} takes ${dealt} ${effect.kind} damage.`,
  )
  return dealt
}

function announceRemoval(ctx: StatusContext, entity: Entity, effect: StatusEffect) {
  const playerText = effect.removalText
    ? `You are ${effect.removalText}.`
    : `The ${effect.source} effect has worn off.`
  notifyHolder(ctx.messaging, entity, playerText, `${entity.name} is no longer affected by ${effect.source}.`)
}

/**
 * One scheduler tick: damage-over-time entries hit first, then every entry
 * loses one tick and anything at zero is removed with a single notice.
 */
export function tick(ctx: StatusContext, entity: Entity): TickReport {
  const report: TickReport = { damage: 0, expired: [], died: false }
  if (entity.effects.length === 0) {
    return report
  }

  const wasAlive = entity.hp > 0
  let killer: StatusEffect | undefined
  const next: StatusEffect[] = []
  for (const effect of entity.effects) {
    if (isDamageOverTime(effect.kind)) {
      const dealt = applyDamageOverTime(ctx, entity, effect)
      report.damage += dealt
      if (dealt > 0 && entity.hp <= 0 && !killer) {
        killer = effect
      }
    }

    effect.remaining -= 1
    if (effect.remaining > 0) {
      next.push(effect)
    } else {
      expireEffect(entity, effect)
      report.expired.push(effect)
    }
  }
  entity.effects = next

  for (const effect of report.expired) {
    announceRemoval(ctx, entity, effect)
  }

  if (wasAlive && killer) {
    report.died = true
    handleDamageOverTimeDeath(ctx, entity, killer)
  }
  return report
}

function handleDamageOverTimeDeath(ctx: StatusContext, entity: Entity, killer: StatusEffect) {
  log.debug({ entityId: entity.id, kind: killer.kind }, 'entity died to damage over time')
  if (entity.kind === 'player') {
    ctx.messaging.sendToPlayer(entity.id, `You have succumbed to ${killer.kind}!`)
    return
  }
  ctx.messaging.broadcastRoomExcept(entity.roomId, null, `${entity.name} succumbs to ${killer.kind}!`)
  ctx.mobs.onDeath(entity, entity.roomId, killer.casterId)
}

/** Removes every matching effect and returns how many were removed. */
export function cure(entity: Entity, filter: EffectFilter): number {
  if (entity.effects.length === 0) {
    return 0
  }
  const kept: StatusEffect[] = []
  let removed = 0
  for (const effect of entity.effects) {
    if (matchesFilter(effect, filter)) {
      expireEffect(entity, effect)
      removed += 1
    } else {
      kept.push(effect)
    }
  }
  entity.effects = kept
  return removed
}
