import type { CreatureDef } from '@config/schema'
import { CONFIG } from '@config/store'
import { logger } from '@engine/logger'
import { tellCaster, tellRoom, type CastRequest, type ResolutionOf } from './combat'
import { articleFor, fillTemplate } from './messages'
import type { MagicContext } from './ports'
import type { Character, Mob } from './types'

type SummonResolution = ResolutionOf<'summon'>

const log = logger.child({ module: 'summon' })

let sequence = 0

export function summonLevelRange(resolution: SummonResolution, casterLevel: number): [number, number] {
  if (resolution.scaled) {
    return [1, Math.max(1, Math.floor((casterLevel + 1) / 2))]
  }
  return [resolution.minLevel, Math.max(resolution.minLevel, resolution.maxLevel)]
}

export function eligibleCreatures(
  creatures: CreatureDef[],
  resolution: SummonResolution,
  casterLevel: number,
): CreatureDef[] {
  const [min, max] = summonLevelRange(resolution, casterLevel)
  const wantedType = resolution.creatureType?.toLowerCase()
  return creatures.filter((template) => {
    if (template.level < min || template.level > max) return false
    if (wantedType && template.type?.toLowerCase() !== wantedType) return false
    if (!resolution.allowSpecialTerrain && template.terrain?.toLowerCase() === 'special') return false
    return true
  })
}

export function createSummon(template: CreatureDef, caster: Character, now: number): Mob {
  sequence += 1
  return {
    kind: 'mob',
    id: `${template.id}_${caster.id}_${now}_${sequence}`,
    templateId: template.id,
    name: template.name,
    type: template.type,
    roomId: caster.roomId,
    level: template.level,
    hp: template.maxHp,
    maxHp: template.maxHp,
    mana: template.maxMana,
    maxMana: template.maxMana,
    armorClass: template.armorClass,
    stats: { ...template.stats },
    effects: [],
    hostile: false,
    summonerId: caster.id,
    partyLeaderId: caster.partyLeaderId ?? caster.id,
  }
}

export function resolveSummon(ctx: MagicContext, request: CastRequest, resolution: SummonResolution): void {
  const { caster, spell } = request
  const candidates = eligibleCreatures(ctx.creatures.all(), resolution, caster.level)

  tellCaster(ctx, caster, spell.messages.cast
    ? fillTemplate(spell.messages.cast, { caster: 'You', spell: spell.name })
    : 'You intone a summoning spell!')
  tellRoom(ctx, caster, fillTemplate(spell.messages.cast ?? '{caster} intones a summoning spell!', {
    caster: caster.name,
    spell: spell.name,
  }))

  if (candidates.length === 0) {
    const [min, max] = summonLevelRange(resolution, caster.level)
    log.error(
      { spellId: spell.id, casterId: caster.id, min, max, type: resolution.creatureType },
      'no creature templates eligible for summon',
    )
    tellCaster(ctx, caster, 'The summoning spell fails - no creatures answer your call!')
    return
  }

  const index = Math.min(candidates.length - 1, Math.floor(ctx.random() * candidates.length))
  const template = candidates[index]

  const occupants = ctx.rooms.listMobs(caster.roomId).length
  if (occupants >= CONFIG().balance.MAX_ROOM_MOBS) {
    tellCaster(ctx, caster, 'The spell succeeds, but the room is too crowded for your summon to appear!')
    return
  }

  const mob = createSummon(template, caster, ctx.clock.now())
  ctx.rooms.addMob(caster.roomId, mob)
  ctx.parties.trackSummon(mob.partyLeaderId ?? caster.id, mob.id)

  const appears = fillTemplate(spell.messages.hit ?? '{mob_prefix} {mob_name} appears in a puff of reddish smoke!', {
    mob_prefix: articleFor(mob.name),
    mob_name: mob.name,
    caster: caster.name,
    spell: spell.name,
  })
  tellCaster(ctx, caster, appears)
  tellRoom(ctx, caster, appears)
  log.debug({ casterId: caster.id, mobId: mob.id, templateId: template.id }, 'summoned creature')
}
