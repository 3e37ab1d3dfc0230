import { beforeEach, describe, expect, it } from 'vitest'

import { spellCatalog } from '@content/registry'
import { findPlayerInRoom, matchSpell, RoomTargetFinder } from '@engine/magic/targeting'
import { TEST_CONFIG } from './helpers/fixtures'
import { makeCharacter, makeMob, ROOM, TestWorld, useConfig } from './helpers/world'

describe('matchSpell', () => {
  beforeEach(() => {
    useConfig({
      ...TEST_CONFIG,
      spells: {
        ...TEST_CONFIG.spells,
        cure: { name: 'Cure', family: 'heal', level: 1, manaCost: 2 },
        cure_light_wounds: { name: 'Cure Light Wounds', family: 'heal', level: 1, manaCost: 4 },
      },
    })
  })

  const caster = () => makeCharacter('alice', { knownSpells: ['cure', 'cure_light_wounds', 'mass_mend'] })

  it('prefers the longest known name and keeps the rest as the target', () => {
    const match = matchSpell(spellCatalog, caster(), 'cure light wounds bob')
    expect(match).toMatchObject({ ok: true, targetText: 'bob' })
    expect(match.ok && match.spell.id).toBe('cure_light_wounds')
  })

  it('falls back to the shorter name', () => {
    const match = matchSpell(spellCatalog, caster(), 'Cure   Bob')
    expect(match.ok && match.spell.id).toBe('cure')
    expect(match.ok && match.targetText).toBe('Bob')
  })

  it('matches by id with underscores, spaces or neither', () => {
    expect(matchSpell(spellCatalog, caster(), 'mass_mend')).toMatchObject({ ok: true, targetText: null })
    expect(matchSpell(spellCatalog, caster(), 'mass mend')).toMatchObject({ ok: true, targetText: null })
    const joined = matchSpell(spellCatalog, caster(), 'massmend bob')
    expect(joined).toMatchObject({ ok: true, targetText: 'bob' })
    expect(joined.ok && joined.spell.id).toBe('mass_mend')
  })

  it('needs a word boundary after the name', () => {
    expect(matchSpell(spellCatalog, caster(), 'cured')).toEqual({ ok: false, message: 'Unknown spell: cured' })
  })
})

describe('room lookups', () => {
  it('finds players by exact name before a partial one', () => {
    const world = new TestWorld()
    world.addPlayer(makeCharacter('annabel'))
    world.addPlayer(makeCharacter('ann'))
    expect(findPlayerInRoom(world, ROOM, 'ANN')?.id).toBe('ann')
    expect(findPlayerInRoom(world, ROOM, 'bel')?.id).toBe('annabel')
    expect(findPlayerInRoom(world, 'elsewhere', 'ann')).toBeNull()
  })

  it('prefers hostile mobs for combat targets', () => {
    const world = new TestWorld()
    world.addMob(ROOM, makeMob('wolf pup', { hostile: false }))
    world.addMob(ROOM, makeMob('grey wolf'))
    const finder = new RoomTargetFinder(world)
    expect(finder.findCombatTarget(ROOM, 'wolf')?.id).toBe('grey wolf')
    expect(finder.findCombatTarget(ROOM, 'pup')?.id).toBe('wolf pup')
    expect(finder.findCombatTarget(ROOM, 'bear')).toBeNull()
  })
})
