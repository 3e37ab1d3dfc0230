import { beforeEach, describe, expect, it } from 'vitest'

import { spellCatalog, Creatures } from '@content/registry'
import { castSpell } from '@engine/magic/cast'
import { cure } from '@engine/magic/status'
import { eligibleCreatures, summonLevelRange } from '@engine/magic/summon'
import { TEST_CONFIG } from './helpers/fixtures'
import { makeCharacter, makeHarness, makeMob, ROOM, useConfig } from './helpers/world'

describe('drain spells', () => {
  beforeEach(() => {
    useConfig(TEST_CONFIG)
  })

  it('drains no more mana than the target has', () => {
    const h = makeHarness({ dice: [2, 3] })
    const alice = h.world.addPlayer(makeCharacter('alice', { knownSpells: ['leech'] }))
    const goblin = makeMob('goblin', { mana: 1, maxMana: 10 })
    h.world.addMob(ROOM, goblin)

    castSpell(h.ctx, 'alice', 'leech goblin')

    expect(goblin.mana).toBe(0)
    expect(goblin.hp).toBe(18)
    expect(alice.mana).toBe(95)
    expect(h.log.to('alice')).toEqual(['You cast Leech at goblin! It strikes for 2 magical damage! You drain 1 mana!'])
  })

  it('heals the caster by the damage actually dealt', () => {
    const h = makeHarness({ dice: [6, 5] })
    const alice = h.world.addPlayer(makeCharacter('alice', { hp: 40, knownSpells: ['siphon'] }))
    h.world.addMob(ROOM, makeMob('goblin', { hp: 5 }))

    castSpell(h.ctx, 'alice', 'siphon goblin')

    expect(alice.hp).toBe(45)
    expect(h.log.to('alice')).toEqual([
      'You cast Siphon at goblin! It strikes for 5 magical damage! You absorb 5 HP!',
      'goblin has been defeated!',
    ])
    expect(h.world.deaths.map((death) => death.mobId)).toEqual(['goblin'])
  })

  it('drains stats for a while and restores them when cured', () => {
    const h = makeHarness({ dice: [1, 2] })
    h.world.addPlayer(makeCharacter('alice', { knownSpells: ['sap'] }))
    const goblin = makeMob('goblin')
    h.world.addMob(ROOM, goblin)

    castSpell(h.ctx, 'alice', 'sap goblin')

    expect(goblin.stats).toMatchObject({ strength: 8, dexterity: 8, constitution: 8, intellect: 10 })
    expect(goblin.effects).toHaveLength(1)
    expect(goblin.effects[0]).toMatchObject({
      kind: 'stat_drain',
      remaining: 4,
      magnitude: 2,
      deltas: { strength: 2, dexterity: 2, constitution: 2 },
    })
    expect(h.log.to('alice')).toEqual(["You cast Sap at goblin! It strikes for 1 magical damage! goblin's stats are drained by 2!"])

    expect(cure(goblin, 'stat_drain')).toBe(1)
    expect(goblin.stats).toMatchObject({ strength: 10, dexterity: 10, constitution: 10 })
  })

  it('is blocked by deflection', () => {
    const h = makeHarness({ outcomes: ['deflect'] })
    h.world.addPlayer(makeCharacter('alice', { knownSpells: ['leech'] }))
    const goblin = makeMob('goblin', { mana: 5 })
    h.world.addMob(ROOM, goblin)

    castSpell(h.ctx, 'alice', 'leech goblin')

    expect(goblin.mana).toBe(5)
    expect(h.log.to('alice')).toEqual(["You cast Leech, but goblin's defenses deflect it!"])
    expect(h.log.room()).toEqual(["goblin's defenses deflect Alice's Leech!"])
  })
})

describe('summon spells', () => {
  beforeEach(() => {
    useConfig(TEST_CONFIG)
  })

  it('scales the level range with the caster and skips special terrain', () => {
    const resolution = spellCatalog.get('familiar')?.resolution
    if (resolution?.type !== 'summon') throw new Error('familiar should compile to a summon')

    expect(summonLevelRange(resolution, 12)).toEqual([1, 6])
    expect(eligibleCreatures(Object.values(Creatures()), resolution, 12).map((c) => c.id)).toEqual([
      'rat',
      'imp',
      'wolf',
    ])
  })

  it('adds a friendly creature to the room and the caster party', () => {
    const h = makeHarness({ random: [0.99, 0.5] })
    h.world.addPlayer(makeCharacter('alice', { level: 12, knownSpells: ['familiar'] }))

    castSpell(h.ctx, 'alice', 'familiar')

    const [imp] = h.world.listMobs(ROOM)
    expect(imp).toMatchObject({ templateId: 'imp', name: 'imp', hostile: false, summonerId: 'alice', partyLeaderId: 'alice', hp: 12 })
    expect(imp.id).toMatch(/^imp_alice_1000000_\d+$/)
    expect(h.world.summons).toEqual([{ leaderId: 'alice', mobId: imp.id }])
    expect(h.log.to('alice')).toEqual(['You intone a summoning spell!', 'An imp appears in a puff of reddish smoke!'])
    expect(h.log.room()).toEqual(['Alice intones a summoning spell!', 'An imp appears in a puff of reddish smoke!'])
  })

  it('spends the cast when the room is full', () => {
    useConfig({ ...TEST_CONFIG, balance: { MAX_ROOM_MOBS: 2 } })
    const h = makeHarness({ random: [0.99, 0] })
    const alice = h.world.addPlayer(makeCharacter('alice', { level: 12, knownSpells: ['familiar'] }))
    h.world.addMob(ROOM, makeMob('goblin'))
    h.world.addMob(ROOM, makeMob('kobold'))

    castSpell(h.ctx, 'alice', 'familiar')

    expect(h.world.listMobs(ROOM)).toHaveLength(2)
    expect(alice.mana).toBe(85)
    expect(h.log.to('alice').at(-1)).toBe('The spell succeeds, but the room is too crowded for your summon to appear!')
  })

  it('fails when no creature fits', () => {
    useConfig({ ...TEST_CONFIG, creatures: {} })
    const h = makeHarness()
    h.world.addPlayer(makeCharacter('alice', { knownSpells: ['familiar'] }))

    castSpell(h.ctx, 'alice', 'familiar')

    expect(h.log.to('alice')).toEqual([
      'You intone a summoning spell!',
      'The summoning spell fails - no creatures answer your call!',
    ])
  })
})
