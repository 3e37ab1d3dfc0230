import { beforeEach, describe, expect, it } from 'vitest'

import { castSpell } from '@engine/magic/cast'
import { attachEffect } from '@engine/magic/status'
import { TEST_CONFIG } from './helpers/fixtures'
import { makeCharacter, makeHarness, useConfig } from './helpers/world'

describe('healing spells', () => {
  beforeEach(() => {
    useConfig(TEST_CONFIG)
  })

  it('heals everyone in the room with one roll and skips those at full health', () => {
    const h = makeHarness({ dice: [8] })
    const alice = h.world.addPlayer(makeCharacter('alice', { hp: 50, maxHp: 60, knownSpells: ['mass_mend'] }))
    const bob = h.world.addPlayer(makeCharacter('bob', { hp: 40, maxHp: 40 }))

    castSpell(h.ctx, 'alice', 'mass mend')

    expect(alice.hp).toBe(58)
    expect(bob.hp).toBe(40)
    expect(h.log.to('alice')).toEqual(['You cast Mass Mend! Healing energy restores 8 hit points!\nHealth: 58 / 60'])
    expect(h.log.to('bob')).toEqual(['Alice casts Mass Mend, but you are already at full health!'])
    expect(h.log.room()).toEqual(['Alice casts Mass Mend!'])
  })

  it('heals another player and reports what was restored', () => {
    const h = makeHarness({ dice: [5] })
    h.world.addPlayer(makeCharacter('alice', { knownSpells: ['mend'] }))
    const bob = h.world.addPlayer(makeCharacter('bob', { hp: 30, maxHp: 40 }))

    castSpell(h.ctx, 'alice', 'mend bob')

    expect(bob.hp).toBe(35)
    expect(h.log.to('alice')).toEqual(['You cast Mend on Bob! Healing energy restores 5 hit points!'])
    expect(h.log.to('bob')).toEqual(['Alice casts Mend on you! Healing energy restores 5 hit points!\nHealth: 35 / 40'])
    expect(h.log.room()).toEqual(['Alice casts Mend on Bob!'])
  })

  it('caps self healing at max hp', () => {
    const h = makeHarness({ dice: [8] })
    const alice = h.world.addPlayer(makeCharacter('alice', { hp: 55, maxHp: 60, knownSpells: ['mend'] }))

    castSpell(h.ctx, 'alice', 'mend')

    expect(alice.hp).toBe(60)
    expect(h.log.to('alice')).toEqual(['You cast Mend on yourself! Healing energy restores 5 hit points!\nHealth: 60 / 60'])
  })

  it('still charges a heal cast at full health', () => {
    const h = makeHarness({ dice: [4] })
    const alice = h.world.addPlayer(makeCharacter('alice', { knownSpells: ['mend'] }))

    castSpell(h.ctx, 'alice', 'mend')

    expect(alice.mana).toBe(95)
    expect(h.log.to('alice')).toEqual(['You cast Mend, but you are already at full health!'])
  })

  it('cures poison on the caster', () => {
    const h = makeHarness()
    const alice = h.world.addPlayer(makeCharacter('alice', { knownSpells: ['antidote'] }))
    attachEffect(alice, { source: 'Venom', effect: 'poison', kind: 'poison', magnitude: 0, remaining: 3, dice: '1d2' })

    castSpell(h.ctx, 'alice', 'antidote')

    expect(alice.effects).toEqual([])
    expect(h.log.to('alice')).toEqual(['You are cured of 1 poison effect(s)!'])
    expect(h.log.room()).toEqual(['Alice casts Antidote!'])
  })

  it('says so when there is nothing to cure', () => {
    const h = makeHarness()
    h.world.addPlayer(makeCharacter('alice', { knownSpells: ['antidote'] }))

    castSpell(h.ctx, 'alice', 'antidote')

    expect(h.log.to('alice')).toEqual(['You cast Antidote, but you are not poisoned!'])
  })

  it('names the other player when they have nothing to cure', () => {
    const h = makeHarness()
    h.world.addPlayer(makeCharacter('alice', { knownSpells: ['quench'] }))
    h.world.addPlayer(makeCharacter('bob'))

    castSpell(h.ctx, 'alice', 'quench bob')

    expect(h.log.to('alice')).toEqual(['You cast Quench, but Bob is not thirsty!'])
    expect(h.log.to('bob')).toEqual([])
  })

  it('quenches another player', () => {
    const h = makeHarness()
    h.world.addPlayer(makeCharacter('alice', { knownSpells: ['quench'] }))
    const bob = h.world.addPlayer(makeCharacter('bob', { thirst: 10 }))

    castSpell(h.ctx, 'alice', 'quench bob')

    expect(bob.thirst).toBe(100)
    expect(h.log.to('alice')).toEqual(['You cast Quench on Bob.'])
    expect(h.log.to('bob')).toEqual(['Your thirst is completely quenched!'])
    expect(h.log.room()).toEqual(['Alice casts Quench on Bob!'])
  })

  it('feeds everyone hungry in the room', () => {
    const h = makeHarness()
    const alice = h.world.addPlayer(makeCharacter('alice', { hunger: 50, knownSpells: ['feast'] }))
    const bob = h.world.addPlayer(makeCharacter('bob', { hunger: 40 }))
    h.world.addPlayer(makeCharacter('carol'))

    castSpell(h.ctx, 'alice', 'feast')

    expect(alice.hunger).toBe(100)
    expect(bob.hunger).toBe(100)
    expect(h.log.to('alice')).toEqual(['You cast Feast! Your hunger is completely satisfied!'])
    expect(h.log.to('bob')).toEqual(['Alice casts Feast on you! Your hunger is completely satisfied!'])
    expect(h.log.to('carol')).toEqual([])
    expect(h.log.room()).toEqual(['Alice casts Feast, and a brownish mist fills the room!'])
  })

  it('tells the caster and the room when an area cure finds no one', () => {
    const h = makeHarness()
    const alice = h.world.addPlayer(makeCharacter('alice', { knownSpells: ['feast'] }))
    h.world.addPlayer(makeCharacter('bob'))

    castSpell(h.ctx, 'alice', 'feast')

    expect(alice.mana).toBe(95)
    expect(h.log.to('alice')).toEqual(['You cast Feast, but no one is hungry!'])
    expect(h.log.room()).toEqual(['Alice casts Feast, but no one is hungry!'])
  })

  it('frees paralyzed players across the room', () => {
    const h = makeHarness()
    h.world.addPlayer(makeCharacter('alice', { knownSpells: ['unbind'] }))
    const bob = h.world.addPlayer(makeCharacter('bob'))
    attachEffect(bob, { source: 'Hold', effect: 'paralyze', kind: 'paralyze', magnitude: 0, remaining: 2 })

    castSpell(h.ctx, 'alice', 'unbind')

    expect(bob.effects).toEqual([])
    expect(h.log.to('alice')).toEqual([])
    expect(h.log.to('bob')).toEqual(['Alice casts Unbind on you! You can move freely again!'])
    expect(h.log.room()).toEqual(['Alice casts Unbind, and a soothing warmth fills the room!'])
  })

  it('gives drained stats back', () => {
    const h = makeHarness()
    const alice = h.world.addPlayer(makeCharacter('alice', { knownSpells: ['restore'] }))
    alice.stats.strength = 8
    attachEffect(alice, {
      source: 'Sap',
      effect: 'drain_body',
      kind: 'stat_drain',
      magnitude: 2,
      remaining: 4,
      stats: ['strength'],
      deltas: { strength: 2 },
    })

    castSpell(h.ctx, 'alice', 'restore')

    expect(alice.stats.strength).toBe(10)
    expect(alice.effects).toEqual([])
    expect(h.log.to('alice')).toEqual(['Your drained stats are restored!'])
    expect(h.log.room()).toEqual(['Alice casts Restore!'])
  })

  it('heals with effects other than plain hit point healing', () => {
    const h = makeHarness({ dice: [6] })
    const alice = h.world.addPlayer(makeCharacter('alice', { hp: 20, knownSpells: ['renew'] }))

    expect(castSpell(h.ctx, 'alice', 'renew')).toEqual({ ok: true, outcome: 'resolved', spellId: 'renew' })

    expect(alice.hp).toBe(26)
    expect(h.log.to('alice')).toEqual(['You cast Renew on yourself! Healing energy restores 6 hit points!\nHealth: 26 / 50'])
  })
})
