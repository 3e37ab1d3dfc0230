import type { RuntimeSpell } from '@content/adapters'
import type { CombatTargetFinder, RoomOccupancy, SpellCatalog } from './ports'
import type { Character, Mob } from './types'

export type SpellMatch =
  | { ok: true; spell: RuntimeSpell; targetText: string | null }
  | { ok: false; message: string }

interface Candidate { spell: RuntimeSpell; keys: string[] }

function keysFor(spell: RuntimeSpell): string[] {
  const id = spell.id.toLowerCase()
  const keys = [spell.name.toLowerCase(), id, id.replace(/_/g, ' '), id.replace(/_/g, '')]
  return [...new Set(keys)]
}

function prefixMatch(input: string, key: string): string | null {
  if (!input.startsWith(key)) return null
  const rest = input.slice(key.length)
  if (rest.length > 0 && !/^\s/.test(rest)) return null
  return rest
}

/**
 * Finds the spell named at the start of `text` among the caster's known
 * spells. Longer names are tried first so "cure light wounds" wins over
 * "cure"; whatever follows the name is the target text.
 */
export function matchSpell(catalog: SpellCatalog, caster: Character, text: string): SpellMatch {
  const input = text.trim().replace(/\s+/g, ' ')
  const lower = input.toLowerCase()
  if (!lower) {
    return { ok: false, message: 'Cast what?' }
  }

  const candidates: Candidate[] = []
  for (const id of caster.knownSpells) {
    const spell = catalog.get(id)
    if (spell) candidates.push({ spell, keys: keysFor(spell) })
  }
  candidates.sort((a, b) => b.spell.name.length - a.spell.name.length)

  for (const { spell, keys } of candidates) {
    for (const key of keys) {
      const rest = prefixMatch(lower, key)
      if (rest === null) continue
      const targetText = input.slice(input.length - rest.length).trim()
      return { ok: true, spell, targetText: targetText || null }
    }
  }

  const words = lower.split(' ')
  for (let i = words.length; i > 0; i -= 1) {
    const known = catalog.get(words.slice(0, i).join('_'))
    if (known) {
      return { ok: false, message: `You don't know the spell '${known.name}'.` }
    }
  }
  return { ok: false, message: `Unknown spell: ${input}` }
}

function byName<T extends { name: string }>(entries: T[], fragment: string): T | null {
  const needle = fragment.trim().toLowerCase()
  if (!needle) return null
  const exact = entries.find((entry) => entry.name.toLowerCase() === needle)
  if (exact) return exact
  return entries.find((entry) => entry.name.toLowerCase().includes(needle)) ?? null
}

export function findPlayerInRoom(rooms: RoomOccupancy, roomId: string, fragment: string): Character | null {
  return byName(rooms.listPlayers(roomId), fragment)
}

export function findMobInRoom(rooms: RoomOccupancy, roomId: string, fragment: string): Mob | null {
  return byName(rooms.listMobs(roomId), fragment)
}

/** Hostile mobs first, then any other mob in the room. */
export class RoomTargetFinder implements CombatTargetFinder {
  constructor(private readonly rooms: RoomOccupancy) {}

  findCombatTarget(roomId: string, nameFragment: string): Mob | null {
    const mobs = this.rooms.listMobs(roomId)
    return byName(mobs.filter((mob) => mob.hostile), nameFragment)
      ?? byName(mobs.filter((mob) => !mob.hostile), nameFragment)
  }
}
