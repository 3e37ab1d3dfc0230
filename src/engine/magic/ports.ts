import type { CreatureDef, StatKey } from '@config/schema'
import type { RuntimeSpell } from '@content/adapters'
import type { DiceRoller, RandomSource } from './dice'
import type { Character, Entity, Mob, StatBlock } from './types'

// Collaborators the engine calls into. The host owns their storage and must
// serialize command processing per room.

export interface SpellCatalog {
  get(spellId: string): RuntimeSpell | null
}

export interface ClassCatalog {
  /** 0 means the class has no ceiling. */
  maxCastableSpellLevel(className: string): number
  castingStat(className: string): StatKey
}

export type AttackOutcome = 'hit' | 'miss' | 'dodge' | 'deflect'

export interface CombatAccuracyOracle {
  checkOutcome(
    attackerStats: StatBlock,
    defenderStats: StatBlock,
    defenderArmor: number,
    baseHitChance: number,
  ): AttackOutcome
}

export interface RoomOccupancy {
  listMobs(roomId: string): Mob[]
  listPlayers(roomId: string): Character[]
  addMob(roomId: string, mob: Mob): void
  isSafeRoom(roomId: string): boolean
}

export interface CombatTargetFinder {
  findCombatTarget(roomId: string, nameFragment: string): Entity | null
}

export interface MobLifecycle {
  /** Loot, experience and removal from the room. */
  onDeath(mob: Mob, roomId: string, killerId?: string): void
}

export interface CreatureCatalog {
  all(): CreatureDef[]
}

export interface PartyRegistry {
  trackSummon(leaderId: string, summonInstanceId: string): void
}

export interface Messaging {
  sendToPlayer(playerId: string, text: string): void
  /** A null playerId broadcasts to everyone in the room. */
  broadcastRoomExcept(roomId: string, playerId: string | null, text: string): void
}

export interface CharacterRegistry {
  get(characterId: string): Character | null
}

export interface Clock {
  now(): number
}

export interface MagicContext {
  spells: SpellCatalog
  classes: ClassCatalog
  creatures: CreatureCatalog
  characters: CharacterRegistry
  rooms: RoomOccupancy
  targets: CombatTargetFinder
  accuracy: CombatAccuracyOracle
  mobs: MobLifecycle
  parties: PartyRegistry
  messaging: Messaging
  dice: DiceRoller
  random: RandomSource
  clock: Clock
}

export const systemClock: Clock = { now: () => Date.now() }
