import type { MobSpellListDef } from '@config/schema'
import { CONFIG } from '@config/store'
import type { RuntimeSpell } from '@content/adapters'
import { logger } from '@engine/logger'
import type { RandomSource } from './dice'
import type { Clock, SpellCatalog } from './ports'
import { mobFailureChance, mobFatigueSeconds, mobMaxMana } from './rules'
import type { Mob } from './types'

const log = logger.child({ module: 'mob-casting' })

export const FALLBACK_SPELL_LIST = 'generic_caster'

export interface MobCastingState {
  mana: number
  maxMana: number
  skill: number
  lastRegenAt: number
  /** Spell id to the epoch ms its cooldown ends. */
  cooldowns: Record<string, number>
  fatigueUntil: number
}

export interface MobSpellcasterDeps {
  spells: SpellCatalog
  lists: () => Record<string, MobSpellListDef>
  clock: Clock
  random: RandomSource
}

function isHealing(spell: RuntimeSpell): boolean {
  return spell.resolution.type === 'heal'
}

/**
 * Casting bookkeeping for hostile mobs. Mobs run on wall-clock time rather
 * than rounds: mana regenerates per second and cooldowns end at a timestamp.
 */
export class MobSpellcaster {
  private readonly state = new Map<string, MobCastingState>()

  constructor(private readonly deps: MobSpellcasterDeps) {}

  initialize(mobId: string, level: number, skill = 50): MobCastingState {
    const maxMana = mobMaxMana(level, skill)
    const entry: MobCastingState = {
      mana: maxMana,
      maxMana,
      skill,
      lastRegenAt: this.deps.clock.now(),
      cooldowns: {},
      fatigueUntil: 0,
    }
    this.state.set(mobId, entry)
    return entry
  }

  get(mobId: string): MobCastingState | undefined {
    return this.state.get(mobId)
  }

  canCast(mobId: string, spellId: string): boolean {
    const entry = this.state.get(mobId)
    const spell = this.deps.spells.get(spellId)
    if (!entry || !spell) {
      return false
    }
    const now = this.deps.clock.now()
    if (entry.fatigueUntil > now) {
      return false
    }
    if (entry.mana < spell.manaCost) {
      return false
    }
    return (entry.cooldowns[spellId] ?? 0) <= now
  }

  /** Spends mana, starts the cooldown and fatigue. False when the cast is not allowed. */
  useSpell(mobId: string, spellId: string, mobLevel = 1): boolean {
    const entry = this.state.get(mobId)
    const spell = this.deps.spells.get(spellId)
    if (!entry || !spell || !this.canCast(mobId, spellId)) {
      return false
    }
    const now = this.deps.clock.now()
    const { DEFAULT_COOLDOWN_SECONDS } = CONFIG().balance.MOB_CASTING
    const cooldownSeconds = spell.cooldown > 0 ? spell.cooldown : DEFAULT_COOLDOWN_SECONDS
    const fatigueSeconds = mobFatigueSeconds(spell.level, mobLevel)

    entry.mana -= spell.manaCost
    entry.cooldowns[spellId] = now + cooldownSeconds * 1000
    entry.fatigueUntil = now + fatigueSeconds * 1000
    log.info(
      { mobId, spellId, mana: entry.mana, maxMana: entry.maxMana, fatigueSeconds },
      'mob cast spell',
    )
    return true
  }

  /**
   * Adds `amount` mana, or when omitted whatever has accrued since the last
   * regeneration at the configured rate per second.
   */
  regenerate(mobId: string, amount?: number): number {
    const entry = this.state.get(mobId)
    if (!entry) {
      return 0
    }
    let gain = amount
    if (gain === undefined) {
      const now = this.deps.clock.now()
      const elapsedSeconds = (now - entry.lastRegenAt) / 1000
      gain = Math.floor(elapsedSeconds * CONFIG().balance.MOB_CASTING.REGEN_PER_SECOND)
      entry.lastRegenAt = now
    }
    if (gain <= 0) {
      return 0
    }
    const before = entry.mana
    entry.mana = Math.min(entry.mana + gain, entry.maxMana)
    return entry.mana - before
  }

  private list(listName: string): MobSpellListDef | undefined {
    const lists = this.deps.lists()
    return lists[listName] ?? lists[FALLBACK_SPELL_LIST]
  }

  /** Spells on the list the mob could cast right now. Level is not a filter; it only raises failure. */
  availableSpells(mobId: string, listName: string): RuntimeSpell[] {
    const list = this.list(listName)
    if (!list) {
      return []
    }
    const out: RuntimeSpell[] = []
    for (const spellId of list.spells) {
      const spell = this.deps.spells.get(spellId)
      if (spell && this.canCast(mobId, spellId)) {
        out.push(spell)
      }
    }
    return out
  }

  /** Heals below the list's threshold when it can, otherwise picks an offensive spell at random. */
  chooseSpell(mobId: string, listName: string, healthFraction: number): RuntimeSpell | null {
    const list = this.list(listName)
    if (!list) {
      return null
    }
    const available = this.availableSpells(mobId, listName)
    if (healthFraction < list.healThreshold) {
      const heals = available.filter(isHealing)
      if (heals.length > 0) {
        return this.pick(heals)
      }
    }
    const offensive = available.filter((spell) => !isHealing(spell))
    return offensive.length > 0 ? this.pick(offensive) : null
  }

  failureChance(mob: Mob, spellId: string): number {
    const spell = this.deps.spells.get(spellId)
    const skill = this.state.get(mob.id)?.skill ?? 50
    return mobFailureChance(spell?.level ?? 1, mob.level, mob.stats.intellect, skill)
  }

  cleanup(mobId: string) {
    this.state.delete(mobId)
  }

  private pick(spells: RuntimeSpell[]): RuntimeSpell {
    const index = Math.min(spells.length - 1, Math.floor(this.deps.random() * spells.length))
    return spells[index]
  }
}
