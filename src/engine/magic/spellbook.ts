import type { RuntimeSpell } from '@content/adapters'
import { logger } from '@engine/logger'
import { titleCase } from './messages'
import type { MagicContext } from './ports'
import type { Character, StatKey } from './types'

const log = logger.child({ module: 'spellbook' })

export type SpellbookContext = Pick<MagicContext, 'spells' | 'characters' | 'messaging'>

const CURE_TEXT: Record<string, string> = {
  poison: 'Cures poison',
  hunger: 'Cures hunger',
  thirst: 'Quenches thirst',
  paralysis: 'Cures paralysis',
  drain: 'Restores drained stats',
}

function statNames(stats: StatKey[]): string {
  return stats.map(titleCase).join('/')
}

function effectLine(spell: RuntimeSpell): string {
  const r = spell.resolution
  switch (r.type) {
    case 'damage':
      return `Damage: ${r.roll.dice} (${r.roll.damageType})`
    case 'heal':
      return `Healing: ${r.dice} HP`
    case 'cure':
      return CURE_TEXT[r.cure] ?? ''
    case 'buff':
      if (r.buff.kind === 'ac_bonus') return `Armor Class +${r.amount} (${r.duration} rounds)`
      if (r.buff.kind === 'invisibility') return `Invisibility (${r.duration} rounds)`
      return `${statNames(r.buff.stats)} +${r.amount} (${r.duration} rounds)`
    case 'enhancement': {
      const amount = r.dice ?? String(r.fallbackAmount)
      if (r.buff.kind === 'stat_buff') return `Enhances ${statNames(r.buff.stats)} by ${amount}`
      if (r.buff.kind === 'ac_bonus') return `Enhances Armor Class by ${amount}`
      return `Effect: ${spell.effectKind} (${r.duration} rounds)`
    }
    case 'debuff': {
      let text: string
      if (r.debuff.kind === 'paralyze') text = `Paralyzes target (${r.duration} rounds)`
      else if (r.debuff.kind === 'charm') text = `Charms target, preventing attacks (${r.duration} rounds)`
      else text = `Effect: ${spell.effectKind} (${r.duration} rounds)`
      return r.damage ? `${text} + Damage: ${r.damage.dice} (${r.damage.damageType})` : text
    }
    case 'drain': {
      const base = `Damage: ${r.roll.dice} (${r.roll.damageType})`
      if (!r.drain) return base
      if (r.drain.kind === 'mana') return `${base} + Drains Mana by ${r.drain.dice}`
      if (r.drain.kind === 'health') return `${base} + Drains Health`
      return `${base} + Drains ${statNames(r.drain.stats)} by ${r.drain.dice} (${r.drain.duration} rounds)`
    }
    case 'summon':
      return 'Summons a creature'
    case 'unsupported':
      return ''
  }
}

export function describeSpell(spell: RuntimeSpell, cooldownRemaining: number): string[] {
  const cooldown = cooldownRemaining > 0 ? ` [COOLDOWN: ${cooldownRemaining} rounds]` : ''
  const lines = [`${spell.name} (Level ${spell.level}) - ${spell.manaCost} mana${cooldown}`]
  if (spell.description) {
    lines.push(`  ${spell.description}`)
  }
  let info = effectLine(spell)
  if (info && spell.area === 'area') {
    info += ' [AOE]'
  }
  if (info) {
    lines.push(`  ${info}`)
  }
  return lines
}

export function describeSpellbook(ctx: Pick<MagicContext, 'spells'>, caster: Character): string {
  if (caster.knownSpells.length === 0) {
    return "Your spellbook is empty. You haven't learned any spells yet."
  }
  const lines = ['=== Your Spellbook ===', '']
  for (const spellId of caster.knownSpells) {
    const spell = ctx.spells.get(spellId)
    if (!spell) {
      log.warn({ casterId: caster.id, spellId }, 'known spell missing from catalog')
      lines.push(`${spellId} (spell data not found)`, '')
      continue
    }
    lines.push(...describeSpell(spell, caster.cooldowns[spellId] ?? 0), '')
  }
  return lines.join('\n').trimEnd()
}

export function showSpellbook(ctx: SpellbookContext, casterId: string): boolean {
  const caster = ctx.characters.get(casterId)
  if (!caster) {
    return false
  }
  ctx.messaging.sendToPlayer(caster.id, describeSpellbook(ctx, caster))
  return true
}

/** Exact id first, then any known spell whose id or name contains the input. */
export function unlearnSpell(ctx: SpellbookContext, casterId: string, input: string): boolean {
  const caster = ctx.characters.get(casterId)
  if (!caster) {
    return false
  }
  const tell = (text: string) => ctx.messaging.sendToPlayer(caster.id, text)
  if (caster.knownSpells.length === 0) {
    tell("Your spellbook is empty. You don't know any spells to unlearn.")
    return false
  }

  const wanted = input.trim().toLowerCase()
  const nameOf = (spellId: string) => ctx.spells.get(spellId)?.name ?? spellId
  let spellId: string | undefined = caster.knownSpells.find((id) => id.toLowerCase() === wanted)
  if (!spellId) {
    const matches = caster.knownSpells.filter(
      (id) => id.toLowerCase().includes(wanted) || nameOf(id).toLowerCase().includes(wanted),
    )
    if (matches.length === 0) {
      tell(`You don't know a spell called '${input}'. Use 'spellbook' to see your spells.`)
      return false
    }
    if (matches.length > 1) {
      const lines = [`Multiple spells match '${input}':`]
      for (const id of matches) {
        lines.push(`  - ${nameOf(id)} (${id})`)
      }
      lines.push('Please be more specific.')
      tell(lines.join('\n'))
      return false
    }
    spellId = matches[0]
  }

  const forgotten = spellId
  caster.knownSpells = caster.knownSpells.filter((id) => id !== forgotten)
  delete caster.cooldowns[forgotten]
  tell(`You have forgotten the spell: ${nameOf(forgotten)}`)
  ctx.messaging.broadcastRoomExcept(
    caster.roomId,
    caster.id,
    `${caster.name} concentrates deeply, erasing knowledge of a spell from their mind.`,
  )
  log.info({ casterId: caster.id, spellId: forgotten }, 'spell unlearned')
  return true
}
