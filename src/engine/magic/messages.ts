import type { Messaging } from './ports'
import type { Entity } from './types'

export type TemplateValues = Record<string, string | number>

/** Replaces `{key}` placeholders; unknown keys are left as written. */
export function fillTemplate(template: string, values: TemplateValues): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => (key in values ? String(values[key]) : whole))
}

export function titleCase(value: string): string {
  return value
    .split(/[_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ')
}

export function articleFor(name: string): 'A' | 'An' {
  return /^[aeiou]/i.test(name) ? 'An' : 'A'
}

// Players hear about their own effects directly; everything that happens to a
// mob is narrated to the room.
export function notifyHolder(messaging: Messaging, entity: Entity, playerText: string, roomText: string) {
  if (entity.kind === 'player') {
    messaging.sendToPlayer(entity.id, playerText)
  } else {
    messaging.broadcastRoomExcept(entity.roomId, null, roomText)
  }
}
