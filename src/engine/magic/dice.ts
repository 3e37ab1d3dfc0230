const RNG_A = 1664525
const RNG_C = 1013904223
const RNG_M = 0x100000000

const MAX_DICE = 100
const MAX_SIDES = 1000

const DICE_PATTERN = /^(-)?(\d*)d(\d+)([+-]\d+)?$/
const FLAT_PATTERN = /^[+-]?\d+$/

/** Uniform draw in [0, 1). */
export type RandomSource = () => number

export interface DiceRoller {
  roll(sides: number): number
}

export const mathRandom: RandomSource = () => Math.random()

export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (Math.imul(state, RNG_A) + RNG_C) >>> 0
    return state / RNG_M
  }
}

export class RandomDiceRoller implements DiceRoller {
  constructor(private readonly random: RandomSource = mathRandom) {}

  roll(sides: number): number {
    if (sides < 1 || sides > MAX_SIDES) {
      throw new Error(`Dice must have between 1 and ${MAX_SIDES} sides, got: ${sides}`)
    }
    return Math.floor(this.random() * sides) + 1
  }
}

/** Deterministic LCG roller for reproducible simulations. */
export class SeededDiceRoller extends RandomDiceRoller {
  constructor(seed: number) {
    super(seededRandom(seed))
  }
}

/**
 * Returns predetermined faces in order. Throws when a face does not fit the
 * die being rolled or when the queue runs dry.
 */
export class FixedDiceRoller implements DiceRoller {
  private values: number[]

  constructor(values: number[]) {
    this.values = [...values]
  }

  roll(sides: number): number {
    const value = this.values.shift()
    if (value === undefined) {
      throw new Error('FixedDiceRoller: No more values available')
    }
    if (value < 1 || value > sides) {
      throw new Error(`FixedDiceRoller: Value ${value} out of range for ${sides}-sided die`)
    }
    return value
  }

  get remaining(): number {
    return this.values.length
  }
}

/**
 * Rolls expressions such as `2d6+3`, `d8`, `-1d5` or a flat `4`. A leading
 * minus negates the whole result. Anything unparseable rolls 0.
 */
export function rollDice(expression: string, roller: DiceRoller): number {
  const normalized = expression.replace(/\s+/g, '').toLowerCase()
  if (FLAT_PATTERN.test(normalized)) {
    return Number(normalized)
  }

  const match = DICE_PATTERN.exec(normalized)
  if (!match) {
    return 0
  }

  const count = match[2] ? Number(match[2]) : 1
  const sides = Number(match[3])
  const modifier = match[4] ? Number(match[4]) : 0
  if (count > MAX_DICE || sides < 1 || sides > MAX_SIDES) {
    return 0
  }

  let total = modifier
  for (let i = 0; i < count; i += 1) {
    total += roller.roll(sides)
  }
  return match[1] ? -total : total
}

export function scaledValue(base: number, scalesWithLevel: boolean, level: number): number {
  return scalesWithLevel ? base * level : base
}
