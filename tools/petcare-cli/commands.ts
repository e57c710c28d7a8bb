/**
 * Command-line command names
 * Maps the words an operator types to orchestrator commands
 */

import { LIGHT_BRIGHTNESS } from '@ble/codec'
import type { ApplianceCommand } from '@system/orchestrator'
import { FEEDER_SETTINGS } from '$types'
import type { FeederSetting } from '$types'

const FIXED_COMMANDS: ReadonlyMap<string, ApplianceCommand> = new Map(Object.entries<ApplianceCommand>({
  // Fountain
  'pause': { kind: 'pause' },
  'normal-mode': { kind: 'normalMode' },
  'smart-mode': { kind: 'smartMode' },
  'reset-filter': { kind: 'resetFilter' },
  'light-on': { kind: 'lightPower', on: true },
  'light-off': { kind: 'lightPower', on: false },
  'dnd-on': { kind: 'doNotDisturb', on: true },
  'dnd-off': { kind: 'doNotDisturb', on: false },

  // Litter box
  'power-on': { kind: 'power', on: true },
  'power-off': { kind: 'power', on: false },
  'start-clean': { kind: 'startClean' },
  'pause-clean': { kind: 'pauseClean' },
  'resume-clean': { kind: 'resumeClean' },
  'odor-removal': { kind: 'odorRemoval' },
  'reset-deodorizer': { kind: 'resetDeodorizer' },

  // Feeder
  'reset-desiccant': { kind: 'resetDesiccant' },
  'cancel-feed': { kind: 'cancelManualFeed' },
}))

/** Commands that take a value */
const VALUE_COMMANDS = ['brightness', 'feed', 'feeder-setting'] as const

const SETTING_NAMES: ReadonlyMap<string, FeederSetting> = new Map(Object.entries(FEEDER_SETTINGS))

/**
 * Every command name, for help output
 */
export function commandNames(): string[] {
  return [...FIXED_COMMANDS.keys(), ...VALUE_COMMANDS]
}

/**
 * Turn a command name and optional value into an orchestrator command
 * @throws Error for an unknown name or a bad value
 */
export function parseCommand(name: string, value?: string): ApplianceCommand {
  const fixed = FIXED_COMMANDS.get(name)
  if (fixed !== undefined) {
    return fixed
  }

  if (name === 'brightness') {
    const level = Object.values(LIGHT_BRIGHTNESS).find((candidate) => String(candidate) === value)
    if (level === undefined) {
      throw new Error(`brightness needs a level of 1, 2 or 3 (got ${value ?? 'nothing'})`)
    }
    return { kind: 'lightBrightness', level }
  }

  if (name === 'feed') {
    const amount = Number(value)
    if (value === undefined || !Number.isInteger(amount)) {
      throw new Error(`feed needs an amount in grams (got ${value ?? 'nothing'})`)
    }
    return { kind: 'manualFeed', amountGrams: amount }
  }

  if (name === 'feeder-setting') {
    return parseFeederSetting(value)
  }

  throw new Error(`Unknown command "${name}"`)
}

/**
 * Read `<setting>=<value>`, e.g. `CHILD_LOCK=1`
 */
function parseFeederSetting(value?: string): ApplianceCommand {
  const [settingName = '', rawValue] = (value ?? '').split('=')
  const setting = SETTING_NAMES.get(settingName)
  const settingValue = Number(rawValue)
  if (setting === undefined || rawValue === undefined || rawValue === '' || !Number.isInteger(settingValue)) {
    throw new Error(`feeder-setting needs <setting>=<number> with one of ${[...SETTING_NAMES.keys()].join(', ')} (got ${value ?? 'nothing'})`)
  }
  return { kind: 'updateFeederSetting', setting, value: settingValue }
}
