/**
 * Tests for command-line command names
 */

import { commandNames, parseCommand } from './commands'

describe('parseCommand', () => {
  it('should map fixed command names', () => {
    expect(parseCommand('smart-mode')).toEqual({ kind: 'smartMode' })
    expect(parseCommand('light-off')).toEqual({ kind: 'lightPower', on: false })
    expect(parseCommand('pause-clean')).toEqual({ kind: 'pauseClean' })
    expect(parseCommand('reset-desiccant')).toEqual({ kind: 'resetDesiccant' })
  })

  it('should read the brightness level', () => {
    expect(parseCommand('brightness', '3')).toEqual({ kind: 'lightBrightness', level: 3 })
  })

  it('should reject a brightness level outside 1-3', () => {
    expect(() => parseCommand('brightness', '4')).toThrow('brightness needs a level of 1, 2 or 3 (got 4)')
    expect(() => parseCommand('brightness')).toThrow('brightness needs a level of 1, 2 or 3 (got nothing)')
  })

  it('should read the feed amount', () => {
    expect(parseCommand('feed', '15')).toEqual({ kind: 'manualFeed', amountGrams: 15 })
    expect(() => parseCommand('feed', 'lots')).toThrow('feed needs an amount in grams (got lots)')
  })

  it('should reject unknown names', () => {
    expect(() => parseCommand('dance')).toThrow('Unknown command "dance"')
  })

  it('should reject names inherited from Object', () => {
    expect(() => parseCommand('constructor')).toThrow('Unknown command "constructor"')
    expect(() => parseCommand('toString')).toThrow('Unknown command "toString"')
  })

  it('should map cancel-feed', () => {
    expect(parseCommand('cancel-feed')).toEqual({ kind: 'cancelManualFeed' })
  })

  it('should read a feeder setting and its value', () => {
    expect(parseCommand('feeder-setting', 'CHILD_LOCK=1')).toEqual({ kind: 'updateFeederSetting', setting: 'manualLock', value: 1 })
    expect(parseCommand('feeder-setting', 'VOLUME=7')).toEqual({ kind: 'updateFeederSetting', setting: 'volume', value: 7 })
  })

  it('should reject an unknown feeder setting or a missing value', () => {
    const expected = 'feeder-setting needs <setting>=<number> with one of CHILD_LOCK, DISPENSE_TONE, DO_NOT_DISTURB, ' +
      'INDICATOR_LIGHT, SELECTED_SOUND, SHORTAGE_ALARM, SOUND_ENABLE, SURPLUS, SURPLUS_CONTROL, SYSTEM_SOUND, VOLUME'

    expect(() => parseCommand('feeder-setting', 'LOUD=1')).toThrow(expected + ' (got LOUD=1)')
    expect(() => parseCommand('feeder-setting', 'VOLUME')).toThrow(expected + ' (got VOLUME)')
    expect(() => parseCommand('feeder-setting')).toThrow(expected + ' (got nothing)')
  })
})

describe('commandNames', () => {
  it('should list value commands after the fixed ones', () => {
    const names = commandNames()

    expect(names).toHaveLength(20)
    expect(names.slice(-3)).toEqual(['brightness', 'feed', 'feeder-setting'])
  })
})
