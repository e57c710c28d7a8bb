/**
 * Configuration Management
 * Reads the operator's environment for the CLI
 */

import * as path from 'path'

import * as dotenv from 'dotenv'

import type { LogLevel } from '@logging'
import type { PetCareUserConfig, RegionName } from '$types'

// Load .env from the directory the CLI is started in
// ? override:true so .env values take precedence over system env vars
dotenv.config({
  path: path.resolve(process.cwd(), '.env'),
  override: true,
})

export interface CliConfig {
  // Cloud session
  region: string
  sessionToken: string
  timeoutMs: number

  // Logging
  logLevel: number

  // Relay
  relayTypeCode: number | null
  pollCooldownSec: number
}

const REGIONS: readonly RegionName[] = ['US', 'CN']
const LOG_LEVELS: readonly LogLevel[] = [0, 1, 2, 3]

class ConfigManager {
  private config: CliConfig

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = ConfigManager.load(env)
  }

  static load(env: NodeJS.ProcessEnv): CliConfig {
    return {
      region: (env.PETCARE_REGION || 'US').toUpperCase(),
      sessionToken: env.PETCARE_SESSION_TOKEN || '',
      timeoutMs: parseInt(env.PETCARE_TIMEOUT_MS || '30000'),
      logLevel: parseInt(env.PETCARE_LOG_LEVEL || '1'),
      relayTypeCode: env.PETCARE_RELAY_TYPE_CODE ? parseInt(env.PETCARE_RELAY_TYPE_CODE) : null,
      pollCooldownSec: parseInt(env.PETCARE_POLL_COOLDOWN_SEC || '420'),
    }
  }

  /**
   * Problems that stop the CLI from starting
   */
  validate(): string[] {
    const errors: string[] = []

    if (!this.config.sessionToken) {
      errors.push('PETCARE_SESSION_TOKEN is required')
    }

    if (!REGIONS.some((region) => region === this.config.region)) {
      errors.push(`PETCARE_REGION must be one of ${REGIONS.join(', ')}`)
    }

    if (Number.isNaN(this.config.timeoutMs)) {
      errors.push('PETCARE_TIMEOUT_MS must be a number')
    }

    if (!LOG_LEVELS.some((level) => level === this.config.logLevel)) {
      errors.push('PETCARE_LOG_LEVEL must be 0, 1, 2 or 3')
    }

    if (this.config.relayTypeCode !== null && Number.isNaN(this.config.relayTypeCode)) {
      errors.push('PETCARE_RELAY_TYPE_CODE must be a number')
    }

    if (Number.isNaN(this.config.pollCooldownSec)) {
      errors.push('PETCARE_POLL_COOLDOWN_SEC must be a number')
    }

    return errors
  }

  get(): CliConfig {
    return { ...this.config }
  }

  /**
   * Controller overrides for the values the environment sets
   * Range checks are left to the controller's own validation
   */
  toOverrides(): Partial<PetCareUserConfig> {
    const region = REGIONS.find((candidate) => candidate === this.config.region)
    const level = LOG_LEVELS.find((candidate) => candidate === this.config.logLevel)

    return {
      ...(region !== undefined ? { REGION: region } : {}),
      ...(level !== undefined ? { GLOBAL_LOG_LEVEL: level, CONSOLE_LOG_LEVEL: level } : {}),
      REQUEST_TIMEOUT_MS: this.config.timeoutMs,
      RELAY_TYPE_CODE: this.config.relayTypeCode,
      RELAY_POLL_COOLDOWN_SEC: this.config.pollCooldownSec,
    }
  }
}

// Export the class
export { ConfigManager }
