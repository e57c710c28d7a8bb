#!/usr/bin/env node
/**
 * Pet-care Controller CLI
 * Reads appliance state and sends commands through the orchestrator
 */

import chalk from 'chalk'
import { Command } from 'commander'

import { initialize } from '@boot/init'
import type { PetCareController } from '@boot/types'
import type { AppliancePublicState } from '@system/orchestrator'
import { ControlError } from '$types'
import type { Appliance } from '$types'

import { commandNames, parseCommand } from './commands'
import { ConfigManager } from './config'

function start(): PetCareController {
  const manager = new ConfigManager()
  const errors = manager.validate()

  if (errors.length > 0) {
    console.error(chalk.red('Configuration errors:'))
    errors.forEach((error) => console.error(`  - ${error}`))
    process.exit(1)
  }

  const { sessionToken } = manager.get()
  return initialize({
    tokenProvider: { getToken: async () => sessionToken },
    overrides: manager.toOverrides(),
  })
}

function formatState(state: AppliancePublicState): string[] {
  const title = chalk.white.bold(`${state.appliance.name} (${state.kind}, ID: ${state.appliance.id})`)

  switch (state.kind) {
    case 'fountain': {
      const { snapshot } = state
      return [
        title,
        chalk.blue(`  Power: ${snapshot.powerStatus === 1 ? 'running' : 'paused'}`),
        chalk.blue(`  Mode: ${snapshot.mode === 1 ? 'normal' : 'smart'}`),
        chalk.blue(`  Light: ${snapshot.settings.lampRingSwitch === 1 ? 'on' : 'off'} (brightness ${snapshot.settings.lampRingBrightness})`),
        chalk.blue(`  Do not disturb: ${snapshot.settings.noDisturbingSwitch === 1 ? 'on' : 'off'}`),
        chalk.gray(`  Data source: ${state.path}`),
      ]
    }
    case 'litterBox':
      return [
        title,
        state.manuallyPaused && state.pauseEndsAt !== null
          ? chalk.yellow(`  Manually paused until ${new Date(state.pauseEndsAt * 1000).toISOString()}`)
          : chalk.green('  Not paused'),
      ]
    case 'feeder':
    case 'purifier':
      return [title, chalk.gray(`  ${Object.keys(state.detail).length} detail fields`)]
  }
}

async function findAppliance(controller: PetCareController, id: number): Promise<Appliance> {
  const roster = await controller.api.getRoster()
  const appliance = roster.appliances.find((candidate) => candidate.id === id)
  if (appliance === undefined) {
    throw new Error(`No appliance with ID ${id} on this account`)
  }
  return appliance
}

async function refresh(options: { id?: string }): Promise<void> {
  const controller = start()

  const states: AppliancePublicState[] = []
  if (options.id !== undefined) {
    const appliance = await findAppliance(controller, parseInt(options.id))
    states.push(await controller.orchestrator.refresh(appliance))
  } else {
    const result = await controller.orchestrator.refreshAll()
    states.push(...result.fountains.values(), ...result.litterBoxes.values(), ...result.feeders.values(), ...result.purifiers.values())
  }

  console.log('\n' + chalk.cyan('═'.repeat(60)))
  if (states.length === 0) {
    console.log(chalk.yellow('No supported appliances found'))
  }
  for (const state of states) {
    console.log(formatState(state).join('\n'))
  }
  console.log(chalk.cyan('═'.repeat(60)) + '\n')
}

async function send(id: string, name: string, value?: string): Promise<void> {
  const command = parseCommand(name, value)
  const controller = start()
  const appliance = await findAppliance(controller, parseInt(id))

  await controller.orchestrator.sendCommand(appliance, command)
  console.log(chalk.green(`✓ ${name} sent to ${appliance.name}`))
}

function fail(error: unknown): void {
  if (error instanceof ControlError) {
    console.error(chalk.red(`${error.reason}:`), error.message)
  } else if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message)
  } else {
    console.error(chalk.red('Error:'), String(error))
  }
  process.exitCode = 1
}

const program = new Command()

program
  .name('petcare')
  .description('Control pet-care appliances through the vendor cloud')

program
  .command('refresh')
  .description('Show the current state of every appliance, or of one')
  .option('-i, --id <id>', 'Only this appliance')
  .action((options: { id?: string }) => refresh(options).catch(fail))

program
  .command('send')
  .description(`Send a command: ${commandNames().join(', ')}`)
  .argument('<id>', 'Appliance ID')
  .argument('<command>', 'Command name')
  .argument('[value]', 'Brightness level, feed amount or <setting>=<number>')
  .action((id: string, name: string, value?: string) => send(id, name, value).catch(fail))

program.parseAsync(process.argv).catch(fail)
