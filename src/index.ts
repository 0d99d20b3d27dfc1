#!/usr/bin/env tsx

import { Command, Option } from 'commander'
import { init } from './commands/init.ts'
import { add } from './commands/add.ts'
import { network } from './commands/network.ts'
import { remove } from './commands/remove.ts'
import { list } from './commands/list.ts'
import { presets } from './commands/presets.ts'
import { collect, withErrorHandling } from './lib/cli.ts'
import { RESTART_POLICIES, NETWORK_DRIVERS } from './types.ts'

const program = new Command()

program
  .name('compose-manager')
  .description('Add and update services and networks in a docker compose file without losing its layout')
  .version('0.1.0')

const fileOption = () => new Option('-f, --file <path>', 'Compose file to edit (default: from config, or compose.yml)')

// compose-manager init
program
  .command('init')
  .description('Create an empty compose file')
  .addOption(fileOption())
  .action(withErrorHandling(init))

// compose-manager add <name>
program
  .command('add <name>')
  .description('Add a service, or update the given fields of an existing one')
  .addOption(fileOption())
  .option('--infra <path>', 'Shared compose file whose networks may be referenced as external networks')
  .option('--container-name <name>', 'Container name (default for new services: the service name)')
  .option('-i, --image <image>', 'Image reference, repository[:tag]')
  .addOption(
    new Option('-r, --restart <policy>', 'Restart policy (default for new services: unless-stopped)').choices(
      RESTART_POLICIES
    )
  )
  .option('-n, --network <name>', 'Attach to a network (repeatable)', collect, [])
  .option('-p, --port <mapping>', 'Publish a port, host:container[/protocol] (repeatable)', collect, [])
  .option('-e, --env <KEY=VALUE>', 'Set an environment variable (repeatable)', collect, [])
  .option('-v, --volume <mapping>', 'Mount a volume, source:target[:mode] (repeatable)', collect, [])
  .option('-l, --label <KEY=VALUE>', 'Set a label (repeatable)', collect, [])
  .option('-d, --depends-on <service>', 'Start after another service (repeatable)', collect, [])
  .option('--preset <name>', 'Resource preset (see `compose-manager presets`)')
  .option('--cpus <count>', 'CPU limit, overrides the preset')
  .option('--memory <size>', 'Memory limit such as 256M, overrides the preset')
  .option('--cpu-reservation <count>', 'CPU reservation')
  .option('--memory-reservation <size>', 'Memory reservation')
  .option('--auto-update', 'Let Watchtower update the container')
  .option('--no-auto-update', 'Keep Watchtower away from the container')
  .option('--note <text>', 'Comment line written under the service (repeatable, replaces existing notes)', collect, [])
  .action(withErrorHandling(add))

// compose-manager network <name>
program
  .command('network <name>')
  .alias('net')
  .description('Add a network, or update the given fields of an existing one')
  .addOption(fileOption())
  .addOption(new Option('--driver <driver>', 'Network driver (default for new networks: bridge)').choices(NETWORK_DRIVERS))
  .option('--internal', 'Restrict external access to the network')
  .option('--no-internal', 'Allow external access to the network')
  .option('--ipv6', 'Enable IPv6')
  .option('--no-ipv6', 'Disable IPv6')
  .option('--external', 'The network is created outside this file')
  .option('--no-external', 'The network is defined by this file')
  .action(withErrorHandling(network))

// compose-manager remove <name>
program
  .command('remove <name>')
  .alias('rm')
  .description('Remove a service, or a network with --network')
  .addOption(fileOption())
  .option('--network', 'Remove a network instead of a service')
  .action(withErrorHandling(remove))

// compose-manager list
program
  .command('list')
  .alias('ls')
  .description('List services and networks in the compose file')
  .addOption(fileOption())
  .action(withErrorHandling(list))

// compose-manager presets
program.command('presets').description('List the available resource presets').action(withErrorHandling(presets))

await program.parseAsync()
