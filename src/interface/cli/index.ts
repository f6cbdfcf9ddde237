/**
 * CLI entry point - creates the commander.js program with all commands
 */

import { Command } from 'commander';
import { addGlobalOptions } from './utils/global-options.js';
import { initCommand } from './commands/init.js';
import { toolchainsCommand } from './commands/toolchains.js';
import { settingsCommand } from './commands/settings.js';
import { watchCommand } from './commands/watch.js';
import { versionCommand } from './commands/version.js';
import { getVersion } from './version.js';

export function createCli(): Command {
  const program = new Command('buildsense')
    .description('Build settings, preparation scheduling and toolchain discovery for C-family projects')
    .version(getVersion(), '-V, --version');

  addGlobalOptions(program);

  program.addCommand(initCommand());
  program.addCommand(toolchainsCommand());
  program.addCommand(settingsCommand());
  program.addCommand(watchCommand());
  program.addCommand(versionCommand());

  return program;
}
