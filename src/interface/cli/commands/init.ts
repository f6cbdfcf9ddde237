/**
 * buildsense init - Write the default project configuration
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { initWorkspace } from '../../../core/workspace.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatBold, formatSuccess } from '../output/formatter.js';

export function initCommand(): Command {
  return new Command('init')
    .description('Create .buildsense/config.json with default settings')
    .option('-f, --force', 'Overwrite an existing configuration', false)
    .action((options: { force?: boolean }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const configPath = initWorkspace(globals.cwd, { force: options.force ?? false });

        if (globals.json) {
          printJson({ config_path: configPath });
        } else if (!globals.quiet) {
          process.stderr.write(formatSuccess('Project initialized') + '\n');
          process.stderr.write(`  ${formatBold('Config:')} ${configPath}\n`);
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
