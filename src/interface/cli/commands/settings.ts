/**
 * buildsense settings - Show the build settings of one file
 */

import { Command } from 'commander';
import { resolveGlobalOptions, effectiveLogLevel } from '../utils/global-options.js';
import { createWorkspace } from '../../../core/workspace.js';
import { configureLogger } from '../../../shared/logger.js';
import { printJson, settingsToJson } from '../output/json-output.js';
import { exitWithError, handleCommandError } from '../output/error-display.js';
import { formatBold, formatDim, formatSettings } from '../output/formatter.js';

export function settingsCommand(): Command {
  return new Command('settings')
    .description('Show the compiler arguments used for a file')
    .argument('<file>', 'Source file, relative to the project root')
    .option('-l, --language <id>', 'Language identifier (c, cpp, objective-c, objective-cpp)')
    .action(async (file: string, options: { language?: string }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const workspace = await createWorkspace(globals.cwd);
        configureLogger({ level: effectiveLogLevel(globals, workspace.config.log.level) });
        const result = await workspace.settingsForFile(file, options.language);
        await workspace.close();

        if (!result.language) {
          exitWithError(
            {
              message: `Cannot determine the language of ${file}`,
              hint: 'Pass --language explicitly.',
            },
            globals,
          );
        }

        if (globals.json) {
          printJson(settingsToJson(result));
          return;
        }

        if (!result.settings) {
          process.stderr.write(formatDim(`No build settings known for ${result.file}`) + '\n');
          return;
        }
        process.stdout.write(formatSettings(result.settings) + '\n');
        if (!globals.quiet) {
          const toolchain = result.toolchain;
          process.stdout.write(
            `${formatBold('Toolchain:')}         ${toolchain ? `${toolchain.displayName} (${toolchain.path})` : formatDim('none')}\n`,
          );
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
