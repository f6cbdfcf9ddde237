/**
 * buildsense watch - Watch the project and print build settings changes
 */

import { Command } from 'commander';
import * as path from 'node:path';
import { resolveGlobalOptions, effectiveLogLevel } from '../utils/global-options.js';
import { createWorkspace } from '../../../core/workspace.js';
import { configureLogger } from '../../../shared/logger.js';
import { pathToUri, uriToPath } from '../../../shared/path-utils.js';
import { printJsonLine } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatBold, formatDim, formatSettings } from '../output/formatter.js';

export function watchCommand(): Command {
  return new Command('watch')
    .description('Watch the project and print build settings changes of the given files')
    .argument('[files...]', 'Source files to follow, relative to the project root', [])
    .action(async (files: string[], _options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const workspace = await createWorkspace(globals.cwd);
        configureLogger({ level: effectiveLogLevel(globals, workspace.config.log.level) });

        workspace.onBuildSettingsChanged((changes) => {
          for (const change of changes) {
            if (globals.json) {
              printJsonLine(change);
              continue;
            }
            const file = uriToPath(change.document) ?? change.document;
            process.stdout.write(`${formatBold(file)}\n`);
            process.stdout.write(
              (change.settings ? formatSettings(change.settings) : formatDim('no settings known')) + '\n\n',
            );
          }
        });

        workspace.startWatching();
        for (const file of files) {
          const uri = pathToUri(path.resolve(workspace.cwd, file));
          const language = await workspace.manager.defaultLanguage(uri);
          if (!language) {
            process.stderr.write(formatDim(`Skipping ${file}: unknown language`) + '\n');
            continue;
          }
          await workspace.manager.registerForChangeNotifications(uri, language);
        }

        let shuttingDown = false;

        const gracefulShutdown = async (signal: string) => {
          if (shuttingDown) return;
          shuttingDown = true;

          process.stderr.write(`[buildsense] Received ${signal}. Shutting down...\n`);
          try {
            await workspace.close();
          } catch (error) {
            handleCommandError(error, globals);
          }
          process.exit(0);
        };

        process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
        process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
