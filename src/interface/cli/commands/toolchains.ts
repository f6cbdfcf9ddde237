/**
 * buildsense toolchains - List discovered toolchains
 */

import { Command, Option } from 'commander';
import { resolveGlobalOptions, effectiveLogLevel } from '../utils/global-options.js';
import { createWorkspace } from '../../../core/workspace.js';
import { TOOL_KINDS, type ToolKind } from '../../../core/toolchain/toolchain.js';
import { configureLogger } from '../../../shared/logger.js';
import { printJson, toolchainToJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatDim, formatToolchain } from '../output/formatter.js';

export function toolchainsCommand(): Command {
  return new Command('toolchains')
    .description('List discovered toolchains, newest first (* marks the default)')
    .addOption(new Option('--tool <kind>', 'Only toolchains providing this tool').choices(TOOL_KINDS))
    .action(async (options: { tool?: ToolKind }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const workspace = await createWorkspace(globals.cwd);
        configureLogger({ level: effectiveLogLevel(globals, workspace.config.log.level) });
        const defaultToolchain = workspace.toolchainRegistry.default;
        const tool = options.tool;
        const toolchains = workspace.toolchains.filter((t) => !tool || t.hasTool(tool));

        if (globals.json) {
          printJson(toolchains.map((t) => toolchainToJson(t, t === defaultToolchain)));
        } else if (toolchains.length === 0) {
          if (!globals.quiet) process.stderr.write(formatDim('No toolchains found') + '\n');
        } else {
          for (const toolchain of toolchains) {
            process.stdout.write(formatToolchain(toolchain, toolchain === defaultToolchain) + '\n');
          }
        }

        await workspace.close();
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
