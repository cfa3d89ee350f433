#!/usr/bin/env node
/**
 * framecalc CLI.
 *
 * Command-line interface for timecode arithmetic, rate conversion,
 * comparison, EDL generation and configuration checks.
 *
 * @module framecalc/cli
 */

import { Command } from 'commander';
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import type { Logger } from 'pino';
import { createLogger, DEFAULT_CONFIG_PATH, loadConfig, readYamlFile } from './app.js';
import { checkConfig, parseClipList, type Config } from './core/config/schema.js';
import {
  isOutputFormat,
  OUTPUT_FORMATS,
  runCalc,
  runCompare,
  runConvert,
  runEdl,
  type OutputFormat,
} from './commands.js';

// ============================================================================
// CLI Setup
// ============================================================================

const program = new Command();

program
  .name('framecalc')
  .description('Frame-accurate timecode arithmetic across frame rates')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to configuration file', process.env['CONFIG_PATH'] ?? DEFAULT_CONFIG_PATH);

interface GlobalOptions {
  config: string;
}

interface FormatOptions {
  output: string;
}

/**
 * Load configuration and build a logger at the configured level, then run the
 * command. Any error is logged and exits with status 1.
 */
async function withContext(
  action: (config: Config, logger: Logger) => Promise<void> | void
): Promise<void> {
  const { config: configPath } = program.opts<GlobalOptions>();
  let logger = createLogger();

  try {
    const config = await loadConfig(configPath, logger);
    logger = createLogger(config.logging.level, config.logging.prettyPrint);
    await action(config, logger);
  } catch (error) {
    logger.error({ error }, error instanceof Error ? error.message : 'Command failed');
    process.exit(1);
  }
}

function outputFormat(options: FormatOptions): OutputFormat {
  if (!isOutputFormat(options.output)) {
    throw new Error(`Unsupported output format "${options.output}". Valid formats: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return options.output;
}

// ============================================================================
// Calc Command
// ============================================================================

program
  .command('calc')
  .description('Evaluate an expression such as "01:00:00:00@24 + 00:00:02:00@16 * 2"')
  .argument('<expression...>', 'Timecodes (HH:MM:SS:FF[@fps]), numbers and + - * operators')
  .option('-o, --output <format>', `Output format: ${OUTPUT_FORMATS.join(', ')}`, 'timecode')
  .action(async (expression: string[], options: FormatOptions) => {
    await withContext((config) => {
      console.log(runCalc(expression.join(' '), config, outputFormat(options)));
    });
  });

// ============================================================================
// Convert Command
// ============================================================================

interface ConvertOptions extends FormatOptions {
  from?: number;
  to: number;
}

program
  .command('convert')
  .description('Express a timecode at another frame rate, keeping its real-time position')
  .argument('<timecode>', 'Timecode as HH:MM:SS:FF[@fps]')
  .requiredOption('-t, --to <fps>', 'Target frame rate', parseFloat)
  .option('-f, --from <fps>', 'Source frame rate (defaults to the configured rate)', parseFloat)
  .option('-o, --output <format>', `Output format: ${OUTPUT_FORMATS.join(', ')}`, 'timecode')
  .action(async (timecode: string, options: ConvertOptions) => {
    await withContext((config) => {
      const fromRate = options.from ?? config.timecode.frameRate;
      console.log(runConvert(timecode, fromRate, options.to, outputFormat(options)));
    });
  });

// ============================================================================
// Compare Command
// ============================================================================

program
  .command('compare')
  .description('Compare two timecodes by real-time position; prints <, = or >')
  .argument('<a>', 'Timecode as HH:MM:SS:FF[@fps]')
  .argument('<b>', 'Timecode as HH:MM:SS:FF[@fps]')
  .action(async (a: string, b: string) => {
    await withContext((config) => {
      console.log(runCompare(a, b, config));
    });
  });

// ============================================================================
// EDL Command
// ============================================================================

interface EdlOptions {
  input: string;
  output?: string;
}

program
  .command('edl')
  .description('Lay out a YAML clip list end to end and write a CMX 3600 EDL')
  .requiredOption('-i, --input <path>', 'Path to clip list YAML file')
  .option('-o, --output <path>', 'Path for output file (stdout when omitted)')
  .action(async (options: EdlOptions) => {
    await withContext(async (config, logger) => {
      const inputPath = resolve(options.input);

      if (!existsSync(inputPath)) {
        throw new Error(`Input file not found: ${inputPath}`);
      }

      logger.info({ path: inputPath }, 'Reading clip list');
      const clipList = parseClipList(await readYamlFile(inputPath));
      const edl = runEdl(clipList, config);

      if (!options.output) {
        console.log(edl);
        return;
      }

      const outputPath = resolve(options.output);
      await writeFile(outputPath, edl);
      logger.info({ path: outputPath, events: clipList.clips.length }, 'EDL generated successfully');
    });
  });

// ============================================================================
// Validate Config Command
// ============================================================================

program
  .command('validate-config')
  .description('Check a configuration file against the schema and the start timecode rules')
  .action(async () => {
    const { config: configFile } = program.opts<GlobalOptions>();
    const logger = createLogger();
    const configPath = resolve(configFile);

    if (!existsSync(configPath)) {
      logger.error({ path: configPath }, 'Configuration file not found');
      process.exit(1);
    }

    try {
      const result = checkConfig(await readYamlFile(configPath));

      if (!result.success) {
        logger.error({ path: configPath, errors: result.errors }, 'Configuration invalid');
        process.exit(1);
      }

      logger.info({ path: configPath }, 'Configuration valid');
      console.log(JSON.stringify(result.config, null, 2));
    } catch (error) {
      logger.error({ error }, error instanceof Error ? error.message : 'Failed to read configuration');
      process.exit(1);
    }
  });

// ============================================================================
// Entry Point
// ============================================================================

await program.parseAsync();
