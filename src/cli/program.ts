import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { types } from 'util';
import { Logger, parseLogLevel } from '../utils/Logger';
import { DelimitedWriter } from '../utils/DelimitedWriter';
import { withDelimiters } from '../utils/DelimitedWriterOptions';

export type CliOptions = {
  prefix: string;
  step: string;
  suffix: string;
  fromFile?: string;
  logLevel: string;
  logFile?: string;
  quiet?: boolean;
};

export interface CliOutput {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

const processOutput: CliOutput = {
  writeOut: text => process.stdout.write(text),
  writeErr: text => process.stderr.write(text)
};

// Read version from package.json
const packageJson: { version: string } = JSON.parse(
  fs.readFileSync(path.join(__dirname, '../../package.json'), 'utf8')
);

export function readParts(file: string): string[] {
  const lines = fs.readFileSync(file, 'utf8').split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function buildProgram(output: CliOutput = processOutput): Command {
  const program = new Command();

  program
    .name('delimited-join')
    .description('Join parts with a delimiter, wrapped in an optional prefix and suffix')
    .version(packageJson.version)
    .configureOutput({
      writeOut: text => output.writeOut(text),
      writeErr: text => output.writeErr(text)
    })
    .argument('[parts...]', 'parts to join')
    .option('--prefix <text>', 'text written before the first part', '')
    .option('--step <text>', 'delimiter written between parts', ',')
    .option('--suffix <text>', 'text written after the last part', '')
    .option('--from-file <path>', 'read parts from a file, one per line')
    .option('--log-level <level>', 'Set the log level (debug, info, warn, error)', 'info')
    .option('--log-file <path>', 'Write logs to this file')
    .option('--quiet', 'Disable all logging')
    .action((parts: string[]) => {
      const options = program.opts<CliOptions>();

      if (options.logFile) {
        Logger.setLogFile(options.logFile);
      }
      Logger.enableLogs(!options.quiet);

      try {
        const level = parseLogLevel(options.logLevel);
        if (!level) {
          throw new Error(`Unknown log level "${options.logLevel}"`);
        }
        Logger.setLogLevel(level);
        Logger.info('CLI', 'Starting...');

        const all = options.fromFile ? [...readParts(options.fromFile), ...parts] : parts;
        const writer = new DelimitedWriter(withDelimiters(options.prefix, options.step, options.suffix));
        for (const part of all) {
          writer.writeString(part);
        }

        Logger.info('CLI', `Joined ${all.length} part(s) into ${writer.len()} bytes`);
        output.writeOut(writer.toString() + '\n');
      } catch (error) {
        const errorMessage = types.isNativeError(error) ? error.message : String(error);
        Logger.error('CLI', `An error occurred: ${errorMessage}`, error);
        program.error(`Error: ${errorMessage}`, { exitCode: 1, code: 'delimited-join.failed' });
      }
    });

  return program;
}
