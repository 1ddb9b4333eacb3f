import { LogLevel } from '@nestjs/common';
import { parseArgs } from 'util';
import { CliUsageError, errorMessage } from './stix_loader/core/exception/custom-exceptions';
import { StixFileLoaderService } from './stix_loader/modules/ingestion/stix-file-loader.service';

export type LoadMode = 'json' | 'zip' | 'jsonx' | 'zipx';

const MODES: ReadonlyArray<LoadMode> = ['json', 'zip', 'jsonx', 'zipx'];

export interface LoadCommand {
  kind: 'load';
  mode: LoadMode;
  file: string;
  db?: string;
}

export type CliCommand = { kind: 'help' } | LoadCommand;

export const USAGE = `Usage: stix-graph-loader (--json|--zip|--jsonx|--zipx) <file> [--db <location>]

  --json  <file>   file of one STIX bundle
  --zip   <file>   zip archive of bundle files
  --jsonx <file>   large text file, one STIX object per line
  --zipx  <file>   zip archive of large text files
  --db    <loc>    graph database location (defaults to NEO4J_URI)
  -h, --help       show this help
`;

export function parseCliArgs(argv: string[]): CliCommand {
  let values: Partial<Record<LoadMode | 'db', string>> & { help?: boolean };
  let positionals: string[];
  try {
    ({ values, positionals } = parseArgs({
      args: argv,
      options: {
        json: { type: 'string' },
        zip: { type: 'string' },
        jsonx: { type: 'string' },
        zipx: { type: 'string' },
        db: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      allowPositionals: true,
      strict: true,
    }));
  } catch (error) {
    throw new CliUsageError(errorMessage(error));
  }

  if (values.help) {
    return { kind: 'help' };
  }
  if (positionals.length > 0) {
    throw new CliUsageError(`unexpected argument: ${positionals[0]}`);
  }
  const selected = MODES.filter((mode) => values[mode] !== undefined);
  if (selected.length !== 1) {
    throw new CliUsageError('exactly one of --json, --zip, --jsonx or --zipx is required');
  }
  const mode = selected[0];
  const file = values[mode];
  if (!file) {
    throw new CliUsageError(`--${mode} needs a file name`);
  }
  return values.db === undefined ? { kind: 'load', mode, file } : { kind: 'load', mode, file, db: values.db };
}

export type FileLoader = Pick<
  StixFileLoaderService,
  'loadBundleFile' | 'loadBundleZipFile' | 'loadLargeTextFile' | 'loadLargeZipTextFile'
>;

export function runLoad(loader: FileLoader, command: LoadCommand): Promise<void> {
  switch (command.mode) {
    case 'json':
      return loader.loadBundleFile(command.file, command.db);
    case 'zip':
      return loader.loadBundleZipFile(command.file, command.db);
    case 'jsonx':
      return loader.loadLargeTextFile(command.file, command.db);
    case 'zipx':
      return loader.loadLargeZipTextFile(command.file, command.db);
  }
}

// most severe first
const LOG_LEVELS: ReadonlyArray<LogLevel> = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Nest log levels enabled for a LOG_LEVEL value; unknown values fall back to `log`. */
export function logLevelsFrom(value: string | undefined): LogLevel[] {
  const wanted = value?.toLowerCase() ?? 'log';
  const level: LogLevel = isLogLevel(wanted) ? wanted : 'log';
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}
