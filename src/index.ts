#!/usr/bin/env node
import { confirm, input, select } from '@inquirer/prompts';

import { ConfigurationError } from './application/errors';
import {
  EmptyDirectoryPruner,
  sumPruneStatistics,
} from './application/services/empty-directory-pruner';
import { MergeEngine } from './application/services/merge-engine';
import { normalizePath, resolveConsolidationConfig } from './application/services/resolve-config';
import type { ConsolidationConfig, PartialConsolidationConfig } from './domain/consolidation-config';
import type { MergeReport, PruneReport } from './domain/run-statistics';
import { JsonConfigFile } from './infrastructure/json-config-file';
import { createLogEventReporter } from './infrastructure/log-event-reporter';
import { NodeFileHasher } from './infrastructure/node-file-hasher';
import { NodeFileSystem } from './infrastructure/node-file-system';
import { getLogger } from './utils/get-logger';
import { parseHashChunkSize } from './utils/parse-byte-size';

type Command = 'prune' | 'merge' | 'consolidate' | 'help';

type ParsedArgs = {
  command: string | null;
  destinationRoot: string | null;
  sourceRoots: string[];
  configPath: string | null;
  logFile: string | null;
  includeRoot: boolean;
  assumeYes: boolean;
  positional: string[];
};

const EXIT_CODE_FAILURE = 1;
const EXIT_CODE_COMPLETED_WITH_ERRORS = 2;

const logger = getLogger();
const fileSystem = new NodeFileSystem();

const main = async () => {
  const args = parseArgs(process.argv.slice(2));

  if (args.command === 'help' || args.command === '--help') {
    printHelp();
    return;
  }

  // In a terminal without a command, ask what to do
  if (!args.command && process.stdin.isTTY) {
    const operation = await select<Command>({
      message: 'What would you like to do?',
      choices: [
        { name: 'Consolidate - Remove empty folders, then merge sources', value: 'consolidate' },
        { name: 'Merge - Merge sources into the destination', value: 'merge' },
        { name: 'Prune - Remove empty folders', value: 'prune' },
        { name: 'Help - Show usage information', value: 'help' },
      ],
    });
    await runCommand(operation, args);
    return;
  }

  if (!args.command) {
    printHelp();
    return;
  }

  if (!isCommand(args.command)) {
    logger.error({ command: args.command }, 'Unknown command');
    printHelp();
    process.exitCode = EXIT_CODE_FAILURE;
    return;
  }

  await runCommand(args.command, args);
};

const isCommand = (value: string): value is Command =>
  value === 'prune' || value === 'merge' || value === 'consolidate' || value === 'help';

const runCommand = async (command: Command, args: ParsedArgs) => {
  if (command === 'prune') {
    await runPrune(args);
  } else if (command === 'merge') {
    await runMerge(args, false);
  } else if (command === 'consolidate') {
    await runMerge(args, true);
  } else {
    printHelp();
  }
};

const runPrune = async (args: ParsedArgs) => {
  let roots = [...args.positional, ...args.sourceRoots].map(normalizePath);
  if (roots.length === 0 && process.stdin.isTTY) {
    roots = await promptForSources('Folder to clean');
  }
  if (roots.length === 0) {
    throw new ConfigurationError('No folders to clean', ['pass one or more paths to prune']);
  }

  process.stdout.write(
    `\nThis will DELETE every folder with no files anywhere below it in:\n${formatList(roots)}\n`,
  );
  if (!(await confirmRun(args, 'Proceed with cleanup?'))) {
    logger.info('Cancelled.');
    return;
  }

  const runLogger = getLogger({ logFile: args.logFile ? normalizePath(args.logFile) : undefined });
  const pruner = new EmptyDirectoryPruner(
    fileSystem,
    createLogEventReporter(runLogger),
    runLogger,
  );
  const reports = await pruner.pruneAll(roots, { includeRoot: args.includeRoot });

  printPruneSummary(reports);
  if (sumPruneStatistics(reports).errors > 0) {
    process.exitCode = EXIT_CODE_COMPLETED_WITH_ERRORS;
  }
};

const runMerge = async (args: ParsedArgs, pruneFirst: boolean) => {
  const config = await resolveConfig(args, pruneFirst);

  process.stdout.write(
    `\nDestination: ${config.destinationRoot}\nSources: ${config.sourceRoots.length} folder(s)\n${formatList(config.sourceRoots)}\n`,
  );
  if (config.pruneSources) {
    process.stdout.write('Empty folders in the sources are deleted first.\n');
  }
  if (!(await confirmRun(args, 'Proceed with consolidation?'))) {
    logger.info('Cancelled.');
    return;
  }

  const runLogger = getLogger({ logFile: config.logFile });
  const reporter = createLogEventReporter(runLogger);

  let pruneReports: PruneReport[] = [];
  if (config.pruneSources) {
    pruneReports = await new EmptyDirectoryPruner(fileSystem, reporter, runLogger).pruneAll(
      config.sourceRoots,
    );
  }

  const hasher = new NodeFileHasher(parseHashChunkSize() ?? config.hashChunkSizeBytes);
  const engine = new MergeEngine(config, fileSystem, hasher, reporter, runLogger);
  const report = await engine.run();

  runLogger.info({ statistics: report.statistics }, 'Consolidation complete');
  if (pruneReports.length > 0) {
    printPruneSummary(pruneReports);
  }
  printMergeSummary(report, config);

  if (report.statistics.errors > 0 || sumPruneStatistics(pruneReports).errors > 0) {
    process.exitCode = EXIT_CODE_COMPLETED_WITH_ERRORS;
  }
};

const resolveConfig = async (
  args: ParsedArgs,
  pruneFirst: boolean,
): Promise<ConsolidationConfig> => {
  const fileConfig: PartialConsolidationConfig = args.configPath
    ? await new JsonConfigFile(fileSystem).load(normalizePath(args.configPath))
    : {};

  let destinationRoot = args.destinationRoot ?? undefined;
  let sourceRoots = args.sourceRoots;

  if (process.stdin.isTTY) {
    if (!destinationRoot && !fileConfig.destinationRoot) {
      destinationRoot = await input({
        message: 'Destination folder for consolidated files:',
        validate: (value) => value.trim().length > 0 || 'Destination folder required',
      });
    }
    if (sourceRoots.length === 0 && !fileConfig.sourceRoots?.length) {
      sourceRoots = await promptForSources('Source folder');
    }
  }

  return resolveConsolidationConfig(fileConfig, {
    destinationRoot,
    sourceRoots,
    logFile: args.logFile ?? undefined,
    pruneSources: pruneFirst,
  });
};

const promptForSources = async (label: string): Promise<string[]> => {
  process.stdout.write('Enter folders one per line, empty line to finish.\n');
  const sources: string[] = [];

  while (true) {
    const answer = await input({
      message: `${label}:`,
      validate: async (value) => {
        if (!value.trim()) {
          return true;
        }
        return (await fileSystem.exists(normalizePath(value))) || `Folder not found: ${value}`;
      },
    });
    if (!answer.trim()) {
      return sources;
    }
    sources.push(normalizePath(answer));
  }
};

const confirmRun = async (args: ParsedArgs, message: string): Promise<boolean> => {
  if (args.assumeYes || !process.stdin.isTTY) {
    return true;
  }
  return confirm({ message, default: false });
};

const parseArgs = (args: string[]): ParsedArgs => {
  const [command, ...rest] = args;
  const parsed: ParsedArgs = {
    command: command ?? null,
    destinationRoot: null,
    sourceRoots: [],
    configPath: null,
    logFile: null,
    includeRoot: false,
    assumeYes: false,
    positional: [],
  };

  let index = 0;
  while (index < rest.length) {
    const token = rest[index];
    if (!token) {
      index += 1;
      continue;
    }
    if (token === '--destination' || token === '-d') {
      parsed.destinationRoot = rest[index + 1] ?? null;
      index += 2;
      continue;
    }
    if (token === '--source' || token === '-s') {
      const sourcePath = rest[index + 1];
      if (sourcePath) {
        parsed.sourceRoots.push(sourcePath);
      }
      index += 2;
      continue;
    }
    if (token === '--config' || token === '-c') {
      parsed.configPath = rest[index + 1] ?? null;
      index += 2;
      continue;
    }
    if (token === '--log-file' || token === '-l') {
      parsed.logFile = rest[index + 1] ?? null;
      index += 2;
      continue;
    }
    if (token === '--include-root') {
      parsed.includeRoot = true;
      index += 1;
      continue;
    }
    if (token === '--yes' || token === '-y') {
      parsed.assumeYes = true;
      index += 1;
      continue;
    }
    parsed.positional.push(token);
    index += 1;
  }

  return parsed;
};

const formatList = (paths: string[]) =>
  paths.map((item, index) => `  ${index + 1}. ${item}`).join('\n');

const printHelp = () => {
  const message = `
folder-consolidator

Usage:
  folder-consolidator [prune|merge|consolidate|help] [options]

  If no command is specified and running in TTY, you'll be prompted to choose.

Commands:
  prune <path...>  - Delete every folder with no files anywhere below it
  merge            - Merge source folders into the destination, deduplicating files
  consolidate      - Prune the source folders, then merge them

Options:
  --destination, -d <path>  Destination folder
  --source, -s <path>       Source folder (can be used multiple times)
  --config, -c <file>       JSON config file
  --log-file, -l <file>     Append JSON log lines to this file
  --include-root            prune: also remove the given folder when it is empty
  --yes, -y                 Do not ask for confirmation

Environment:
  LOG_LEVEL        Terminal log level (default: info)
  HASH_CHUNK_SIZE  Read size for content hashing, e.g. 64KB (default: 8192 bytes)

Examples:
  folder-consolidator                                   # Interactive mode
  folder-consolidator prune ~/Old/Laptop ~/Old/Phone
  folder-consolidator merge -d ~/Master -s ~/Old/Laptop -s ~/Old/Phone
  folder-consolidator consolidate --config consolidate.json --yes
`;

  process.stdout.write(message);
};

const printPruneSummary = (reports: PruneReport[]) => {
  const totals = sumPruneStatistics(reports);
  const perRoot = reports
    .map((report) => `  - ${report.root}: ${report.statistics.directoriesRemoved} removed`)
    .join('\n');

  process.stdout.write(`
Cleanup summary
${perRoot || '  - (none)'}

  Empty Folders Deleted: ${totals.directoriesRemoved}
  Errors:                ${totals.errors}
`);
};

const printMergeSummary = (report: MergeReport, config: ConsolidationConfig) => {
  const { statistics } = report;

  process.stdout.write(`
Consolidation summary
Destination: ${report.destinationRoot}
Sources: ${report.sourceRoots.length}

  Folders Created:  ${statistics.directoriesCreated}
  Folders Renamed:  ${statistics.directoriesRenamed}
  Files Copied:     ${statistics.filesCopied}
  Files Renamed:    ${statistics.filesRenamed}
  Files Skipped:    ${statistics.filesSkipped}
  Errors:           ${statistics.errors}
${config.logFile ? `\nLog: ${config.logFile}\n` : ''}`);
};

const run = async () => {
  try {
    await main();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error({ issues: error.issues }, error.message);
    } else if (error instanceof Error && error.name === 'ExitPromptError') {
      logger.info('Cancelled by user.');
    } else {
      logger.error({ error: error instanceof Error ? error.message : error }, 'Fatal error');
    }
    process.exitCode = EXIT_CODE_FAILURE;
  }
};

void run();
