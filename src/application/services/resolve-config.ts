import os from 'node:os';
import path from 'node:path';

import { parseConsolidationConfig } from '../../domain/consolidation-config';
import type {
  ConsolidationConfig,
  PartialConsolidationConfig,
} from '../../domain/consolidation-config';

export type ConfigOverrides = {
  destinationRoot?: string;
  sourceRoots: string[];
  logFile?: string;
  /** Chosen by the command: only `consolidate` prunes. */
  pruneSources: boolean;
  hashChunkSizeBytes?: number;
};

export const resolveHome = (targetPath: string, homeDir = os.homedir()) => {
  if (targetPath === '~' || targetPath.startsWith('~/')) {
    return path.join(homeDir, targetPath.slice(1));
  }
  return targetPath;
};

export const normalizePath = (targetPath: string) => path.resolve(resolveHome(targetPath.trim()));

/**
 * Command-line values override the config file; command-line sources are
 * appended after the file's sources.
 */
export const resolveConsolidationConfig = (
  fileConfig: PartialConsolidationConfig,
  overrides: ConfigOverrides,
): ConsolidationConfig => {
  const config = parseConsolidationConfig({
    destinationRoot: overrides.destinationRoot ?? fileConfig.destinationRoot ?? '',
    sourceRoots: [...(fileConfig.sourceRoots ?? []), ...overrides.sourceRoots],
    logFile: overrides.logFile ?? fileConfig.logFile,
    pruneSources: overrides.pruneSources,
    hashChunkSizeBytes: overrides.hashChunkSizeBytes ?? fileConfig.hashChunkSizeBytes,
  });

  return {
    ...config,
    destinationRoot: normalizePath(config.destinationRoot),
    sourceRoots: config.sourceRoots.map(normalizePath),
    ...(config.logFile ? { logFile: normalizePath(config.logFile) } : {}),
  };
};
