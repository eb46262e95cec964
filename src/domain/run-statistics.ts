export type RunStatistics = {
  directoriesCreated: number;
  directoriesRenamed: number;
  filesCopied: number;
  filesRenamed: number;
  filesSkipped: number;
  errors: number;
};

export type PruneStatistics = {
  directoriesRemoved: number;
  errors: number;
};

export const createRunStatistics = (): RunStatistics => ({
  directoriesCreated: 0,
  directoriesRenamed: 0,
  filesCopied: 0,
  filesRenamed: 0,
  filesSkipped: 0,
  errors: 0,
});

export const createPruneStatistics = (): PruneStatistics => ({
  directoriesRemoved: 0,
  errors: 0,
});

export type MergeReport = {
  destinationRoot: string;
  sourceRoots: string[];
  statistics: RunStatistics;
  startedAt: string;
  finishedAt: string;
};

export type PruneReport = {
  root: string;
  statistics: PruneStatistics;
  /** Deleted directories, in deletion order (deepest first). */
  removed: string[];
};
