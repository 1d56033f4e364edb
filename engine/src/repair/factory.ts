/**
 * Default wiring: SQLite history at `history.databasePath` and the shell
 * sandbox runner built from `sandbox.commandTemplate`
 */

import { assertValidConfig, config as defaultConfig } from '../config';
import type { HistoryStore } from '../history/history-store';
import { SqliteHistoryStore } from '../history/sqlite-history-store';
import { ShellBuildRunner, type ContainerRunner } from '../validation/container-runner';
import { RepairOrchestrator, type OrchestratorDependencies } from './orchestrator';

export type CreateOrchestratorOptions = Pick<OrchestratorDependencies, 'generator'> &
  Partial<Omit<OrchestratorDependencies, 'generator'>>;

export interface OrchestratorSetup {
  orchestrator: RepairOrchestrator;
  history: HistoryStore;
  container: ContainerRunner;
  /** Closes the history store when the factory opened it */
  close(): void;
}

export function createOrchestrator(options: CreateOrchestratorOptions): OrchestratorSetup {
  const config = options.config ?? defaultConfig;
  // Checked before the database file is opened
  assertValidConfig(config);

  const ownsHistory = options.history === undefined;
  const history = options.history ?? new SqliteHistoryStore(config.history.databasePath, config.history);
  const container = options.container ?? new ShellBuildRunner(config.sandbox.commandTemplate);

  return {
    orchestrator: new RepairOrchestrator({ ...options, config, history, container }),
    history,
    container,
    close: () => {
      if (ownsHistory) history.close();
    },
  };
}
