import { createStore } from 'zustand/vanilla';

export type SearchStage =
  | 'queued'
  | 'geocoding'
  | 'retrieving'
  | 'parsing'
  | 'aggregating'
  | 'done'
  | 'error'
  | 'cancelled';

export type SearchRunStatus = 'SUCCESS' | 'NO_RESULTS' | 'ALL_FAILED' | 'CANCELLED';

export interface SearchRunProgressEvent {
  id: string;
  label: string;
  message: string;
  stage: SearchStage;
  timestamp: number;
  level?: 'info' | 'warning' | 'error';
}

export interface SearchRunState {
  id: string;
  queries: string[];
  stage: SearchStage;
  startedAt: number;
  finishedAt?: number;
  status?: SearchRunStatus;
  errorMessage?: string;
  hasErrors?: boolean;
  lastStage?: SearchStage;
}

export interface SearchRunsStore {
  runs: Record<string, SearchRunState>;
  logs: Record<string, SearchRunProgressEvent[]>;

  addRun: (run: SearchRunState) => void;
  updateRun: (id: string, patch: Partial<SearchRunState>) => void;
  addLog: (id: string, event: SearchRunProgressEvent) => void;
  clearRun: (id: string) => void;
  clearAllCompleted: () => void;
}

const FINISHED_STAGES: ReadonlySet<SearchStage> = new Set(['done', 'error', 'cancelled']);

export function createSearchRunsStore() {
  return createStore<SearchRunsStore>()(set => ({
    runs: {},
    logs: {},

    addRun: run =>
      set(state => ({
        runs: { ...state.runs, [run.id]: run },
        logs: { ...state.logs, [run.id]: [] },
      })),

    updateRun: (id, patch) =>
      set(state => {
        const currentRun = state.runs[id];
        if (!currentRun) return {};
        return { runs: { ...state.runs, [id]: { ...currentRun, ...patch } } };
      }),

    addLog: (id, event) =>
      set(state => {
        const currentLogs = state.logs[id] ?? [];
        const isError =
          event.level === 'error' ||
          event.stage === 'error' ||
          /error|failed|blocked/i.test(event.message);

        const currentRun = state.runs[id];

        return {
          logs: { ...state.logs, [id]: [...currentLogs, event] },
          runs: currentRun
            ? {
                ...state.runs,
                [id]: { ...currentRun, hasErrors: Boolean(currentRun.hasErrors) || isError },
              }
            : state.runs,
        };
      }),

    clearRun: id =>
      set(state => {
        const { [id]: _run, ...restRuns } = state.runs;
        const { [id]: _logs, ...restLogs } = state.logs;
        return { runs: restRuns, logs: restLogs };
      }),

    clearAllCompleted: () =>
      set(state => {
        const newRuns: Record<string, SearchRunState> = {};
        const newLogs: Record<string, SearchRunProgressEvent[]> = {};

        for (const [id, run] of Object.entries(state.runs)) {
          if (!FINISHED_STAGES.has(run.stage)) {
            newRuns[id] = run;
            newLogs[id] = state.logs[id] ?? [];
          }
        }

        return { runs: newRuns, logs: newLogs };
      }),
  }));
}

export type SearchRunsStoreApi = ReturnType<typeof createSearchRunsStore>;

/**
 * Process-wide store used when a caller does not supply its own
 */
export const searchRunsStore = createSearchRunsStore();

export function getSearchRunLogs(
  searchRunId: string,
  store: SearchRunsStoreApi = searchRunsStore
): SearchRunProgressEvent[] {
  return store.getState().logs[searchRunId] ?? [];
}
