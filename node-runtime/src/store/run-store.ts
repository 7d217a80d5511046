import { createStore } from 'zustand/vanilla';
import type { RunResult } from '../types/index.js';

export type RunState = 'idle' | 'running' | 'stopping';

export interface IterationProgress {
  stepId: string;
  index: number;
  count: number;
}

interface RunStoreState {
  state: RunState;
  status: string;
  runId: string | null;
  /** Path of the step being executed, for list highlighting. */
  currentStep: string | null;
  iteration: IterationProgress | null;
  lastResult: RunResult | null;
}

interface RunStoreActions {
  setRunStart: (runId: string) => void;
  setStepStart: (stepId: string) => void;
  setIteration: (progress: IterationProgress) => void;
  setStatus: (status: string) => void;
  setStopping: () => void;
  setRunEnd: (result: RunResult, status: string) => void;
  /** The run ended by throwing instead of producing a result. */
  setRunError: (status: string) => void;
  reset: () => void;
}

export type RunStore = RunStoreState & RunStoreActions;

export const IDLE_STATUS = 'Idle';
export const RUNNING_STATUS = 'Running...';
export const STOPPING_STATUS = 'Stopping...';

const initialState: RunStoreState = {
  state: 'idle',
  status: IDLE_STATUS,
  runId: null,
  currentStep: null,
  iteration: null,
  lastResult: null,
};

export function createRunStore() {
  return createStore<RunStore>()((set) => ({
    ...initialState,

    setRunStart: (runId) =>
      set({
        state: 'running',
        status: RUNNING_STATUS,
        runId,
        currentStep: null,
        iteration: null,
        lastResult: null,
      }),

    setStepStart: (stepId) => set({ currentStep: stepId }),

    // A pending stop keeps its status until the run ends
    setIteration: (progress) =>
      set((current) =>
        current.state === 'running'
          ? { iteration: progress, status: `Running Loop ${progress.index}/${progress.count}` }
          : { iteration: progress },
      ),

    setStatus: (status) => set({ status }),

    setStopping: () => set({ state: 'stopping', status: STOPPING_STATUS }),

    setRunEnd: (result, status) =>
      set({ state: 'idle', status, currentStep: null, iteration: null, lastResult: result }),

    setRunError: (status) => set({ state: 'idle', status, currentStep: null, iteration: null }),

    reset: () => set(initialState),
  }));
}

export type RunStoreApi = ReturnType<typeof createRunStore>;
