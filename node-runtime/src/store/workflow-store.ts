import { createStore } from 'zustand/vanilla';
import { WorkflowLockedError, type Step } from '../types/index.js';
import type { StepEditor } from '../model/draft.js';
import { cloneSteps } from '../model/steps.js';

interface WorkflowState {
  steps: readonly Step[];
  /** Set while a run reads the workflow; edits are refused until cleared. */
  locked: boolean;
  isDirty: boolean;
}

interface WorkflowActions {
  append: (step: Step) => void;
  replaceAt: (index: number, step: Step) => void;
  removeAt: (index: number) => void;
  move: (from: number, to: number) => void;
  load: (steps: readonly Step[]) => void;
  addWith: (editor: StepEditor) => Promise<boolean>;
  editAt: (index: number, editor: StepEditor) => Promise<boolean>;
  markSaved: () => void;
  lock: () => void;
  unlock: () => void;
}

export type WorkflowStore = WorkflowState & WorkflowActions;

export function createWorkflowStore(initial: readonly Step[] = []) {
  return createStore<WorkflowStore>()((set, get) => {
    const assertUnlocked = () => {
      if (get().locked) throw new WorkflowLockedError();
    };
    const assertIndex = (index: number) => {
      if (!Number.isInteger(index) || index < 0 || index >= get().steps.length) {
        throw new RangeError(`No step at index ${index}`);
      }
    };

    return {
      steps: cloneSteps(initial),
      locked: false,
      isDirty: false,

      append: (step) => {
        assertUnlocked();
        set((state) => ({ steps: [...state.steps, step], isDirty: true }));
      },

      replaceAt: (index, step) => {
        assertUnlocked();
        assertIndex(index);
        set((state) => ({
          steps: state.steps.map((s, i) => (i === index ? step : s)),
          isDirty: true,
        }));
      },

      removeAt: (index) => {
        assertUnlocked();
        assertIndex(index);
        set((state) => ({
          steps: state.steps.filter((_, i) => i !== index),
          isDirty: true,
        }));
      },

      move: (from, to) => {
        assertUnlocked();
        assertIndex(from);
        assertIndex(to);
        set((state) => {
          const steps = [...state.steps];
          const [moved] = steps.splice(from, 1);
          steps.splice(to, 0, moved);
          return { steps, isDirty: true };
        });
      },

      load: (steps) => {
        assertUnlocked();
        set({ steps: cloneSteps(steps), isDirty: false });
      },

      addWith: async (editor) => {
        assertUnlocked();
        const step = await editor.edit();
        if (!step) return false;
        get().append(step);
        return true;
      },

      editAt: async (index, editor) => {
        assertUnlocked();
        assertIndex(index);
        const edited = await editor.edit(get().steps[index]);
        if (!edited) return false;
        get().replaceAt(index, edited);
        return true;
      },

      markSaved: () => set({ isDirty: false }),

      lock: () => set({ locked: true }),

      unlock: () => set({ locked: false }),
    };
  });
}

export type WorkflowStoreApi = ReturnType<typeof createWorkflowStore>;
