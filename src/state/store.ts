import { create } from 'zustand';
import { useShallow } from 'zustand/react/shallow';

export type NeuroState = {
  /** UI: corpus callosum severed in the split-brain section */
  readonly isSplit: boolean;
};

export type NeuroActions = {
  setSplit: (isSplit: boolean) => void;
  toggleSplit: () => void;
  /** Back to the intact brain. */
  reset: () => void;
};

export type NeuroStore = NeuroState & NeuroActions;

const initialIsSplit = false;

export const useNeuroStore = create<NeuroStore>()((set) => ({
  isSplit: initialIsSplit,

  setSplit: (isSplit) => set({ isSplit }),
  toggleSplit: () => set((s) => ({ isSplit: !s.isSplit })),
  reset: () => set({ isSplit: initialIsSplit }),
}));

export function useIsSplit(): boolean {
  return useNeuroStore((s) => s.isSplit);
}

export function useSplitBrainActions(): Pick<NeuroActions, 'setSplit' | 'toggleSplit' | 'reset'> {
  return useNeuroStore(
    useShallow((s) => ({
      setSplit: s.setSplit,
      toggleSplit: s.toggleSplit,
      reset: s.reset,
    })),
  );
}
