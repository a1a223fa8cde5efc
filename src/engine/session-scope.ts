import type { SessionHandle } from "./command-spec.js";

export interface SessionScope {
  /** Drops whatever a previous invocation left behind. Called before and after every invocation. */
  reset: () => Promise<void> | void;
  track: ({ handle }: { handle: SessionHandle }) => void;
  getTrackedCount: () => number;
}

export const createProcessSessionScope = (): SessionScope => {
  const handles = new Set<SessionHandle>();
  return {
    reset: () => {
      for (const handle of handles) {
        if (handle.isAlive()) {
          handle.dispose();
        }
      }
      handles.clear();
    },
    track: ({ handle }) => {
      handles.add(handle);
    },
    getTrackedCount: () => handles.size,
  };
};

export const createNoopSessionScope = (): SessionScope => ({
  reset: () => undefined,
  track: () => undefined,
  getTrackedCount: () => 0,
});
