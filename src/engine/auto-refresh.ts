import { setTimeout as sleep } from "node:timers/promises";
import type { LogEvent } from "../state/events.js";
import { noopLogEvent } from "../state/events.js";
import { describeError, isCancellation } from "./errors.js";

export type RefreshPanel = ({
  panelId,
  priority,
  signal,
}: {
  panelId: string;
  priority: boolean;
  signal: AbortSignal;
}) => Promise<void>;

export type LoopState = "idle" | "disabled" | "running" | "cancelled" | "failed";

export interface PassReport {
  refreshed: string[];
  failed: Array<{ panelId: string; message: string }>;
}

export interface AutoRefreshLoop {
  /** Returns false when the interval disables auto-refresh or the loop already runs. */
  start: () => boolean;
  stop: () => Promise<void>;
  isRunning: () => boolean;
  getState: () => LoopState;
  getPassCount: () => number;
}

export const orderPanelsForRefresh = ({
  panelIds,
  focusedPanelId,
}: {
  panelIds: readonly string[];
  focusedPanelId: string | null;
}): string[] => {
  if (!focusedPanelId || !panelIds.includes(focusedPanelId)) {
    return [...panelIds];
  }
  return [focusedPanelId, ...panelIds.filter((panelId) => panelId !== focusedPanelId)];
};

/**
 * Refreshes panels one after another, focused panel first. A failing panel is
 * reported and skipped; cancellation ends the pass.
 */
export const runRefreshPass = async ({
  panelIds,
  focusedPanelId,
  refreshPanel,
  signal,
  logEvent = noopLogEvent,
}: {
  panelIds: readonly string[];
  focusedPanelId: string | null;
  refreshPanel: RefreshPanel;
  signal: AbortSignal;
  logEvent?: LogEvent;
}): Promise<PassReport> => {
  const report: PassReport = { refreshed: [], failed: [] };
  for (const panelId of orderPanelsForRefresh({ panelIds, focusedPanelId })) {
    signal.throwIfAborted();
    try {
      await refreshPanel({ panelId, priority: panelId === focusedPanelId, signal });
      report.refreshed.push(panelId);
    } catch (error) {
      if (isCancellation(error)) {
        throw error;
      }
      const message = describeError({ error });
      report.failed.push({ panelId, message });
      logEvent({ type: "REFRESH_PANEL_FAILED", msg: message, panelId });
    }
  }
  logEvent({
    type: "REFRESH_PASS",
    msg: "auto-refresh pass complete",
    data: { refreshed: report.refreshed.length, failed: report.failed.length },
  });
  return report;
};

export const createAutoRefreshLoop = ({
  intervalSeconds,
  getPanelIds,
  getFocusedPanelId,
  refreshPanel,
  logEvent = noopLogEvent,
}: {
  intervalSeconds: number;
  getPanelIds: () => readonly string[];
  getFocusedPanelId: () => string | null;
  refreshPanel: RefreshPanel;
  logEvent?: LogEvent;
}): AutoRefreshLoop => {
  let state: LoopState = intervalSeconds > 0 ? "idle" : "disabled";
  let controller: AbortController | null = null;
  let task: Promise<void> | null = null;
  let passCount = 0;

  const loop = async ({ signal }: { signal: AbortSignal }): Promise<void> => {
    while (!signal.aborted) {
      await sleep(intervalSeconds * 1000, undefined, { signal });
      await runRefreshPass({
        panelIds: getPanelIds(),
        focusedPanelId: getFocusedPanelId(),
        refreshPanel,
        signal,
        logEvent,
      });
      passCount += 1;
    }
  };

  const start = (): boolean => {
    if (state === "disabled" || state === "running") {
      return false;
    }
    const current = new AbortController();
    controller = current;
    state = "running";
    task = loop({ signal: current.signal }).then(
      () => {
        state = "cancelled";
      },
      (error: unknown) => {
        if (isCancellation(error) || current.signal.aborted) {
          state = "cancelled";
          return;
        }
        state = "failed";
        logEvent({ type: "AUTO_REFRESH", msg: `auto-refresh stopped: ${describeError({ error })}` });
      },
    );
    logEvent({ type: "AUTO_REFRESH", msg: "auto-refresh started", data: { intervalSeconds } });
    return true;
  };

  const stop = async (): Promise<void> => {
    if (!controller || !task) {
      return;
    }
    controller.abort();
    await task;
    controller = null;
    task = null;
    logEvent({ type: "AUTO_REFRESH", msg: "auto-refresh stopped" });
  };

  return {
    start,
    stop,
    isRunning: () => state === "running",
    getState: () => state,
    getPassCount: () => passCount,
  };
};
