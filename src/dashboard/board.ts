import type { AutoRefreshLoop } from "../engine/auto-refresh.js";
import { createAutoRefreshLoop } from "../engine/auto-refresh.js";
import { describeError, isCancellation } from "../engine/errors.js";
import type { CommandRunner } from "../engine/runner.js";
import type { DiagnosticSink } from "../panels/diagnostics.js";
import type {
  ErrorFormatter,
  LoadOutcome,
  PanelController,
  PanelDefinition,
} from "../panels/panel-controller.js";
import { createPanelController } from "../panels/panel-controller.js";
import type { PanelRenderer } from "../panels/renderer.js";
import type { LogEvent } from "../state/events.js";
import { noopLogEvent } from "../state/events.js";

export const RESULTS_PANEL_NUMBER = 0;

export interface BoardOptions {
  autoRefreshInterval: number;
  initialFocusPanel: number;
}

export interface Board {
  readonly controllers: readonly PanelController[];
  getFocusedPanelNumber: () => number;
  getFocusedPanelId: () => string | null;
  focus: ({ panelNumber }: { panelNumber: number }) => boolean;
  nextTab: () => Promise<LoadOutcome | null>;
  prevTab: () => Promise<LoadOutcome | null>;
  refreshFocused: () => Promise<LoadOutcome | null>;
  /** Loads the first tab of every panel, one after another. */
  loadInitialTabs: () => Promise<LoadOutcome[]>;
  startAutoRefresh: () => boolean;
  /** Returns whether auto-refresh runs afterwards. */
  toggleAutoRefresh: () => Promise<boolean>;
  isAutoRefreshRunning: () => boolean;
  describeStatus: () => string;
  shutdown: () => Promise<void>;
}

/**
 * Everything the dashboard does between key presses and the command
 * runner: focus, tab moves, refreshes and the auto-refresh loop.
 */
export const createBoard = ({
  panels,
  runner,
  renderer,
  diagnostics,
  options,
  formatError,
  logEvent = noopLogEvent,
  onStateChange = () => undefined,
}: {
  panels: readonly PanelDefinition[];
  runner: CommandRunner;
  renderer: PanelRenderer;
  diagnostics: DiagnosticSink;
  options: BoardOptions;
  formatError?: ErrorFormatter;
  logEvent?: LogEvent;
  onStateChange?: () => void;
}): Board => {
  const controllers = panels.map((panel) =>
    createPanelController({ panel, runner, renderer, diagnostics, formatError, logEvent }),
  );
  const byNumber = new Map(
    controllers.map((controller): [number, PanelController] => [controller.panel.number, controller]),
  );
  const byId = new Map(
    controllers.map((controller): [string, PanelController] => [controller.panel.id, controller]),
  );
  const validNumbers = new Set([RESULTS_PANEL_NUMBER, ...byNumber.keys()]);
  let focusedNumber = validNumbers.has(options.initialFocusPanel)
    ? options.initialFocusPanel
    : RESULTS_PANEL_NUMBER;
  let closed = false;

  const getFocusedController = (): PanelController | null => byNumber.get(focusedNumber) ?? null;

  const loop: AutoRefreshLoop = createAutoRefreshLoop({
    intervalSeconds: options.autoRefreshInterval,
    getPanelIds: () => controllers.map((controller) => controller.panel.id),
    getFocusedPanelId: () => getFocusedController()?.panel.id ?? null,
    refreshPanel: async ({ panelId, priority, signal }) => {
      await byId.get(panelId)?.refresh({ priority, signal });
    },
    logEvent,
  });

  const runFocused = async (
    action: (controller: PanelController) => Promise<LoadOutcome | null>,
  ): Promise<LoadOutcome | null> => {
    const controller = getFocusedController();
    if (!controller || closed) {
      return null;
    }
    try {
      return await action(controller);
    } catch (error) {
      if (isCancellation(error)) {
        return null;
      }
      diagnostics.report({ message: describeError({ error }) });
      return "failed";
    }
  };

  const startAutoRefresh = (): boolean => {
    if (closed || !loop.start()) {
      return false;
    }
    diagnostics.note({
      message: `Auto-refresh enabled (interval: ${options.autoRefreshInterval}s)`,
    });
    onStateChange();
    return true;
  };

  return {
    controllers,
    getFocusedPanelNumber: () => focusedNumber,
    getFocusedPanelId: () => getFocusedController()?.panel.id ?? null,
    focus: ({ panelNumber }) => {
      if (!validNumbers.has(panelNumber) || panelNumber === focusedNumber) {
        return false;
      }
      focusedNumber = panelNumber;
      onStateChange();
      return true;
    },
    nextTab: () => runFocused((controller) => controller.nextTab({ priority: true })),
    prevTab: () => runFocused((controller) => controller.prevTab({ priority: true })),
    refreshFocused: () => runFocused((controller) => controller.refresh({ priority: true })),
    loadInitialTabs: async () => {
      const outcomes: LoadOutcome[] = [];
      for (const controller of controllers) {
        if (closed) {
          break;
        }
        controller.renderTitle();
        try {
          outcomes.push(await controller.loadActiveTab());
        } catch (error) {
          if (isCancellation(error)) {
            break;
          }
          throw error;
        }
      }
      return outcomes;
    },
    startAutoRefresh,
    toggleAutoRefresh: async () => {
      if (loop.isRunning()) {
        await loop.stop();
        diagnostics.note({ message: "Auto-refresh disabled" });
        onStateChange();
        return false;
      }
      if (options.autoRefreshInterval <= 0) {
        diagnostics.note({ message: "Auto-refresh is off: interval must be greater than 0" });
        return false;
      }
      return startAutoRefresh();
    },
    isAutoRefreshRunning: () => loop.isRunning(),
    describeStatus: () => {
      const refresh = loop.isRunning() ? `on (${options.autoRefreshInterval}s)` : "off";
      return `focus [${focusedNumber}]  auto-refresh ${refresh}  ? help  q quit`;
    },
    shutdown: async () => {
      if (closed) {
        return;
      }
      closed = true;
      await loop.stop();
      await runner.shutdown();
    },
  };
};
