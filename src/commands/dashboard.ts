import { setTimeout as sleep } from "node:timers/promises";
import type { BoardConfig } from "../config.js";
import { ensureConfigFile, loadConfig } from "../config.js";
import { APP_NAME, APP_VERSION, SHUTDOWN_TIMEOUT_MS } from "../constants.js";
import { createBoard } from "../dashboard/board.js";
import { describeError, isCancellation } from "../engine/errors.js";
import { createCommandRunner } from "../engine/runner.js";
import { createProcessSessionScope } from "../engine/session-scope.js";
import { createDiagnosticSink } from "../panels/diagnostics.js";
import { formatTabTitle } from "../panels/tab-state.js";
import { getBoardPaths, getDefaultConfigDir } from "../paths.js";
import { createEventLogger } from "../state/events.js";
import type { DashboardHandle } from "../tui/dashboard.js";
import { startDashboard } from "../tui/dashboard.js";
import { formatErrorMessage } from "../verdi/error-messages.js";
import { buildPanels, RESULTS_PANEL_ID } from "../verdi/registry.js";

const WELCOME_MESSAGE = `Welcome to ${APP_NAME}. Press ? for keys, q to quit.`;

const summarizeConfig = ({ config }: { config: BoardConfig }): Record<string, unknown> => ({
  autoRefreshInterval: config.autoRefreshInterval,
  autoRefreshOnStartup: config.autoRefreshOnStartup,
  initialFocusPanel: config.initialFocusPanel,
  verdiCommand: config.verdiCommand,
});

export const runDashboard = async ({
  configDir = getDefaultConfigDir({}),
}: {
  configDir?: string;
}): Promise<void> => {
  const paths = getBoardPaths({ configDir });
  await ensureConfigFile({ configPath: paths.configPath });
  const config = await loadConfig({ configPath: paths.configPath });

  let handle: DashboardHandle | null = null;
  const logger = createEventLogger({
    eventsLog: paths.eventsLog,
    onError: (error) => {
      handle?.writeResult({ message: `event log write failed: ${describeError({ error })}` });
    },
  });
  const logEvent = logger.log;
  logEvent({ type: "STARTUP", msg: "dashboard starting", data: summarizeConfig({ config }) });

  const runner = createCommandRunner({ sessionScope: createProcessSessionScope(), logEvent });
  const panels = buildPanels({
    verdiCommand: config.verdiCommand,
    commandTimeoutMs: config.commandTimeoutMs,
  });

  let resolveDone: () => void = () => undefined;
  const done = new Promise<void>((resolve) => {
    resolveDone = resolve;
  });
  let shuttingDown = false;

  const dashboard = startDashboard({
    config,
    version: APP_VERSION,
    panels: [
      { id: RESULTS_PANEL_ID, number: 0, title: "[0] details" },
      ...panels.map((panel) => ({
        id: panel.id,
        number: panel.number,
        title: formatTabTitle({ panelNumber: panel.number, tabs: panel.tabs, activeIndex: 0 }),
      })),
    ],
    callbacks: {
      onQuit: () => {
        void shutdown();
      },
      onFocus: ({ panelNumber }) => {
        board.focus({ panelNumber });
      },
      onNextTab: () => {
        void inBackground(board.nextTab());
      },
      onPrevTab: () => {
        void inBackground(board.prevTab());
      },
      onRefresh: () => {
        void inBackground(board.refreshFocused());
      },
      onToggleAutoRefresh: () => {
        void inBackground(board.toggleAutoRefresh());
      },
    },
  });
  handle = dashboard;

  const diagnostics = createDiagnosticSink({
    write: ({ message }) => {
      dashboard.writeResult({ message });
    },
  });

  const syncChrome = (): void => {
    dashboard.setFocus({ panelNumber: board.getFocusedPanelNumber() });
    dashboard.setStatusLine({ text: board.describeStatus() });
  };

  const board = createBoard({
    panels,
    runner,
    renderer: dashboard,
    diagnostics,
    options: {
      autoRefreshInterval: config.autoRefreshInterval,
      initialFocusPanel: config.initialFocusPanel,
    },
    formatError: formatErrorMessage,
    logEvent,
    onStateChange: syncChrome,
  });

  const inBackground = async (task: Promise<unknown>): Promise<void> => {
    try {
      await task;
    } catch (error) {
      if (!isCancellation(error)) {
        diagnostics.report({ message: describeError({ error }) });
      }
    }
  };

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logEvent({ type: "SHUTDOWN", msg: "dashboard shutting down" });
    const timeout = new AbortController();
    await Promise.race([
      board.shutdown(),
      sleep(SHUTDOWN_TIMEOUT_MS, undefined, { signal: timeout.signal }).catch(() => undefined),
    ]);
    timeout.abort();
    await logger.flush();
    dashboard.destroy();
    resolveDone();
  };

  process.on("SIGINT", () => {
    void shutdown();
  });
  process.on("SIGTERM", () => {
    void shutdown();
  });

  syncChrome();
  if (config.showWelcomeMessage) {
    diagnostics.note({ message: WELCOME_MESSAGE });
  }

  await inBackground(
    board.loadInitialTabs().then(() => {
      if (config.autoRefreshOnStartup) {
        board.startAutoRefresh();
      }
    }),
  );

  await done;
};
