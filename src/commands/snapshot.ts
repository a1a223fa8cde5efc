import { loadConfig } from "../config.js";
import { createCommandRunner } from "../engine/runner.js";
import { createProcessSessionScope } from "../engine/session-scope.js";
import { renderTableText } from "../format/table-text.js";
import { createDiagnosticSink } from "../panels/diagnostics.js";
import type { LoadOutcome } from "../panels/panel-controller.js";
import { createPanelController } from "../panels/panel-controller.js";
import type { PanelRenderer } from "../panels/renderer.js";
import { getBoardPaths, getDefaultConfigDir } from "../paths.js";
import { createEventLogger } from "../state/events.js";
import { formatErrorMessage } from "../verdi/error-messages.js";
import type { SpawnProcess } from "../verdi/process.js";
import { buildPanels } from "../verdi/registry.js";

type Write = (text: string) => void;

/** Collects what a panel would show so it can be printed as plain text. */
const createTextRenderer = (): PanelRenderer & {
  getOutput: ({ panelId }: { panelId: string }) => string;
  getTitle: ({ panelId }: { panelId: string }) => string;
} => {
  const output = new Map<string, string>();
  const titles = new Map<string, string>();
  return {
    renderTable: ({ panelId, table }) => {
      output.set(panelId, renderTableText({ table }));
      return true;
    },
    renderText: ({ panelId, text }) => {
      output.set(panelId, text);
      return true;
    },
    renderError: ({ panelId, message }) => {
      output.set(panelId, message);
      return true;
    },
    renderLoading: () => true,
    setTitle: ({ panelId, title }) => {
      titles.set(panelId, title.replace(/\{\/?[a-z-]+\}/g, ""));
      return true;
    },
    getOutput: ({ panelId }) => output.get(panelId) ?? "",
    getTitle: ({ panelId }) => titles.get(panelId) ?? panelId,
  };
};

/**
 * Loads the first tab of each panel (or just `panelNumber`) once and prints
 * it. Resolves to the process exit code.
 */
export const runSnapshot = async ({
  panelNumber,
  configDir = getDefaultConfigDir({}),
  write = (text) => process.stdout.write(text),
  writeError = (text) => process.stderr.write(text),
  env,
  spawnProcess,
}: {
  panelNumber?: number;
  configDir?: string;
  write?: Write;
  writeError?: Write;
  env?: NodeJS.ProcessEnv;
  spawnProcess?: SpawnProcess;
}): Promise<number> => {
  const paths = getBoardPaths({ configDir });
  const config = await loadConfig({ configPath: paths.configPath });
  const logger = createEventLogger({
    eventsLog: paths.eventsLog,
    onError: (error) => {
      writeError(`event log write failed: ${error instanceof Error ? error.message : String(error)}\n`);
    },
  });
  const panels = buildPanels({
    verdiCommand: config.verdiCommand,
    commandTimeoutMs: config.commandTimeoutMs,
    env,
    spawnProcess,
  });
  const selected =
    panelNumber === undefined ? panels : panels.filter((panel) => panel.number === panelNumber);
  if (selected.length === 0) {
    writeError(`unknown panel: ${panelNumber ?? ""}\n`);
    await logger.flush();
    return 2;
  }

  const runner = createCommandRunner({
    sessionScope: createProcessSessionScope(),
    logEvent: logger.log,
  });
  const renderer = createTextRenderer();
  const diagnostics = createDiagnosticSink({
    write: ({ message }) => {
      writeError(`${message}\n`);
    },
  });

  const outcomes: LoadOutcome[] = [];
  try {
    for (const panel of selected) {
      const controller = createPanelController({
        panel,
        runner,
        renderer,
        diagnostics,
        formatError: formatErrorMessage,
        logEvent: logger.log,
      });
      controller.renderTitle();
      outcomes.push(await controller.loadActiveTab());
      write(`== ${renderer.getTitle({ panelId: panel.id })} ==\n`);
      write(`${renderer.getOutput({ panelId: panel.id })}\n\n`);
    }
  } finally {
    await runner.shutdown();
    await logger.flush();
  }
  return outcomes.includes("failed") ? 1 : 0;
};
