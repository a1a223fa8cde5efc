import type { CommandResult } from "../engine/command-result.js";
import { isSuccess } from "../engine/command-result.js";
import type { CommandRunner } from "../engine/runner.js";
import { EMPTY_TABLE, normalizeTable } from "../parsing/table.js";
import type { LogEvent } from "../state/events.js";
import { noopLogEvent } from "../state/events.js";
import type { DiagnosticSink } from "./diagnostics.js";
import { isBenignStderr } from "./diagnostics.js";
import type { PanelRenderer } from "./renderer.js";
import type { PanelTabState, Tab, TabContent } from "./tab-state.js";
import { createPanelTabState, formatTabTitle } from "./tab-state.js";

export type PanelKind = "table" | "text";

export interface PanelDefinition {
  id: string;
  number: number;
  kind: PanelKind;
  tabs: readonly Tab[];
}

export type LoadOutcome = "cached" | "loaded" | "failed";

export type ErrorFormatter = ({
  commandName,
  error,
}: {
  commandName: string;
  error: string;
}) => string;

export interface PanelController {
  readonly panel: PanelDefinition;
  readonly state: PanelTabState;
  /** Renders the active tab from cache, or runs its command on first visit. */
  loadActiveTab: ({ priority, signal }?: { priority?: boolean; signal?: AbortSignal }) => Promise<LoadOutcome>;
  /** Always re-runs the active tab's command. */
  refresh: ({ priority, signal }?: { priority?: boolean; signal?: AbortSignal }) => Promise<LoadOutcome>;
  nextTab: ({ priority }?: { priority?: boolean }) => Promise<LoadOutcome | null>;
  prevTab: ({ priority }?: { priority?: boolean }) => Promise<LoadOutcome | null>;
  selectTab: ({ index, priority }: { index: number; priority?: boolean }) => Promise<LoadOutcome | null>;
  renderTitle: () => void;
}

const EMPTY_OUTPUT = "No output";

export const toTabContent = ({
  tab,
  kind,
  stdout,
}: {
  tab: Tab;
  kind: PanelKind;
  stdout: string;
}): TabContent => {
  const trimmed = stdout.trim();
  const raw = trimmed.length > 0 ? trimmed : EMPTY_OUTPUT;
  const text = tab.formatter ? tab.formatter({ text: raw }) : raw;
  if (tab.parser) {
    return tab.parser({ text });
  }
  return kind === "table" ? { ...EMPTY_TABLE, footer: text } : text;
};

const firstLine = ({ text }: { text: string }): string =>
  text
    .split("\n")
    .map((line) => line.trim())
    .find((line) => line.length > 0) ?? text.trim();

export const createPanelController = ({
  panel,
  runner,
  renderer,
  diagnostics,
  formatError = ({ error }) => error,
  logEvent = noopLogEvent,
}: {
  panel: PanelDefinition;
  runner: CommandRunner;
  renderer: PanelRenderer;
  diagnostics: DiagnosticSink;
  formatError?: ErrorFormatter;
  logEvent?: LogEvent;
}): PanelController => {
  const state = createPanelTabState({ tabs: panel.tabs });
  const panelId = panel.id;

  const checkRendered = ({ rendered, action }: { rendered: boolean; action: string }): void => {
    if (!rendered) {
      logEvent({ type: "RENDER_TARGET_MISSING", msg: `no render target for ${action}`, panelId });
    }
  };

  const renderContent = ({ content }: { content: TabContent }): void => {
    const rendered =
      typeof content === "string"
        ? renderer.renderText({ panelId, text: content })
        : renderer.renderTable({ panelId, table: normalizeTable({ table: content }) });
    checkRendered({ rendered, action: "content" });
  };

  const renderTitle = (): void => {
    const title = formatTabTitle({
      panelNumber: panel.number,
      tabs: state.tabs,
      activeIndex: state.getActiveIndex(),
    });
    checkRendered({ rendered: renderer.setTitle({ panelId, title }), action: "title" });
  };

  const routeStderr = ({ result }: { result: CommandResult }): string | null => {
    const stderr = result.stderr.trim();
    if (stderr.length > 0 && !isBenignStderr({ stderr })) {
      const message = formatError({ commandName: result.commandName, error: stderr });
      diagnostics.report({ message });
      return message;
    }
    if (!isSuccess({ result })) {
      const message = `${result.commandName} failed (exit code ${result.exitCode ?? "unknown"})`;
      diagnostics.report({ message });
      return message;
    }
    return null;
  };

  const runActiveTab = async ({
    priority = false,
    signal,
  }: {
    priority?: boolean;
    signal?: AbortSignal;
  }): Promise<LoadOutcome> => {
    const index = state.getActiveIndex();
    const tab = state.getActiveTab();
    const result = await runner.execute({ spec: tab.command, priority, signal });
    const reported = routeStderr({ result });
    const stillActive = state.getActiveIndex() === index;

    if (!isSuccess({ result })) {
      if (stillActive) {
        const message = `Error: ${firstLine({ text: reported ?? "command failed" })}`;
        checkRendered({ rendered: renderer.renderError({ panelId, message }), action: "error" });
      }
      return "failed";
    }

    const content = toTabContent({ tab, kind: panel.kind, stdout: result.stdout });
    state.markLoaded({ index, content });
    if (stillActive) {
      renderContent({ content });
    }
    return "loaded";
  };

  const loadActiveTab: PanelController["loadActiveTab"] = async ({ priority, signal } = {}) => {
    const index = state.getActiveIndex();
    const cached = state.isLoaded({ index }) ? state.getCached({ index }) : undefined;
    if (cached !== undefined) {
      renderContent({ content: cached });
      return "cached";
    }
    checkRendered({ rendered: renderer.renderLoading({ panelId }), action: "loading" });
    return runActiveTab({ priority, signal });
  };

  const afterTransition = async ({
    changed,
    priority,
  }: {
    changed: boolean;
    priority?: boolean;
  }): Promise<LoadOutcome | null> => {
    if (!changed) {
      return null;
    }
    renderTitle();
    return loadActiveTab({ priority });
  };

  return {
    panel,
    state,
    loadActiveTab,
    refresh: ({ priority, signal } = {}) => runActiveTab({ priority, signal }),
    nextTab: ({ priority } = {}) => afterTransition({ changed: state.next(), priority }),
    prevTab: ({ priority } = {}) => afterTransition({ changed: state.prev(), priority }),
    selectTab: ({ index, priority }) =>
      afterTransition({ changed: state.select({ index }), priority }),
    renderTitle,
  };
};
