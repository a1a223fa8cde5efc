import type { InvocationOutput } from "../engine/command-spec.js";
import { defineStructuredQuery } from "../engine/command-spec.js";
import { CommandCancelledError } from "../engine/errors.js";
import { createCommandRunner } from "../engine/runner.js";
import { createNoopSessionScope } from "../engine/session-scope.js";
import { createDiagnosticSink } from "../panels/diagnostics.js";
import type { PanelDefinition } from "../panels/panel-controller.js";
import { createPanelController, toTabContent } from "../panels/panel-controller.js";
import type { PanelRenderer } from "../panels/renderer.js";
import type { Tab } from "../panels/tab-state.js";
import { formatTableOutput, formatTrimmed } from "../parsing/formatters.js";
import { parseLabelList, parseTable } from "../parsing/table.js";
import type { EventInput } from "../state/events.js";

interface RenderCall {
  method: keyof PanelRenderer;
  panelId: string;
  value?: unknown;
}

const createFakeRenderer = ({ available = true }: { available?: boolean } = {}) => {
  const calls: RenderCall[] = [];
  const renderer: PanelRenderer = {
    renderTable: ({ panelId, table }) => {
      calls.push({ method: "renderTable", panelId, value: table });
      return available;
    },
    renderText: ({ panelId, text }) => {
      calls.push({ method: "renderText", panelId, value: text });
      return available;
    },
    renderError: ({ panelId, message }) => {
      calls.push({ method: "renderError", panelId, value: message });
      return available;
    },
    renderLoading: ({ panelId }) => {
      calls.push({ method: "renderLoading", panelId });
      return available;
    },
    setTitle: ({ panelId, title }) => {
      calls.push({ method: "setTitle", panelId, value: title });
      return available;
    },
  };
  return { renderer, calls };
};

type Script = () => Promise<InvocationOutput>;

const scriptedTab = ({
  name,
  path,
  script,
  counter,
  parser,
}: {
  name: string;
  path: string[];
  script: { next: Script };
  counter: { count: number };
  parser?: Tab["parser"];
}): Tab => ({
  name,
  command: defineStructuredQuery({
    name: "verdi",
    path,
    invoke: () => {
      counter.count += 1;
      return script.next();
    },
  }),
  formatter: formatTableOutput,
  parser,
});

const output = ({ stdout, stderr = "", exitCode = 0 }: Partial<InvocationOutput>): Script => {
  return async () => ({ stdout: stdout ?? "", stderr, exitCode });
};

const setup = ({ available = true }: { available?: boolean } = {}) => {
  const computerScript = { next: output({ stdout: "* localhost\n* nm\n" }) };
  const codeScript = { next: output({ stdout: "Label  Pk\n-----  --\nadd     1\n" }) };
  const computerCalls = { count: 0 };
  const codeCalls = { count: 0 };
  const panel: PanelDefinition = {
    id: "panel-1",
    number: 1,
    kind: "table",
    tabs: [
      scriptedTab({
        name: "computer",
        path: ["computer", "list"],
        script: computerScript,
        counter: computerCalls,
        parser: parseLabelList,
      }),
      scriptedTab({
        name: "code",
        path: ["code", "list"],
        script: codeScript,
        counter: codeCalls,
        parser: parseTable,
      }),
    ],
  };
  const { renderer, calls } = createFakeRenderer({ available });
  const messages: string[] = [];
  const diagnostics = createDiagnosticSink({
    write: ({ message }) => {
      messages.push(message);
    },
  });
  const events: EventInput[] = [];
  const controller = createPanelController({
    panel,
    runner: createCommandRunner({ sessionScope: createNoopSessionScope() }),
    renderer,
    diagnostics,
    logEvent: (event) => {
      events.push(event);
    },
  });
  return { controller, calls, messages, events, computerScript, computerCalls, codeScript, codeCalls };
};

const LABEL_TABLE = { headers: ["label"], rows: [["localhost"], ["nm"]], footer: "" };

describe("createPanelController", () => {
  test("loads a tab once and serves it from cache afterwards", async () => {
    const { controller, calls, computerCalls } = setup();

    await expect(controller.loadActiveTab()).resolves.toBe("loaded");
    await expect(controller.loadActiveTab()).resolves.toBe("cached");
    await expect(controller.loadActiveTab()).resolves.toBe("cached");

    expect(computerCalls.count).toBe(1);
    expect(calls).toEqual([
      { method: "renderLoading", panelId: "panel-1" },
      { method: "renderTable", panelId: "panel-1", value: LABEL_TABLE },
      { method: "renderTable", panelId: "panel-1", value: LABEL_TABLE },
      { method: "renderTable", panelId: "panel-1", value: LABEL_TABLE },
    ]);
    expect(controller.state.getCached({ index: 0 })).toEqual(LABEL_TABLE);
  });

  test("refresh always runs the command", async () => {
    const { controller, computerCalls } = setup();
    await controller.loadActiveTab();
    await expect(controller.refresh()).resolves.toBe("loaded");
    expect(computerCalls.count).toBe(2);
  });

  test("a failed refresh keeps the cached content", async () => {
    const { controller, calls, messages, computerScript } = setup();
    await controller.loadActiveTab();
    computerScript.next = output({ stderr: "connection refused\nretrying", exitCode: 1 });

    await expect(controller.refresh()).resolves.toBe("failed");

    expect(controller.state.getCached({ index: 0 })).toEqual(LABEL_TABLE);
    expect(controller.state.isLoaded({ index: 0 })).toBe(true);
    expect(calls.at(-1)).toEqual({
      method: "renderError",
      panelId: "panel-1",
      value: "Error: connection refused",
    });
    expect(messages).toEqual(["connection refused\nretrying"]);
  });

  test("a failed first load leaves the tab unloaded", async () => {
    const { controller, messages, computerScript, computerCalls } = setup();
    computerScript.next = output({ exitCode: 2 });

    await expect(controller.loadActiveTab()).resolves.toBe("failed");
    expect(controller.state.isLoaded({ index: 0 })).toBe(false);
    expect(messages).toEqual(["verdi computer list failed (exit code 2)"]);

    computerScript.next = output({ stdout: "* nm" });
    await expect(controller.loadActiveTab()).resolves.toBe("loaded");
    expect(computerCalls.count).toBe(2);
  });

  test("benign stderr on success is not reported", async () => {
    const { controller, messages, computerScript } = setup();
    computerScript.next = output({
      stdout: "* nm",
      stderr: "Warning: configuration file /tmp/x does not exist",
    });
    await expect(controller.loadActiveTab()).resolves.toBe("loaded");
    expect(messages).toEqual([]);
  });

  test("switching tabs updates the title and loads the new tab lazily", async () => {
    const { controller, calls, codeCalls } = setup();

    await expect(controller.nextTab()).resolves.toBe("loaded");
    await expect(controller.nextTab()).resolves.toBeNull();
    await expect(controller.prevTab()).resolves.toBe("loaded");
    await expect(controller.selectTab({ index: 1 })).resolves.toBe("cached");

    expect(codeCalls.count).toBe(1);
    expect(calls[0]).toEqual({
      method: "setTitle",
      panelId: "panel-1",
      value: "[1] computer/{green-fg}code{/green-fg}",
    });
    expect(calls[2]).toEqual({
      method: "renderTable",
      panelId: "panel-1",
      value: { headers: ["Label", "Pk"], rows: [["add", "1"]], footer: "" },
    });
  });

  test("content for a tab left during loading is cached but not drawn", async () => {
    const { controller, calls, computerScript } = setup();
    let finish: (value: InvocationOutput) => void = () => undefined;
    computerScript.next = () =>
      new Promise<InvocationOutput>((resolve) => {
        finish = resolve;
      });

    const loading = controller.loadActiveTab();
    await new Promise((resolve) => setImmediate(resolve));
    controller.state.next();
    finish({ stdout: "* nm", stderr: "", exitCode: 0 });

    await expect(loading).resolves.toBe("loaded");
    expect(controller.state.getCached({ index: 0 })).toEqual({
      headers: ["label"],
      rows: [["nm"]],
      footer: "",
    });
    expect(calls.map((call) => call.method)).toEqual(["renderLoading"]);
  });

  test("logs when the render target is gone", async () => {
    const { controller, events } = setup({ available: false });
    await controller.loadActiveTab();
    expect(events.filter((event) => event.type === "RENDER_TARGET_MISSING")).toEqual([
      { type: "RENDER_TARGET_MISSING", msg: "no render target for loading", panelId: "panel-1" },
      { type: "RENDER_TARGET_MISSING", msg: "no render target for content", panelId: "panel-1" },
    ]);
  });

  test("cancellation propagates to the caller", async () => {
    const { controller } = setup();
    const aborted = new AbortController();
    aborted.abort();
    await expect(controller.loadActiveTab({ signal: aborted.signal })).rejects.toBeInstanceOf(
      CommandCancelledError,
    );
    expect(controller.state.isLoaded({ index: 0 })).toBe(false);
  });
});

describe("toTabContent", () => {
  const textTab = (formatter?: Tab["formatter"]): Tab => ({
    name: "config",
    command: defineStructuredQuery({
      name: "verdi",
      path: ["config", "list"],
      invoke: output({}),
    }),
    formatter,
  });

  test("text panels show the formatted text", () => {
    expect(
      toTabContent({ tab: textTab(formatTrimmed), kind: "text", stdout: "  a: 1\n\n" }),
    ).toBe("a: 1");
  });

  test("empty output becomes a placeholder", () => {
    expect(toTabContent({ tab: textTab(), kind: "text", stdout: "   " })).toBe("No output");
  });

  test("table panels without a parser show the text as footer", () => {
    expect(toTabContent({ tab: textTab(), kind: "table", stdout: "plain" })).toEqual({
      headers: [],
      rows: [],
      footer: "plain",
    });
  });
});
