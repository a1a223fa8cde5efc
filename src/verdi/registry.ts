import type { CommandSpec } from "../engine/command-spec.js";
import { definePlainQuery, defineStructuredQuery } from "../engine/command-spec.js";
import type { PanelDefinition } from "../panels/panel-controller.js";
import type { Tab } from "../panels/tab-state.js";
import {
  formatProcessList,
  formatTableOutput,
  formatTrimmed,
  noFormat,
} from "../parsing/formatters.js";
import {
  parseEntryPointList,
  parseLabelList,
  parseSubcommandHelp,
  parseTable,
} from "../parsing/table.js";
import type { SpawnProcess } from "./process.js";
import { resolveCliCommand, runProcess } from "./process.js";
import { readBackendStatus, resolveBackendConfigDir } from "./status.js";

export const DEFAULT_VERDI_COMMAND = "verdi";

export interface RegistryOptions {
  verdiCommand: string;
  commandTimeoutMs: number;
  env?: NodeJS.ProcessEnv;
  spawnProcess?: SpawnProcess;
}

export type VerdiCommandFactory = ({
  path,
  args,
}: {
  path: readonly string[];
  args?: readonly string[];
}) => CommandSpec;

export const createVerdiCommandFactory = ({
  verdiCommand,
  commandTimeoutMs,
  env,
  spawnProcess,
}: RegistryOptions): VerdiCommandFactory => {
  const cli = resolveCliCommand({ command: verdiCommand, fallback: DEFAULT_VERDI_COMMAND });
  return ({ path, args = [] }) =>
    defineStructuredQuery({
      name: DEFAULT_VERDI_COMMAND,
      path,
      args,
      invoke: (context) =>
        runProcess({
          cli,
          args: [...path, ...args],
          context,
          timeoutMs: commandTimeoutMs,
          env,
          spawnProcess,
        }),
    });
};

export const RESULTS_PANEL_ID = "panel-0";

export const buildPanels = (options: RegistryOptions): PanelDefinition[] => {
  const verdi = createVerdiCommandFactory(options);
  const configDir = resolveBackendConfigDir({ env: options.env });
  const statusQuery = definePlainQuery({
    name: "status",
    run: () => readBackendStatus({ configDir }),
  });

  const tableTab = ({
    name,
    path,
    args,
    parser = parseTable,
    formatter = formatTableOutput,
  }: {
    name: string;
    path: string[];
    args?: string[];
    parser?: Tab["parser"];
    formatter?: Tab["formatter"];
  }): Tab => ({ name, command: verdi({ path, args }), formatter, parser });

  const textTab = ({
    name,
    command,
    formatter = formatTrimmed,
  }: {
    name: string;
    command: CommandSpec;
    formatter?: Tab["formatter"];
  }): Tab => ({ name, command, formatter });

  return [
    {
      id: "panel-1",
      number: 1,
      kind: "table",
      tabs: [
        // -a avoids the backend's per-user filter, which needs a loaded session
        tableTab({
          name: "computer",
          path: ["computer", "list"],
          args: ["-r", "-a"],
          parser: parseLabelList,
        }),
        tableTab({ name: "code", path: ["code", "list"] }),
        tableTab({ name: "plugin", path: ["plugin", "list"], parser: parseEntryPointList }),
      ],
    },
    {
      id: "panel-2",
      number: 2,
      kind: "table",
      tabs: [
        tableTab({ name: "process", path: ["process", "list"], formatter: formatProcessList }),
        tableTab({
          name: "calcjob",
          path: ["calcjob"],
          args: ["--help"],
          formatter: noFormat,
          parser: parseSubcommandHelp,
        }),
      ],
    },
    {
      id: "panel-3",
      number: 3,
      kind: "table",
      tabs: [
        tableTab({ name: "group", path: ["group", "list"] }),
        tableTab({ name: "node", path: ["node", "list"] }),
      ],
    },
    {
      id: "panel-4",
      number: 4,
      kind: "text",
      tabs: [
        textTab({ name: "config", command: verdi({ path: ["config", "list"], args: ["--"] }) }),
        textTab({ name: "profile", command: verdi({ path: ["profile", "list"] }) }),
      ],
    },
    {
      id: "panel-5",
      number: 5,
      kind: "text",
      tabs: [
        textTab({ name: "status", command: statusQuery, formatter: noFormat }),
        textTab({ name: "daemon", command: verdi({ path: ["daemon", "status"] }) }),
        textTab({ name: "storage", command: verdi({ path: ["storage", "info"] }) }),
      ],
    },
  ];
};
