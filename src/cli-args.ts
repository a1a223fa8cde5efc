import yargs from "yargs";
import { PANEL_COUNT } from "./constants.js";
import type { RuntimeOverrides } from "./runtime/overrides.js";

export interface CliCommand {
  name: string;
  args: string[];
}

export interface ParsedArgs {
  command: CliCommand;
  helpRequested: boolean;
  panel?: number;
  overrides: RuntimeOverrides;
  errors: string[];
}

const readFlagValue = ({ value }: { value: unknown }): string | undefined => {
  if (value === undefined) {
    return undefined;
  }
  return String(value).trim();
};

const parsePanelNumber = ({
  flag,
  value,
  errors,
}: {
  flag: string;
  value: unknown;
  errors: string[];
}): number | undefined => {
  const raw = readFlagValue({ value });
  if (raw === undefined) {
    return undefined;
  }
  const parsed = raw.length > 0 ? Number(raw) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed < 0 || parsed >= PANEL_COUNT) {
    errors.push(`--${flag} must be an integer from 0 to ${PANEL_COUNT - 1}`);
    return undefined;
  }
  return parsed;
};

const parseInterval = ({ value, errors }: { value: unknown; errors: string[] }): number | undefined => {
  const raw = readFlagValue({ value });
  if (raw === undefined) {
    return undefined;
  }
  const parsed = raw.length > 0 ? Number(raw) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    errors.push("--interval must be a number of seconds");
    return undefined;
  }
  return parsed;
};

export const parseArgs = ({ argv }: { argv: string[] }): ParsedArgs => {
  const parser = yargs(argv)
    .parserConfiguration({ "unknown-options-as-args": true })
    .option("interval", { type: "string" })
    .option("focus", { type: "string" })
    .option("verdi-command", { type: "string" })
    .option("auto-refresh", { type: "boolean" })
    .option("panel", { type: "string" })
    .option("help", { type: "boolean", alias: "h", default: false })
    .help(false)
    .version(false);
  const parsed = parser.parseSync();
  const [name, ...args] = parsed._.map((value) => String(value));
  const errors: string[] = [];
  const panel = parsePanelNumber({ flag: "panel", value: parsed.panel, errors });
  const verdiCommand = parsed.verdiCommand?.trim();
  return {
    command: {
      name: name ?? "",
      args,
    },
    helpRequested: Boolean(parsed.help),
    panel,
    overrides: {
      autoRefreshInterval: parseInterval({ value: parsed.interval, errors }),
      autoRefreshOnStartup: parsed.autoRefresh === false ? false : undefined,
      initialFocusPanel: parsePanelNumber({ flag: "focus", value: parsed.focus, errors }),
      verdiCommand: verdiCommand ? verdiCommand : undefined,
    },
    errors,
  };
};
