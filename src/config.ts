import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { parse } from "yaml";
import { getRuntimeOverrides } from "./runtime/overrides.js";

export const DEFAULT_SENTINEL = "default" as const;
type DefaultSentinel = typeof DEFAULT_SENTINEL;
type ConfigValue<T> = T | DefaultSentinel;

export interface BoardConfig {
  autoRefreshInterval: number;
  autoRefreshOnStartup: boolean;
  leftPanelWidthPercent: number;
  resultsPanelHeightPercent: number;
  focusedPanelHeightPercent: number;
  initialFocusPanel: number;
  showWelcomeMessage: boolean;
  verdiCommand: string;
  commandTimeoutMs: number;
}

export type BoardConfigTemplate = { [K in keyof BoardConfig]: ConfigValue<BoardConfig[K]> };

export const DEFAULT_CONFIG = {
  autoRefreshInterval: 10,
  autoRefreshOnStartup: true,
  leftPanelWidthPercent: 40,
  resultsPanelHeightPercent: 80,
  focusedPanelHeightPercent: 50,
  initialFocusPanel: 0,
  showWelcomeMessage: true,
  verdiCommand: "verdi",
  commandTimeoutMs: 60_000,
} satisfies BoardConfig;

export const CONFIG_KEYS = [
  "autoRefreshInterval",
  "autoRefreshOnStartup",
  "leftPanelWidthPercent",
  "resultsPanelHeightPercent",
  "focusedPanelHeightPercent",
  "initialFocusPanel",
  "showWelcomeMessage",
  "verdiCommand",
  "commandTimeoutMs",
] as const satisfies ReadonlyArray<keyof BoardConfig>;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

type ParsedConfig = Partial<Record<ConfigKey, unknown>> & { auto_refresh_interval?: unknown };

interface NumberRule {
  min?: number;
  max?: number;
  integer?: boolean;
}

const NUMBER_RULES: Record<
  | "autoRefreshInterval"
  | "leftPanelWidthPercent"
  | "resultsPanelHeightPercent"
  | "focusedPanelHeightPercent"
  | "initialFocusPanel"
  | "commandTimeoutMs",
  NumberRule
> = {
  autoRefreshInterval: {},
  leftPanelWidthPercent: { min: 1, max: 99, integer: true },
  resultsPanelHeightPercent: { min: 1, max: 99, integer: true },
  focusedPanelHeightPercent: { min: 1, max: 99, integer: true },
  initialFocusPanel: { min: 0, max: 5, integer: true },
  commandTimeoutMs: { min: 0, integer: true },
};

const escapeYamlString = ({ value }: { value: string }): string =>
  value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');

const isDefaultSentinel = (value: unknown): value is DefaultSentinel =>
  typeof value === "string" && value.trim().toLowerCase() === DEFAULT_SENTINEL;

const parseNumberValue = ({
  value,
  rule = {},
}: {
  value: unknown;
  rule?: NumberRule;
}): number | undefined => {
  if (isDefaultSentinel(value)) {
    return undefined;
  }
  let parsed: number | undefined;
  if (typeof value === "number" && Number.isFinite(value)) {
    parsed = value;
  } else if (typeof value === "string" && value.trim().length > 0) {
    const candidate = Number(value.trim());
    parsed = Number.isFinite(candidate) ? candidate : undefined;
  }
  if (parsed === undefined) {
    return undefined;
  }
  if (rule.integer && !Number.isInteger(parsed)) {
    return undefined;
  }
  if ((rule.min !== undefined && parsed < rule.min) || (rule.max !== undefined && parsed > rule.max)) {
    return undefined;
  }
  return parsed;
};

const parseBooleanValue = ({ value }: { value: unknown }): boolean | undefined => {
  if (isDefaultSentinel(value)) {
    return undefined;
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    const trimmed = value.trim().toLowerCase();
    if (trimmed === "true") {
      return true;
    }
    if (trimmed === "false") {
      return false;
    }
  }
  return undefined;
};

const parseStringValue = ({ value }: { value: unknown }): string | undefined => {
  if (isDefaultSentinel(value)) {
    return undefined;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  return undefined;
};

const normalizeParsedConfig = ({
  parsed,
}: {
  parsed: ParsedConfig | null;
}): ParsedConfig | null => {
  if (!parsed) {
    return null;
  }
  if (parsed.autoRefreshInterval === undefined && parsed.auto_refresh_interval !== undefined) {
    return { ...parsed, autoRefreshInterval: parsed.auto_refresh_interval } satisfies ParsedConfig;
  }
  return parsed;
};

const isParsedConfig = (value: unknown): value is ParsedConfig =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const parseConfigFile = ({ raw }: { raw: string }): ParsedConfig | null => {
  if (!raw.trim()) {
    return null;
  }
  try {
    const parsedRaw: unknown = parse(raw);
    return normalizeParsedConfig({ parsed: isParsedConfig(parsedRaw) ? parsedRaw : null });
  } catch {
    return null;
  }
};

/** Fills every key from the parsed file, falling back to the default for invalid values. */
export const resolveConfig = ({ parsed }: { parsed: ParsedConfig | null }): BoardConfig => {
  const number = (key: keyof typeof NUMBER_RULES): number =>
    parseNumberValue({ value: parsed?.[key], rule: NUMBER_RULES[key] }) ?? DEFAULT_CONFIG[key];
  const boolean = (key: "autoRefreshOnStartup" | "showWelcomeMessage"): boolean =>
    parseBooleanValue({ value: parsed?.[key] }) ?? DEFAULT_CONFIG[key];
  return {
    autoRefreshInterval: number("autoRefreshInterval"),
    autoRefreshOnStartup: boolean("autoRefreshOnStartup"),
    leftPanelWidthPercent: number("leftPanelWidthPercent"),
    resultsPanelHeightPercent: number("resultsPanelHeightPercent"),
    focusedPanelHeightPercent: number("focusedPanelHeightPercent"),
    initialFocusPanel: number("initialFocusPanel"),
    showWelcomeMessage: boolean("showWelcomeMessage"),
    verdiCommand: parseStringValue({ value: parsed?.verdiCommand }) ?? DEFAULT_CONFIG.verdiCommand,
    commandTimeoutMs: number("commandTimeoutMs"),
  } satisfies BoardConfig;
};

export const buildTemplateConfig = ({
  parsed,
}: {
  parsed: ParsedConfig | null;
}): BoardConfigTemplate => {
  const resolved = resolveConfig({ parsed });
  const keep = <K extends ConfigKey>(key: K): ConfigValue<BoardConfig[K]> => {
    const raw = parsed?.[key];
    if (raw === undefined || isDefaultSentinel(raw) || resolved[key] === DEFAULT_CONFIG[key]) {
      return DEFAULT_SENTINEL;
    }
    return resolved[key];
  };
  return {
    autoRefreshInterval: keep("autoRefreshInterval"),
    autoRefreshOnStartup: keep("autoRefreshOnStartup"),
    leftPanelWidthPercent: keep("leftPanelWidthPercent"),
    resultsPanelHeightPercent: keep("resultsPanelHeightPercent"),
    focusedPanelHeightPercent: keep("focusedPanelHeightPercent"),
    initialFocusPanel: keep("initialFocusPanel"),
    showWelcomeMessage: keep("showWelcomeMessage"),
    verdiCommand: keep("verdiCommand"),
    commandTimeoutMs: keep("commandTimeoutMs"),
  } satisfies BoardConfigTemplate;
};

const formatConfigValue = ({ value }: { value: ConfigValue<number | boolean> }): string => {
  if (value === DEFAULT_SENTINEL) {
    return DEFAULT_SENTINEL;
  }
  return `${value}`;
};

const formatConfigString = ({ value }: { value: ConfigValue<string> }): string => {
  if (value === DEFAULT_SENTINEL) {
    return DEFAULT_SENTINEL;
  }
  return `"${escapeYamlString({ value })}"`;
};

export const formatConfigTemplate = ({ config }: { config: BoardConfigTemplate }): string => {
  return [
    `# default: ${DEFAULT_CONFIG.autoRefreshInterval}. Seconds between auto-refresh passes (0 or negative disables).`,
    `autoRefreshInterval: ${formatConfigValue({ value: config.autoRefreshInterval })}`,
    "",
    `# default: ${DEFAULT_CONFIG.autoRefreshOnStartup}. Start auto-refresh when the dashboard opens.`,
    `autoRefreshOnStartup: ${formatConfigValue({ value: config.autoRefreshOnStartup })}`,
    "",
    `# default: ${DEFAULT_CONFIG.leftPanelWidthPercent}. Width of the left column (1-99).`,
    `leftPanelWidthPercent: ${formatConfigValue({ value: config.leftPanelWidthPercent })}`,
    "",
    `# default: ${DEFAULT_CONFIG.resultsPanelHeightPercent}. Height of the details panel (1-99).`,
    `resultsPanelHeightPercent: ${formatConfigValue({ value: config.resultsPanelHeightPercent })}`,
    "",
    `# default: ${DEFAULT_CONFIG.focusedPanelHeightPercent}. Height of a focused left panel (1-99).`,
    `focusedPanelHeightPercent: ${formatConfigValue({ value: config.focusedPanelHeightPercent })}`,
    "",
    `# default: ${DEFAULT_CONFIG.initialFocusPanel}. Panel focused on startup (0-5).`,
    `initialFocusPanel: ${formatConfigValue({ value: config.initialFocusPanel })}`,
    "",
    `# default: ${DEFAULT_CONFIG.showWelcomeMessage}. Greet in the details panel on startup.`,
    `showWelcomeMessage: ${formatConfigValue({ value: config.showWelcomeMessage })}`,
    "",
    `# default: ${DEFAULT_CONFIG.verdiCommand}. Command used to invoke verdi.`,
    `verdiCommand: ${formatConfigString({ value: config.verdiCommand })}`,
    "",
    `# default: ${DEFAULT_CONFIG.commandTimeoutMs}. Per-command timeout in ms (0 disables).`,
    `commandTimeoutMs: ${formatConfigValue({ value: config.commandTimeoutMs })}`,
    "",
  ].join("\n");
};

export const ensureConfigFile = async ({ configPath }: { configPath: string }): Promise<void> => {
  try {
    const raw = await readFile(configPath, "utf-8");
    const parsed = parseConfigFile({ raw });
    const template = formatConfigTemplate({ config: buildTemplateConfig({ parsed }) });
    if (!raw.trim() || raw !== template) {
      await writeFile(configPath, template, "utf-8");
    }
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err?.code !== "ENOENT") {
      throw error;
    }
    await mkdir(dirname(configPath), { recursive: true });
    const template = formatConfigTemplate({ config: buildTemplateConfig({ parsed: null }) });
    await writeFile(configPath, template, "utf-8");
  }
};

const applyOverrides = ({ config }: { config: BoardConfig }): BoardConfig => {
  const overrides = getRuntimeOverrides();
  return {
    ...config,
    autoRefreshInterval: overrides.autoRefreshInterval ?? config.autoRefreshInterval,
    autoRefreshOnStartup: overrides.autoRefreshOnStartup ?? config.autoRefreshOnStartup,
    initialFocusPanel: overrides.initialFocusPanel ?? config.initialFocusPanel,
    verdiCommand: overrides.verdiCommand ?? config.verdiCommand,
  } satisfies BoardConfig;
};

export const loadConfig = async ({ configPath }: { configPath: string }): Promise<BoardConfig> => {
  try {
    const raw = await readFile(configPath, "utf-8");
    return applyOverrides({ config: resolveConfig({ parsed: parseConfigFile({ raw }) }) });
  } catch {
    return applyOverrides({ config: { ...DEFAULT_CONFIG } });
  }
};
