import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";

const LABEL_WIDTH = 13;
const VALUE_LIMIT = 60;

const truncate = ({ value }: { value: string }): string =>
  value.length > VALUE_LIMIT ? `${value.slice(0, VALUE_LIMIT - 3)}...` : value;

const line = ({
  mark,
  label,
  value,
}: {
  mark: "✔" | "⚠" | "✘";
  label: string;
  value: string;
}): string => `${mark} ${`${label}:`.padEnd(LABEL_WIDTH)}${truncate({ value })}`;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readBackendString = ({ value }: { value: unknown }): string | null => {
  if (!isRecord(value)) {
    return null;
  }
  const backend = value.backend;
  return typeof backend === "string" && backend.length > 0 ? backend : null;
};

export const resolveBackendConfigDir = ({
  env = process.env,
}: {
  env?: NodeJS.ProcessEnv;
} = {}): string => {
  const base = env.AIIDA_PATH?.trim();
  return join(base && base.length > 0 ? base : homedir(), ".aiida");
};

const NO_PROFILE_LINES = [
  line({ mark: "⚠", label: "profile", value: "No profile configured" }),
  "",
  "To set up a profile, run:",
  "  verdi presto",
];

/** Summarizes the backend configuration file without starting the backend. */
export const describeBackendStatus = ({
  configDir,
  raw,
}: {
  configDir: string;
  raw: string | null;
}): string => {
  const output = [line({ mark: "✔", label: "config", value: configDir })];
  if (raw === null) {
    return [...output, ...NO_PROFILE_LINES].join("\n");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return [...output, line({ mark: "✘", label: "config", value: `unreadable - ${reason}` })].join(
      "\n",
    );
  }
  if (!isRecord(parsed)) {
    return [...output, line({ mark: "✘", label: "config", value: "unexpected format" })].join("\n");
  }

  const profileName = typeof parsed.default_profile === "string" ? parsed.default_profile : "";
  const profiles: Record<string, unknown> = isRecord(parsed.profiles) ? parsed.profiles : {};
  const profile = profileName ? profiles[profileName] : undefined;
  if (!profileName || !isRecord(profile)) {
    return [...output, ...NO_PROFILE_LINES].join("\n");
  }

  output.push(line({ mark: "✔", label: "profile", value: profileName }));
  const storage = readBackendString({ value: profile.storage });
  output.push(
    storage
      ? line({ mark: "✔", label: "storage", value: storage })
      : line({ mark: "✘", label: "storage", value: "not configured" }),
  );
  const broker = readBackendString({ value: profile.process_control });
  output.push(
    broker
      ? line({ mark: "✔", label: "broker", value: broker })
      : line({ mark: "⚠", label: "broker", value: "No broker" }),
  );
  output.push(line({ mark: "✔", label: "profiles", value: Object.keys(profiles).join(", ") }));
  return output.join("\n");
};

export const readBackendStatus = async ({
  configDir,
}: {
  configDir: string;
}): Promise<string> => {
  try {
    const raw = await readFile(join(configDir, "config.json"), "utf-8");
    return describeBackendStatus({ configDir, raw });
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err?.code === "ENOENT") {
      return describeBackendStatus({ configDir, raw: null });
    }
    throw error;
  }
};
