#!/usr/bin/env node

import { getCliHelp } from "./cli-help.js";
import { parseArgs } from "./cli-args.js";
import { runDashboard } from "./commands/dashboard.js";
import { runSnapshot } from "./commands/snapshot.js";
import { getBoardPaths, getDefaultConfigDir } from "./paths.js";
import { setRuntimeOverrides } from "./runtime/overrides.js";
import { appendEvent } from "./state/events.js";

const reportFatal = async ({ label, error }: { label: string; error: unknown }): Promise<void> => {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;
  console.error(`${label}: ${message}`);
  if (stack) {
    console.error(stack);
  }
  try {
    const paths = getBoardPaths({ configDir: getDefaultConfigDir({}) });
    await appendEvent({
      eventsLog: paths.eventsLog,
      event: {
        ts: new Date().toISOString(),
        type: "FATAL",
        msg: `${label}: ${message}`,
        data: stack ? { stack } : undefined,
      },
    });
  } catch (logError) {
    console.error(`could not record ${label}: ${String(logError)}`);
  }
};

process.on("uncaughtException", (error) => {
  void reportFatal({ label: "uncaughtException", error }).finally(() => {
    process.exit(1);
  });
});

process.on("unhandledRejection", (error) => {
  void reportFatal({ label: "unhandledRejection", error }).finally(() => {
    process.exit(1);
  });
});

const main = async ({ argv }: { argv: string[] }): Promise<void> => {
  const parsed = parseArgs({ argv });
  if (parsed.helpRequested || parsed.command.name === "help") {
    console.log(getCliHelp());
    return;
  }
  if (parsed.errors.length > 0) {
    for (const error of parsed.errors) {
      console.error(error);
    }
    process.exitCode = 2;
    return;
  }
  setRuntimeOverrides({ overrides: parsed.overrides });
  const command = parsed.command;

  switch (command.name) {
    case "snapshot": {
      process.exitCode = await runSnapshot({ panelNumber: parsed.panel });
      return;
    }
    case "":
    case "dashboard": {
      await runDashboard({});
      process.exit(0);
    }
    default: {
      console.error(`unknown command: ${command.name}`);
      console.error(getCliHelp());
      process.exitCode = 2;
    }
  }
};

void main({ argv: process.argv.slice(2) }).catch((error) => {
  void reportFatal({ label: "command failed", error }).finally(() => {
    process.exit(1);
  });
});
