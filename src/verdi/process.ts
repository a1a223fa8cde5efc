import type { ChildProcess, SpawnOptions } from "node:child_process";
import { spawn } from "node:child_process";
import type { InvocationOutput, InvokeContext } from "../engine/command-spec.js";

export interface CliCommand {
  cmd: string;
  args: string[];
}

export const splitCommand = ({ command }: { command: string }): string[] => {
  const parts: string[] = [];
  let current = "";
  let inSingle = false;
  let inDouble = false;
  let isEscaping = false;
  for (const ch of command.trim()) {
    if (isEscaping) {
      current += ch;
      isEscaping = false;
      continue;
    }
    if (ch === "\\") {
      isEscaping = true;
      continue;
    }
    if (ch === "'" && !inDouble) {
      inSingle = !inSingle;
      continue;
    }
    if (ch === '"' && !inSingle) {
      inDouble = !inDouble;
      continue;
    }
    if (!inSingle && !inDouble && /\s/.test(ch)) {
      if (current.length > 0) {
        parts.push(current);
        current = "";
      }
      continue;
    }
    current += ch;
  }
  if (current.length > 0) {
    parts.push(current);
  }
  return parts;
};

export const resolveCliCommand = ({
  command,
  fallback,
}: {
  command?: string;
  fallback: string;
}): CliCommand => {
  const [cmd, ...args] = splitCommand({ command: command ?? "" });
  return cmd ? { cmd, args } : { cmd: fallback, args: [] };
};

export type SpawnProcess = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildProcess;

/**
 * Runs one external command to completion and collects its output. A
 * non-zero exit is an ordinary result; failing to start rejects.
 */
export const runProcess = ({
  cli,
  args,
  context,
  timeoutMs,
  env = process.env,
  spawnProcess = spawn,
}: {
  cli: CliCommand;
  args: readonly string[];
  context: InvokeContext;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
  spawnProcess?: SpawnProcess;
}): Promise<InvocationOutput> =>
  new Promise<InvocationOutput>((resolve, reject) => {
    const child = spawnProcess(cli.cmd, [...cli.args, ...args], {
      stdio: ["ignore", "pipe", "pipe"],
      env,
    });
    context.track({
      handle: {
        isAlive: () => child.exitCode === null && child.signalCode === null,
        dispose: () => {
          child.kill("SIGKILL");
        },
      },
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    // decoded per stream so a character split across chunks stays intact
    child.stdout?.setEncoding("utf-8");
    child.stderr?.setEncoding("utf-8");
    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });

    const onAbort = (): void => {
      child.kill("SIGTERM");
    };
    context.signal.addEventListener("abort", onAbort, { once: true });
    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGTERM");
          }, timeoutMs)
        : null;

    const cleanup = (): void => {
      if (timer) {
        clearTimeout(timer);
      }
      context.signal.removeEventListener("abort", onAbort);
    };

    child.on("error", (error) => {
      cleanup();
      reject(error);
    });
    child.on("close", (code, signal) => {
      cleanup();
      if (timedOut) {
        resolve({
          stdout,
          stderr,
          exitCode: code ?? 1,
          fault: new Error(`${cli.cmd} ${args.join(" ")} timed out after ${timeoutMs}ms`),
        });
        return;
      }
      if (code === null) {
        resolve({
          stdout,
          stderr,
          exitCode: 1,
          fault: new Error(`${cli.cmd} ${args.join(" ")} terminated by ${signal ?? "signal"}`),
        });
        return;
      }
      resolve({ stdout, stderr, exitCode: code });
    });
  });
