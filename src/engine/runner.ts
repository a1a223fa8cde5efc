import type { LogEvent } from "../state/events.js";
import { noopLogEvent } from "../state/events.js";
import type { CommandSpec, InvocationOutput, InvokeContext } from "./command-spec.js";
import { describeCommand } from "./command-spec.js";
import type { CommandResult } from "./command-result.js";
import { createCommandResult, finalizeResult, getDuration } from "./command-result.js";
import type { ExecutionErrorKind } from "./errors.js";
import { CommandCancelledError, formatFault, isCancellation } from "./errors.js";
import type { PriorityGate } from "./gate.js";
import { createPriorityGate } from "./gate.js";
import type { SessionScope } from "./session-scope.js";

export interface ExecuteOptions {
  spec: CommandSpec;
  priority?: boolean;
  signal?: AbortSignal;
  onComplete?: (result: CommandResult) => void;
}

export interface CommandRunner {
  /**
   * Runs `spec` once the shared gate is free. Query failures come back as a
   * `failed` result; only cancellation rejects (with `CommandCancelledError`).
   */
  execute: (options: ExecuteOptions) => Promise<CommandResult>;
  cancelAll: () => void;
  /** Refuses new work, cancels everything queued or running, and waits for it to settle. */
  shutdown: () => Promise<void>;
  getPendingCount: () => number;
  isShutdown: () => boolean;
}

interface Outcome {
  stdout: string;
  stderr: string;
  exitCode?: number;
  status: "done" | "failed" | "cancelled";
  errorKind?: ExecutionErrorKind;
}

interface Outstanding {
  controller: AbortController;
  settled: Promise<unknown>;
}

const appendStderr = ({ stderr, addition }: { stderr: string; addition: string }): string =>
  stderr.length > 0 ? `${stderr}\n\n${addition}` : addition;

/** Rejects as soon as `signal` aborts; the abandoned promise keeps its handlers attached. */
const raceAbort = <T>({ promise, signal }: { promise: Promise<T>; signal: AbortSignal }) =>
  new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(new CommandCancelledError("cancelled while the query was running"));
      return;
    }
    const onAbort = (): void => {
      reject(new CommandCancelledError("cancelled while the query was running"));
    };
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });

// Plain queries start on a later turn of the event loop so the caller's path stays free.
const runDeferred = ({
  run,
  context,
}: {
  run: (context: InvokeContext) => Promise<string> | string;
  context: InvokeContext;
}): Promise<string> =>
  new Promise<string>((resolve, reject) => {
    setImmediate(() => {
      try {
        Promise.resolve(run(context)).then(resolve, reject);
      } catch (error) {
        reject(error);
      }
    });
  });

const invokeSpec = async ({
  spec,
  context,
}: {
  spec: CommandSpec;
  context: InvokeContext;
}): Promise<InvocationOutput> => {
  if (spec.kind === "plain") {
    const stdout = await runDeferred({ run: spec.run, context });
    return { stdout, stderr: "", exitCode: 0 };
  }
  return spec.invoke(context);
};

const toOutcome = ({ output }: { output: InvocationOutput }): Outcome => {
  const stderr = output.fault
    ? appendStderr({ stderr: output.stderr, addition: formatFault({ error: output.fault }) })
    : output.stderr;
  if (output.exitCode === 0 && !output.fault) {
    return { stdout: output.stdout, stderr, exitCode: 0, status: "done" };
  }
  return {
    stdout: output.stdout,
    stderr,
    exitCode: output.exitCode === 0 ? 1 : output.exitCode,
    status: "failed",
    errorKind: "ExecutionFailed",
  };
};

export const createCommandRunner = ({
  sessionScope,
  logEvent = noopLogEvent,
  gate = createPriorityGate(),
}: {
  sessionScope: SessionScope;
  logEvent?: LogEvent;
  gate?: PriorityGate;
}): CommandRunner => {
  const outstanding = new Set<Outstanding>();
  let closed = false;

  const runUnderGate = async ({
    spec,
    signal,
  }: {
    spec: CommandSpec;
    signal: AbortSignal;
  }): Promise<Outcome> => {
    const context: InvokeContext = {
      signal,
      track: ({ handle }) => sessionScope.track({ handle }),
    };
    let outcome: Outcome;
    try {
      await sessionScope.reset();
      const output = await raceAbort({ promise: invokeSpec({ spec, context }), signal });
      outcome = toOutcome({ output });
    } catch (error) {
      outcome = isCancellation(error)
        ? { stdout: "", stderr: "", status: "cancelled", errorKind: "Cancelled" }
        : {
            stdout: "",
            stderr: formatFault({ error }),
            exitCode: 1,
            status: "failed",
            errorKind: "InvocationError",
          };
    }
    try {
      await sessionScope.reset();
    } catch (error) {
      outcome = {
        ...outcome,
        stderr: appendStderr({ stderr: outcome.stderr, addition: formatFault({ error }) }),
      };
    }
    if (signal.aborted && outcome.status !== "cancelled") {
      return { ...outcome, status: "cancelled", errorKind: "Cancelled" };
    }
    return outcome;
  };

  const logOutcome = ({ result }: { result: CommandResult }): void => {
    if (result.status === "done") {
      logEvent({
        type: "COMMAND_DONE",
        msg: "command finished",
        command: result.commandName,
        data: { seconds: getDuration({ result }) },
      });
      return;
    }
    if (result.status === "cancelled") {
      logEvent({ type: "COMMAND_CANCELLED", msg: "command cancelled", command: result.commandName });
      return;
    }
    logEvent({
      type: "COMMAND_FAILED",
      msg: result.errorKind === "InvocationError" ? "query raised" : "command exited non-zero",
      command: result.commandName,
      data: {
        exitCode: result.exitCode,
        errorKind: result.errorKind,
        seconds: getDuration({ result }),
      },
    });
  };

  const finish = ({
    result,
    outcome,
    onComplete,
  }: {
    result: CommandResult;
    outcome: Outcome;
    onComplete?: (result: CommandResult) => void;
  }): CommandResult => {
    result.stdout = outcome.stdout;
    result.stderr = outcome.stderr;
    if (outcome.exitCode !== undefined) {
      result.exitCode = outcome.exitCode;
    }
    const finalized = finalizeResult({
      result,
      status: outcome.status,
      errorKind: outcome.errorKind,
    });
    logOutcome({ result: finalized });
    onComplete?.(finalized);
    if (finalized.status === "cancelled") {
      throw new CommandCancelledError(`${finalized.commandName} cancelled`);
    }
    return finalized;
  };

  const execute = async ({
    spec,
    priority = false,
    signal,
    onComplete,
  }: ExecuteOptions): Promise<CommandResult> => {
    const result = createCommandResult({ commandName: describeCommand({ spec }) });
    if (closed) {
      return finish({
        result,
        outcome: { stdout: "", stderr: "", status: "cancelled", errorKind: "Cancelled" },
        onComplete,
      });
    }

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    let settle: () => void = () => undefined;
    const entry: Outstanding = {
      controller,
      settled: new Promise<void>((resolve) => {
        settle = resolve;
      }),
    };
    outstanding.add(entry);

    try {
      let release: () => void;
      try {
        release = await gate.acquire({ priority, signal: controller.signal });
      } catch (error) {
        if (!isCancellation(error)) {
          throw error;
        }
        return finish({
          result,
          outcome: { stdout: "", stderr: "", status: "cancelled", errorKind: "Cancelled" },
          onComplete,
        });
      }

      let outcome: Outcome;
      try {
        outcome = await runUnderGate({ spec, signal: controller.signal });
      } finally {
        release();
      }
      return finish({ result, outcome, onComplete });
    } finally {
      signal?.removeEventListener("abort", forwardAbort);
      outstanding.delete(entry);
      settle();
    }
  };

  const cancelAll = (): void => {
    for (const entry of outstanding) {
      entry.controller.abort();
    }
  };

  return {
    execute,
    cancelAll,
    shutdown: async () => {
      closed = true;
      const pending = [...outstanding];
      cancelAll();
      await Promise.all(pending.map((entry) => entry.settled));
    },
    getPendingCount: () => outstanding.size,
    isShutdown: () => closed,
  };
};
