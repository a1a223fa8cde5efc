import type { ExecutionErrorKind } from "./errors.js";

export type CommandStatus = "running" | "done" | "cancelled" | "failed";

export interface CommandResult {
  commandName: string;
  stdout: string;
  stderr: string;
  exitCode?: number;
  status: CommandStatus;
  errorKind?: ExecutionErrorKind;
  startTime: Date;
  endTime?: Date;
}

export const createCommandResult = ({
  commandName,
  now = new Date(),
}: {
  commandName: string;
  now?: Date;
}): CommandResult => ({
  commandName,
  stdout: "",
  stderr: "",
  status: "running",
  startTime: now,
});

/** Seconds elapsed; still counting while the command runs. */
export const getDuration = ({
  result,
  now = new Date(),
}: {
  result: CommandResult;
  now?: Date;
}): number => ((result.endTime ?? now).getTime() - result.startTime.getTime()) / 1000;

export const isSuccess = ({ result }: { result: CommandResult }): boolean =>
  result.status === "done" && result.exitCode === 0;

export const finalizeResult = ({
  result,
  status,
  errorKind,
  now = new Date(),
}: {
  result: CommandResult;
  status: Exclude<CommandStatus, "running">;
  errorKind?: ExecutionErrorKind;
  now?: Date;
}): CommandResult => {
  result.status = status;
  if (errorKind) {
    result.errorKind = errorKind;
  }
  result.endTime = now;
  return Object.freeze(result);
};
