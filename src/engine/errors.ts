export type ExecutionErrorKind = "ExecutionFailed" | "Cancelled" | "InvocationError";

export class CommandCancelledError extends Error {
  readonly kind = "Cancelled" satisfies ExecutionErrorKind;

  constructor(message = "command cancelled") {
    super(message);
    this.name = "CommandCancelledError";
  }
}

export const isCancellation = (error: unknown): boolean =>
  error instanceof CommandCancelledError ||
  (error instanceof Error && error.name === "AbortError");

export const formatFault = ({ error }: { error: unknown }): string => {
  if (error instanceof Error) {
    const trace = error.stack ?? `${error.name}: ${error.message}`;
    return `${error.name}: ${error.message}\n\n${trace}`;
  }
  return `Error: ${String(error)}`;
};

export const describeError = ({ error }: { error: unknown }): string =>
  error instanceof Error ? error.message : String(error);
