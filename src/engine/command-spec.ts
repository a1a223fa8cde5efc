export interface InvocationOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
  /** Set when the query produced output but still ended abnormally (signal, timeout). */
  fault?: Error;
}

/** Something an invocation leaves behind in the backend session until the next reset. */
export interface SessionHandle {
  isAlive: () => boolean;
  dispose: () => void;
}

export interface InvokeContext {
  signal: AbortSignal;
  track: ({ handle }: { handle: SessionHandle }) => void;
}

export interface PlainQuery {
  kind: "plain";
  name: string;
  run: (context: InvokeContext) => Promise<string> | string;
}

export interface StructuredQuery {
  kind: "structured";
  name: string;
  path: readonly string[];
  args: readonly string[];
  invoke: (context: InvokeContext) => Promise<InvocationOutput>;
}

export type CommandSpec = PlainQuery | StructuredQuery;

export const definePlainQuery = ({
  name,
  run,
}: {
  name: string;
  run: PlainQuery["run"];
}): PlainQuery => Object.freeze({ kind: "plain", name, run });

export const defineStructuredQuery = ({
  name,
  path,
  args = [],
  invoke,
}: {
  name: string;
  path: readonly string[];
  args?: readonly string[];
  invoke: StructuredQuery["invoke"];
}): StructuredQuery =>
  Object.freeze({
    kind: "structured",
    name,
    path: Object.freeze([...path]),
    args: Object.freeze([...args]),
    invoke,
  });

export const describeCommand = ({ spec }: { spec: CommandSpec }): string => {
  if (spec.kind === "plain") {
    return spec.name;
  }
  return [spec.name, ...spec.path, ...spec.args].join(" ");
};
