export interface RecurringPattern {
  id: string;
  test: RegExp;
}

// Warnings the backend repeats on every call; each is shown once per session.
export const RECURRING_PATTERNS: readonly RecurringPattern[] = [
  { id: "no-profile", test: /no .*profile (is )?configured/i },
  { id: "closed-file", test: /i\/o operation on closed file/i },
  { id: "broker-unreachable", test: /unable to connect to (the )?broker/i },
  { id: "daemon-not-running", test: /daemon is not running/i },
];

const BENIGN_PATTERNS: readonly RegExp[] = [/configuration file .*does not exist/i];

export const isBenignStderr = ({ stderr }: { stderr: string }): boolean =>
  BENIGN_PATTERNS.some((pattern) => pattern.test(stderr));

export const normalizeMessage = ({ message }: { message: string }): string =>
  message.trim().replace(/\s+/g, " ").toLowerCase();

export interface DiagnosticSink {
  /** Appends an error unless it (or its recurring pattern) was already shown. */
  report: ({ message }: { message: string }) => boolean;
  /** Appends an informational line with no deduplication. */
  note: ({ message }: { message: string }) => void;
  getMessages: () => string[];
  reset: () => void;
}

export const createDiagnosticSink = ({
  write,
  patterns = RECURRING_PATTERNS,
}: {
  write: ({ message }: { message: string }) => void;
  patterns?: readonly RecurringPattern[];
}): DiagnosticSink => {
  const messages: string[] = [];
  const seen = new Set<string>();

  const append = ({ message }: { message: string }): void => {
    messages.push(message);
    write({ message });
  };

  return {
    report: ({ message }) => {
      const trimmed = message.trim();
      if (trimmed.length === 0) {
        return false;
      }
      const pattern = patterns.find((candidate) => candidate.test.test(trimmed));
      const key = pattern ? `pattern:${pattern.id}` : `text:${normalizeMessage({ message: trimmed })}`;
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      append({ message: trimmed });
      return true;
    },
    note: ({ message }) => {
      append({ message });
    },
    getMessages: () => [...messages],
    reset: () => {
      messages.length = 0;
      seen.clear();
    },
  };
};
