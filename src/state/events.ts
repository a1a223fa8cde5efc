import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

export type BoardEventType =
  | "STARTUP"
  | "COMMAND_DONE"
  | "COMMAND_FAILED"
  | "COMMAND_CANCELLED"
  | "REFRESH_PASS"
  | "REFRESH_PANEL_FAILED"
  | "AUTO_REFRESH"
  | "RENDER_TARGET_MISSING"
  | "SHUTDOWN"
  | "FATAL";

export interface BoardEvent {
  ts: string;
  type: BoardEventType;
  msg: string;
  panelId?: string;
  command?: string;
  data?: Record<string, unknown>;
}

export type EventInput = Omit<BoardEvent, "ts">;

export type LogEvent = (event: EventInput) => void;

export const appendEvent = async ({
  eventsLog,
  event,
}: {
  eventsLog: string;
  event: BoardEvent;
}): Promise<void> => {
  const line = `${JSON.stringify(event)}\n`;
  await appendFile(eventsLog, line, "utf-8");
};

export interface EventLogger {
  log: LogEvent;
  flush: () => Promise<void>;
}

/**
 * Appends events in submission order without making callers await the write.
 * Write failures go to `onError`; they never reach the caller of `log`.
 */
export const createEventLogger = ({
  eventsLog,
  onError,
  now = () => new Date(),
}: {
  eventsLog: string;
  onError: (error: unknown) => void;
  now?: () => Date;
}): EventLogger => {
  let chain: Promise<void> = mkdir(dirname(eventsLog), { recursive: true }).then(
    () => undefined,
    onError,
  );
  return {
    log: (event) => {
      const stamped: BoardEvent = { ts: now().toISOString(), ...event };
      chain = chain.then(() => appendEvent({ eventsLog, event: stamped })).catch(onError);
    },
    flush: () => chain,
  };
};

export const noopLogEvent: LogEvent = () => undefined;
