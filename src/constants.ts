export const APP_NAME = "verdi-board";
export const APP_VERSION = "0.1.0";

export const PANEL_COUNT = 6;
export const SHUTDOWN_TIMEOUT_MS = 5_000;
