import type { ParsedTable } from "../parsing/table.js";

/**
 * Render boundary. Every method returns false when the panel no longer
 * exists, which callers log and otherwise ignore.
 */
export interface PanelRenderer {
  renderTable: ({ panelId, table }: { panelId: string; table: ParsedTable }) => boolean;
  renderText: ({ panelId, text }: { panelId: string; text: string }) => boolean;
  renderError: ({ panelId, message }: { panelId: string; message: string }) => boolean;
  renderLoading: ({ panelId }: { panelId: string }) => boolean;
  setTitle: ({ panelId, title }: { panelId: string; title: string }) => boolean;
}
