import blessed from "blessed";
import type { BoardConfig } from "../config.js";
import { APP_NAME } from "../constants.js";
import { renderTableText } from "../format/table-text.js";
import type { PanelRenderer } from "../panels/renderer.js";
import {
  computeLeftColumnLayout,
  HORIZONTAL_STEP,
  nextColumnOffset,
  shiftColumns,
} from "./layout.js";
import { PALETTE } from "./palette.js";

export const HELP_TEXT = [
  "Keys",
  "",
  "  0-5      focus panel",
  "  [ / ]    previous / next tab",
  "  r        refresh focused panel",
  "  a        toggle auto-refresh",
  "  j / k    scroll focused panel",
  "  h / l    scroll focused panel sideways",
  "  g / G    jump to top / bottom",
  "  ?        toggle this help",
  "  q        quit",
].join("\n");

const LEFT_PANEL_NUMBERS = [1, 2, 3, 4] as const;
const HEADER_ROWS = 1;

export interface DashboardPanel {
  id: string;
  number: number;
  title: string;
}

export interface DashboardHandle extends PanelRenderer {
  /** Appends a line to the details panel. */
  writeResult: ({ message }: { message: string }) => void;
  setFocus: ({ panelNumber }: { panelNumber: number }) => void;
  setStatusLine: ({ text }: { text: string }) => void;
  destroy: () => void;
}

export interface DashboardCallbacks {
  onQuit: () => void;
  onFocus: ({ panelNumber }: { panelNumber: number }) => void;
  onNextTab: () => void;
  onPrevTab: () => void;
  onRefresh: () => void;
  onToggleAutoRefresh: () => void;
}

export const escapeTags = ({ text }: { text: string }): string =>
  text.replace(/[{}]/g, (ch) => (ch === "{" ? "{open}" : "{close}"));

const panelStyle = () => ({
  fg: PALETTE.fg,
  border: {
    fg: PALETTE.muted,
  },
});

export const startDashboard = ({
  config,
  version,
  panels,
  callbacks,
}: {
  config: BoardConfig;
  version: string;
  panels: readonly DashboardPanel[];
  callbacks: DashboardCallbacks;
}): DashboardHandle => {
  const screen = blessed.screen({
    smartCSR: true,
    title: APP_NAME,
  });
  let destroyed = false;
  let focusedNumber = config.initialFocusPanel;

  const header = blessed.box({
    top: 0,
    left: 0,
    width: "100%",
    height: HEADER_ROWS,
    tags: true,
    content: ` ${APP_NAME} v${version} `,
    style: {
      fg: PALETTE.fg,
      bg: PALETTE.bg,
    },
  });

  const left = blessed.box({
    top: HEADER_ROWS,
    left: 0,
    width: `${config.leftPanelWidthPercent}%`,
    height: `100%-${HEADER_ROWS}`,
  });

  const right = blessed.box({
    top: HEADER_ROWS,
    left: `${config.leftPanelWidthPercent}%`,
    width: `${100 - config.leftPanelWidthPercent}%`,
    height: `100%-${HEADER_ROWS}`,
  });

  const results = blessed.log({
    parent: right,
    top: 0,
    left: 0,
    width: "100%",
    height: `${config.resultsPanelHeightPercent}%`,
    tags: true,
    label: " [0] details ",
    border: { type: "line" },
    scrollable: true,
    alwaysScroll: true,
    scrollback: 1000,
    style: panelStyle(),
  });

  const boxes = new Map<number, blessed.Widgets.ScrollableBoxElement>();
  boxes.set(0, results);
  const ids = new Map<string, number>();
  // unescaped table and text content per panel, for sideways scrolling
  const plainText = new Map<number, string>();
  const columnOffsets = new Map<number, number>();

  for (const panel of panels) {
    ids.set(panel.id, panel.number);
    if (panel.number === 0) {
      continue;
    }
    const isLeft = LEFT_PANEL_NUMBERS.some((value) => value === panel.number);
    const box = blessed.box({
      parent: isLeft ? left : right,
      left: 0,
      width: "100%",
      ...(isLeft
        ? { top: 0, height: 3 }
        : {
            top: `${config.resultsPanelHeightPercent}%`,
            height: `${100 - config.resultsPanelHeightPercent}%`,
          }),
      tags: true,
      label: ` ${panel.title} `,
      border: { type: "line" },
      scrollable: true,
      alwaysScroll: true,
      content: "",
      style: panelStyle(),
    });
    boxes.set(panel.number, box);
  }

  const footer = blessed.box({
    bottom: 0,
    left: 0,
    width: "100%",
    height: 1,
    tags: true,
    content: "",
    style: {
      fg: PALETTE.fg,
      bg: PALETTE.bg,
    },
  });

  const help = blessed.box({
    top: "center",
    left: "center",
    width: 44,
    height: 15,
    tags: false,
    hidden: true,
    content: HELP_TEXT,
    border: { type: "line" },
    style: {
      fg: PALETTE.fg,
      bg: PALETTE.bg,
      border: {
        fg: PALETTE.accent,
      },
    },
  });

  screen.append(header);
  screen.append(left);
  screen.append(right);
  screen.append(footer);
  screen.append(help);

  const render = (): void => {
    if (!destroyed) {
      screen.render();
    }
  };

  const applyLayout = (): void => {
    const focusedIndex = LEFT_PANEL_NUMBERS.findIndex((value) => value === focusedNumber);
    const layout = computeLeftColumnLayout({
      totalRows: Math.max(Number(screen.height) - HEADER_ROWS - 1, 0),
      focusedIndex: focusedIndex >= 0 ? focusedIndex : null,
      focusedPercent: config.focusedPanelHeightPercent,
    });
    LEFT_PANEL_NUMBERS.forEach((panelNumber, idx) => {
      const box = boxes.get(panelNumber);
      if (!box) {
        return;
      }
      box.top = layout.tops[idx] ?? 0;
      box.height = layout.heights[idx] ?? 0;
    });
    for (const [panelNumber, box] of boxes) {
      box.style.border = { fg: panelNumber === focusedNumber ? PALETTE.focus : PALETTE.muted };
    }
  };

  const boxFor = ({ panelId }: { panelId: string }): blessed.Widgets.ScrollableBoxElement | null => {
    if (destroyed) {
      return null;
    }
    const panelNumber = ids.get(panelId);
    return panelNumber === undefined ? null : (boxes.get(panelNumber) ?? null);
  };

  const show = ({ panelId, content }: { panelId: string; content: string }): boolean => {
    const box = boxFor({ panelId });
    if (!box) {
      return false;
    }
    const panelNumber = ids.get(panelId);
    if (panelNumber !== undefined) {
      plainText.delete(panelNumber);
      columnOffsets.delete(panelNumber);
    }
    box.setContent(content);
    box.setScroll(0);
    render();
    return true;
  };

  const showPlain = ({ panelId, text }: { panelId: string; text: string }): boolean => {
    const box = boxFor({ panelId });
    const panelNumber = ids.get(panelId);
    if (!box || panelNumber === undefined) {
      return false;
    }
    plainText.set(panelNumber, text);
    const offset = nextColumnOffset({ text, offset: columnOffsets.get(panelNumber) ?? 0, delta: 0 });
    columnOffsets.set(panelNumber, offset);
    box.setContent(escapeTags({ text: shiftColumns({ text, offset }) }));
    box.setScroll(0);
    render();
    return true;
  };

  const scrollSideways = ({ delta }: { delta: number }): void => {
    const text = plainText.get(focusedNumber);
    const box = boxes.get(focusedNumber);
    if (text === undefined || !box) {
      return;
    }
    const offset = nextColumnOffset({ text, offset: columnOffsets.get(focusedNumber) ?? 0, delta });
    columnOffsets.set(focusedNumber, offset);
    box.setContent(escapeTags({ text: shiftColumns({ text, offset }) }));
    render();
  };

  screen.key(["q", "C-c"], () => {
    callbacks.onQuit();
  });
  screen.key(["0", "1", "2", "3", "4", "5"], (ch: string) => {
    callbacks.onFocus({ panelNumber: Number(ch) });
  });
  screen.key(["]"], () => {
    callbacks.onNextTab();
  });
  screen.key(["["], () => {
    callbacks.onPrevTab();
  });
  screen.key(["r"], () => {
    callbacks.onRefresh();
  });
  screen.key(["a"], () => {
    callbacks.onToggleAutoRefresh();
  });
  screen.key(["?"], () => {
    help.toggle();
    render();
  });
  screen.key(["j", "down"], () => {
    boxes.get(focusedNumber)?.scroll(1);
    render();
  });
  screen.key(["k", "up"], () => {
    boxes.get(focusedNumber)?.scroll(-1);
    render();
  });
  screen.key(["h", "left"], () => {
    scrollSideways({ delta: -HORIZONTAL_STEP });
  });
  screen.key(["l", "right"], () => {
    scrollSideways({ delta: HORIZONTAL_STEP });
  });
  screen.key(["g", "home"], () => {
    boxes.get(focusedNumber)?.setScroll(0);
    render();
  });
  screen.key(["S-g", "end"], () => {
    boxes.get(focusedNumber)?.setScrollPerc(100);
    render();
  });
  screen.on("resize", () => {
    applyLayout();
    render();
  });

  applyLayout();
  render();

  return {
    renderTable: ({ panelId, table }) => showPlain({ panelId, text: renderTableText({ table }) }),
    renderText: ({ panelId, text }) => showPlain({ panelId, text }),
    renderError: ({ panelId, message }) =>
      show({
        panelId,
        content: `{${PALETTE.error}-fg}${escapeTags({ text: message })}{/${PALETTE.error}-fg}`,
      }),
    renderLoading: ({ panelId }) =>
      show({ panelId, content: `{${PALETTE.muted}-fg}Loading...{/${PALETTE.muted}-fg}` }),
    setTitle: ({ panelId, title }) => {
      const box = boxFor({ panelId });
      if (!box) {
        return false;
      }
      box.setLabel(` ${title} `);
      render();
      return true;
    },
    writeResult: ({ message }) => {
      if (destroyed) {
        return;
      }
      results.log(escapeTags({ text: message }));
      render();
    },
    setFocus: ({ panelNumber }) => {
      focusedNumber = panelNumber;
      applyLayout();
      boxes.get(panelNumber)?.focus();
      render();
    },
    setStatusLine: ({ text }) => {
      footer.setContent(` ${escapeTags({ text })} `);
      render();
    },
    destroy: () => {
      if (destroyed) {
        return;
      }
      destroyed = true;
      screen.destroy();
    },
  };
};
