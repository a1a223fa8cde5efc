import type { CommandSpec } from "../engine/command-spec.js";
import type { OutputFormatter } from "../parsing/formatters.js";
import type { ParsedTable, TableParser } from "../parsing/table.js";

export interface Tab {
  name: string;
  command: CommandSpec;
  formatter?: OutputFormatter;
  parser?: TableParser;
}

export type TabContent = ParsedTable | string;

export interface PanelTabState {
  readonly tabs: readonly Tab[];
  getActiveIndex: () => number;
  getActiveTab: () => Tab;
  next: () => boolean;
  prev: () => boolean;
  select: ({ index }: { index: number }) => boolean;
  isLoaded: ({ index }: { index: number }) => boolean;
  markLoaded: ({ index, content }: { index: number; content: TabContent }) => void;
  getCached: ({ index }: { index: number }) => TabContent | undefined;
  getLoadedIndexes: () => number[];
}

/**
 * Active tab plus a per-tab cache. Moving between tabs only changes the
 * index; loading is the caller's job.
 */
export const createPanelTabState = ({ tabs }: { tabs: readonly Tab[] }): PanelTabState => {
  if (tabs.length === 0) {
    throw new Error("a panel needs at least one tab");
  }
  const frozenTabs = Object.freeze([...tabs]);
  let activeIndex = 0;
  const cache = new Map<number, TabContent>();
  const loaded = new Set<number>();

  const assertIndex = ({ index }: { index: number }): void => {
    if (!Number.isInteger(index) || index < 0 || index >= frozenTabs.length) {
      throw new RangeError(`tab index ${index} out of range 0..${frozenTabs.length - 1}`);
    }
  };

  const getActiveTab = (): Tab => {
    const tab = frozenTabs[activeIndex];
    if (!tab) {
      throw new RangeError(`no tab at index ${activeIndex}`);
    }
    return tab;
  };

  return {
    tabs: frozenTabs,
    getActiveIndex: () => activeIndex,
    getActiveTab,
    next: () => {
      if (activeIndex >= frozenTabs.length - 1) {
        return false;
      }
      activeIndex += 1;
      return true;
    },
    prev: () => {
      if (activeIndex <= 0) {
        return false;
      }
      activeIndex -= 1;
      return true;
    },
    select: ({ index }) => {
      assertIndex({ index });
      if (index === activeIndex) {
        return false;
      }
      activeIndex = index;
      return true;
    },
    isLoaded: ({ index }) => loaded.has(index),
    markLoaded: ({ index, content }) => {
      assertIndex({ index });
      cache.set(index, content);
      loaded.add(index);
    },
    getCached: ({ index }) => cache.get(index),
    getLoadedIndexes: () => [...loaded].sort((a, b) => a - b),
  };
};

export const formatTabTitle = ({
  panelNumber,
  tabs,
  activeIndex,
}: {
  panelNumber: number;
  tabs: readonly Tab[];
  activeIndex: number;
}): string => {
  const names = tabs.map((tab, idx) =>
    idx === activeIndex ? `{green-fg}${tab.name}{/green-fg}` : tab.name,
  );
  return `[${panelNumber}] ${names.join("/")}`;
};
