export interface LeftColumnLayout {
  /** Row count per left panel, top to bottom. */
  heights: number[];
  /** Row offset of each panel from the top of the column. */
  tops: number[];
}

// Panels 1 and 4 are short lists; 2 and 3 get twice the room.
export const LEFT_PANEL_WEIGHTS = [1, 2, 2, 1] as const;

const sum = ({ values }: { values: readonly number[] }): number =>
  values.reduce((total, value) => total + value, 0);

export const distributeRows = ({
  total,
  weights,
}: {
  total: number;
  weights: readonly number[];
}): number[] => {
  const weightSum = sum({ values: weights });
  if (total <= 0 || weightSum <= 0) {
    return weights.map(() => 0);
  }
  const rows = weights.map((weight) => Math.floor((total * weight) / weightSum));
  const remainder = total - sum({ values: rows });
  return rows.map((value, idx) => value + (idx < remainder ? 1 : 0));
};

/**
 * Heights for the stacked left panels. A focused panel takes its
 * configured share and the others split the rest evenly.
 */
export const computeLeftColumnLayout = ({
  totalRows,
  focusedIndex,
  focusedPercent,
  weights = LEFT_PANEL_WEIGHTS,
}: {
  totalRows: number;
  focusedIndex: number | null;
  focusedPercent: number;
  weights?: readonly number[];
}): LeftColumnLayout => {
  let heights: number[];
  if (focusedIndex === null || focusedIndex < 0 || focusedIndex >= weights.length) {
    heights = distributeRows({ total: totalRows, weights });
  } else {
    const focusedRows = Math.min(
      Math.max(Math.round((totalRows * focusedPercent) / 100), 0),
      Math.max(totalRows, 0),
    );
    const others = distributeRows({
      total: totalRows - focusedRows,
      weights: weights.slice(1).map(() => 1),
    });
    heights = weights.map((_, idx) => {
      if (idx === focusedIndex) {
        return focusedRows;
      }
      return others[idx < focusedIndex ? idx : idx - 1] ?? 0;
    });
  }
  const tops: number[] = [];
  let offset = 0;
  for (const height of heights) {
    tops.push(offset);
    offset += height;
  }
  return { heights, tops };
};

export const HORIZONTAL_STEP = 8;

/** Next column offset for a horizontal scroll, kept within the longest line. */
export const nextColumnOffset = ({
  text,
  offset,
  delta,
}: {
  text: string;
  offset: number;
  delta: number;
}): number => {
  const widest = text.split("\n").reduce((width, line) => Math.max(width, line.length), 0);
  return Math.min(Math.max(offset + delta, 0), Math.max(widest - 1, 0));
};

export const shiftColumns = ({ text, offset }: { text: string; offset: number }): string =>
  offset <= 0
    ? text
    : text
        .split("\n")
        .map((line) => line.slice(offset))
        .join("\n");
