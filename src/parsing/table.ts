export interface ParsedTable {
  headers: string[];
  rows: string[][];
  footer: string;
}

export type TableParser = ({ text }: { text: string }) => ParsedTable;

const SEPARATOR_REGEX = /^[\s-]*-[\s-]*$/;
const CELL_SPLIT_REGEX = /\s{2,}/;
const REPORT_PREFIXES = [
  "Report:",
  "Info:",
  "Warning:",
  "Error:",
  "Success:",
  "Critical:",
  "Debug:",
] as const;
const FOOTER_PREFIXES = ["Total", ...REPORT_PREFIXES] as const;
const REPORT_LINE_REGEX = /^(Report|Info|Warning|Error|Success|Debug|Critical):/;

export const EMPTY_TABLE: ParsedTable = { headers: [], rows: [], footer: "" };

export const splitCells = ({ line }: { line: string }): string[] =>
  line
    .split(CELL_SPLIT_REGEX)
    .map((cell) => cell.trim())
    .filter((cell) => cell.length > 0);

export const isReportLine = ({ line }: { line: string }): boolean =>
  REPORT_LINE_REGEX.test(line.trim());

const startsFooter = ({ stripped }: { stripped: string }): boolean =>
  stripped.length === 0 || FOOTER_PREFIXES.some((prefix) => stripped.startsWith(prefix));

/**
 * Parses column-aligned command output of the form
 *
 * ```
 * Label      Pk  Type
 * ---------  --  ----
 * localhost   1  core
 * ```
 *
 * Text without a dash separator line comes back whole as the footer.
 */
export const parseTable = ({ text }: { text: string }): ParsedTable => {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return { headers: [], rows: [], footer: "" };
  }
  const lines = trimmed.split(/\r?\n/);

  const separatorIdx = lines.findIndex((line) => SEPARATOR_REGEX.test(line));
  if (separatorIdx === -1) {
    return { headers: [], rows: [], footer: trimmed };
  }

  const headerLine = separatorIdx > 0 ? lines[separatorIdx - 1] : undefined;
  const headers = headerLine === undefined ? [] : splitCells({ line: headerLine });

  const rows: string[][] = [];
  const footerLines: string[] = [];
  let inFooter = false;

  for (const line of lines.slice(separatorIdx + 1)) {
    const stripped = line.trim();
    if (!inFooter && startsFooter({ stripped })) {
      inFooter = true;
    }
    if (inFooter) {
      if (stripped.length > 0 && !isReportLine({ line: stripped })) {
        footerLines.push(stripped);
      }
      continue;
    }
    const cells = splitCells({ line });
    if (cells.length > 0) {
      rows.push(cells);
    }
  }

  return { headers, rows, footer: footerLines.join("\n") };
};

const stripBullet = ({ stripped }: { stripped: string }): string =>
  stripped.startsWith("* ") ? stripped.slice(2).trim() : stripped;

export const parseBulletList = ({
  text,
  header,
  skipPrefixes = [],
}: {
  text: string;
  header: string;
  skipPrefixes?: readonly string[];
}): ParsedTable => {
  const rows = text
    .trim()
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(
      (stripped) =>
        stripped.length > 0 &&
        !REPORT_PREFIXES.some((prefix) => stripped.startsWith(prefix)) &&
        !skipPrefixes.some((prefix) => stripped.startsWith(prefix)),
    )
    .map((stripped) => [stripBullet({ stripped })]);
  return { headers: [header], rows, footer: "" };
};

export const parseLabelList = ({ text }: { text: string }): ParsedTable =>
  parseBulletList({ text, header: "label" });

export const parseEntryPointList = ({ text }: { text: string }): ParsedTable =>
  parseBulletList({ text, header: "entry point", skipPrefixes: ["Registered entry points"] });

/** Extracts the sub-command table from a `--help` page's `Commands:` section. */
export const parseSubcommandHelp = ({ text }: { text: string }): ParsedTable => {
  const rows: string[][] = [];
  let inCommands = false;

  for (const line of text.trim().split(/\r?\n/)) {
    const stripped = line.trim();
    if (!inCommands) {
      inCommands = stripped.startsWith("Commands:");
      continue;
    }
    if (!line.startsWith("  ") || stripped.startsWith("-")) {
      break;
    }
    const [name, description] = splitCells({ line: stripped });
    if (name !== undefined) {
      rows.push([name, description ?? ""]);
    }
  }

  return { headers: ["command", "description"], rows, footer: "" };
};

export const normalizeRow = ({ row, width }: { row: string[]; width: number }): string[] => {
  if (row.length >= width) {
    return row.slice(0, width);
  }
  return [...row, ...Array.from({ length: width - row.length }, () => "")];
};

export const normalizeTable = ({ table }: { table: ParsedTable }): ParsedTable => ({
  headers: [...table.headers],
  rows: table.rows.map((row) => normalizeRow({ row, width: table.headers.length })),
  footer: table.footer,
});
