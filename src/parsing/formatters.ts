export type OutputFormatter = ({ text }: { text: string }) => string;

const COMMAND_ECHO_PREFIX = "$ verdi";

const dropTrailingBlankLines = ({ lines }: { lines: string[] }): string[] => {
  let end = lines.length;
  while (end > 0 && (lines[end - 1] ?? "").trim().length === 0) {
    end -= 1;
  }
  return lines.slice(0, end);
};

export const stripCommandEcho = ({ text }: { text: string }): string => {
  const lines = text.split(/\r?\n/);
  const last = lines[lines.length - 1];
  if (last !== undefined && last.trim().startsWith(COMMAND_ECHO_PREFIX)) {
    return lines.slice(0, -1).join("\n");
  }
  return text;
};

export const formatTableOutput = ({ text }: { text: string }): string =>
  dropTrailingBlankLines({ lines: stripCommandEcho({ text }).split(/\r?\n/) }).join("\n");

// Process listings keep their trailing report lines; the parser moves them to the footer.
export const formatProcessList = formatTableOutput;

export const formatTrimmed = ({ text }: { text: string }): string =>
  stripCommandEcho({ text }).trim();

export const noFormat = ({ text }: { text: string }): string => text;
