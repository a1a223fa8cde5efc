import {
  normalizeTable,
  parseEntryPointList,
  parseLabelList,
  parseSubcommandHelp,
  parseTable,
  splitCells,
} from "../parsing/table.js";

describe("parseTable", () => {
  test("parses headers, rows and drops report lines from the footer", () => {
    const text = [
      "Full label      Pk  Entry point",
      "------------  ----  -------------------",
      "dspaw@nm         1  core.code.installed",
      "",
      "Report: see docs",
    ].join("\n");
    expect(parseTable({ text })).toEqual({
      headers: ["Full label", "Pk", "Entry point"],
      rows: [["dspaw@nm", "1", "core.code.installed"]],
      footer: "",
    });
  });

  test("drops success lines from the footer", () => {
    const text = ["Label  Pk", "-----  --", "nm     1", "Success: listed", "Total results: 1"].join(
      "\n",
    );
    expect(parseTable({ text })).toEqual({
      headers: ["Label", "Pk"],
      rows: [["nm", "1"]],
      footer: "Total results: 1",
    });
  });

  test("returns text without a separator as the footer", () => {
    expect(parseTable({ text: "  No codes found.\n\nUse verdi code create\n" })).toEqual({
      headers: [],
      rows: [],
      footer: "No codes found.\n\nUse verdi code create",
    });
  });

  test("returns an empty table for blank input", () => {
    expect(parseTable({ text: " \n\n " })).toEqual({ headers: [], rows: [], footer: "" });
  });

  test("a blank line alone is not a separator", () => {
    const table = parseTable({ text: "Label  Pk\n\nlocalhost  1" });
    expect(table.headers).toEqual([]);
    expect(table.footer).toBe("Label  Pk\n\nlocalhost  1");
  });

  test("keeps total lines in the footer and stays in footer mode", () => {
    const text = [
      "PK  Created  State",
      "--  -------  --------",
      "12  1m ago   Finished",
      "13  2m ago   Waiting",
      "Total results: 2",
      "14  3m ago   looks like a row",
      "Info: last time an entry changed state: 1m ago",
    ].join("\n");
    expect(parseTable({ text })).toEqual({
      headers: ["PK", "Created", "State"],
      rows: [
        ["12", "1m ago", "Finished"],
        ["13", "2m ago", "Waiting"],
      ],
      footer: "Total results: 2\n14  3m ago   looks like a row",
    });
  });

  test("tolerates a separator on the first line", () => {
    expect(parseTable({ text: "----\nalpha  beta" })).toEqual({
      headers: [],
      rows: [["alpha", "beta"]],
      footer: "",
    });
  });

  test("keeps rows whose cell count differs from the header", () => {
    const table = parseTable({ text: "A  B  C\n-  -  -\n1  2\n1  2  3  4" });
    expect(table.rows).toEqual([
      ["1", "2"],
      ["1", "2", "3", "4"],
    ]);
    expect(normalizeTable({ table }).rows).toEqual([
      ["1", "2", ""],
      ["1", "2", "3"],
    ]);
  });
});

describe("splitCells", () => {
  test("splits on runs of two or more spaces", () => {
    expect(splitCells({ line: "  Full label   Pk core x " })).toEqual(["Full label", "Pk core x"]);
  });
});

describe("bullet list parsers", () => {
  test("label list turns bullets into single-column rows", () => {
    expect(parseLabelList({ text: "* localhost\n* nm\n" })).toEqual({
      headers: ["label"],
      rows: [["localhost"], ["nm"]],
      footer: "",
    });
  });

  test("label list skips report lines", () => {
    expect(parseLabelList({ text: "Report: No computers found\n" }).rows).toEqual([]);
  });

  test("entry point list skips the heading", () => {
    const text = "Registered entry points for aiida.calculations:\n* core.arithmetic.add\n* core.templatereplacer\n\nInfo: Pass the entry point as an argument to display detailed information";
    expect(parseEntryPointList({ text })).toEqual({
      headers: ["entry point"],
      rows: [["core.arithmetic.add"], ["core.templatereplacer"]],
      footer: "",
    });
  });
});

describe("parseSubcommandHelp", () => {
  test("reads the commands section", () => {
    const text = [
      "Usage: verdi calcjob [OPTIONS] COMMAND [ARGS]...",
      "",
      "  Inspect and manage calcjobs.",
      "",
      "Options:",
      "  -h, --help  Show this message and exit.",
      "",
      "Commands:",
      "  cleanworkdir  Clean all content of all output remote folders.",
      "  gotocomputer  Open a shell in the remote folder on the calcjob.",
      "  inputcat",
    ].join("\n");
    expect(parseSubcommandHelp({ text })).toEqual({
      headers: ["command", "description"],
      rows: [
        ["cleanworkdir", "Clean all content of all output remote folders."],
        ["gotocomputer", "Open a shell in the remote folder on the calcjob."],
        ["inputcat", ""],
      ],
      footer: "",
    });
  });

  test("returns no rows without a commands section", () => {
    expect(parseSubcommandHelp({ text: "Usage: verdi calcjob" }).rows).toEqual([]);
  });
});
