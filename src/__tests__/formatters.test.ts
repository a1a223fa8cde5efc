import {
  formatProcessList,
  formatTableOutput,
  formatTrimmed,
  noFormat,
  stripCommandEcho,
} from "../parsing/formatters.js";

describe("stripCommandEcho", () => {
  test("drops a trailing command echo", () => {
    expect(stripCommandEcho({ text: "Label\n-----\nnm\n$ verdi computer list" })).toBe(
      "Label\n-----\nnm",
    );
  });

  test("leaves other text alone", () => {
    expect(stripCommandEcho({ text: "Label\n-----\nnm" })).toBe("Label\n-----\nnm");
  });
});

describe("formatTableOutput", () => {
  test("removes trailing blank lines but keeps leading indentation", () => {
    expect(formatTableOutput({ text: "  PK  Label\n  --  -----\n   1  nm\n\n  \n" })).toBe(
      "  PK  Label\n  --  -----\n   1  nm",
    );
  });

  test("process lists keep their report lines", () => {
    expect(formatProcessList({ text: "PK\n--\n1\n\nTotal results: 1\n" })).toBe(
      "PK\n--\n1\n\nTotal results: 1",
    );
  });
});

describe("formatTrimmed", () => {
  test("trims and strips the echo", () => {
    expect(formatTrimmed({ text: "\n  profile: test\n$ verdi config list" })).toBe("profile: test");
  });
});

describe("noFormat", () => {
  test("returns the input", () => {
    expect(noFormat({ text: "  raw  \n" })).toBe("  raw  \n");
  });
});
