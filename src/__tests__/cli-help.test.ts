import { getCliHelp } from "../cli-help.js";

describe("cli help", () => {
  test("includes commands and options", () => {
    const help = getCliHelp();
    expect(help).toContain("verdi-board: terminal dashboard for verdi");
    expect(help).toContain("Commands:");
    expect(help).toContain("snapshot");
    expect(help).toContain("--interval <seconds>");
    expect(help).toContain("--no-auto-refresh");
    expect(help).toContain("--help");
  });
});
