import { homedir } from "node:os";
import { join } from "node:path";
import { getBoardPaths, getDefaultConfigDir } from "../paths.js";

describe("getBoardPaths", () => {
  test("builds config and log paths", () => {
    const paths = getBoardPaths({ configDir: "/tmp/board" });
    expect(paths.configDir).toBe("/tmp/board");
    expect(paths.configPath).toBe("/tmp/board/config.yaml");
    expect(paths.eventsLog).toBe("/tmp/board/events.log");
  });
});

describe("getDefaultConfigDir", () => {
  test("prefers the environment override", () => {
    expect(getDefaultConfigDir({ env: { VERDI_BOARD_CONFIG_DIR: " /srv/board " } })).toBe(
      "/srv/board",
    );
  });

  test("falls back to the user config directory", () => {
    expect(getDefaultConfigDir({ env: { VERDI_BOARD_CONFIG_DIR: "" } })).toBe(
      join(homedir(), ".config", "verdi-board"),
    );
  });
});
