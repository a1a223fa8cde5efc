import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  buildTemplateConfig,
  DEFAULT_CONFIG,
  ensureConfigFile,
  loadConfig,
  parseConfigFile,
} from "../config.js";
import { setRuntimeOverrides } from "../runtime/overrides.js";

const makeConfigPath = async (): Promise<string> => {
  const root = await mkdtemp(join(tmpdir(), "verdi-board-config-"));
  return join(root, "config.yaml");
};

describe("loadConfig", () => {
  beforeEach(() => {
    setRuntimeOverrides({ overrides: {} });
  });

  test("returns defaults when no file", async () => {
    const config = await loadConfig({ configPath: await makeConfigPath() });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.autoRefreshInterval).toBe(10);
    expect(config.leftPanelWidthPercent).toBe(40);
    expect(config.resultsPanelHeightPercent).toBe(80);
    expect(config.focusedPanelHeightPercent).toBe(50);
    expect(config.initialFocusPanel).toBe(0);
    expect(config.verdiCommand).toBe("verdi");
  });

  test("writes defaults when missing file", async () => {
    const root = await mkdtemp(join(tmpdir(), "verdi-board-config-"));
    const configPath = join(root, "nested", "config.yaml");
    await ensureConfigFile({ configPath });
    const raw = await readFile(configPath, "utf-8");
    expect(raw).toContain("# default: 10. Seconds between auto-refresh passes");
    expect(raw).toContain("autoRefreshInterval: default");
    expect(raw).toContain("autoRefreshOnStartup: default");
    expect(raw).toContain("leftPanelWidthPercent: default");
    expect(raw).toContain("resultsPanelHeightPercent: default");
    expect(raw).toContain("focusedPanelHeightPercent: default");
    expect(raw).toContain("initialFocusPanel: default");
    expect(raw).toContain("showWelcomeMessage: default");
    expect(raw).toContain("verdiCommand: default");
    expect(raw).toContain("commandTimeoutMs: default");
  });

  test("fills missing keys with defaults and keeps set ones", async () => {
    const configPath = await makeConfigPath();
    await writeFile(configPath, "autoRefreshInterval: 5\nverdiCommand: /opt/bin/verdi -p test\n", "utf-8");
    await ensureConfigFile({ configPath });
    const raw = await readFile(configPath, "utf-8");
    expect(raw).toContain("autoRefreshInterval: 5\n");
    expect(raw).toContain('verdiCommand: "/opt/bin/verdi -p test"');
    expect(raw).toContain("leftPanelWidthPercent: default");

    const config = await loadConfig({ configPath });
    expect(config.autoRefreshInterval).toBe(5);
    expect(config.verdiCommand).toBe("/opt/bin/verdi -p test");
    expect(config.leftPanelWidthPercent).toBe(40);
  });

  test("rewriting the template is stable", async () => {
    const configPath = await makeConfigPath();
    await writeFile(configPath, "initialFocusPanel: 3\n", "utf-8");
    await ensureConfigFile({ configPath });
    const first = await readFile(configPath, "utf-8");
    await ensureConfigFile({ configPath });
    const second = await readFile(configPath, "utf-8");
    expect(second).toBe(first);
    expect(second).toContain("initialFocusPanel: 3\n");
  });

  test("invalid values fall back to defaults", async () => {
    const configPath = await makeConfigPath();
    await writeFile(
      configPath,
      'leftPanelWidthPercent: 150\ninitialFocusPanel: 2.5\nautoRefreshOnStartup: maybe\nverdiCommand: "  "\ncommandTimeoutMs: -5\n',
      "utf-8",
    );
    const config = await loadConfig({ configPath });
    expect(config.leftPanelWidthPercent).toBe(40);
    expect(config.initialFocusPanel).toBe(0);
    expect(config.autoRefreshOnStartup).toBe(true);
    expect(config.verdiCommand).toBe("verdi");
    expect(config.commandTimeoutMs).toBe(60_000);
  });

  test("accepts fractional and non-positive intervals", async () => {
    const configPath = await makeConfigPath();
    await writeFile(configPath, "autoRefreshInterval: 0.5\n", "utf-8");
    expect((await loadConfig({ configPath })).autoRefreshInterval).toBe(0.5);
    await writeFile(configPath, 'autoRefreshInterval: "-1"\n', "utf-8");
    expect((await loadConfig({ configPath })).autoRefreshInterval).toBe(-1);
  });

  test("reads the snake_case interval key", async () => {
    const configPath = await makeConfigPath();
    await writeFile(configPath, "auto_refresh_interval: 3\n", "utf-8");
    expect((await loadConfig({ configPath })).autoRefreshInterval).toBe(3);
  });

  test("parses string numbers and booleans", async () => {
    const configPath = await makeConfigPath();
    await writeFile(configPath, 'focusedPanelHeightPercent: "60"\nshowWelcomeMessage: "false"\n', "utf-8");
    const config = await loadConfig({ configPath });
    expect(config.focusedPanelHeightPercent).toBe(60);
    expect(config.showWelcomeMessage).toBe(false);
  });

  test("treats default sentinel as default values", async () => {
    const configPath = await makeConfigPath();
    await writeFile(configPath, "autoRefreshInterval: default\nverdiCommand: DEFAULT\n", "utf-8");
    const config = await loadConfig({ configPath });
    expect(config.autoRefreshInterval).toBe(10);
    expect(config.verdiCommand).toBe("verdi");
  });

  test("ignores a file that is not a mapping", async () => {
    const configPath = await makeConfigPath();
    await writeFile(configPath, "- 1\n- 2\n", "utf-8");
    expect(await loadConfig({ configPath })).toEqual(DEFAULT_CONFIG);
  });

  test("runtime overrides win over the file", async () => {
    const configPath = await makeConfigPath();
    await writeFile(configPath, "autoRefreshInterval: 5\ninitialFocusPanel: 1\n", "utf-8");
    setRuntimeOverrides({
      overrides: { autoRefreshInterval: 2, initialFocusPanel: 3, autoRefreshOnStartup: false },
    });
    const config = await loadConfig({ configPath });
    expect(config.autoRefreshInterval).toBe(2);
    expect(config.initialFocusPanel).toBe(3);
    expect(config.autoRefreshOnStartup).toBe(false);
    expect(config.verdiCommand).toBe("verdi");
  });
});

describe("buildTemplateConfig", () => {
  test("keeps defaults as sentinel", () => {
    const template = buildTemplateConfig({
      parsed: parseConfigFile({ raw: "autoRefreshInterval: 10\nleftPanelWidthPercent: 30\n" }),
    });
    expect(template.autoRefreshInterval).toBe("default");
    expect(template.leftPanelWidthPercent).toBe(30);
    expect(template.verdiCommand).toBe("default");
  });

  test("parseConfigFile returns null for blank input", () => {
    expect(parseConfigFile({ raw: "  \n" })).toBeNull();
  });
});
