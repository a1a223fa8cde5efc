import { homedir } from "node:os";
import { join } from "node:path";
import { APP_NAME } from "./constants.js";

export interface BoardPaths {
  configDir: string;
  configPath: string;
  eventsLog: string;
}

export const getDefaultConfigDir = ({
  env = process.env,
}: {
  env?: NodeJS.ProcessEnv;
} = {}): string => {
  const override = env.VERDI_BOARD_CONFIG_DIR?.trim();
  if (override && override.length > 0) {
    return override;
  }
  return join(homedir(), ".config", APP_NAME);
};

export const getBoardPaths = ({ configDir }: { configDir: string }): BoardPaths => ({
  configDir,
  configPath: join(configDir, "config.yaml"),
  eventsLog: join(configDir, "events.log"),
});
