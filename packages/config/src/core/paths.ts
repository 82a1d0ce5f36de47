import os from "node:os"
import path from "node:path"

export const CONFIG_DIR_NAME = ".modeldeck"
export const CONFIG_FILE_NAME = "config.yaml"

export function defaultConfigPath(home: string = os.homedir()): string {
  return path.join(home, CONFIG_DIR_NAME, CONFIG_FILE_NAME)
}

export function defaultDotenvPath(home: string = os.homedir()): string {
  return path.join(home, ".env")
}
