import { ConfigError, type IProfileManager, type ProfileOperation } from "@modeldeck/config"

/**
 * Fails before any prompt when the active source cannot be written.
 */
export function assertWritable(manager: IProfileManager, operation: ProfileOperation): void {
  if (!manager.source.supportsSave) {
    throw ConfigError.unsupported(operation, manager.source.name)
  }
}

export async function profileExists(manager: IProfileManager, name: string): Promise<boolean> {
  const config = await manager.getConfig()
  return Object.hasOwn(config.profiles, name)
}

export function notFoundMessage(name: string): string {
  return `Profile '${name}' not found.\n`
}
