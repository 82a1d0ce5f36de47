export {
  DEFAULT_ENV_PREFIX,
  ENV_PROFILE_NAME,
  EnvProfileSource,
  type EnvProfileSourceOptions,
} from "./adapters/env/env-profile-source"
export { MemoryProfileSource } from "./adapters/memory/memory-profile-source"
export {
  YamlFileSource,
  type YamlFileSourceDeps,
  type YamlFileSourceOptions,
} from "./adapters/yaml/yaml-file-source"
export {
  type CreateProfileSourceOptions,
  createProfileManager,
  createProfileSource,
  type ProfileSourceKind,
  profileSourceKinds,
} from "./core/create-manager"
export {
  ConfigError,
  type ConfigErrorCode,
  isConfigError,
  type ProfileOperation,
} from "./core/errors"
export { isErrnoException, isFileMissing } from "./core/fs-errors"
export { envReferenceName, resolveEnvReference } from "./core/interpolate"
export {
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  defaultConfigPath,
  defaultDotenvPath,
} from "./core/paths"
export { ProfileManager, type ProfileManagerDeps } from "./core/profile-manager"
export { ReadOnlyProfileManager } from "./core/read-only-profile-manager"
export {
  type ConfigurationDocument,
  configurationDocumentSchema,
  emptyDocument,
  type Profile,
  type ProfileParams,
  setEntry,
} from "./model/document"
export type {
  IProfileManager,
  NewProfileInput,
  ProfileSummary,
  ProfileUpdate,
  ResolvedProfile,
} from "./ports/profile-manager"
export type {
  ProfileSource,
  ReadableProfileSource,
  WritableProfileSource,
} from "./ports/source"
