// src/core/config/index.ts
// Configuration system exports

export {
  type ScriptsConfig,
  type ReloadConfig,
  type VmConfig,
  type SandboxConfig,
  type SandboxConfigInput,
  type ConfigValidation,
  DEFAULT_SCRIPTS_CONFIG,
  DEFAULT_RELOAD_CONFIG,
  DEFAULT_VM_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
