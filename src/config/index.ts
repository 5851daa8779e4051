export { loadConfig, readConfigFile, resolveConfig, validateConfigFile } from "./loader.js";
export type { ConfigFileOverrides } from "./loader.js";
export type { BootstrapConfig, ProvisioningConfig, SupervisorConfig, Env } from "./types.js";
export { CONFIG_DEFAULTS, ENV_KEYS } from "./types.js";
