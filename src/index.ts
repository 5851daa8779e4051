export { loadConfig, readConfigFile, resolveConfig } from "./config/index.js";
export type { BootstrapConfig, ProvisioningConfig, SupervisorConfig } from "./config/index.js";
export { planStartup, prepareInstance, runStartup, StepError } from "./startup/index.js";
export type { PlannedStep, StartupOptions, StartupPlan, StepName } from "./startup/index.js";
export { Logger, handOffToSupervisor, runSupervisor } from "./runtime/index.js";
export type { Handoff, HandoffPlan, SupervisorExit } from "./runtime/index.js";
