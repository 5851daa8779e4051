export { planStartup, prepareInstance, runStartup } from "./orchestrator.js";
export type { PlannedStep, StartupOptions, StartupPlan } from "./orchestrator.js";
export { StepError, type StepName } from "./errors.js";
export { provisionSshKey, type SshKeyResult } from "./ssh-keys.js";
export { ensureWorkspace } from "./workspace.js";
export {
    fetchProvisioningScript,
    runProvisioningScript,
    type ProvisioningScript,
} from "./provisioning.js";
