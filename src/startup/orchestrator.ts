import type { AxiosInstance } from "axios";
import type { BootstrapConfig } from "../config/types.js";
import { handOffToSupervisor, supervisorPlan, type Handoff, type HandoffPlan } from "../runtime/handoff.js";
import type { Logger } from "../runtime/logger.js";
import { StepError, errorMessage, type StepName } from "./errors.js";
import { fetchProvisioningScript, runProvisioningScript } from "./provisioning.js";
import { provisionSshKey } from "./ssh-keys.js";
import { ensureWorkspace } from "./workspace.js";

export interface StartupOptions {
    logger: Logger;
    /** Terminal action (defaults to the supervisor handoff) */
    handoff?: Handoff;
    /** HTTP client for the provisioning fetch */
    http?: AxiosInstance;
    /** Environment the provisioning script runs with */
    env?: NodeJS.ProcessEnv;
}

export interface PlannedStep {
    step: StepName;
    action: "run" | "skip";
    detail: string;
}

export interface StartupPlan {
    steps: PlannedStep[];
    handoff: HandoffPlan;
}

/**
 * Describe what a startup with this configuration would do, without doing it.
 */
export function planStartup(config: BootstrapConfig): StartupPlan {
    const handoff = supervisorPlan(config.supervisor);
    return {
        steps: [
            config.sshPublicKey !== undefined
                ? { step: "ssh-keys", action: "run", detail: `append to ${config.authorizedKeysPath}` }
                : { step: "ssh-keys", action: "skip", detail: "no SSH public key" },
            { step: "workspace", action: "run", detail: `ensure ${config.workspace}` },
            config.provisioning !== undefined
                ? {
                    step: "provisioning",
                    action: "run",
                    detail: `fetch ${config.provisioning.url} and run with ${config.shell}`,
                }
                : { step: "provisioning", action: "skip", detail: "no provisioning script" },
            { step: "handoff", action: "run", detail: [handoff.command, ...handoff.args].join(" ") },
        ],
        handoff,
    };
}

async function step<T>(name: StepName, work: () => T | Promise<T>): Promise<T> {
    try {
        return await work();
    } catch (err) {
        throw new StepError(name, errorMessage(err), { cause: err });
    }
}

/**
 * Run the setup steps in order, stopping at the first failure.
 * @returns what to hand off to once the instance is ready
 */
export async function prepareInstance(config: BootstrapConfig, options: StartupOptions): Promise<HandoffPlan> {
    const { logger } = options;

    const sshResult = await step("ssh-keys", () =>
        provisionSshKey(config.sshPublicKey, config.authorizedKeysPath),
    );
    if (sshResult.status === "configured") {
        logger.info(
            `SSH key configured (${sshResult.appended.length} added, ` +
            `${sshResult.alreadyPresent.length} already present)`,
        );
    } else {
        logger.info("No SSH public key set, skipping");
    }

    const created = await step("workspace", () => ensureWorkspace(config.workspace));
    logger.info(`Workspace ${created ? "created" : "ready"}: ${config.workspace}`);

    const provisioning = config.provisioning;
    if (provisioning !== undefined) {
        logger.info(`Running provisioning script from ${provisioning.url}...`);
        await step("provisioning", async () => {
            const script = await fetchProvisioningScript(provisioning, { http: options.http });
            logger.info(`Fetched ${script.body.length} bytes (sha256 ${script.sha256})`);
            await runProvisioningScript(script, {
                shell: config.shell,
                cwd: config.workspace,
                env: options.env,
            });
        });
        logger.info("Provisioning script completed");
    }

    return supervisorPlan(config.supervisor);
}

/**
 * Bring the instance up and hand the process over to the supervisor.
 * Never resolves: the real handoff exits with the supervisor's status.
 */
export async function runStartup(config: BootstrapConfig, options: StartupOptions): Promise<never> {
    const plan = await prepareInstance(config, options);
    const handoff = options.handoff ?? handOffToSupervisor;

    options.logger.info(`Starting supervisor: ${[plan.command, ...plan.args].join(" ")}`);
    try {
        return await handoff(plan);
    } catch (err) {
        if (err instanceof StepError) throw err;
        throw new StepError("handoff", errorMessage(err), { cause: err });
    }
}
