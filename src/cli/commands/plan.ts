import { loadConfig } from "../../config/loader.js";
import { errorMessage } from "../../startup/errors.js";
import { planStartup, type StartupPlan } from "../../startup/orchestrator.js";

interface PlanOptions {
    config?: string;
}

/**
 * Render a startup plan, one step per line.
 */
export function formatPlan(plan: StartupPlan): string {
    return plan.steps
        .map((s) => `${`[${s.action}]`.padEnd(6)} ${s.step.padEnd(12)} ${s.detail}`)
        .join("\n");
}

export function planCommand(options: PlanOptions): void {
    try {
        const config = loadConfig(process.env, options.config);
        console.log("=== Startup Plan ===\n");
        console.log(formatPlan(planStartup(config)));
    } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
    }
}
