import { loadConfig } from "../../config/loader.js";
import type { BootstrapConfig } from "../../config/types.js";
import { handOffToSupervisor } from "../../runtime/handoff.js";
import { Logger } from "../../runtime/logger.js";
import { exitOnSignalsUntilHandoff } from "../../runtime/signals.js";
import { StepError, errorMessage } from "../../startup/errors.js";
import { runStartup } from "../../startup/orchestrator.js";

interface RunOptions {
    config?: string;
}

/**
 * Log which step failed, then print the bare reason to stderr.
 */
export function reportStartupFailure(err: unknown, logger: Logger | undefined): void {
    const message =
        err instanceof StepError
            ? `Startup failed during ${err.step}: ${err.message}`
            : `Startup failed: ${errorMessage(err)}`;
    logger?.error(message);
    console.error(`Error: ${errorMessage(err)}`);
}

export async function runCommand(options: RunOptions): Promise<void> {
    let config: BootstrapConfig;
    try {
        config = loadConfig(process.env, options.config);
    } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
    }

    let logger: Logger | undefined;
    let detachSignals = (): void => {};
    try {
        logger = new Logger({
            logDir: config.logDir,
            maxLogSizeMB: config.maxLogSizeMB,
            maxLogFiles: config.maxLogFiles,
        });
        detachSignals = exitOnSignalsUntilHandoff(logger);
        logger.info("=== Instance starting ===");
        await runStartup(config, {
            logger,
            handoff: (plan) => {
                detachSignals();
                return handOffToSupervisor(plan);
            },
        });
    } catch (err) {
        detachSignals();
        reportStartupFailure(err, logger);
        process.exit(1);
    }
}
