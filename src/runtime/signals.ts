import { exitCodeFor } from "./handoff.js";
import type { Logger } from "./logger.js";

/** Signals that end startup before the supervisor takes over */
export const STARTUP_SIGNALS: readonly NodeJS.Signals[] = ["SIGTERM", "SIGINT", "SIGHUP", "SIGQUIT"];

export interface ExitOnSignalsOptions {
    signalSource?: NodeJS.EventEmitter;
    exit?: (code: number) => void;
}

/**
 * As PID 1, Node ignores SIGTERM unless it has a handler. Until the handoff,
 * a termination signal ends startup with 128 + N; the container's exit takes
 * any running provisioning script with it.
 * @returns a function that removes the handlers
 */
export function exitOnSignalsUntilHandoff(logger: Logger, options: ExitOnSignalsOptions = {}): () => void {
    const source: NodeJS.EventEmitter = options.signalSource ?? process;
    const exit = options.exit ?? ((code: number) => process.exit(code));

    const handlers = STARTUP_SIGNALS.map((signal) => {
        const handler = (): void => {
            logger.warn(`${signal} received during startup. Exiting...`);
            exit(exitCodeFor(null, signal));
        };
        source.on(signal, handler);
        return { signal, handler };
    });

    return () => {
        for (const { signal, handler } of handlers) {
            source.removeListener(signal, handler);
        }
    };
}
