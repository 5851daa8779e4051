/**
 * Handoff to the process supervisor.
 *
 * Node.js cannot execve() itself, so the supervisor runs as the only child of
 * the orchestrator: stdio and environment are inherited, termination signals
 * are forwarded, and the orchestrator exits with the supervisor's status.
 */
import * as child_process from "node:child_process";
import * as os from "node:os";
import type { SupervisorConfig } from "../config/types.js";

export interface HandoffPlan {
    command: string;
    args: string[];
}

export interface SupervisorExit {
    /** Exit status the orchestrator should report */
    code: number;
    /** Signal that killed the supervisor, if any */
    signal: NodeJS.Signals | null;
}

/** The terminal action of a startup. Never returns. */
export type Handoff = (plan: HandoffPlan) => Promise<never>;

/** Signals a container runtime or operator sends to PID 1 */
export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = [
    "SIGTERM",
    "SIGINT",
    "SIGHUP",
    "SIGQUIT",
    "SIGUSR1",
    "SIGUSR2",
];

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(os.constants.signals));

export function supervisorPlan(supervisor: SupervisorConfig): HandoffPlan {
    return { command: supervisor.command, args: ["-c", supervisor.configPath] };
}

/**
 * Shell convention: a process killed by signal N reports 128 + N.
 */
export function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
    if (code !== null) {
        return code;
    }
    const signalNumber = signal !== null ? SIGNAL_NUMBERS.get(signal) : undefined;
    return signalNumber !== undefined ? 128 + signalNumber : 1;
}

export interface RunSupervisorOptions {
    env?: NodeJS.ProcessEnv;
    /** Where forwarded signals are received (defaults to the current process) */
    signalSource?: NodeJS.EventEmitter;
}

/**
 * Start the supervisor and resolve once it exits.
 */
export function runSupervisor(plan: HandoffPlan, options: RunSupervisorOptions = {}): Promise<SupervisorExit> {
    const source: NodeJS.EventEmitter = options.signalSource ?? process;

    return new Promise<SupervisorExit>((resolve, reject) => {
        const child = child_process.spawn(plan.command, plan.args, {
            stdio: "inherit",
            env: options.env ?? process.env,
        });

        const forwarders = FORWARDED_SIGNALS.map((signal) => {
            const forward = (): void => {
                child.kill(signal);
            };
            source.on(signal, forward);
            return { signal, forward };
        });

        const detach = (): void => {
            for (const { signal, forward } of forwarders) {
                source.removeListener(signal, forward);
            }
        };

        child.once("error", (err) => {
            detach();
            reject(new Error(`Failed to start supervisor ${plan.command}: ${err.message}`));
        });

        child.once("exit", (code, signal) => {
            detach();
            resolve({ code: exitCodeFor(code, signal), signal });
        });
    });
}

/**
 * Hand the container over to the supervisor and exit with its status.
 */
export const handOffToSupervisor: Handoff = async (plan) => {
    const exit = await runSupervisor(plan);
    process.exit(exit.code);
};
