export type StepName = "ssh-keys" | "workspace" | "provisioning" | "handoff";

/**
 * A startup step failed. Startup stops at the first one.
 */
export class StepError extends Error {
    readonly step: StepName;

    constructor(step: StepName, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "StepError";
        this.step = step;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
