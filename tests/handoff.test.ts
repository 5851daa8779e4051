import { describe, it, expect } from "vitest";
import { EventEmitter } from "node:events";
import { exitCodeFor, runSupervisor, supervisorPlan } from "../src/runtime/handoff.js";

describe("Supervisor handoff", () => {
    describe("supervisorPlan", () => {
        it("should pass the configuration file with -c", () => {
            expect(
                supervisorPlan({
                    command: "/usr/bin/supervisord",
                    configPath: "/etc/supervisor/supervisord.conf",
                }),
            ).toEqual({
                command: "/usr/bin/supervisord",
                args: ["-c", "/etc/supervisor/supervisord.conf"],
            });
        });
    });

    describe("exitCodeFor", () => {
        it("should keep a normal exit code", () => {
            expect(exitCodeFor(0, null)).toBe(0);
            expect(exitCodeFor(2, null)).toBe(2);
        });

        it("should map a signal to 128 + its number", () => {
            expect(exitCodeFor(null, "SIGTERM")).toBe(143);
            expect(exitCodeFor(null, "SIGINT")).toBe(130);
            expect(exitCodeFor(null, "SIGKILL")).toBe(137);
        });

        it("should fall back to 1 with neither code nor signal", () => {
            expect(exitCodeFor(null, null)).toBe(1);
        });
    });

    describe("runSupervisor", () => {
        it("should report the supervisor's exit code", async () => {
            const exit = await runSupervisor(
                { command: "/bin/sh", args: ["-c", "exit 4"] },
                { signalSource: new EventEmitter() },
            );
            expect(exit).toEqual({ code: 4, signal: null });
        });

        it("should forward termination signals to the supervisor", async () => {
            const signals = new EventEmitter();
            const running = runSupervisor({ command: "sleep", args: ["30"] }, { signalSource: signals });

            signals.emit("SIGTERM");

            expect(await running).toEqual({ code: 143, signal: "SIGTERM" });
            expect(signals.listenerCount("SIGTERM")).toBe(0);
            expect(signals.listenerCount("SIGHUP")).toBe(0);
        });

        it("should fail when the supervisor cannot be started", async () => {
            const signals = new EventEmitter();
            await expect(
                runSupervisor({ command: "/nonexistent/supervisord", args: [] }, { signalSource: signals }),
            ).rejects.toThrow("Failed to start supervisor /nonexistent/supervisord");
            expect(signals.listenerCount("SIGTERM")).toBe(0);
        });
    });
});
