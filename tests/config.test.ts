import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { fileURLToPath } from "node:url";
import { loadConfig, readConfigFile, resolveConfig, validateConfigFile } from "../src/config/loader.js";

function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), "bootstrap-config-test-"));
}

function cleanupDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

const DIGEST = "ab".repeat(32);

describe("Config Loader", () => {
    describe("resolveConfig", () => {
        it("should use defaults when the environment is empty", () => {
            const config = resolveConfig({});
            expect(config).toEqual({
                authorizedKeysPath: "/root/.ssh/authorized_keys",
                workspace: "/workspace",
                shell: "/bin/bash",
                supervisor: {
                    command: "/usr/bin/supervisord",
                    configPath: "/etc/supervisor/supervisord.conf",
                },
                maxLogSizeMB: 10,
                maxLogFiles: 5,
            });
        });

        it("should read operator values from the environment", () => {
            const config = resolveConfig({
                SSH_PUBLIC_KEY: "ssh-ed25519 AAAAtest user@host\n",
                WORKSPACE: "/data/workspace",
                PROVISIONING_SCRIPT: "https://example.com/provision.sh",
                PROVISIONING_SCRIPT_SHA256: DIGEST.toUpperCase(),
                PROVISIONING_TIMEOUT_MS: "3000",
                BOOTSTRAP_LOG_DIR: "/var/log/bootstrap",
            });
            expect(config.sshPublicKey).toBe("ssh-ed25519 AAAAtest user@host");
            expect(config.workspace).toBe("/data/workspace");
            expect(config.provisioning).toEqual({
                url: "https://example.com/provision.sh",
                sha256: DIGEST,
                timeoutMs: 3000,
            });
            expect(config.logDir).toBe("/var/log/bootstrap");
        });

        it("should treat empty and whitespace-only variables as unset", () => {
            const config = resolveConfig({
                SSH_PUBLIC_KEY: "",
                WORKSPACE: "   ",
                PROVISIONING_SCRIPT: "",
            });
            expect(config.sshPublicKey).toBeUndefined();
            expect(config.workspace).toBe("/workspace");
            expect(config.provisioning).toBeUndefined();
        });

        it("should default the provisioning timeout to two minutes", () => {
            const config = resolveConfig({ PROVISIONING_SCRIPT: "http://example.com/p.sh" });
            expect(config.provisioning?.timeoutMs).toBe(120000);
            expect(config.provisioning?.sha256).toBeUndefined();
        });

        it("should let the environment win over file overrides", () => {
            const config = resolveConfig(
                { WORKSPACE: "/from-env", PROVISIONING_SCRIPT: "http://example.com/p.sh" },
                { workspace: "/from-file", provisioningTimeoutMs: 500, shell: "/bin/sh" },
            );
            expect(config.workspace).toBe("/from-env");
            expect(config.provisioning?.timeoutMs).toBe(500);
            expect(config.shell).toBe("/bin/sh");
        });

        it("should reject a provisioning URL that does not parse", () => {
            expect(() => resolveConfig({ PROVISIONING_SCRIPT: "not a url" })).toThrow(
                "PROVISIONING_SCRIPT is not a valid URL: not a url",
            );
        });

        it("should reject a non-http provisioning URL", () => {
            expect(() => resolveConfig({ PROVISIONING_SCRIPT: "file:///etc/passwd" })).toThrow(
                "PROVISIONING_SCRIPT must be an http(s) URL",
            );
        });

        it("should reject a malformed digest", () => {
            expect(() =>
                resolveConfig({
                    PROVISIONING_SCRIPT: "https://example.com/p.sh",
                    PROVISIONING_SCRIPT_SHA256: "abc123",
                }),
            ).toThrow("PROVISIONING_SCRIPT_SHA256 must be a 64-character hex digest");
        });

        it("should reject a non-positive timeout", () => {
            expect(() =>
                resolveConfig({
                    PROVISIONING_SCRIPT: "https://example.com/p.sh",
                    PROVISIONING_TIMEOUT_MS: "0",
                }),
            ).toThrow("PROVISIONING_TIMEOUT_MS must be a positive integer");
        });
    });

    describe("validateConfigFile", () => {
        it("should accept an empty file", () => {
            expect(validateConfigFile(null)).toEqual({});
        });

        it("should reject non-object config", () => {
            expect(() => validateConfigFile("string")).toThrow("must be a YAML object");
            expect(() => validateConfigFile(["a"])).toThrow("must be a YAML object");
        });

        it("should trim string values", () => {
            expect(validateConfigFile({ supervisorConfigPath: " /etc/sv.conf " })).toEqual({
                supervisorConfigPath: "/etc/sv.conf",
            });
        });

        it("should reject an empty workspace", () => {
            expect(() => validateConfigFile({ workspace: "" })).toThrow(
                "workspace must be a non-empty string",
            );
        });

        it("should reject non-integer maxLogFiles", () => {
            expect(() => validateConfigFile({ maxLogFiles: 2.5 })).toThrow(
                "maxLogFiles must be a positive integer",
            );
        });

        it("should reject non-positive maxLogSizeMB", () => {
            expect(() => validateConfigFile({ maxLogSizeMB: 0 })).toThrow(
                "maxLogSizeMB must be a positive number",
            );
        });
    });

    describe("loadConfig", () => {
        let tempDir: string;

        beforeEach(() => {
            tempDir = createTempDir();
        });

        afterEach(() => {
            cleanupDir(tempDir);
        });

        it("should read overrides from BOOTSTRAP_CONFIG", () => {
            const file = path.join(tempDir, "bootstrap.yml");
            fs.writeFileSync(
                file,
                ["supervisorCommand: /usr/local/bin/supervisord", "maxLogFiles: 2", ""].join("\n"),
            );

            const config = loadConfig({ BOOTSTRAP_CONFIG: file });
            expect(config.supervisor.command).toBe("/usr/local/bin/supervisord");
            expect(config.maxLogFiles).toBe(2);
        });

        it("should prefer an explicit file over BOOTSTRAP_CONFIG", () => {
            const file = path.join(tempDir, "explicit.yml");
            fs.writeFileSync(file, "shell: /bin/sh\n");

            const config = loadConfig({ BOOTSTRAP_CONFIG: path.join(tempDir, "missing.yml") }, file);
            expect(config.shell).toBe("/bin/sh");
        });

        it("should accept the shipped example file", () => {
            const example = fileURLToPath(new URL("../bootstrap.example.yml", import.meta.url));
            expect(readConfigFile(example)).toEqual({});
        });

        it("should throw if the named file does not exist", () => {
            const missing = path.join(tempDir, "missing.yml");
            expect(() => readConfigFile(missing)).toThrow(`Config file not found: ${missing}`);
        });
    });
});
