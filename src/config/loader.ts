import * as fs from "node:fs";
import * as yaml from "yaml";
import type { BootstrapConfig, Env, ProvisioningConfig } from "./types.js";
import { CONFIG_DEFAULTS, ENV_KEYS } from "./types.js";

/**
 * Values an overrides file may set. Operator-facing values (the SSH key and
 * the provisioning URL) come from the environment only.
 */
export interface ConfigFileOverrides {
    authorizedKeysPath?: string;
    workspace?: string;
    shell?: string;
    supervisorCommand?: string;
    supervisorConfigPath?: string;
    provisioningTimeoutMs?: number;
    logDir?: string;
    maxLogSizeMB?: number;
    maxLogFiles?: number;
}

const STRING_KEYS = [
    "authorizedKeysPath",
    "workspace",
    "shell",
    "supervisorCommand",
    "supervisorConfigPath",
    "logDir",
] as const;

const SHA256_PATTERN = /^[a-f0-9]{64}$/i;

/**
 * Read an environment variable, treating unset, empty and whitespace-only
 * values alike.
 */
function readEnv(env: Env, key: string): string | undefined {
    const value = env[key]?.trim();
    return value ? value : undefined;
}

function requirePositiveInteger(value: number, label: string): number {
    if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`${label} must be a positive integer`);
    }
    return value;
}

/**
 * Validate a parsed overrides file. An empty file yields no overrides.
 */
export function validateConfigFile(config: unknown): ConfigFileOverrides {
    if (config === null || config === undefined) {
        return {};
    }
    if (typeof config !== "object" || Array.isArray(config)) {
        throw new Error("Configuration must be a YAML object");
    }

    const raw = config as Record<string, unknown>;
    const overrides: ConfigFileOverrides = {};

    for (const key of STRING_KEYS) {
        const value = raw[key];
        if (value === undefined) continue;
        if (typeof value !== "string" || value.trim() === "") {
            throw new Error(`${key} must be a non-empty string`);
        }
        overrides[key] = value.trim();
    }

    if (raw.provisioningTimeoutMs !== undefined) {
        if (typeof raw.provisioningTimeoutMs !== "number") {
            throw new Error("provisioningTimeoutMs must be a positive integer");
        }
        overrides.provisioningTimeoutMs = requirePositiveInteger(
            raw.provisioningTimeoutMs,
            "provisioningTimeoutMs",
        );
    }

    if (raw.maxLogSizeMB !== undefined) {
        if (typeof raw.maxLogSizeMB !== "number" || raw.maxLogSizeMB <= 0) {
            throw new Error("maxLogSizeMB must be a positive number");
        }
        overrides.maxLogSizeMB = raw.maxLogSizeMB;
    }

    if (raw.maxLogFiles !== undefined) {
        if (typeof raw.maxLogFiles !== "number") {
            throw new Error("maxLogFiles must be a positive integer");
        }
        overrides.maxLogFiles = requirePositiveInteger(raw.maxLogFiles, "maxLogFiles");
    }

    return overrides;
}

/**
 * Read and validate a YAML overrides file.
 */
export function readConfigFile(filePath: string): ConfigFileOverrides {
    if (!fs.existsSync(filePath)) {
        throw new Error(`Config file not found: ${filePath}`);
    }

    const raw = fs.readFileSync(filePath, "utf-8");
    return validateConfigFile(yaml.parse(raw));
}

function resolveProvisioning(env: Env, overrides: ConfigFileOverrides): ProvisioningConfig | undefined {
    const url = readEnv(env, ENV_KEYS.provisioningScript);
    if (url === undefined) {
        return undefined;
    }

    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        throw new Error(`${ENV_KEYS.provisioningScript} is not a valid URL: ${url}`);
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
        throw new Error(`${ENV_KEYS.provisioningScript} must be an http(s) URL: ${url}`);
    }

    const provisioning: ProvisioningConfig = {
        url,
        timeoutMs: overrides.provisioningTimeoutMs ?? CONFIG_DEFAULTS.provisioningTimeoutMs,
    };

    const timeout = readEnv(env, ENV_KEYS.provisioningTimeoutMs);
    if (timeout !== undefined) {
        provisioning.timeoutMs = requirePositiveInteger(Number(timeout), ENV_KEYS.provisioningTimeoutMs);
    }

    const sha256 = readEnv(env, ENV_KEYS.provisioningSha256);
    if (sha256 !== undefined) {
        if (!SHA256_PATTERN.test(sha256)) {
            throw new Error(`${ENV_KEYS.provisioningSha256} must be a 64-character hex digest`);
        }
        provisioning.sha256 = sha256.toLowerCase();
    }

    return provisioning;
}

/**
 * Build the startup configuration: defaults, then file overrides, then the
 * environment.
 */
export function resolveConfig(env: Env, overrides: ConfigFileOverrides = {}): BootstrapConfig {
    const config: BootstrapConfig = {
        authorizedKeysPath: overrides.authorizedKeysPath ?? CONFIG_DEFAULTS.authorizedKeysPath,
        workspace:
            readEnv(env, ENV_KEYS.workspace) ?? overrides.workspace ?? CONFIG_DEFAULTS.workspace,
        shell: overrides.shell ?? CONFIG_DEFAULTS.shell,
        supervisor: {
            command: overrides.supervisorCommand ?? CONFIG_DEFAULTS.supervisorCommand,
            configPath: overrides.supervisorConfigPath ?? CONFIG_DEFAULTS.supervisorConfigPath,
        },
        maxLogSizeMB: overrides.maxLogSizeMB ?? CONFIG_DEFAULTS.maxLogSizeMB,
        maxLogFiles: overrides.maxLogFiles ?? CONFIG_DEFAULTS.maxLogFiles,
    };

    const sshPublicKey = readEnv(env, ENV_KEYS.sshPublicKey);
    if (sshPublicKey !== undefined) {
        config.sshPublicKey = sshPublicKey;
    }

    const provisioning = resolveProvisioning(env, overrides);
    if (provisioning !== undefined) {
        config.provisioning = provisioning;
    }

    const logDir = readEnv(env, ENV_KEYS.logDir) ?? overrides.logDir;
    if (logDir !== undefined) {
        config.logDir = logDir;
    }

    return config;
}

/**
 * Load the startup configuration.
 * @param configFile YAML overrides file (defaults to $BOOTSTRAP_CONFIG, if set)
 */
export function loadConfig(env: Env = process.env, configFile?: string): BootstrapConfig {
    const filePath = configFile ?? readEnv(env, ENV_KEYS.configFile);
    const overrides = filePath !== undefined ? readConfigFile(filePath) : {};
    return resolveConfig(env, overrides);
}
