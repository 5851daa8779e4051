/**
 * Where and how the provisioning script is fetched.
 */
export interface ProvisioningConfig {
    /** http(s) URL serving the shell script */
    url: string;
    /** Expected SHA-256 of the script body (lowercase hex) */
    sha256?: string;
    /** Abort the fetch after this many milliseconds */
    timeoutMs: number;
}

/**
 * The process supervisor the orchestrator hands off to.
 */
export interface SupervisorConfig {
    /** Supervisor executable */
    command: string;
    /** Configuration file passed with `-c` */
    configPath: string;
}

/**
 * Everything a single startup needs, resolved once before any step runs.
 */
export interface BootstrapConfig {
    /** Public key line to authorize for root; absent means skip */
    sshPublicKey?: string;
    authorizedKeysPath: string;
    workspace: string;
    /** Absent means no provisioning hook */
    provisioning?: ProvisioningConfig;
    /** Shell used to run the provisioning script */
    shell: string;
    supervisor: SupervisorConfig;
    /** Directory for bootstrap.log; console only when absent */
    logDir?: string;
    maxLogSizeMB: number;
    maxLogFiles: number;
}

/** Default configuration values */
export const CONFIG_DEFAULTS = {
    authorizedKeysPath: "/root/.ssh/authorized_keys",
    workspace: "/workspace",
    shell: "/bin/bash",
    supervisorCommand: "/usr/bin/supervisord",
    supervisorConfigPath: "/etc/supervisor/supervisord.conf",
    provisioningTimeoutMs: 120_000,
    maxLogSizeMB: 10,
    maxLogFiles: 5,
    logFileName: "bootstrap.log",
} as const;

/** Environment variables read at startup */
export const ENV_KEYS = {
    sshPublicKey: "SSH_PUBLIC_KEY",
    workspace: "WORKSPACE",
    provisioningScript: "PROVISIONING_SCRIPT",
    provisioningSha256: "PROVISIONING_SCRIPT_SHA256",
    provisioningTimeoutMs: "PROVISIONING_TIMEOUT_MS",
    configFile: "BOOTSTRAP_CONFIG",
    logDir: "BOOTSTRAP_LOG_DIR",
} as const;

export type Env = Record<string, string | undefined>;
