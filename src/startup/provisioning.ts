/**
 * Operator provisioning hook.
 *
 * The script is downloaded completely before anything runs: a non-2xx status,
 * a dropped connection, a timeout, an empty body or a digest mismatch all
 * abort startup. Only then is it written to a private temp file and run with
 * the configured shell.
 */
import * as child_process from "node:child_process";
import * as crypto from "node:crypto";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import axios, { type AxiosInstance, isAxiosError, isCancel } from "axios";
import type { ProvisioningConfig } from "../config/types.js";
import { errorMessage } from "./errors.js";

export interface ProvisioningScript {
    url: string;
    body: Buffer;
    /** SHA-256 of the body (hex) */
    sha256: string;
}

export interface FetchScriptOptions {
    /** HTTP client (defaults to the shared axios instance) */
    http?: AxiosInstance;
}

export async function fetchProvisioningScript(
    provisioning: ProvisioningConfig,
    options: FetchScriptOptions = {},
): Promise<ProvisioningScript> {
    const http = options.http ?? axios;
    const { url, timeoutMs } = provisioning;

    let body: Buffer;
    try {
        const response = await http.get<ArrayBuffer>(url, {
            responseType: "arraybuffer",
            // `timeout` only covers an idle socket; the signal bounds the whole download
            timeout: timeoutMs,
            signal: AbortSignal.timeout(timeoutMs),
            maxRedirects: 5,
            validateStatus: (status) => status >= 200 && status < 300,
        });
        body = Buffer.from(response.data);
    } catch (err) {
        if (isCancel(err)) {
            throw new Error(`Provisioning script fetch timed out after ${timeoutMs}ms: ${url}`, {
                cause: err,
            });
        }
        if (isAxiosError(err)) {
            if (err.response) {
                throw new Error(`Provisioning script fetch failed: HTTP ${err.response.status} from ${url}`, {
                    cause: err,
                });
            }
            if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") {
                throw new Error(`Provisioning script fetch timed out after ${timeoutMs}ms: ${url}`, {
                    cause: err,
                });
            }
        }
        throw new Error(`Provisioning script fetch failed: ${errorMessage(err)}`, { cause: err });
    }

    if (body.length === 0) {
        throw new Error(`Provisioning script is empty: ${url}`);
    }

    const sha256 = crypto.createHash("sha256").update(body).digest("hex");
    if (provisioning.sha256 !== undefined && provisioning.sha256 !== sha256) {
        throw new Error(
            `Provisioning script digest mismatch: expected ${provisioning.sha256}, got ${sha256}`,
        );
    }

    return { url, body, sha256 };
}

export interface RunScriptOptions {
    shell: string;
    cwd: string;
    env?: NodeJS.ProcessEnv;
}

function waitForExit(child: child_process.ChildProcess, shell: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        child.once("error", (err) => {
            reject(new Error(`Failed to start ${shell}: ${err.message}`));
        });
        child.once("exit", (code, signal) => {
            if (signal !== null) {
                reject(new Error(`Provisioning script was killed by ${signal}`));
            } else if (code !== 0) {
                reject(new Error(`Provisioning script exited with code ${code}`));
            } else {
                resolve();
            }
        });
    });
}

/**
 * Run a fetched script in the current environment, inheriting stdio.
 */
export async function runProvisioningScript(
    script: ProvisioningScript,
    options: RunScriptOptions,
): Promise<void> {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "provisioning-"));
    const scriptPath = path.join(tempDir, "provision.sh");

    try {
        fs.writeFileSync(scriptPath, script.body, { mode: 0o700 });
        const child = child_process.spawn(options.shell, [scriptPath], {
            cwd: options.cwd,
            env: options.env ?? process.env,
            stdio: "inherit",
        });
        await waitForExit(child, options.shell);
    } finally {
        fs.rmSync(tempDir, { recursive: true, force: true });
    }
}
