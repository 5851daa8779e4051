import * as fs from "node:fs";
import * as path from "node:path";

export type SshKeyResult =
    | { status: "skipped" }
    | { status: "configured"; appended: string[]; alreadyPresent: string[] };

function splitLines(content: string): string[] {
    return content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line !== "");
}

/**
 * Authorize one or more public keys (one per line) for the account owning
 * `authorizedKeysPath`. Existing entries are kept; keys already listed are not
 * appended twice. The file always ends up with mode 600.
 */
export function provisionSshKey(publicKey: string | undefined, authorizedKeysPath: string): SshKeyResult {
    const keys = publicKey === undefined ? [] : splitLines(publicKey);
    if (keys.length === 0) {
        return { status: "skipped" };
    }

    fs.mkdirSync(path.dirname(authorizedKeysPath), { recursive: true, mode: 0o700 });

    const existing = fs.existsSync(authorizedKeysPath)
        ? fs.readFileSync(authorizedKeysPath, "utf-8")
        : "";
    const present = new Set(splitLines(existing));

    const appended: string[] = [];
    const alreadyPresent: string[] = [];
    for (const key of keys) {
        if (present.has(key)) {
            alreadyPresent.push(key);
        } else {
            present.add(key);
            appended.push(key);
        }
    }

    if (appended.length > 0) {
        const separator = existing !== "" && !existing.endsWith("\n") ? "\n" : "";
        fs.appendFileSync(authorizedKeysPath, `${separator}${appended.join("\n")}\n`, {
            encoding: "utf-8",
            mode: 0o600,
        });
    }

    // appendFileSync's mode only applies when the file is created
    fs.chmodSync(authorizedKeysPath, 0o600);

    return { status: "configured", appended, alreadyPresent };
}
