import * as fs from "node:fs";

/**
 * Create the workspace directory (and parents) unless it already exists.
 * @returns true if the directory was created
 */
export function ensureWorkspace(workspace: string): boolean {
    if (fs.existsSync(workspace)) {
        if (!fs.statSync(workspace).isDirectory()) {
            throw new Error(`Workspace path exists and is not a directory: ${workspace}`);
        }
        return false;
    }

    fs.mkdirSync(workspace, { recursive: true });
    return true;
}
