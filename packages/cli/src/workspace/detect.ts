import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

export const CONFIG_RELATIVE_PATH = join('config', 'recon.yaml');

/** Environment variable naming the workspace root explicitly. */
export const WORKSPACE_ENV = 'CASH_RECON_WORKSPACE';

function hasConfig(dir: string): boolean {
    return existsSync(join(dir, CONFIG_RELATIVE_PATH));
}

/**
 * Locates the workspace root, the directory holding config/recon.yaml.
 *
 * CASH_RECON_WORKSPACE wins when it points at a workspace; otherwise the
 * search starts at startPath and walks up to the file system root.
 */
export function detectWorkspaceRoot(
    startPath: string = process.cwd(),
    env: NodeJS.ProcessEnv = process.env
): string | null {
    const fromEnv = env[WORKSPACE_ENV];
    if (fromEnv && hasConfig(resolve(fromEnv))) {
        return resolve(fromEnv);
    }

    for (let dir = resolve(startPath); ; dir = dirname(dir)) {
        if (hasConfig(dir)) {
            return dir;
        }
        if (dirname(dir) === dir) {
            return null;
        }
    }
}
