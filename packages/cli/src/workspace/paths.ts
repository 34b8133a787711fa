import { isAbsolute, join, resolve } from 'node:path';
import type { Workspace } from '../types.js';
import { CONFIG_RELATIVE_PATH } from './detect.js';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    const absRoot = resolve(root);
    const outputs = join(absRoot, 'outputs');

    return {
        root: absRoot,
        imports: join(absRoot, 'imports'),
        outputs,
        archive: join(absRoot, 'archive'),
        configPath: join(absRoot, CONFIG_RELATIVE_PATH),
        runLogPath: join(outputs, 'run_log.json'),
    };
}

export function getImportsPath(workspace: Workspace, month: string): string {
    return join(workspace.imports, month);
}

export function getOutputsPath(workspace: Workspace, month: string): string {
    return join(workspace.outputs, month);
}

export function getArchivePath(workspace: Workspace, month: string): string {
    return join(workspace.archive, month, 'raw');
}

/**
 * Resolve a configured path against the workspace root.
 */
export function resolveWorkspacePath(workspace: Workspace, path: string): string {
    return isAbsolute(path) ? path : join(workspace.root, path);
}
