import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export const FIXTURES = join(dirname(fileURLToPath(import.meta.url)), 'fixtures');

export async function readFixture(name: string): Promise<string> {
    return readFile(join(FIXTURES, name), 'utf-8');
}

/**
 * Temporary workspace with a config file. Remove with cleanup().
 */
export async function createTempWorkspace(configYaml = ''): Promise<{ root: string; cleanup: () => Promise<void> }> {
    const root = await mkdtemp(join(tmpdir(), 'cash-recon-'));
    await writeWorkspaceFile(root, 'config/recon.yaml', configYaml);
    return {
        root,
        cleanup: () => rm(root, { recursive: true, force: true }),
    };
}

export async function writeWorkspaceFile(root: string, relativePath: string, content: string): Promise<string> {
    const path = join(root, relativePath);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
    return path;
}
