/**
 * Cash Recon CLI
 *
 * The CLI owns all file I/O. The core receives text and returns rows,
 * warnings and match results; it never touches the file system or console.
 */

import { parseArgs } from 'node:util';
import { processMonth } from './commands/process.js';
import { parseFile } from './commands/parse.js';
import { error } from './utils/console.js';

export const USAGE = `Cash Recon CLI

Usage:
  cash-recon process <YYYY-MM> [--dry-run] [--force] [--yes] [--workspace <dir>]
  cash-recon parse <file.bai> [--balances | --details]
  cash-recon help

Commands:
  process   Decode the month's BAI2 files, match credits to open invoices
            and write outputs/<YYYY-MM>/
  parse     Decode one BAI2 file and print CSV to stdout`;

/**
 * Dispatches a command line (without the node and script arguments).
 *
 * @returns Process exit code
 */
export async function run(argv: string[]): Promise<number> {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            'dry-run': { type: 'boolean', default: false },
            force: { type: 'boolean', default: false },
            yes: { type: 'boolean', short: 'y', default: false },
            workspace: { type: 'string' },
            balances: { type: 'boolean', default: false },
            details: { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false },
        },
    });

    const [command, target] = positionals;

    if (!command || command === 'help' || values.help === true) {
        console.log(USAGE);
        return 0;
    }

    switch (command) {
        case 'process':
            if (!target) {
                error('Error: Missing month. Usage: cash-recon process <YYYY-MM>');
                return 1;
            }
            return processMonth(target, {
                dryRun: values['dry-run'] ?? false,
                force: values.force ?? false,
                yes: values.yes ?? false,
                workspace: values.workspace,
            });

        case 'parse':
            if (!target) {
                error('Error: Missing file. Usage: cash-recon parse <file.bai>');
                return 1;
            }
            return parseFile(target, { balances: values.balances ?? false, details: values.details ?? false });

        default:
            error(`Error: Unknown command "${command}".`, '', USAGE);
            return 1;
    }
}
