#!/usr/bin/env node
import 'dotenv/config';
import * as readline from 'readline';
import chalk from 'chalk';
import boxen from 'boxen';
import { loadConfig } from './config.js';
import { BeliefShell } from './shell/shell.js';

const VERSION = '1.0.0';
const HELP = `
Belief Revision Shell v${VERSION}

Usage:
  belief-revision [options]

Options:
  --max-resolutions=<n>  Cap resolution steps per entailment query
  --no-color             Disable coloured output
  --help, -h             Show this help
  --version, -v          Show version

Environment:
  BELIEF_DEFAULT_ENTRENCHMENT  Entrenchment for beliefs added without one (50)
  BELIEF_MAX_RESOLUTIONS       Resolution cap (100000)
  BELIEF_MAX_CLAUSES           Clause cap per formula (10000)
`;

const args = process.argv.slice(2);

function main(): void {
    if (args.includes('--help') || args.includes('-h')) {
        console.log(HELP);
        return;
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(VERSION);
        return;
    }

    const config = loadConfig();
    const limitArg = args.find(a => a.startsWith('--max-resolutions='));
    if (limitArg) {
        const limit = Number(limitArg.split('=')[1]);
        if (!Number.isInteger(limit) || limit < 1) {
            console.error(`Error: Invalid --max-resolutions value '${limitArg.split('=')[1]}'`);
            process.exit(1);
        }
        config.maxResolutions = limit;
    }

    const color = !args.includes('--no-color') && chalk.supportsColor !== false;
    runShell(new BeliefShell({ ...config, color }), color);
}

function runShell(shell: BeliefShell, color: boolean): void {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: '> '
    });

    const banner = `Belief Revision Agent v${VERSION}\nType help to list commands, exit to quit.`;
    console.log(color ? boxen(banner, { padding: 1, borderColor: 'blue' }) : banner);
    rl.prompt();

    rl.on('line', (line) => {
        const result = shell.execute(line);
        for (const out of result.output) {
            console.log(out);
        }
        if (result.exit) {
            rl.close();
            return;
        }
        rl.prompt();
    });

    rl.on('close', () => process.exit(0));
}

try {
    main();
} catch (e) {
    console.error('Error:', e instanceof Error ? e.message : String(e));
    process.exit(1);
}
