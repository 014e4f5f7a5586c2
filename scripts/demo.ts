/**
 * Scripted walk-through of the belief revision operations.
 *
 * Run with: npx tsx scripts/demo.ts
 */
import chalk from 'chalk';
import { BeliefShell } from '../src/shell/shell.js';

interface Scenario {
    title: string;
    note?: string;
    commands: string[];
}

const SCENARIOS: Scenario[] = [
    {
        title: 'Belief base representation',
        commands: [
            'expand p 10',
            'expand q 80',
            'expand p >> q 60',
            'show',
            'update q => ~q 40',
            'remove ~q',
            'show',
            'entrenchment p',
            'cnf p >> r',
        ],
    },
    {
        title: 'Logical entailment (resolution)',
        commands: [
            'expand p',
            'expand p >> q',
            'prove q',
            'entails r',
        ],
    },
    {
        title: 'Contraction',
        commands: [
            'expand p 20',
            'expand p >> q 40',
            'expand q 60',
            'show',
            'contract q',
            'show',
        ],
    },
    {
        title: 'Expansion',
        note: 'Expansion does not check for consistency.',
        commands: [
            'expand p',
            'expand ~p',
            'show',
            'consistent',
        ],
    },
    {
        title: 'Full revision (contraction + expansion)',
        commands: [
            'expand p 30',
            'expand p >> q 50',
            'show',
            'revise ~q 40',
            'show',
            'model',
        ],
    },
];

function line(title: string): void {
    console.log('\n' + '='.repeat(50));
    console.log(chalk.bold.cyan(title));
    console.log('='.repeat(50));
}

for (const scenario of SCENARIOS) {
    line(scenario.title);
    const shell = new BeliefShell({ color: true });
    for (const command of scenario.commands) {
        console.log(chalk.dim(`> ${command}`));
        for (const out of shell.execute(command).output) {
            console.log(out);
        }
    }
    if (scenario.note) {
        console.log(chalk.yellow(`Note: ${scenario.note}`));
    }
}
