/**
 * Interactive belief revision shell.
 *
 * Owns one belief base and turns command lines into calls on it. Output is
 * returned as lines rather than printed so the same shell backs the
 * readline CLI, the demo script and the tests.
 */

import chalk from 'chalk';
import type { Formula } from '../types/formula.js';
import { isBeliefException } from '../types/errors.js';
import { BeliefBase, type BeliefBaseOptions } from '../beliefs/base.js';
import type { Belief } from '../beliefs/belief.js';
import { parse } from '../parser/index.js';
import { formulaToString } from '../logic/printer.js';
import { cnfToString } from '../logic/clause.js';
import { toCNF } from '../logic/normalizer.js';
import { COMMANDS, SYNTAX_HELP } from './help.js';

export interface ShellOptions extends BeliefBaseOptions {
    /** Colour output with ANSI escapes (default: false) */
    color?: boolean;
}

export interface ShellResult {
    output: string[];
    /** Set when the command ends the session */
    exit: boolean;
}

// A trailing integer is an entrenchment unless it is the operand of an operator
const ENTRENCHMENT_SUFFIX = /^(.*?[^\s&|>~(<])\s+(-?\d+)$/;

export class BeliefShell {
    readonly base: BeliefBase;
    private readonly paint: chalk.Chalk;

    constructor(options: ShellOptions = {}) {
        this.base = new BeliefBase(options);
        this.paint = new chalk.Instance({ level: options.color ? 1 : 0 });
    }

    execute(line: string): ShellResult {
        const trimmed = line.trim();
        if (!trimmed) return { output: [], exit: false };

        const space = trimmed.search(/\s/);
        const name = (space < 0 ? trimmed : trimmed.slice(0, space)).toLowerCase();
        const arg = space < 0 ? '' : trimmed.slice(space + 1).trim();

        if (name === 'exit' || name === 'quit') {
            return { output: [this.paint.yellow('Goodbye!')], exit: true };
        }

        try {
            return { output: this.dispatch(name, arg), exit: false };
        } catch (e) {
            return { output: this.formatError(e), exit: false };
        }
    }

    private dispatch(name: string, arg: string): string[] {
        switch (name) {
            case 'expand': {
                const { formula, entrenchment } = this.parseWeighted(arg);
                const belief = this.base.expand(formula, entrenchment);
                return [this.paint.green(`Expanded belief base with: ${describe(belief)}`)];
            }
            case 'revise': {
                const { formula, entrenchment } = this.parseWeighted(arg);
                const removed = this.base.revise(formula, entrenchment);
                const text = formulaToString(formula);
                const added = this.base.beliefs()[this.base.size - 1];
                return [
                    this.paint.green(`Revised belief base with: ${text} (entrenchment: ${added.entrenchment})`),
                    ...this.listRemoved(removed),
                ];
            }
            case 'contract': {
                const formula = this.parseFormula(arg);
                const text = formulaToString(formula);
                const removed = this.base.contract(formula);
                if (removed.length === 0) {
                    return [`Nothing to contract: the belief base does not entail ${text}`];
                }
                return [this.paint.green(`Contracted belief base by: ${text}`), ...this.listRemoved(removed)];
            }
            case 'remove': {
                const removed = this.base.remove(this.parseFormula(arg));
                return [this.paint.green(`Removed belief: ${describe(removed)}`)];
            }
            case 'update': {
                const parts = arg.split('=>');
                if (parts.length !== 2) {
                    return [this.paint.red(`Usage: ${COMMANDS.update.usage}`)];
                }
                const oldFormula = this.parseFormula(parts[0]);
                const { formula, entrenchment } = this.parseWeighted(parts[1]);
                const belief = this.base.update(oldFormula, formula, entrenchment);
                return [this.paint.green(`Updated belief ${formulaToString(oldFormula)} to: ${describe(belief)}`)];
            }
            case 'entrenchment': {
                const formula = this.parseFormula(arg);
                return [`Entrenchment of ${formulaToString(formula)}: ${this.base.getEntrenchment(formula)}`];
            }
            case 'entails': {
                const formula = this.parseFormula(arg);
                const text = formulaToString(formula);
                return this.base.entails(formula)
                    ? [this.paint.green(`The belief base entails: ${text}`)]
                    : [this.paint.red(`The belief base does not entail: ${text}`)];
            }
            case 'prove': {
                const formula = this.parseFormula(arg);
                const text = formulaToString(formula);
                const result = this.base.prove(formula, { includeTrace: true });
                const steps = result.steps ?? [];
                return [
                    result.refuted
                        ? this.paint.green(`Proved: ${text}`)
                        : this.paint.red(`Not proved: ${text}`),
                    this.paint.dim(`${result.passes} pass(es), ${result.clausesGenerated} new clause(s)`),
                    ...steps.map(step => `  ${step}`),
                ];
            }
            case 'cnf': {
                const formula = this.parseFormula(arg);
                return [`CNF of ${formulaToString(formula)}: ${cnfToString(toCNF(formula))}`];
            }
            case 'consistent':
                return this.base.isConsistent()
                    ? [this.paint.green('The belief base is consistent.')]
                    : [this.paint.red('The belief base is inconsistent.')];
            case 'model': {
                const model = this.base.findModel();
                if (!model) {
                    return [this.paint.red('No model: the belief base is inconsistent.')];
                }
                if (model.size === 0) {
                    return ['Model: every assignment satisfies the belief base.'];
                }
                const assignment = [...model].map(([atom, value]) => `${atom}=${value}`).join(', ');
                return [`Model: ${assignment}`];
            }
            case 'show':
                return this.show();
            case 'clear':
                this.base.clear();
                return ['Belief base cleared.'];
            case 'help':
                return this.help(arg);
            default:
                return [this.paint.red(`Unknown command: ${name}. Type 'help' for the list of commands.`)];
        }
    }

    private show(): string[] {
        const entries = this.base.show();
        if (entries.length === 0) {
            return ['Belief base is empty.'];
        }
        return [
            'Current Belief Base:',
            ...entries.map(({ formula, entrenchment }, i) =>
                `  ${String(i + 1).padStart(2)}. ${formulaToString(formula).padEnd(30)} [entrenchment: ${entrenchment}]`),
        ];
    }

    private help(arg: string): string[] {
        if (arg) {
            const entry = COMMANDS[arg.toLowerCase()];
            return entry
                ? [`${entry.usage} - ${entry.description}`]
                : [`No help available for '${arg}'`];
        }
        return [
            'Available commands:',
            ...Object.values(COMMANDS).map(c => `  ${c.usage.padEnd(40)} ${c.description}`),
            '',
            ...SYNTAX_HELP,
        ];
    }

    private listRemoved(removed: readonly Belief[]): string[] {
        return removed.map(b => this.paint.yellow(`  removed: ${describe(b)}`));
    }

    private parseFormula(text: string): Formula {
        return parse(text.trim());
    }

    private parseWeighted(text: string): { formula: Formula; entrenchment?: number } {
        const match = ENTRENCHMENT_SUFFIX.exec(text.trim());
        if (match) {
            return { formula: parse(match[1]), entrenchment: Number.parseInt(match[2], 10) };
        }
        return { formula: parse(text.trim()) };
    }

    private formatError(e: unknown): string[] {
        if (isBeliefException(e)) {
            const lines = [this.paint.red(`Error: ${e.message}`)];
            if (e.error.suggestion) {
                lines.push(this.paint.dim(`  Hint: ${e.error.suggestion}`));
            }
            return lines;
        }
        throw e;
    }
}

function describe(belief: Belief): string {
    return `${formulaToString(belief.formula)} (entrenchment: ${belief.entrenchment})`;
}
