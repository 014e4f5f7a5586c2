export interface CommandHelp {
    usage: string;
    description: string;
}

export const COMMANDS: Record<string, CommandHelp> = {
    expand: { usage: 'expand <formula> [<entrenchment>]', description: 'Add a belief to the base without any check' },
    revise: { usage: 'revise <formula> [<entrenchment>]', description: 'Contract the negation, then add the belief' },
    contract: { usage: 'contract <formula>', description: 'Remove beliefs until the formula is no longer entailed' },
    remove: { usage: 'remove <formula>', description: 'Remove the first matching belief from the base' },
    update: { usage: 'update <old> => <new> [<entrenchment>]', description: 'Replace a belief in place' },
    entrenchment: { usage: 'entrenchment <formula>', description: 'Show the entrenchment of a belief' },
    entails: { usage: 'entails <formula>', description: 'Check if the belief base entails the formula' },
    prove: { usage: 'prove <formula>', description: 'Check entailment and print the resolution steps' },
    cnf: { usage: 'cnf <formula>', description: 'Show the clausal form of a formula' },
    consistent: { usage: 'consistent', description: 'Check whether the belief base is consistent' },
    model: { usage: 'model', description: 'Show an assignment satisfying every belief' },
    show: { usage: 'show', description: 'Display the current belief base' },
    clear: { usage: 'clear', description: 'Remove every belief' },
    help: { usage: 'help [command]', description: 'Show this help, or help for one command' },
    exit: { usage: 'exit', description: 'Exit the shell' },
};

export const SYNTAX_HELP = [
    'Formula syntax:',
    '  ~f        negation',
    '  f & g     conjunction',
    '  f | g     disjunction',
    '  f >> g    implication',
    '  f <<>> g  equivalence',
    '  ( )       grouping; atoms are letters, digits and _',
];
