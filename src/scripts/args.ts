// Minimal flag handling for the CLI scripts: `--name value` options, `--flag` switches and
// positionals that are not option values.

export interface ParsedArgs {
    positionals: string[];
    options: Map<string, string>;
    switches: Set<string>;
}

export function parseArgs(argv: string[], valueOptions: string[]): ParsedArgs {
    const positionals: string[] = [];
    const options = new Map<string, string>();
    const switches = new Set<string>();

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith('--')) {
            positionals.push(arg);
            continue;
        }
        const name = arg.slice(2);
        const next = argv[i + 1];
        if (valueOptions.includes(name) && next !== undefined) {
            options.set(name, next);
            i++;
        } else {
            switches.add(name);
        }
    }

    return { positionals, options, switches };
}

/**
 * Reads a numeric option, falling back when it is absent.
 * @throws Error when the value is not a finite number.
 */
export function numberOption(args: ParsedArgs, name: string, fallback: number): number {
    const raw = args.options.get(name);
    if (raw === undefined) return fallback;
    const value = parseFloat(raw);
    if (!Number.isFinite(value)) {
        throw new Error(`--${name} expects a number, got "${raw}".`);
    }
    return value;
}
