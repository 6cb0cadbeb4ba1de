import type { AppConfig } from "../config";
import type { LookupOptions } from "../lookup";

export interface ParsedArgs {
    command: string | undefined;
    positionals: string[];
    /** --timeout in ms; NaN or non-positive values are ignored by callers */
    timeout?: number;
    fixedAgent: boolean;
    debug: boolean;
}

/**
 * Split argv into command, positionals and global options.
 * Options may appear anywhere; the first other argument is the command.
 */
export function parseArgs(argv: string[]): ParsedArgs {
    // Filter out standalone "--" which npm passes through
    const args = argv.filter(a => a !== "--");
    const positionals: string[] = [];
    const parsed: ParsedArgs = { command: undefined, positionals, fixedAgent: false, debug: false };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const nextArg = args[i + 1];

        if (arg === undefined) continue;

        if (arg === "--timeout" && nextArg !== undefined) {
            parsed.timeout = parseInt(nextArg, 10);
            i++;
        } else if (arg === "--fixed-agent") {
            parsed.fixedAgent = true;
        } else if (arg === "--debug") {
            parsed.debug = true;
        } else if (parsed.command === undefined) {
            parsed.command = arg;
        } else {
            positionals.push(arg);
        }
    }

    return parsed;
}

/**
 * Lookup options for a run: flags override the environment configuration
 */
export function toLookupOptions(config: AppConfig, args: ParsedArgs): LookupOptions {
    const timeout = args.timeout !== undefined && args.timeout > 0 ? args.timeout : config.timeout;
    return {
        baseUrl: config.baseUrl,
        timeout,
        userAgentStrategy: args.fixedAgent ? "fixed" : config.userAgentStrategy,
        ...(config.userAgent !== undefined && { userAgent: config.userAgent }),
    };
}
