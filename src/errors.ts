/**
 * Fetch-level failure: timeout, connection failure or a non-2xx status.
 * Terminal for the attempt; callers decide whether to try again.
 */
export class NetworkError extends Error {
    constructor(
        message: string,
        public readonly url: string,
        public readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = "NetworkError";
    }
}

/** A year, test type, question or section number the wiki cannot have */
export class InvalidTestError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "InvalidTestError";
    }
}

/** One or more environment variables failed validation */
export class ConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
        this.name = "ConfigError";
    }
}

/** The user interrupted an interactive prompt (Ctrl+C or end of input) */
export class PromptCancelledError extends Error {
    constructor() {
        super("Prompt cancelled");
        this.name = "PromptCancelledError";
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
