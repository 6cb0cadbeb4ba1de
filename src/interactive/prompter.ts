import * as readline from "readline/promises";
import { PromptCancelledError } from "../errors";

/** Source of interactive answers */
export interface Prompter {
    /** Ask a question; rejects with PromptCancelledError once input is interrupted or closed */
    ask(question: string): Promise<string>;
    close(): void;
}

/**
 * Prompter over stdin/stdout. Ctrl+C and end of input both cancel the pending
 * question and every later one.
 */
export function createConsolePrompter(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
): Prompter {
    const rl = readline.createInterface({ input, output });
    const controller = new AbortController();

    rl.on("SIGINT", () => controller.abort());
    rl.on("close", () => controller.abort());

    return {
        async ask(question: string): Promise<string> {
            if (controller.signal.aborted) {
                throw new PromptCancelledError();
            }
            try {
                return await rl.question(question, { signal: controller.signal });
            } catch (err) {
                if (controller.signal.aborted) {
                    throw new PromptCancelledError();
                }
                throw err;
            }
        },
        close(): void {
            rl.close();
        },
    };
}
