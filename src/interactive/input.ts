/**
 * Parsing of interactive answers, kept free of I/O
 */

export type IntParseResult =
    | { ok: true; value: number }
    | { ok: false; message: string };

export interface BoundedIntOptions {
    min: number;
    max: number;
    /** Shown instead of the generic message when below min */
    minMessage?: string;
    /** Shown instead of the generic message when above max */
    maxMessage?: string;
    /** Accept a literal "0" as "exit / go back" regardless of min */
    allowZero?: boolean;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

export const INVALID_NUMBER_MESSAGE = "Invalid input. Please enter a valid number.";

/**
 * Parse an integer answer and check it against [min, max]
 */
export function parseBoundedInt(input: string, options: BoundedIntOptions): IntParseResult {
    const { min, max, minMessage, maxMessage, allowZero = true } = options;
    const trimmed = input.trim();

    if (allowZero && trimmed === "0") {
        return { ok: true, value: 0 };
    }

    if (!INTEGER_PATTERN.test(trimmed)) {
        return { ok: false, message: INVALID_NUMBER_MESSAGE };
    }

    const value = parseInt(trimmed, 10);
    if (value < min) {
        return {
            ok: false,
            message: minMessage ?? `Please enter a number greater than or equal to ${min}.`,
        };
    }
    if (value > max) {
        return {
            ok: false,
            message: maxMessage ?? `Please enter a number less than or equal to ${max}.`,
        };
    }

    return { ok: true, value };
}

/** "y", "yes", "Yeah" ... */
export function isYes(answer: string): boolean {
    return answer.trim().toLowerCase().startsWith("y");
}

/** "n", "no", "Nope" ... */
export function isNo(answer: string): boolean {
    return answer.trim().toLowerCase().startsWith("n");
}
