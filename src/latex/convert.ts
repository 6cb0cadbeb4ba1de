/**
 * LaTeX to plain-text conversion for the alt text of wiki math images.
 *
 * Math delimiters are dropped, symbol macros become their Unicode character,
 * and structural macros (fractions, roots, scripts) become inline notation.
 * Unknown macros vanish while their braced arguments stay as plain groups.
 * Conversion never throws: malformed markup converts as far as it parses.
 */

import symbolTable from "./symbols.json";

const SYMBOLS = new Map<string, string>(Object.entries(symbolTable));

const FRACTION_MACROS = new Set(["frac", "dfrac", "tfrac", "cfrac"]);

const BINOMIAL_MACROS = new Set(["binom", "dbinom", "tbinom"]);

/** Macros rendered as their single argument */
const PASSTHROUGH_MACROS = new Set([
    "text", "textbf", "textit", "textrm", "textsf", "texttt", "textnormal", "textup",
    "mathrm", "mathbf", "mathit", "mathsf", "mathtt", "mathcal", "mathbb", "mathfrak",
    "mathscr", "boldsymbol", "operatorname", "mbox", "hbox", "fbox", "boxed", "emph",
    "overline", "underline", "overrightarrow", "overleftrightarrow", "widehat",
    "widetilde", "hat", "bar", "vec", "tilde", "dot", "ddot",
]);

/** Macros whose single argument is consumed and rendered as nothing */
const SWALLOW_MACROS = new Set(["phantom", "hphantom", "vphantom", "label", "tag"]);

const SPACING_MACROS = new Set(["hspace", "vspace", "hskip", "vskip"]);

/** Environments whose column spec follows the environment name */
const TABULAR_ENVIRONMENTS = new Set(["array", "tabular"]);

/** Backslash followed by a single non-letter */
const CONTROL_SYMBOLS: ReadonlyMap<string, string> = new Map([
    ["{", "{"],
    ["}", "}"],
    ["%", "%"],
    ["$", "$"],
    ["&", "&"],
    ["#", "#"],
    ["_", "_"],
    ["|", "‖"],
    [",", " "],
    [";", " "],
    [":", " "],
    [">", " "],
    [" ", " "],
    ["\\", "\n"],
]);

const ROOT_SIGNS: ReadonlyMap<string, string> = new Map([
    ["", "√"],
    ["2", "√"],
    ["3", "∛"],
    ["4", "∜"],
]);

/** Text that reads unambiguously next to "/", "^" or "√" without parentheses */
const ATOM_PATTERN = /^[\p{L}\p{N}.]+$/u;

interface Cursor {
    source: string;
    pos: number;
}

function group(text: string): string {
    const trimmed = text.trim();
    if (trimmed === "" || ATOM_PATTERN.test(trimmed)) return trimmed;
    return `(${trimmed})`;
}

function skipSpaces(cursor: Cursor): void {
    while (cursor.pos < cursor.source.length && /\s/.test(cursor.source.charAt(cursor.pos))) {
        cursor.pos++;
    }
}

/**
 * Parse tokens until the closing character (consumed) or the end of input
 */
function parseUntil(cursor: Cursor, closer: "}" | "]" | null): string {
    let out = "";
    while (cursor.pos < cursor.source.length) {
        if (closer !== null && cursor.source.charAt(cursor.pos) === closer) {
            cursor.pos++;
            return out;
        }
        out += parseToken(cursor);
    }
    return out;
}

function parseToken(cursor: Cursor): string {
    const ch = cursor.source.charAt(cursor.pos);

    switch (ch) {
        case "\\":
            return parseMacro(cursor);
        case "{":
            cursor.pos++;
            return parseUntil(cursor, "}");
        case "}":
        case "$":
            cursor.pos++;
            return "";
        case "^":
        case "_":
            cursor.pos++;
            return formatScript(ch, readArgument(cursor));
        case "~":
        case "&":
        case "\n":
        case "\r":
            cursor.pos++;
            return " ";
        case "%": {
            // Comment runs to the end of the line
            const end = cursor.source.indexOf("\n", cursor.pos);
            cursor.pos = end === -1 ? cursor.source.length : end;
            return "";
        }
        default:
            cursor.pos++;
            return ch;
    }
}

/**
 * Read one macro argument: a braced group, a single macro, or a single character
 */
function readArgument(cursor: Cursor): string {
    skipSpaces(cursor);
    const ch = cursor.source.charAt(cursor.pos);
    if (ch === "") return "";
    if (ch === "{") {
        cursor.pos++;
        return parseUntil(cursor, "}");
    }
    if (ch === "\\") {
        return parseMacro(cursor);
    }
    cursor.pos++;
    return ch;
}

/** Optional [...] argument, or null when absent */
function readOptionalArgument(cursor: Cursor): string | null {
    skipSpaces(cursor);
    if (cursor.source.charAt(cursor.pos) !== "[") return null;
    cursor.pos++;
    return parseUntil(cursor, "]");
}

/** Braced argument taken verbatim (environment names, column specs) */
function readRawArgument(cursor: Cursor): string {
    skipSpaces(cursor);
    if (cursor.source.charAt(cursor.pos) !== "{") {
        const ch = cursor.source.charAt(cursor.pos);
        cursor.pos = Math.min(cursor.pos + 1, cursor.source.length);
        return ch;
    }
    const end = cursor.source.indexOf("}", cursor.pos);
    const close = end === -1 ? cursor.source.length : end;
    const raw = cursor.source.slice(cursor.pos + 1, close);
    cursor.pos = Math.min(close + 1, cursor.source.length);
    return raw;
}

function formatScript(marker: "^" | "_", argument: string): string {
    if (marker === "^" && argument.trim() === "∘") return "°";
    return `${marker}${group(argument)}`;
}

function formatRoot(index: string | null, radicand: string): string {
    const degree = (index ?? "").trim();
    const sign = ROOT_SIGNS.get(degree) ?? `${degree}√`;
    return `${sign}${group(radicand)}`;
}

function parseMacro(cursor: Cursor): string {
    cursor.pos++; // backslash
    const rest = cursor.source.slice(cursor.pos);
    const name = /^[A-Za-z]+/.exec(rest)?.[0] ?? "";

    if (name === "") {
        const symbol = cursor.source.charAt(cursor.pos);
        if (symbol === "") return "";
        cursor.pos++;
        return CONTROL_SYMBOLS.get(symbol) ?? "";
    }
    cursor.pos += name.length;

    if (FRACTION_MACROS.has(name)) {
        const numerator = readArgument(cursor);
        const denominator = readArgument(cursor);
        return `${group(numerator)}/${group(denominator)}`;
    }
    if (BINOMIAL_MACROS.has(name)) {
        const n = readArgument(cursor);
        const k = readArgument(cursor);
        return `C(${n.trim()}, ${k.trim()})`;
    }
    if (PASSTHROUGH_MACROS.has(name)) {
        return readArgument(cursor);
    }
    if (SWALLOW_MACROS.has(name)) {
        readArgument(cursor);
        return "";
    }
    if (SPACING_MACROS.has(name)) {
        readRawArgument(cursor);
        return " ";
    }

    switch (name) {
        case "sqrt": {
            const index = readOptionalArgument(cursor);
            return formatRoot(index, readArgument(cursor));
        }
        case "pmod":
            return `(mod ${readArgument(cursor).trim()})`;
        case "not": {
            const negated = readArgument(cursor);
            return negated === "=" ? "≠" : `${negated}\u0338`;
        }
        case "left":
        case "right":
            // The delimiter that follows renders itself; "." means none
            skipSpaces(cursor);
            if (cursor.source.charAt(cursor.pos) === ".") cursor.pos++;
            return "";
        case "begin": {
            const environment = readRawArgument(cursor);
            if (TABULAR_ENVIRONMENTS.has(environment)) readRawArgument(cursor);
            return "";
        }
        case "end":
            readRawArgument(cursor);
            return "";
        default:
            return SYMBOLS.get(name) ?? "";
    }
}

/**
 * Convert LaTeX math markup to plain text
 */
export function latexToText(markup: string): string {
    const cursor: Cursor = { source: markup, pos: 0 };
    const raw = parseUntil(cursor, null);

    return raw
        .replace(/[ \t\f\v\u00a0]+/g, " ")
        .replace(/ *\n */g, "\n")
        .replace(/^ +| +$/g, "");
}
