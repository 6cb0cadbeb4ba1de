import type { UserAgentStrategy } from "../types";

/** Desktop browser user agents rotated across requests */
export const BROWSER_USER_AGENTS: readonly string[] = [
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 14.4; rv:125.0) Gecko/20100101 Firefox/125.0",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 14_4_1) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4.1 Safari/605.1.15",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36 Edg/124.0.2478.51",
];

export const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; amc-keys/1.0)";

/**
 * Pick the user agent for one request
 */
export function pickUserAgent(
    strategy: UserAgentStrategy,
    fixedUserAgent: string = DEFAULT_USER_AGENT,
    random: () => number = Math.random
): string {
    if (strategy === "fixed") {
        return fixedUserAgent;
    }
    const index = Math.floor(random() * BROWSER_USER_AGENTS.length);
    return BROWSER_USER_AGENTS[index] ?? fixedUserAgent;
}
