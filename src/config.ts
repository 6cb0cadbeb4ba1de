/**
 * Runtime configuration read from the environment
 */

import { z } from "zod";
import type { FetchOptions, UserAgentStrategy } from "./types";
import { ConfigError } from "./errors";
import { WIKI_BASE_URL } from "./wiki/urls";
import { DEFAULT_TIMEOUT_MS } from "./wiki/fetcher";

export interface AppConfig {
    /** Wiki index.php base that page names are appended to */
    baseUrl: string;
    /** Request timeout in ms */
    timeout: number;
    userAgentStrategy: UserAgentStrategy;
    /** Sent by the "fixed" strategy; the built-in agent when absent */
    userAgent?: string;
    debug: boolean;
}

const booleanFlag = z
    .string()
    .trim()
    .toLowerCase()
    .refine(value => ["", "0", "1", "true", "false", "yes", "no"].includes(value), {
        message: "expected 1/0, true/false or yes/no",
    })
    .transform(value => value === "1" || value === "true" || value === "yes");

const envSchema = z.object({
    AMC_KEYS_BASE_URL: z.string().url().default(WIKI_BASE_URL),
    AMC_KEYS_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    AMC_KEYS_USER_AGENT_STRATEGY: z.enum(["rotate", "fixed"]).default("rotate"),
    AMC_KEYS_USER_AGENT: z.string().min(1).optional(),
    AMC_KEYS_DEBUG: booleanFlag.default("false"),
});

/**
 * Read configuration from environment variables.
 * Throws ConfigError naming every variable that failed validation.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = envSchema.safeParse(env);

    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`)
        );
    }

    const parsed = result.data;
    return {
        baseUrl: parsed.AMC_KEYS_BASE_URL,
        timeout: parsed.AMC_KEYS_TIMEOUT_MS,
        userAgentStrategy: parsed.AMC_KEYS_USER_AGENT_STRATEGY,
        ...(parsed.AMC_KEYS_USER_AGENT !== undefined && { userAgent: parsed.AMC_KEYS_USER_AGENT }),
        debug: parsed.AMC_KEYS_DEBUG,
    };
}

/** Fetch options carried by a configuration */
export function toFetchOptions(config: AppConfig): FetchOptions {
    return {
        timeout: config.timeout,
        userAgentStrategy: config.userAgentStrategy,
        ...(config.userAgent !== undefined && { userAgent: config.userAgent }),
    };
}
