import { describe, it, expect } from "vitest";
import { parseArgs, toLookupOptions } from "../args";
import type { AppConfig } from "../../config";

describe("parseArgs", () => {
    it("returns no command for empty argv", () => {
        expect(parseArgs([])).toEqual({
            command: undefined,
            positionals: [],
            fixedAgent: false,
            debug: false,
        });
    });

    it("splits command and positionals", () => {
        const args = parseArgs(["solution", "2019", "10A", "25", "2"]);

        expect(args.command).toBe("solution");
        expect(args.positionals).toEqual(["2019", "10A", "25", "2"]);
    });

    it("reads options anywhere in argv", () => {
        const args = parseArgs(["--debug", "answers", "2019", "--timeout", "5000", "AIME_I", "--fixed-agent"]);

        expect(args).toEqual({
            command: "answers",
            positionals: ["2019", "AIME_I"],
            timeout: 5000,
            fixedAgent: true,
            debug: true,
        });
    });

    it("drops a standalone --", () => {
        expect(parseArgs(["--", "answers", "2019", "8"]).positionals).toEqual(["2019", "8"]);
    });

    it("keeps a non-numeric timeout as NaN", () => {
        expect(parseArgs(["--timeout", "soon"]).timeout).toBeNaN();
    });
});

describe("toLookupOptions", () => {
    const config: AppConfig = {
        baseUrl: "http://wiki.test/index.php",
        timeout: 10000,
        userAgentStrategy: "rotate",
        userAgent: "test-agent/1.0",
        debug: false,
    };

    it("takes everything from the configuration without flags", () => {
        expect(toLookupOptions(config, parseArgs(["mcp"]))).toEqual({
            baseUrl: "http://wiki.test/index.php",
            timeout: 10000,
            userAgentStrategy: "rotate",
            userAgent: "test-agent/1.0",
        });
    });

    it("lets --timeout and --fixed-agent override the configuration", () => {
        const options = toLookupOptions(config, parseArgs(["mcp", "--timeout", "2500", "--fixed-agent"]));

        expect(options.timeout).toBe(2500);
        expect(options.userAgentStrategy).toBe("fixed");
    });

    it("ignores a timeout flag that is not a positive number", () => {
        expect(toLookupOptions(config, parseArgs(["--timeout", "soon"])).timeout).toBe(10000);
        expect(toLookupOptions(config, parseArgs(["--timeout", "0"])).timeout).toBe(10000);
    });
});
