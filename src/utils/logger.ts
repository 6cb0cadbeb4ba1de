export type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

/**
 * Diagnostic logger. Everything goes to stderr so stdout carries only results
 * (and stays clean for the MCP stdio transport).
 */
class Logger {
    private static instance: Logger;
    private debugEnabled: boolean = false;

    private constructor() {
        // Private constructor to prevent direct instantiation
    }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    public setDebugEnabled(enabled: boolean): void {
        this.debugEnabled = enabled;
    }

    public log(message: string): void {
        this.write("INFO", message);
    }

    public warn(message: string): void {
        this.write("WARN", message);
    }

    public error(message: string): void {
        this.write("ERROR", message);
    }

    public debug(message: string): void {
        if (this.debugEnabled) {
            this.write("DEBUG", message);
        }
    }

    private write(level: LogLevel, message: string): void {
        console.error(`[${new Date().toISOString()}] [${level}] ${message}`);
    }
}

export default Logger;
