export type LogLevel = "INFO" | "WARNING" | "ERROR";

export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export function formatLine(level: LogLevel, message: string, at: Date = new Date()): string {
    return `${at.toISOString()} - ${level} - ${message}\n`;
}

export function errorMessage(err: unknown): string {
    if (typeof err !== "object" || err === null || !("message" in err) || typeof err.message !== "string") {
        return String(err);
    }
    const name = "name" in err && typeof err.name === "string" ? err.name : "";
    return name && name !== "Error" ? `${name}: ${err.message}` : err.message;
}
