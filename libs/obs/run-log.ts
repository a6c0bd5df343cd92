import { open, type FileHandle } from "fs/promises";
import { formatLine, type LogLevel, type Logger } from "./logger";

/**
 * Append-only local log for one run. Lines are echoed to the console and
 * written to the file in order; `flush` waits for every pending write and
 * `close` releases the handle. The file itself persists across runs.
 */
export class RunLog implements Logger {
    private pending: Promise<void> = Promise.resolve();
    private closed = false;

    private constructor(readonly path: string, private readonly handle: FileHandle) {}

    static async open(path: string): Promise<RunLog> {
        return new RunLog(path, await open(path, "a"));
    }

    info(message: string) { this.write("INFO", message); }
    warn(message: string) { this.write("WARNING", message); }
    error(message: string) { this.write("ERROR", message); }

    async flush(): Promise<void> {
        await this.pending;
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        await this.flush();
        await this.handle.close();
    }

    private write(level: LogLevel, message: string) {
        const line = formatLine(level, message);
        if (level === "ERROR") console.error(line.trimEnd());
        else if (level === "WARNING") console.warn(line.trimEnd());
        else console.log(line.trimEnd());

        if (this.closed) {
            console.warn("run-log-closed", this.path);
            return;
        }
        this.pending = this.pending
            .then(() => this.handle.appendFile(line, "utf8"))
            .catch((e) => { console.error("run-log-write-failed", this.path, (e as Error).message); });
    }
}
