import cron from "node-cron";
import { errorMessage } from "../libs/obs/logger";

export type CronTask = { stop(): void };
export type ScheduleFn = (expression: string, onTick: () => void) => CronTask;

export type SchedulerOptions = {
    /** node-cron expression */
    schedule: string;
    run: () => Promise<unknown>;
    runOnStart?: boolean;
    scheduleFn?: ScheduleFn;
};

export type TickOutcome = "ran" | "failed" | "skipped";

const cronSchedule: ScheduleFn = (expression, onTick) => cron.schedule(expression, onTick);

/**
 * Runs `run` on a cron schedule. Errors are caught here so the loop keeps
 * going; a tick that arrives while a run is still going is skipped.
 *
 * Ticks follow the wall clock (`0 *\/4 * * *` fires at 00:00, 04:00, ...), so
 * the first scheduled run may come sooner than one interval after the
 * start-up run.
 */
export class Scheduler {
    private task?: CronTask;
    private current?: Promise<TickOutcome>;

    constructor(private readonly opts: SchedulerOptions) {}

    start(): void {
        if (this.task) return;
        const schedule = this.opts.scheduleFn ?? cronSchedule;
        this.task = schedule(this.opts.schedule, () => { void this.tick(); });
        console.log("scheduler-started", this.opts.schedule);
        if (this.opts.runOnStart ?? true) void this.tick();
    }

    stop(): void {
        this.task?.stop();
        this.task = undefined;
        console.log("scheduler-stopped");
    }

    /** Resolves once no run is in progress. */
    async idle(): Promise<void> {
        await this.current;
    }

    tick(): Promise<TickOutcome> {
        if (this.current) {
            console.warn("scheduler-tick-skipped", "previous run still in progress");
            return Promise.resolve("skipped");
        }
        const current = this.runGuarded().finally(() => { this.current = undefined; });
        this.current = current;
        return current;
    }

    private async runGuarded(): Promise<TickOutcome> {
        try {
            await this.opts.run();
            return "ran";
        } catch (err) {
            console.error("scheduler-tick-failed", errorMessage(err));
            return "failed";
        }
    }
}
