import { DateTime } from "luxon";
import { Clock, Rng, msUntil, nextDailyUtc, systemClock } from "./time";
import { logger, errorMessage } from "./logger";

export type TaskSchedule =
  | { kind: "jittered"; intervalMs: number; jitter: number; minMs?: number }
  | { kind: "daily"; hourUtc: number }
  | { kind: "interval"; intervalMs: number };

export type JobFn = (signal: AbortSignal) => Promise<void> | void;

export type ScheduledTask = {
  name: string;
  schedule: TaskSchedule;
  run: JobFn;
};

export type TaskFault = {
  task: string;
  at: string;
  error: string;
};

/** Resolves after `ms`, or as soon as `signal` aborts. */
export type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

export const sleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

/** `intervalMs` shifted by up to ±`jitter` of itself, never below `minMs`. */
export function jitteredDelay(intervalMs: number, jitter: number, rng: Rng, minMs = 0): number {
  const offset = (rng() * 2 - 1) * jitter * intervalMs;
  return Math.max(minMs, Math.floor(intervalMs + offset));
}

export function msUntilNextDailyUtc(hourUtc: number, now: DateTime): number {
  return msUntil(nextDailyUtc(now, hourUtc), now);
}

export function nextDelay(schedule: TaskSchedule, now: DateTime, rng: Rng): number {
  switch (schedule.kind) {
    case "jittered":
      return jitteredDelay(schedule.intervalMs, schedule.jitter, rng, schedule.minMs);
    case "daily":
      return msUntilNextDailyUtc(schedule.hourUtc, now);
    case "interval":
      return schedule.intervalMs;
  }
}

export type SchedulerOptions = {
  clock?: Clock;
  rng?: Rng;
  sleep?: Sleeper;
};

/**
 * One long-lived loop per task. Every iteration sleeps, then runs the task inside its
 * own failure boundary, so a throwing or slow task never touches its siblings.
 */
export class Scheduler {
  private readonly tasks: ScheduledTask[] = [];
  private readonly loops: Promise<void>[] = [];
  private readonly recorded: TaskFault[] = [];
  private controller: AbortController | undefined;
  private readonly clock: Clock;
  private readonly rng: Rng;
  private readonly sleep: Sleeper;

  constructor(opts: SchedulerOptions = {}) {
    this.clock = opts.clock ?? systemClock;
    this.rng = opts.rng ?? Math.random;
    this.sleep = opts.sleep ?? sleep;
  }

  register(task: ScheduledTask) {
    if (this.tasks.some((t) => t.name === task.name)) throw new Error(`Task already registered: ${task.name}`);
    this.tasks.push(task);
    if (this.controller) this.loops.push(this.loop(task, this.controller.signal));
  }

  get running(): boolean {
    return this.controller !== undefined;
  }

  taskNames(): string[] {
    return this.tasks.map((t) => t.name);
  }

  faults(): TaskFault[] {
    return [...this.recorded];
  }

  start() {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    for (const task of this.tasks) this.loops.push(this.loop(task, controller.signal));
    logger.info("Scheduler started", { tasks: this.taskNames() });
  }

  /** Cancels every loop, waits for all of them, and returns whatever they threw while draining. */
  async stop(): Promise<unknown[]> {
    const controller = this.controller;
    if (!controller) return [];
    controller.abort();
    const settled = await Promise.allSettled(this.loops);
    this.loops.length = 0;
    this.controller = undefined;
    const errors = settled.flatMap((r) => (r.status === "rejected" ? [r.reason] : []));
    logger.info("Scheduler stopped", { tasks: this.taskNames(), drainErrors: errors.length });
    return errors;
  }

  private async loop(task: ScheduledTask, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const delay = nextDelay(task.schedule, this.clock(), this.rng);
      logger.debug("Scheduling job", { name: task.name, inMs: delay });
      await this.sleep(delay, signal);
      if (signal.aborted) break;

      logger.info("Job start", { name: task.name });
      try {
        await task.run(signal);
        logger.info("Job finish", { name: task.name });
      } catch (e) {
        const fault = { task: task.name, at: this.clock().toISO() ?? "", error: errorMessage(e) };
        this.recorded.push(fault);
        logger.error("Job error", { name: task.name, error: fault.error });
      }
    }
  }
}
