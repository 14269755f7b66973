import { FileStore } from "./storage/fileStore";
import { counterKey } from "./types";
import { Clock, isSameUtcDay, parseIso, systemClock, toIso } from "./time";

/**
 * Per-(user, activity) rate limiting. Last-action times are process-local and reset on
 * restart; daily counters are durable and roll over at UTC midnight.
 */
export class CooldownTracker {
    private readonly lastAction = new Map<string, number>();
    private readonly clock: Clock;

    constructor(private readonly store: FileStore, opts: { clock?: Clock } = {}) {
        this.clock = opts.clock ?? systemClock;
    }

    /** Whole seconds left before `activity` may run again; 0 when free. */
    remainingSeconds(user: string, room: string, activity: string, cooldownSeconds: number): number {
        if (cooldownSeconds <= 0) return 0;
        const last = this.lastAction.get(counterKey(room, user, activity));
        if (last === undefined) return 0;
        const elapsed = (this.clock().toMillis() - last) / 1000;
        return elapsed < cooldownSeconds ? Math.ceil(cooldownSeconds - elapsed) : 0;
    }

    /** Returns the previous timestamp so a caller that backs out can restore it. */
    markUsed(user: string, room: string, activity: string): number | undefined {
        const key = counterKey(room, user, activity);
        const previous = this.lastAction.get(key);
        this.lastAction.set(key, this.clock().toMillis());
        return previous;
    }

    restoreMark(user: string, room: string, activity: string, previous: number | undefined) {
        const key = counterKey(room, user, activity);
        if (previous === undefined) this.lastAction.delete(key);
        else this.lastAction.set(key, previous);
    }

    dailyCount(user: string, room: string, activity: string): number {
        const row = this.store.get().cooldownCounters[counterKey(room, user, activity)];
        if (!row) return 0;
        return isSameUtcDay(parseIso(row.windowStart), this.clock()) ? row.count : 0;
    }

    async incrementDaily(user: string, room: string, activity: string): Promise<number> {
        const now = this.clock();
        return this.store.update((s) => {
            const key = counterKey(room, user, activity);
            const row = s.cooldownCounters[key];
            if (!row || !isSameUtcDay(parseIso(row.windowStart), now)) {
                s.cooldownCounters[key] = { user, room, activity, count: 1, windowStart: toIso(now) };
                return 1;
            }
            row.count += 1;
            return row.count;
        });
    }

    /** Gives back a slot taken by `incrementDaily` for an attempt that did not go ahead. */
    async decrementDaily(user: string, room: string, activity: string): Promise<number> {
        const now = this.clock();
        return this.store.update((s) => {
            const row = s.cooldownCounters[counterKey(room, user, activity)];
            if (!row || !isSameUtcDay(parseIso(row.windowStart), now) || row.count <= 0) return 0;
            row.count -= 1;
            return row.count;
        });
    }

    clear() {
        this.lastAction.clear();
    }
}
