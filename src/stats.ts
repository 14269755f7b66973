import { FileStore } from "./storage/fileStore";
import { GameKind, GamblingStats, accountKey } from "./types";

function emptyStats(user: string, room: string): GamblingStats {
    return {
        user,
        room,
        plays: { spin: 0, flip: 0, free_spin: 0, challenge: 0, heist: 0 },
        biggestWin: 0,
        biggestLoss: 0,
        net: 0,
    };
}

/** Derived per-user gambling counters; never consulted for balances. */
export class GamblingStatsRecorder {
    constructor(private readonly store: FileStore) {}

    get(user: string, room: string): GamblingStats | undefined {
        return this.store.get().gamblingStats[accountKey(room, user)];
    }

    async record(user: string, room: string, game: GameKind, net: number): Promise<GamblingStats> {
        return this.store.update((s) => {
            const key = accountKey(room, user);
            const stats = s.gamblingStats[key] ?? emptyStats(user, room);
            stats.plays[game] += 1;
            stats.net += net;
            if (net > 0) stats.biggestWin = Math.max(stats.biggestWin, net);
            if (net < 0) stats.biggestLoss = Math.max(stats.biggestLoss, -net);
            s.gamblingStats[key] = stats;
            return { ...stats, plays: { ...stats.plays } };
        });
    }
}
