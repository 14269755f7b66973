import { PayoutConfig } from "../config";
import { logger } from "../logger";

export type PayoutEntry = {
    label: string;
    multiplier: number;
    /** Upper bound (inclusive) of this entry's slice of [0, 1). */
    boundary: number;
};

export type WagerOutcome = "win" | "push" | "loss" | "jackpot";

export const JACKPOT_MULTIPLIER = 50;
export const BOUNDARY_TOLERANCE = 0.01;

export type Payout = {
    payout: number;
    net: number;
    outcome: WagerOutcome;
};

export function settleWager(wager: number, multiplier: number): Payout {
    const payout = Math.floor(wager * multiplier);
    const net = payout - wager;
    let outcome: WagerOutcome = net > 0 ? "win" : net === 0 ? "push" : "loss";
    if (net > 0 && multiplier >= JACKPOT_MULTIPLIER) outcome = "jackpot";
    return { payout, net, outcome };
}

/** Maps a uniform draw to an outcome through cumulative probability boundaries. */
export class PayoutTable {
    private constructor(readonly entries: readonly PayoutEntry[]) {}

    static build(payouts: readonly PayoutConfig[]): PayoutTable {
        if (payouts.length === 0) throw new Error("Payout table needs at least one entry");
        let cumulative = 0;
        const entries = payouts.map((p) => {
            cumulative += p.probability;
            return { label: p.label, multiplier: p.multiplier, boundary: cumulative };
        });
        if (Math.abs(cumulative - 1) > BOUNDARY_TOLERANCE) {
            logger.warn("Payout probabilities do not sum to 1", { sum: Number(cumulative.toFixed(4)) });
        }
        return new PayoutTable(entries);
    }

    /** First entry whose boundary is >= draw; the last entry when drift leaves the draw uncovered. */
    resolve(draw: number): PayoutEntry {
        for (const entry of this.entries) {
            if (draw <= entry.boundary) return entry;
        }
        return this.entries[this.entries.length - 1];
    }
}
