import { GamblingConfig } from "../config";
import { Rng } from "../time";
import { PayoutTable } from "./payoutTable";
import { WagerRules } from "./rules";

export type SoloGameKind = "spin" | "flip";

export type Draw = {
    label: string;
    multiplier: number;
};

/** A single-player wager: validated by shared rules, resolved by one draw. */
export interface SoloGame {
    readonly kind: SoloGameKind;
    readonly enabled: boolean;
    readonly rules: WagerRules;
    draw(rng: Rng): Draw;
    /** Whether a payout this size is announced to the whole room. */
    announces(payout: number): boolean;
}

export function spinGame(config: GamblingConfig["spin"], table: PayoutTable): SoloGame {
    return {
        kind: "spin",
        enabled: config.enabled,
        rules: {
            game: "spin",
            minWager: config.minWager,
            maxWager: config.maxWager,
            cooldownSeconds: config.cooldownSeconds,
            dailyLimit: config.dailyLimit,
        },
        draw(rng) {
            const entry = table.resolve(rng());
            return { label: entry.label, multiplier: entry.multiplier };
        },
        announces(payout) {
            return config.announceJackpots && payout >= config.jackpotAnnounceThreshold;
        },
    };
}

export function flipGame(config: GamblingConfig["flip"]): SoloGame {
    return {
        kind: "flip",
        enabled: config.enabled,
        rules: {
            game: "flip",
            minWager: config.minWager,
            maxWager: config.maxWager,
            cooldownSeconds: config.cooldownSeconds,
            dailyLimit: config.dailyLimit,
        },
        draw(rng) {
            return rng() < config.winChance
                ? { label: "heads", multiplier: 2 }
                : { label: "tails", multiplier: 0 };
        },
        announces() {
            return false;
        },
    };
}

export function buildSoloGames(config: GamblingConfig, table: PayoutTable): Record<SoloGameKind, SoloGame> {
    return {
        spin: spinGame(config.spin, table),
        flip: flipGame(config.flip),
    };
}
