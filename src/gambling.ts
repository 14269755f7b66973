import { GamblingConfig } from "./config";
import { CooldownTracker } from "./cooldowns";
import { Ledger } from "./ledger";
import { logger } from "./logger";
import { GamblingStatsRecorder } from "./stats";
import { Rng } from "./time";
import { GameKind } from "./types";
import { PayoutTable, WagerOutcome, settleWager } from "./games/payoutTable";
import { Rejection, WagerValidator, reject, rejectLedgerFailure } from "./games/rules";
import { SoloGame, SoloGameKind, buildSoloGames } from "./games/soloGames";

export type SettledGame = {
    status: "settled";
    game: GameKind;
    outcome: WagerOutcome;
    label: string;
    wager: number;
    payout: number;
    net: number;
    balance: number;
    announce: boolean;
};

export type GameResult = SettledGame | Rejection;

export type GamblingEngineDeps = {
    ledger: Ledger;
    cooldowns: CooldownTracker;
    stats: GamblingStatsRecorder;
    validator: WagerValidator;
    config: GamblingConfig;
    rng?: Rng;
};

/** Spin, flip and the daily free spin. */
export class GamblingEngine {
    private readonly games: Record<SoloGameKind, SoloGame>;
    private readonly table: PayoutTable;
    private readonly rng: Rng;

    constructor(private readonly deps: GamblingEngineDeps) {
        this.table = PayoutTable.build(deps.config.spin.payouts);
        this.games = buildSoloGames(deps.config, this.table);
        this.rng = deps.rng ?? Math.random;
    }

    async play(kind: SoloGameKind, user: string, room: string, wager: number): Promise<GameResult> {
        const { ledger, validator, cooldowns, stats } = this.deps;
        const game = this.games[kind];
        if (!game.enabled) return reject("disabled", `${kind} is currently disabled.`);

        const invalid = validator.validate(user, room, wager, game.rules);
        if (invalid) return invalid;

        // claim the cooldown and the daily slot before any await, so a concurrent
        // request for the same game sees them taken
        const previousMark = cooldowns.markUsed(user, room, kind);
        const release = async () => {
            cooldowns.restoreMark(user, room, kind, previousMark);
            await cooldowns.decrementDaily(user, room, kind);
        };
        const used = await cooldowns.incrementDaily(user, room, kind);
        const limit = game.rules.dailyLimit;
        if (limit !== undefined && used > limit) {
            await release();
            return reject("daily_limit", `Daily limit reached (${limit} per day).`);
        }

        const trigger = `gambling.${kind}`;
        const escrow = await ledger.atomicDebit(user, room, wager, { trigger });
        if (!escrow.ok) {
            await release();
            return rejectLedgerFailure(escrow.reason, { user, room, game: kind });
        }

        const draw = game.draw(this.rng);
        const { payout, net, outcome } = settleWager(wager, draw.multiplier);
        const settled = await ledger.settle(user, room, {
            escrow: wager,
            payout,
            trigger,
            reason: `${kind}: ${draw.label}`,
            metadata: { label: draw.label, multiplier: draw.multiplier },
        });
        if (!settled.ok) {
            logger.error("Escrow left unsettled", { user, room, game: kind, wager, payout, reason: settled.reason });
            return rejectLedgerFailure(settled.reason, { user, room, game: kind });
        }

        await stats.record(user, room, kind, net);

        logger.info("Game settled", { user, room, game: kind, wager, payout, net, outcome });
        return {
            status: "settled",
            game: kind,
            outcome,
            label: draw.label,
            wager,
            payout,
            net,
            balance: settled.value.balance,
            announce: game.announces(payout),
        };
    }

    /** One spin per UTC day against the configured equivalent wager; nothing is debited. */
    async freeSpin(user: string, room: string): Promise<GameResult> {
        const { ledger, validator, cooldowns, stats, config } = this.deps;
        if (!config.enabled || !config.freeSpin.enabled) return reject("disabled", "Free spins are disabled.");
        if (!ledger.getAccount(user, room)) return reject("no_account", "You need an account first. Stick around a bit!");
        if (validator.isExcluded(user, room)) return reject("restricted", "Your economy access is restricted.");

        // increment-then-check keeps two concurrent requests from both spinning
        const used = await cooldowns.incrementDaily(user, room, "free_spin");
        if (used > 1) return reject("daily_limit", "You've already used your free spin today. Come back tomorrow!");

        const wager = config.freeSpin.equivalentWager;
        const entry = this.table.resolve(this.rng());
        const { payout, outcome } = settleWager(wager, entry.multiplier);
        let balance = ledger.getBalance(user, room);
        if (payout > 0) {
            const credited = await ledger.credit(user, room, payout, "gamble-win", "gambling.free_spin", {
                reason: `free spin: ${entry.label}`,
                metadata: { label: entry.label, multiplier: entry.multiplier },
            });
            if (!credited.ok) return rejectLedgerFailure(credited.reason, { user, room, game: "free_spin" });
            balance = credited.value.balanceAfter;
        }
        await stats.record(user, room, "free_spin", payout);

        return {
            status: "settled",
            game: "free_spin",
            outcome: payout > 0 ? (outcome === "jackpot" ? "jackpot" : "win") : "loss",
            label: entry.label,
            wager: 0,
            payout,
            net: payout,
            balance,
            announce: config.spin.announceJackpots && payout >= config.spin.jackpotAnnounceThreshold,
        };
    }
}
