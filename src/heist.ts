import { DateTime } from "luxon";
import { HeistConfig } from "./config";
import { Ledger } from "./ledger";
import { logger } from "./logger";
import { GamblingStatsRecorder } from "./stats";
import { Clock, Rng, systemClock } from "./time";
import {
    Rejection,
    SETTLEMENT_FAILED_MESSAGE,
    SettlementFailed,
    UnsettledEscrow,
    WagerRules,
    WagerValidator,
    reject,
    rejectLedgerFailure,
} from "./games/rules";

export type ActiveHeist = {
    room: string;
    initiator: string;
    participants: Map<string, number>;
    startedAt: DateTime;
    expiresAt: DateTime;
};

/** Volatile per-room heist state; lost on restart. */
export interface HeistStateStore {
    get(room: string): ActiveHeist | undefined;
    set(heist: ActiveHeist): void;
    delete(room: string): void;
    active(): ActiveHeist[];
    lastResolvedAt(room: string): DateTime | undefined;
    markResolved(room: string, at: DateTime): void;
}

export class InMemoryHeistState implements HeistStateStore {
    private readonly heists = new Map<string, ActiveHeist>();
    private readonly resolved = new Map<string, DateTime>();

    get(room: string) {
        return this.heists.get(room);
    }

    set(heist: ActiveHeist) {
        this.heists.set(heist.room, heist);
    }

    delete(room: string) {
        this.heists.delete(room);
    }

    active() {
        return [...this.heists.values()];
    }

    lastResolvedAt(room: string) {
        return this.resolved.get(room);
    }

    markResolved(room: string, at: DateTime) {
        this.resolved.set(room, at);
    }
}

export type HeistStarted = { status: "started"; room: string; initiator: string; wager: number; expiresAt: DateTime };
export type HeistJoined = { status: "joined"; room: string; user: string; wager: number; crewSize: number };

export type HeistOutcome = "succeeded" | "pushed" | "failed";

export type HeistResolution =
    | { status: "cancelled"; room: string; participants: string[]; required: number }
    | (SettlementFailed & { participants: string[]; outcome: HeistOutcome | "cancelled" })
    | {
          status: HeistOutcome;
          room: string;
          participants: string[];
          draw: number;
          multiplier: number;
          /** user -> amount credited back (0 on failure) */
          payouts: Record<string, number>;
          totalWagered: number;
      };

export type HeistServiceDeps = {
    ledger: Ledger;
    validator: WagerValidator;
    stats: GamblingStatsRecorder;
    config: HeistConfig;
    state?: HeistStateStore;
    clock?: Clock;
    rng?: Rng;
};

const TRIGGER = "gambling.heist";
const REFUND_TRIGGER = "gambling.heist.refund";

/** Group wager: one join window, one shared draw, identical fate for every participant. */
export class HeistCoordinator {
    private readonly state: HeistStateStore;
    private readonly clock: Clock;
    private readonly rng: Rng;

    constructor(private readonly deps: HeistServiceDeps) {
        this.state = deps.state ?? new InMemoryHeistState();
        this.clock = deps.clock ?? systemClock;
        this.rng = deps.rng ?? Math.random;
    }

    active(room: string): ActiveHeist | undefined {
        return this.state.get(room);
    }

    cooldownRemaining(room: string): number {
        const last = this.state.lastResolvedAt(room);
        if (!last) return 0;
        const elapsed = this.clock().diff(last, "seconds").seconds;
        return Math.max(0, Math.ceil(this.deps.config.cooldownSeconds - elapsed));
    }

    /** base multiplier plus a bonus for every member beyond the first */
    crewMultiplier(crewSize: number): number {
        const { payoutMultiplier, crewBonusPerPlayer } = this.deps.config;
        return payoutMultiplier + (crewSize - 1) * crewBonusPerPlayer;
    }

    async start(user: string, room: string, wager: number): Promise<HeistStarted | Rejection> {
        const { config, validator, ledger } = this.deps;
        if (!config.enabled) return reject("disabled", "Heists are currently disabled.");
        if (this.state.get(room)) return reject("heist_in_progress", "A heist is already in progress! Join it instead.");

        const wait = this.cooldownRemaining(room);
        if (wait > 0) return reject("heist_cooldown", `The crew is laying low. Next heist in ${wait}s.`, wait);

        const invalid = validator.validate(user, room, wager, this.rules());
        if (invalid) return invalid;

        const escrow = await ledger.atomicDebit(user, room, wager, { trigger: TRIGGER });
        if (!escrow.ok) return rejectLedgerFailure(escrow.reason, { user, room, game: "heist" });

        if (this.state.get(room)) {
            await this.refund(user, room, wager, "Another heist started first");
            return reject("heist_in_progress", "A heist is already in progress! Join it instead.");
        }

        const now = this.clock();
        const heist: ActiveHeist = {
            room,
            initiator: user,
            participants: new Map([[user, wager]]),
            startedAt: now,
            expiresAt: now.plus({ seconds: config.joinWindowSeconds }),
        };
        this.state.set(heist);
        logger.info("Heist started", { room, initiator: user, wager, expiresAt: heist.expiresAt.toISO() });
        return { status: "started", room, initiator: user, wager, expiresAt: heist.expiresAt };
    }

    async join(user: string, room: string, wager: number): Promise<HeistJoined | Rejection> {
        const { validator, ledger } = this.deps;
        const heist = this.state.get(room);
        if (!heist) return reject("no_active_heist", "No active heist. Start one with a wager.");
        if (heist.participants.has(user)) return reject("already_joined", "You're already in this heist.");
        if (this.clock() > heist.expiresAt) return reject("window_closed", "The join window has closed.");

        const invalid = validator.validate(user, room, wager, this.rules());
        if (invalid) return invalid;

        const escrow = await ledger.atomicDebit(user, room, wager, { trigger: TRIGGER });
        if (!escrow.ok) return rejectLedgerFailure(escrow.reason, { user, room, game: "heist" });

        // the heist may have resolved, or this user joined twice, while the debit was in flight
        if (this.state.get(room) !== heist || heist.participants.has(user)) {
            await this.refund(user, room, wager, "Heist join not recorded");
            if (heist.participants.has(user)) return reject("already_joined", "You're already in this heist.");
            return reject("window_closed", "The join window has closed.");
        }

        heist.participants.set(user, wager);
        logger.info("Heist joined", { room, user, wager, crewSize: heist.participants.size });
        return { status: "joined", room, user, wager, crewSize: heist.participants.size };
    }

    /** Settles the room's heist now, whether or not its window has closed. */
    async resolve(room: string): Promise<HeistResolution | undefined> {
        const { config, ledger, stats } = this.deps;
        const heist = this.state.get(room);
        if (!heist) return undefined;
        this.state.delete(room);
        this.state.markResolved(room, this.clock());

        const entries = [...heist.participants.entries()];
        const participants = entries.map(([user]) => user);
        const totalWagered = entries.reduce((sum, [, w]) => sum + w, 0);

        if (participants.length < config.minParticipants) {
            const unsettled: UnsettledEscrow[] = [];
            for (const [user, wager] of entries) {
                const res = await this.refund(user, room, wager, "Heist cancelled: not enough participants");
                if (!res.ok) unsettled.push({ user, escrow: wager, payout: wager, reason: res.reason });
            }
            if (unsettled.length > 0) return this.settlementFailed(room, participants, "cancelled", unsettled);
            logger.info("Heist cancelled", { room, crewSize: participants.length, required: config.minParticipants });
            return { status: "cancelled", room, participants, required: config.minParticipants };
        }

        const draw = this.rng();
        let status: HeistOutcome;
        let multiplier: number;
        if (draw < config.successChance) {
            status = "succeeded";
            multiplier = this.crewMultiplier(participants.length);
        } else if (draw < config.successChance + config.pushChance) {
            status = "pushed";
            multiplier = 1 - config.pushFeePercent / 100;
        } else {
            status = "failed";
            multiplier = 0;
        }

        const payouts: Record<string, number> = {};
        const unsettled: UnsettledEscrow[] = [];
        for (const [user, wager] of entries) {
            const payout = Math.floor(wager * multiplier);
            payouts[user] = payout;
            const settled = await ledger.settle(user, room, {
                escrow: wager,
                payout,
                trigger: TRIGGER,
                metadata: { outcome: status, multiplier, crewSize: participants.length },
            });
            if (!settled.ok) {
                unsettled.push({ user, escrow: wager, payout, reason: settled.reason });
                continue;
            }
            await stats.record(user, room, "heist", payout - wager);
        }
        if (unsettled.length > 0) return this.settlementFailed(room, participants, status, unsettled);

        logger.info("Heist resolved", { room, status, draw, multiplier, crewSize: participants.length, totalWagered });
        return { status, room, participants, draw, multiplier, payouts, totalWagered };
    }

    /** Resolves every heist whose join window has closed. */
    async resolveDue(): Promise<HeistResolution[]> {
        const now = this.clock();
        const results: HeistResolution[] = [];
        for (const heist of this.state.active()) {
            if (now <= heist.expiresAt) continue;
            const res = await this.resolve(heist.room);
            if (res) results.push(res);
        }
        return results;
    }

    private rules(): WagerRules {
        const { minWager, maxWager } = this.deps.config;
        return { game: "heist", minWager, maxWager, cooldownSeconds: 0 };
    }

    private settlementFailed(
        room: string,
        participants: string[],
        outcome: HeistOutcome | "cancelled",
        unsettled: UnsettledEscrow[]
    ): HeistResolution {
        logger.error("Heist settlement incomplete", { room, outcome, unsettled });
        return { status: "settlement_failed", room, participants, outcome, unsettled, message: SETTLEMENT_FAILED_MESSAGE };
    }

    private async refund(user: string, room: string, amount: number, reason: string) {
        const res = await this.deps.ledger.refund(user, room, amount, REFUND_TRIGGER, reason);
        if (!res.ok) logger.error("Heist refund failed", { user, room, amount, reason: res.reason });
        return res;
    }
}
