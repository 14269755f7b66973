import { randomUUID } from "crypto";
import { ChallengeConfig } from "./config";
import { FileStore, StoreWriteError } from "./storage/fileStore";
import { Ledger } from "./ledger";
import { logger } from "./logger";
import { GamblingStatsRecorder } from "./stats";
import { Clock, Rng, parseIso, systemClock, toIso } from "./time";
import { ChallengeStatus, PendingChallenge } from "./types";
import {
    Rejection,
    SETTLEMENT_FAILED_MESSAGE,
    SettlementFailed,
    UnsettledEscrow,
    WagerValidator,
    reject,
    rejectLedgerFailure,
} from "./games/rules";

export type ChallengeCreated = {
    status: "created";
    challenge: PendingChallenge;
    /** The target has to be told a challenge is waiting. */
    notify: { room: string; user: string };
};

export type ChallengeSettled = {
    status: "settled";
    challenge: PendingChallenge;
    winner: string;
    loser: string;
    pot: number;
    rake: number;
    prize: number;
    winnerBalance: number;
    loserBalance: number;
    announce: boolean;
};

export type ChallengeExpired = { status: "expired"; challenge: PendingChallenge };
export type ChallengeDeclined = { status: "declined"; challenge: PendingChallenge };
export type ChallengeSettlementFailed = SettlementFailed & { challenge: PendingChallenge };

export type CreateResult = ChallengeCreated | Rejection;
export type AcceptResult = ChallengeSettled | ChallengeSettlementFailed | ChallengeExpired | Rejection;
export type DeclineResult = ChallengeDeclined | Rejection;

export type ChallengeServiceDeps = {
    store: FileStore;
    ledger: Ledger;
    validator: WagerValidator;
    stats: GamblingStatsRecorder;
    config: ChallengeConfig;
    clock?: Clock;
    rng?: Rng;
};

const TRIGGER = "gambling.challenge";
const REFUND_TRIGGER = "gambling.challenge.refund";

function newestFirst(a: PendingChallenge, b: PendingChallenge): number {
    return b.createdAt.localeCompare(a.createdAt);
}

/**
 * Two-party wager escrow: pending -> accepted | declined | expired.
 * The challenger's wager is held from creation until one terminal transition
 * either refunds it whole or folds it into the settled pot.
 */
export class ChallengeService {
    private readonly clock: Clock;
    private readonly rng: Rng;

    constructor(private readonly deps: ChallengeServiceDeps) {
        this.clock = deps.clock ?? systemClock;
        this.rng = deps.rng ?? Math.random;
    }

    get(id: string): PendingChallenge | undefined {
        return this.deps.store.get().challenges[id];
    }

    pendingBetween(challenger: string, target: string, room: string): PendingChallenge | undefined {
        return this.pending((c) => c.challenger === challenger && c.target === target && c.room === room)[0];
    }

    /** Newest pending challenge naming `target`. */
    pendingFor(target: string, room: string): PendingChallenge | undefined {
        return this.pending((c) => c.target === target && c.room === room)[0];
    }

    async create(challenger: string, target: string, room: string, wager: number): Promise<CreateResult> {
        const { config, validator, ledger, store } = this.deps;
        if (!config.enabled) return reject("disabled", "Challenges are currently disabled.");

        const invalid = validator.validate(challenger, room, wager, {
            game: "challenge",
            minWager: config.minWager,
            maxWager: config.maxWager,
            cooldownSeconds: 0,
        });
        if (invalid) return invalid;

        if (challenger.toLowerCase() === target.toLowerCase()) {
            return reject("self_challenge", "You can't challenge yourself.");
        }
        if (validator.isExcluded(target, room)) return reject("target_ineligible", "That user can't be challenged.");

        const targetAccount = ledger.getAccount(target, room);
        if (!targetAccount) return reject("target_ineligible", `${target} doesn't have an account.`);
        if (targetAccount.balance < wager) {
            return reject("target_insufficient_funds", `${target} can't afford that wager.`);
        }
        if (this.pendingBetween(challenger, target, room)) {
            return reject("duplicate_challenge", `You already have a pending challenge with ${target}.`);
        }

        const escrow = await ledger.atomicDebit(challenger, room, wager, { trigger: TRIGGER, relatedUser: target });
        if (!escrow.ok) return rejectLedgerFailure(escrow.reason, { challenger, target, room });

        const now = this.clock();
        const record: PendingChallenge = {
            id: randomUUID(),
            challenger,
            target,
            room,
            wager,
            createdAt: toIso(now),
            expiresAt: toIso(now.plus({ seconds: config.acceptTimeoutSeconds })),
            status: "pending",
        };
        // re-check the pair inside the write: a concurrent create may have won while we debited
        const inserted = await this.write(() =>
            store.update((s) => {
                const clash = Object.values(s.challenges).some(
                    (c) => c.status === "pending" && c.challenger === challenger && c.target === target && c.room === room
                );
                if (clash) return "duplicate";
                s.challenges[record.id] = record;
                return "inserted";
            })
        );
        if (inserted !== "inserted") {
            await this.refund(challenger, room, wager, "Challenge not recorded");
            if (inserted === "duplicate") {
                return reject("duplicate_challenge", `You already have a pending challenge with ${target}.`);
            }
            return rejectLedgerFailure("storage_error", { challenger, target, room });
        }

        logger.info("Challenge created", { id: record.id, challenger, target, room, wager, expiresAt: record.expiresAt });
        return { status: "created", challenge: { ...record }, notify: { room, user: target } };
    }

    async accept(target: string, room: string): Promise<AcceptResult> {
        const { ledger, config, stats } = this.deps;
        const challenge = this.pendingFor(target, room);
        if (!challenge) return reject("no_pending_challenge", "No pending challenge to accept.");

        if (this.clock() > parseIso(challenge.expiresAt)) {
            const expired = await this.expire(challenge.id);
            if (expired) return { status: "expired", challenge: expired };
            return reject("no_pending_challenge", "No pending challenge to accept.");
        }

        const { challenger, wager } = challenge;
        const escrow = await ledger.atomicDebit(target, room, wager, { trigger: TRIGGER, relatedUser: challenger });
        if (!escrow.ok) {
            // challenge stays pending; a retry or the expiry sweep resolves it
            if (escrow.reason === "storage_error") return rejectLedgerFailure(escrow.reason, { target, room, id: challenge.id });
            return reject("insufficient_funds", "You can't afford the wager anymore.");
        }

        const accepted = await this.transition(challenge.id, "accepted");
        if (!accepted) {
            await this.refund(target, room, wager, "Challenge no longer pending");
            return reject("no_pending_challenge", "No pending challenge to accept.");
        }

        const challengerWins = this.rng() < 0.5;
        const winner = challengerWins ? challenger : target;
        const loser = challengerWins ? target : challenger;
        const pot = wager * 2;
        const rake = Math.floor(pot * (config.rakePercent / 100));
        const prize = pot - rake;
        const metadata = { challengeId: challenge.id, pot, rake };

        const sides = [
            { user: winner, other: loser, payout: prize },
            { user: loser, other: winner, payout: 0 },
        ];
        const unsettled: UnsettledEscrow[] = [];
        for (const side of sides) {
            const res = await ledger.settle(side.user, room, {
                escrow: wager,
                payout: side.payout,
                trigger: TRIGGER,
                relatedUser: side.other,
                metadata,
            });
            if (!res.ok) {
                unsettled.push({ user: side.user, escrow: wager, payout: side.payout, reason: res.reason });
                continue;
            }
            await stats.record(side.user, room, "challenge", side.payout - wager);
        }
        if (unsettled.length > 0) {
            logger.error("Challenge settlement incomplete", { id: challenge.id, winner, loser, wager, prize, unsettled });
            return { status: "settlement_failed", room, challenge: accepted, unsettled, message: SETTLEMENT_FAILED_MESSAGE };
        }

        logger.info("Challenge settled", { id: challenge.id, winner, loser, pot, rake, prize });
        return {
            status: "settled",
            challenge: accepted,
            winner,
            loser,
            pot,
            rake,
            prize,
            winnerBalance: ledger.getBalance(winner, room),
            loserBalance: ledger.getBalance(loser, room),
            announce: config.announcePublic,
        };
    }

    async decline(target: string, room: string): Promise<DeclineResult> {
        const challenge = this.pendingFor(target, room);
        if (!challenge) return reject("no_pending_challenge", "No pending challenge to decline.");

        const declined = await this.transition(challenge.id, "declined");
        if (!declined) return reject("no_pending_challenge", "No pending challenge to decline.");

        await this.refund(declined.challenger, room, declined.wager, `Challenge declined by ${target}`);
        logger.info("Challenge declined", { id: declined.id, challenger: declined.challenger, target, room });
        return { status: "declined", challenge: declined };
    }

    /** Expires and refunds every pending challenge past its deadline. Safe to run repeatedly. */
    async expireOverdue(): Promise<PendingChallenge[]> {
        const now = this.clock();
        const overdue = this.pending((c) => now > parseIso(c.expiresAt));
        const expired: PendingChallenge[] = [];
        for (const c of overdue) {
            const done = await this.expire(c.id);
            if (done) expired.push(done);
        }
        if (expired.length > 0) logger.info("Challenges expired", { count: expired.length });
        return expired;
    }

    private async expire(id: string): Promise<PendingChallenge | undefined> {
        const expired = await this.transition(id, "expired");
        if (!expired) return undefined;
        await this.refund(expired.challenger, expired.room, expired.wager, "Challenge expired");
        return expired;
    }

    /** Compare-and-set from pending; undefined when the record already left pending. */
    private async transition(id: string, to: Exclude<ChallengeStatus, "pending">): Promise<PendingChallenge | undefined> {
        const resolvedAt = toIso(this.clock());
        return this.write(() =>
            this.deps.store.update((s) => {
                const rec = s.challenges[id];
                if (!rec || rec.status !== "pending") return undefined;
                rec.status = to;
                rec.resolvedAt = resolvedAt;
                return { ...rec };
            })
        );
    }

    /** Store faults become `undefined` so callers treat them like a lost race. */
    private async write<T>(op: () => Promise<T>): Promise<T | undefined> {
        try {
            return await op();
        } catch (e) {
            if (!(e instanceof StoreWriteError)) throw e;
            logger.error("Challenge state write failed", { error: e.message });
            return undefined;
        }
    }

    private async refund(user: string, room: string, amount: number, reason: string) {
        const res = await this.deps.ledger.refund(user, room, amount, REFUND_TRIGGER, reason);
        if (!res.ok) logger.error("Challenge refund failed", { user, room, amount, reason: res.reason });
    }

    private pending(match: (c: PendingChallenge) => boolean): PendingChallenge[] {
        return Object.values(this.deps.store.get().challenges)
            .filter((c) => c.status === "pending" && match(c))
            .sort(newestFirst);
    }
}
