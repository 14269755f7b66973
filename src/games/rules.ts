import { GamblingConfig } from "../config";
import { CooldownTracker } from "../cooldowns";
import { Ledger, LedgerFailure } from "../ledger";
import { logger } from "../logger";
import { Clock, parseIso, systemClock } from "../time";
import { GameKind } from "../types";

export type RejectionReason =
    | "disabled"
    | "no_account"
    | "restricted"
    | "account_too_young"
    | "wager_too_low"
    | "wager_too_high"
    | "insufficient_funds"
    | "cooldown"
    | "daily_limit"
    | "self_challenge"
    | "target_ineligible"
    | "target_insufficient_funds"
    | "duplicate_challenge"
    | "no_pending_challenge"
    | "heist_in_progress"
    | "heist_cooldown"
    | "no_active_heist"
    | "already_joined"
    | "window_closed";

export type Rejection = {
    status: "rejected";
    reason: RejectionReason;
    message: string;
    retryAfterSeconds?: number;
};

export type UnsettledEscrow = {
    user: string;
    escrow: number;
    payout: number;
    reason: LedgerFailure;
};

/** Currency is still held in escrow for `unsettled`; nothing about the outcome was paid to them. */
export type SettlementFailed = {
    status: "settlement_failed";
    room: string;
    unsettled: UnsettledEscrow[];
    message: string;
};

export const SETTLEMENT_FAILED_MESSAGE = "The result could not be saved. Held wagers stay in escrow until an admin settles them.";

export function reject(reason: RejectionReason, message: string, retryAfterSeconds?: number): Rejection {
    return { status: "rejected", reason, message, retryAfterSeconds };
}

/** Ledger failures surface to players as a lack of funds, whatever the cause. */
export function rejectLedgerFailure(failure: LedgerFailure, ctx: Record<string, unknown>): Rejection {
    if (failure === "storage_error") logger.error("Ledger unavailable during wager", { ...ctx, failure });
    return reject("insufficient_funds", "Insufficient funds.");
}

export type WagerRules = {
    game: GameKind;
    minWager: number;
    maxWager: number;
    cooldownSeconds: number;
    dailyLimit?: number;
};

/** Shared checks every wager passes before any currency moves. */
export class WagerValidator {
    private readonly clock: Clock;
    private readonly ignored: Set<string>;
    readonly symbol: string;

    constructor(
        private readonly ledger: Ledger,
        private readonly cooldowns: CooldownTracker,
        private readonly config: GamblingConfig,
        opts: { clock?: Clock; ignoredUsers?: readonly string[]; symbol?: string } = {}
    ) {
        this.clock = opts.clock ?? systemClock;
        this.ignored = new Set((opts.ignoredUsers ?? []).map((u) => u.toLowerCase()));
        this.symbol = opts.symbol ?? "Z";
    }

    isExcluded(user: string, room: string): boolean {
        if (this.ignored.has(user.toLowerCase())) return true;
        return this.ledger.getAccount(user, room)?.restricted ?? false;
    }

    validate(user: string, room: string, wager: number, rules: WagerRules): Rejection | null {
        const rejection = this.check(user, room, wager, rules);
        if (rejection) logger.debug("Wager rejected", { user, room, game: rules.game, wager, reason: rejection.reason });
        return rejection;
    }

    private check(user: string, room: string, wager: number, rules: WagerRules): Rejection | null {
        if (!this.config.enabled) return reject("disabled", "Gambling is currently disabled.");

        const account = this.ledger.getAccount(user, room);
        if (!account) return reject("no_account", "You need an account first. Stick around a bit!");
        if (account.restricted || this.ignored.has(user.toLowerCase())) {
            return reject("restricted", "Your economy access is restricted.");
        }

        const minAge = this.config.minAccountAgeMinutes;
        const ageMinutes = this.clock().diff(parseIso(account.firstSeen), "minutes").minutes;
        if (ageMinutes < minAge) {
            const remaining = Math.ceil(minAge - ageMinutes);
            return reject("account_too_young", `You need to be around for ${remaining} more minutes before gambling.`);
        }

        if (!Number.isSafeInteger(wager) || wager < rules.minWager) {
            return reject("wager_too_low", `Minimum wager: ${rules.minWager} ${this.symbol}.`);
        }
        if (wager > rules.maxWager) {
            return reject("wager_too_high", `Maximum wager: ${rules.maxWager} ${this.symbol}.`);
        }

        if (account.balance < wager) {
            return reject("insufficient_funds", `Insufficient funds. Balance: ${account.balance} ${this.symbol}.`);
        }

        const wait = this.cooldowns.remainingSeconds(user, room, rules.game, rules.cooldownSeconds);
        if (wait > 0) return reject("cooldown", `Cooldown: ${wait}s remaining.`, wait);

        if (rules.dailyLimit !== undefined && this.cooldowns.dailyCount(user, room, rules.game) >= rules.dailyLimit) {
            return reject("daily_limit", `Daily limit reached (${rules.dailyLimit} per day).`);
        }

        return null;
    }
}
