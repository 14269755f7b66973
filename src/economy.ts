import { EconomyConfig } from "./config";
import { Ledger, LedgerResult } from "./ledger";
import { Clock, Rng, randomInt, systemClock, utcDate } from "./time";
import { Transaction } from "./types";
import { logger } from "./logger";

export const WELCOME_FLAG = "welcome_wallet";

export type RainDrop = {
    room: string;
    amount: number;
    recipients: string[];
};

export type MaintenanceRun =
    | { status: "applied"; room: string; mode: "interest" | "decay"; date: string; total: number }
    | { status: "skipped"; room: string; date: string; why: "disabled" | "already_ran" };

/** Time-based and one-shot rewards that sit outside the games. */
export class Economy {
    private readonly clock: Clock;
    private readonly rng: Rng;

    constructor(
        private readonly ledger: Ledger,
        private readonly config: EconomyConfig,
        opts: { clock?: Clock; rng?: Rng } = {}
    ) {
        this.clock = opts.clock ?? systemClock;
        this.rng = opts.rng ?? Math.random;
    }

    /** Pays the welcome wallet exactly once per account. */
    async grantWelcome(user: string, room: string): Promise<LedgerResult<Transaction>> {
        const res = await this.ledger.claimOnce(user, room, WELCOME_FLAG, this.config.welcomeWallet, {
            kind: "welcome",
            trigger: "onboarding.wallet",
        });
        if (res.ok) logger.info("Welcome wallet granted", { user, room, amount: this.config.welcomeWallet });
        return res;
    }

    /** Credits one randomly sized drop to every listed user. */
    async distributeRain(room: string, users: readonly string[]): Promise<RainDrop> {
        const { minAmount, maxAmount } = this.config.rain;
        const amount = randomInt(this.rng, minAmount, maxAmount);
        const recipients: string[] = [];
        for (const user of users) {
            const res = await this.ledger.credit(user, room, amount, "rain", "rain.ambient", { reason: `Rain drop: ${amount}` });
            if (res.ok) recipients.push(user);
            else logger.warn("Rain credit failed", { user, room, reason: res.reason });
        }
        logger.info("Rain", { room, amount, users: recipients.length });
        return { room, amount, recipients };
    }

    /** Interest or decay for one room, at most once per room per UTC day. */
    async runMaintenance(room: string): Promise<MaintenanceRun> {
        const { mode, interest, decay } = this.config.maintenance;
        const now = this.clock();
        const date = utcDate(now);
        if (mode === "none") return { status: "skipped", room, date, why: "disabled" };

        // the day key is written in the same store update as the postings
        const once = { key: `maintenance:${room}:${date}`, meta: { mode } };
        const res =
            mode === "interest"
                ? await this.ledger.applyInterest(room, interest.dailyRate, interest.maxDailyInterest, interest.minBalanceToEarn, once)
                : await this.ledger.applyDecay(room, decay.dailyRate, decay.exemptBelow, once);
        if (!res.ok && res.reason === "already_ran") return { status: "skipped", room, date, why: "already_ran" };
        if (!res.ok) throw new Error(`Balance maintenance failed: ${res.reason}`);

        logger.info("Balance maintenance", { room, mode, date, total: res.value });
        return { status: "applied", room, mode, date, total: res.value };
    }
}
