import { randomUUID } from "crypto";
import { Account, State, Transaction, TransactionKind, accountKey } from "./types";
import { FileStore, StoreWriteError } from "./storage/fileStore";
import { logger } from "./logger";
import { Clock, systemClock, toIso } from "./time";
import { OnceKey, claimKey } from "./idempotency";

export type LedgerFailure =
  | "insufficient_funds"
  | "already_claimed"
  | "already_ran"
  | "account_not_found"
  | "storage_error";

export type LedgerResult<T> = { ok: true; value: T } | { ok: false; reason: LedgerFailure };

export type PostingOptions = {
  reason?: string;
  relatedUser?: string;
  metadata?: Record<string, unknown>;
};

export type Settlement = {
  release: Transaction;
  outcome?: Transaction;
  net: number;
  balance: number;
};

export type Reconciliation = {
  balance: number;
  ledgerSum: number;
  balanced: boolean;
};

const EARNING_KINDS: ReadonlySet<TransactionKind> = new Set<TransactionKind>(["earn", "rain", "interest", "welcome", "admin"]);
const SPENDING_KINDS: ReadonlySet<TransactionKind> = new Set<TransactionKind>(["spend", "decay", "admin"]);

function ok<T>(value: T): LedgerResult<T> {
  return { ok: true, value };
}

function fail<T>(reason: LedgerFailure): LedgerResult<T> {
  return { ok: false, reason };
}

function assertAmount(amount: number) {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new RangeError(`Ledger amount must be a positive integer, got ${amount}`);
  }
}

/**
 * Sole owner of balance mutation. Each public mutation is one `FileStore.update`,
 * so the balance check and the change it guards cannot interleave with another
 * mutation; there is no check-then-act window for callers to race through.
 */
export class Ledger {
  private readonly clock: Clock;

  constructor(private readonly store: FileStore, opts: { clock?: Clock } = {}) {
    this.clock = opts.clock ?? systemClock;
  }

  getAccount(user: string, room: string): Account | undefined {
    return this.store.get().accounts[accountKey(room, user)];
  }

  getBalance(user: string, room: string): number {
    return this.getAccount(user, room)?.balance ?? 0;
  }

  accountsIn(room: string): Account[] {
    return Object.values(this.store.get().accounts).filter((a) => a.room === room);
  }

  transactionsFor(user: string, room: string): Transaction[] {
    return this.store.get().transactions.filter((t) => t.user === user && t.room === room);
  }

  reconcile(user: string, room: string): Reconciliation {
    const balance = this.getBalance(user, room);
    const ledgerSum = this.transactionsFor(user, room).reduce((sum, t) => sum + t.amount, 0);
    return { balance, ledgerSum, balanced: balance === ledgerSum };
  }

  /** Creates the account on first sight, otherwise bumps `lastSeen`. */
  async touch(user: string, room: string): Promise<LedgerResult<Account>> {
    return this.run<Account>((s) => {
      const acct = this.ensureAccount(s, user, room);
      acct.lastSeen = this.nowIso();
      return ok({ ...acct });
    });
  }

  async setRestricted(user: string, room: string, restricted: boolean): Promise<LedgerResult<Account>> {
    return this.run<Account>((s) => {
      const acct = s.accounts[accountKey(room, user)];
      if (!acct) return fail("account_not_found");
      acct.restricted = restricted;
      return ok({ ...acct });
    });
  }

  async credit(
    user: string,
    room: string,
    amount: number,
    kind: TransactionKind,
    trigger: string,
    opts: PostingOptions = {}
  ): Promise<LedgerResult<Transaction>> {
    assertAmount(amount);
    return this.run<Transaction>((s) => {
      const acct = this.ensureAccount(s, user, room);
      return ok(this.post(s, acct, amount, kind, trigger, opts));
    });
  }

  /** For deductions the caller has already validated; still refuses to go below zero. */
  async debit(
    user: string,
    room: string,
    amount: number,
    kind: TransactionKind,
    trigger: string,
    opts: PostingOptions = {}
  ): Promise<LedgerResult<Transaction>> {
    assertAmount(amount);
    return this.run<Transaction>((s) => {
      const acct = s.accounts[accountKey(room, user)];
      if (!acct) return fail("account_not_found");
      if (acct.balance < amount) return fail("insufficient_funds");
      return ok(this.post(s, acct, -amount, kind, trigger, opts));
    });
  }

  /** Debits only when `balance >= amount`; the only debit path wager-taking code may use. */
  async atomicDebit(
    user: string,
    room: string,
    amount: number,
    opts: PostingOptions & { trigger?: string } = {}
  ): Promise<LedgerResult<Transaction>> {
    assertAmount(amount);
    const { trigger = "escrow", ...posting } = opts;
    return this.run<Transaction>((s) => {
      const acct = s.accounts[accountKey(room, user)];
      if (!acct) return fail("account_not_found");
      if (acct.balance < amount) return fail("insufficient_funds");
      return ok(this.post(s, acct, -amount, "escrow", trigger, posting));
    });
  }

  /** Credits `amount` and sets `flag` only while the flag is unset. */
  async claimOnce(
    user: string,
    room: string,
    flag: string,
    amount: number,
    opts: { kind?: TransactionKind; trigger?: string } = {}
  ): Promise<LedgerResult<Transaction>> {
    assertAmount(amount);
    return this.run<Transaction>((s) => {
      const acct = this.ensureAccount(s, user, room);
      if (acct.claims[flag]) return fail("already_claimed");
      acct.claims[flag] = this.nowIso();
      return ok(this.post(s, acct, amount, opts.kind ?? "earn", opts.trigger ?? `claim.${flag}`, { metadata: { flag } }));
    });
  }

  async refund(user: string, room: string, amount: number, trigger: string, reason?: string): Promise<LedgerResult<Transaction>> {
    return this.credit(user, room, amount, "refund", trigger, { reason });
  }

  /**
   * Closes an escrow: releases the held `escrow`, then books the difference to
   * `payout` as a gamble-win or gamble-loss. A push books only the release.
   */
  async settle(
    user: string,
    room: string,
    params: PostingOptions & { escrow: number; payout: number; trigger: string }
  ): Promise<LedgerResult<Settlement>> {
    const { escrow, payout, trigger, ...posting } = params;
    assertAmount(escrow);
    if (!Number.isSafeInteger(payout) || payout < 0) {
      throw new RangeError(`Payout must be a non-negative integer, got ${payout}`);
    }
    return this.run<Settlement>((s) => {
      const acct = s.accounts[accountKey(room, user)];
      if (!acct) return fail("account_not_found");
      const release = this.post(s, acct, escrow, "escrow-release", trigger, { relatedUser: posting.relatedUser });
      const net = payout - escrow;
      let outcome: Transaction | undefined;
      if (net > 0) outcome = this.post(s, acct, net, "gamble-win", trigger, posting);
      if (net < 0) outcome = this.post(s, acct, net, "gamble-loss", trigger, posting);
      acct.lifetimeWagered += escrow;
      acct.lifetimePaidOut += payout;
      return ok({ release, outcome, net, balance: acct.balance });
    });
  }

  /**
   * Daily interest on every account at or above `minBalance`, capped per account.
   * With `once`, the key is recorded in the same write as the postings.
   */
  async applyInterest(
    room: string,
    rate: number,
    cap: number,
    minBalance: number,
    once?: OnceKey
  ): Promise<LedgerResult<number>> {
    return this.run<number>((s) => {
      if (once && !claimKey(s, once, this.clock().toMillis())) return fail("already_ran");
      let total = 0;
      for (const acct of Object.values(s.accounts)) {
        if (acct.room !== room || acct.balance < minBalance) continue;
        const interest = Math.min(Math.floor(acct.balance * rate), cap);
        if (interest <= 0) continue;
        this.post(s, acct, interest, "interest", "maintenance.interest");
        total += interest;
      }
      return ok(total);
    });
  }

  /** Daily decay on every account at or above `exemptBelow`; `once` as for `applyInterest`. */
  async applyDecay(room: string, rate: number, exemptBelow: number, once?: OnceKey): Promise<LedgerResult<number>> {
    return this.run<number>((s) => {
      if (once && !claimKey(s, once, this.clock().toMillis())) return fail("already_ran");
      let total = 0;
      for (const acct of Object.values(s.accounts)) {
        if (acct.room !== room || acct.balance < exemptBelow) continue;
        const decay = Math.min(Math.floor(acct.balance * rate), acct.balance);
        if (decay <= 0) continue;
        this.post(s, acct, -decay, "decay", "maintenance.decay", { reason: "Vault maintenance fee" });
        total += decay;
      }
      return ok(total);
    });
  }

  private async run<T>(mutator: (s: State) => LedgerResult<T>): Promise<LedgerResult<T>> {
    try {
      return await this.store.update(mutator);
    } catch (e) {
      if (e instanceof StoreWriteError) return fail("storage_error");
      throw e;
    }
  }

  private nowIso(): string {
    return toIso(this.clock());
  }

  private ensureAccount(s: State, user: string, room: string): Account {
    const key = accountKey(room, user);
    let acct = s.accounts[key];
    if (!acct) {
      const now = this.nowIso();
      acct = {
        user,
        room,
        balance: 0,
        lifetimeEarned: 0,
        lifetimeSpent: 0,
        lifetimeWagered: 0,
        lifetimePaidOut: 0,
        claims: {},
        restricted: false,
        firstSeen: now,
        lastSeen: now,
      };
      s.accounts[key] = acct;
      logger.debug("Account created", { user, room });
    }
    return acct;
  }

  private post(
    s: State,
    acct: Account,
    amount: number,
    kind: TransactionKind,
    trigger: string,
    opts: PostingOptions = {}
  ): Transaction {
    const balanceAfter = acct.balance + amount;
    if (balanceAfter < 0) {
      throw new Error(`Posting ${amount} would leave ${acct.room}/${acct.user} negative`);
    }
    const tx: Transaction = {
      id: randomUUID(),
      user: acct.user,
      room: acct.room,
      amount,
      kind,
      trigger,
      balanceAfter,
      reason: opts.reason,
      relatedUser: opts.relatedUser,
      metadata: opts.metadata,
      createdAt: this.nowIso(),
    };
    s.transactions.push(tx);
    acct.balance = balanceAfter;
    if (amount > 0 && EARNING_KINDS.has(kind)) acct.lifetimeEarned += amount;
    if (amount < 0 && SPENDING_KINDS.has(kind)) acct.lifetimeSpent += -amount;

    logger.info("Transaction", { user: acct.user, room: acct.room, kind, amount, trigger, balanceAfter });
    return tx;
  }
}
