import { Ledger } from "../src/ledger";
import { FileStore } from "../src/storage/fileStore";
import { logger } from "../src/logger";
import { ROOM, TestClock, removeDir, tempStore } from "./common/harness";

describe("Ledger", () => {
  let store: FileStore;
  let dir: string;
  let ledger: Ledger;
  let clock: TestClock;

  beforeEach(async () => {
    ({ store, dir } = await tempStore());
    clock = new TestClock();
    ledger = new Ledger(store, { clock: clock.read });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeDir(dir);
  });

  it("should create the account on first credit and record the balance after", async () => {
    const res = await ledger.credit("U1", ROOM, 100, "earn", "test.earn", { reason: "hello" });

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.amount).toBe(100);
    expect(res.value.balanceAfter).toBe(100);
    expect(res.value.trigger).toBe("test.earn");
    expect(ledger.getBalance("U1", ROOM)).toBe(100);
    expect(ledger.getAccount("U1", ROOM)?.lifetimeEarned).toBe(100);
    expect(ledger.getAccount("U1", ROOM)?.firstSeen).toBe("2024-05-01T12:00:00.000Z");
  });

  it("should keep balances separate per room", async () => {
    await ledger.credit("U1", ROOM, 100, "earn", "test.earn");
    await ledger.credit("U1", "C-OTHER", 7, "earn", "test.earn");

    expect(ledger.getBalance("U1", ROOM)).toBe(100);
    expect(ledger.getBalance("U1", "C-OTHER")).toBe(7);
    expect(ledger.accountsIn("C-OTHER").map((a) => a.user)).toEqual(["U1"]);
  });

  it("should refuse a debit that would overdraw", async () => {
    await ledger.credit("U1", ROOM, 50, "earn", "test.earn");

    const res = await ledger.debit("U1", ROOM, 80, "spend", "test.spend");

    expect(res).toEqual({ ok: false, reason: "insufficient_funds" });
    expect(ledger.getBalance("U1", ROOM)).toBe(50);
    expect(ledger.transactionsFor("U1", ROOM)).toHaveLength(1);
  });

  it("should report a missing account on debit", async () => {
    const res = await ledger.debit("nobody", ROOM, 1, "spend", "test.spend");
    expect(res).toEqual({ ok: false, reason: "account_not_found" });
  });

  it("should reject non-positive or fractional amounts", async () => {
    await expect(ledger.credit("U1", ROOM, 0, "earn", "test.earn")).rejects.toThrow(RangeError);
    await expect(ledger.credit("U1", ROOM, 2.5, "earn", "test.earn")).rejects.toThrow(RangeError);
    expect(ledger.getAccount("U1", ROOM)).toBeUndefined();
  });

  it("should let exactly one of two concurrent atomic debits through", async () => {
    await ledger.credit("U1", ROOM, 100, "earn", "test.earn");

    const results = await Promise.all([ledger.atomicDebit("U1", ROOM, 80), ledger.atomicDebit("U1", ROOM, 80)]);

    expect(results.filter((r) => r.ok)).toHaveLength(1);
    expect(results.filter((r) => !r.ok)).toEqual([{ ok: false, reason: "insufficient_funds" }]);
    expect(ledger.getBalance("U1", ROOM)).toBe(20);
    expect(ledger.transactionsFor("U1", ROOM).map((t) => t.kind)).toEqual(["earn", "escrow"]);
  });

  it("should pay a claim only once under concurrent requests", async () => {
    const results = await Promise.all([
      ledger.claimOnce("U1", ROOM, "welcome_wallet", 100),
      ledger.claimOnce("U1", ROOM, "welcome_wallet", 100),
    ]);

    expect(results.filter((r) => r.ok)).toHaveLength(1);
    expect(results.filter((r) => !r.ok)).toEqual([{ ok: false, reason: "already_claimed" }]);
    expect(ledger.getBalance("U1", ROOM)).toBe(100);
    expect(ledger.getAccount("U1", ROOM)?.claims.welcome_wallet).toBe("2024-05-01T12:00:00.000Z");
  });

  it("should settle an escrow as a release plus one gamble transaction", async () => {
    await ledger.credit("U1", ROOM, 1000, "admin", "test.fund");
    await ledger.atomicDebit("U1", ROOM, 100, { trigger: "gambling.spin" });

    const res = await ledger.settle("U1", ROOM, { escrow: 100, payout: 300, trigger: "gambling.spin" });

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.net).toBe(200);
    expect(res.value.balance).toBe(1200);
    expect(res.value.outcome?.kind).toBe("gamble-win");
    expect(ledger.transactionsFor("U1", ROOM).map((t) => [t.kind, t.amount])).toEqual([
      ["admin", 1000],
      ["escrow", -100],
      ["escrow-release", 100],
      ["gamble-win", 200],
    ]);
    expect(ledger.getAccount("U1", ROOM)?.lifetimeWagered).toBe(100);
    expect(ledger.getAccount("U1", ROOM)?.lifetimePaidOut).toBe(300);
    expect(ledger.reconcile("U1", ROOM)).toEqual({ balance: 1200, ledgerSum: 1200, balanced: true });
  });

  it("should book only the release when the payout equals the escrow", async () => {
    await ledger.credit("U1", ROOM, 100, "admin", "test.fund");
    await ledger.atomicDebit("U1", ROOM, 100);

    const res = await ledger.settle("U1", ROOM, { escrow: 100, payout: 100, trigger: "gambling.heist" });

    expect(res.ok && res.value.outcome).toBeUndefined();
    expect(ledger.getBalance("U1", ROOM)).toBe(100);
    expect(ledger.transactionsFor("U1", ROOM).map((t) => t.kind)).toEqual(["admin", "escrow", "escrow-release"]);
  });

  it("should book a total loss as a release and a gamble loss", async () => {
    await ledger.credit("U1", ROOM, 100, "admin", "test.fund");
    await ledger.atomicDebit("U1", ROOM, 60);

    await ledger.settle("U1", ROOM, { escrow: 60, payout: 0, trigger: "gambling.flip" });

    expect(ledger.getBalance("U1", ROOM)).toBe(40);
    expect(ledger.transactionsFor("U1", ROOM).map((t) => t.amount)).toEqual([100, -60, 60, -60]);
    expect(ledger.reconcile("U1", ROOM).balanced).toBe(true);
  });

  it("should cap daily interest and skip balances under the threshold", async () => {
    await ledger.credit("rich", ROOM, 20000, "admin", "test.fund");
    await ledger.credit("modest", ROOM, 1500, "admin", "test.fund");
    await ledger.credit("poor", ROOM, 50, "admin", "test.fund");

    const res = await ledger.applyInterest(ROOM, 0.001, 10, 100);

    expect(res).toEqual({ ok: true, value: 11 });
    expect(ledger.getBalance("rich", ROOM)).toBe(20010);
    expect(ledger.getBalance("modest", ROOM)).toBe(1501);
    expect(ledger.getBalance("poor", ROOM)).toBe(50);
  });

  it("should decay balances at or above the exemption line", async () => {
    await ledger.credit("whale", ROOM, 100000, "admin", "test.fund");
    await ledger.credit("minnow", ROOM, 1000, "admin", "test.fund");

    const res = await ledger.applyDecay(ROOM, 0.005, 50000);

    expect(res).toEqual({ ok: true, value: 500 });
    expect(ledger.getBalance("whale", ROOM)).toBe(99500);
    expect(ledger.getBalance("minnow", ROOM)).toBe(1000);
  });

  it("should report a storage fault and keep the last persisted balance", async () => {
    jest.spyOn(logger, "error").mockImplementation(() => undefined);
    await ledger.credit("U1", ROOM, 100, "earn", "test.earn");
    await removeDir(dir);

    const res = await ledger.credit("U1", ROOM, 50, "earn", "test.earn");

    expect(res).toEqual({ ok: false, reason: "storage_error" });
    expect(ledger.getBalance("U1", ROOM)).toBe(100);
    expect(ledger.transactionsFor("U1", ROOM)).toHaveLength(1);
  });

  it("should flag restricted accounts and bump lastSeen on touch", async () => {
    await ledger.touch("U1", ROOM);
    clock.advance({ minutes: 5 });
    await ledger.touch("U1", ROOM);

    const restricted = await ledger.setRestricted("U1", ROOM, true);

    expect(restricted.ok && restricted.value.restricted).toBe(true);
    expect(ledger.getAccount("U1", ROOM)?.lastSeen).toBe("2024-05-01T12:05:00.000Z");
    expect(ledger.getBalance("U1", ROOM)).toBe(0);
    expect(await ledger.setRestricted("nobody", ROOM, true)).toEqual({ ok: false, reason: "account_not_found" });
  });
});
