import { logger } from "../src/logger";
import { SETTLEMENT_FAILED_MESSAGE } from "../src/games/rules";
import { Harness, ROOM, createHarness, removeDir } from "./common/harness";

describe("ChallengeService", () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
    await h.fund("alice", 1000);
    await h.fund("bob", 1000);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeDir(h.dir);
  });

  it("should hold the challenger's wager and ask the target", async () => {
    const res = await h.challenges.create("alice", "bob", ROOM, 200);

    expect(res.status).toBe("created");
    if (res.status !== "created") return;
    expect(res.notify).toEqual({ room: ROOM, user: "bob" });
    expect(res.challenge).toMatchObject({
      challenger: "alice",
      target: "bob",
      wager: 200,
      status: "pending",
      createdAt: "2024-05-01T12:00:00.000Z",
      expiresAt: "2024-05-01T12:02:00.000Z",
    });
    expect(h.ledger.getBalance("alice", ROOM)).toBe(800);
    expect(h.challenges.pendingFor("bob", ROOM)?.id).toBe(res.challenge.id);
    expect(h.challenges.get(res.challenge.id)?.status).toBe("pending");
  });

  it("should settle the pot minus rake when the challenger wins", async () => {
    await h.challenges.create("alice", "bob", ROOM, 200);
    h.rng.queue(0.3);

    const res = await h.challenges.accept("bob", ROOM);

    expect(res).toMatchObject({
      status: "settled",
      winner: "alice",
      loser: "bob",
      pot: 400,
      rake: 20,
      prize: 380,
      winnerBalance: 1180,
      loserBalance: 800,
      announce: true,
    });
    expect(h.ledger.transactionsFor("alice", ROOM).map((t) => [t.kind, t.amount])).toEqual([
      ["admin", 1000],
      ["escrow", -200],
      ["escrow-release", 200],
      ["gamble-win", 180],
    ]);
    expect(h.ledger.transactionsFor("bob", ROOM).map((t) => [t.kind, t.amount])).toEqual([
      ["admin", 1000],
      ["escrow", -200],
      ["escrow-release", 200],
      ["gamble-loss", -200],
    ]);
    expect(h.stats.get("alice", ROOM)?.net).toBe(180);
    expect(h.stats.get("bob", ROOM)?.net).toBe(-200);
    expect(h.ledger.reconcile("bob", ROOM).balanced).toBe(true);
  });

  it("should let the target win on the upper half of the draw", async () => {
    const created = await h.challenges.create("alice", "bob", ROOM, 100);
    h.rng.queue(0.5);

    const res = await h.challenges.accept("bob", ROOM);

    expect(res).toMatchObject({ status: "settled", winner: "bob", loser: "alice", prize: 190 });
    expect(h.ledger.getBalance("bob", ROOM)).toBe(1090);
    expect(h.ledger.getBalance("alice", ROOM)).toBe(900);
    if (created.status === "created") expect(h.challenges.get(created.challenge.id)?.status).toBe("accepted");
  });

  it("should validate the pairing before holding anything", async () => {
    await h.fund("UBOT", 1000);
    await h.fund("carol", 100);

    expect(await h.challenges.create("alice", "alice", ROOM, 100)).toMatchObject({ reason: "self_challenge" });
    expect(await h.challenges.create("alice", "UBOT", ROOM, 100)).toMatchObject({ reason: "target_ineligible" });
    expect(await h.challenges.create("alice", "ghost", ROOM, 100)).toMatchObject({ reason: "target_ineligible" });
    expect(await h.challenges.create("alice", "carol", ROOM, 200)).toMatchObject({ reason: "target_insufficient_funds" });
    expect(await h.challenges.create("alice", "bob", ROOM, 10)).toMatchObject({ reason: "wager_too_low" });
    expect(h.ledger.getBalance("alice", ROOM)).toBe(1000);
  });

  it("should allow only one pending challenge per pair", async () => {
    await h.challenges.create("alice", "bob", ROOM, 100);

    expect(await h.challenges.create("alice", "bob", ROOM, 100)).toMatchObject({ reason: "duplicate_challenge" });
    expect(await h.challenges.create("bob", "alice", ROOM, 100)).toMatchObject({ status: "created" });
    expect(h.ledger.getBalance("alice", ROOM)).toBe(900);
  });

  it("should refund the loser of a concurrent create for the same pair", async () => {
    const results = await Promise.all([
      h.challenges.create("alice", "bob", ROOM, 100),
      h.challenges.create("alice", "bob", ROOM, 100),
    ]);

    expect(results.map((r) => r.status).sort()).toEqual(["created", "rejected"]);
    expect(h.ledger.getBalance("alice", ROOM)).toBe(900);
    expect(h.kinds("alice")).toEqual(["admin", "escrow", "escrow", "refund"]);
  });

  it("should expire and refund instead of accepting past the deadline", async () => {
    await h.challenges.create("alice", "bob", ROOM, 200);
    h.clock.advance({ seconds: 121 });

    const res = await h.challenges.accept("bob", ROOM);

    expect(res).toMatchObject({ status: "expired", challenge: { status: "expired", resolvedAt: "2024-05-01T12:02:01.000Z" } });
    expect(h.ledger.getBalance("alice", ROOM)).toBe(1000);
    expect(h.ledger.getBalance("bob", ROOM)).toBe(1000);
    expect(h.kinds("alice")).toEqual(["admin", "escrow", "refund"]);
    expect(await h.challenges.accept("bob", ROOM)).toMatchObject({ reason: "no_pending_challenge" });
  });

  it("should leave the challenge pending when the target can no longer pay", async () => {
    await h.challenges.create("alice", "bob", ROOM, 200);
    await h.ledger.debit("bob", ROOM, 900, "spend", "test.spend");

    const res = await h.challenges.accept("bob", ROOM);

    expect(res).toMatchObject({ reason: "insufficient_funds", message: "You can't afford the wager anymore." });
    expect(h.challenges.pendingFor("bob", ROOM)?.status).toBe("pending");
    expect(h.ledger.getBalance("alice", ROOM)).toBe(800);
  });

  it("should refund the challenger on decline", async () => {
    await h.challenges.create("alice", "bob", ROOM, 200);

    const res = await h.challenges.decline("bob", ROOM);

    expect(res).toMatchObject({ status: "declined", challenge: { challenger: "alice", status: "declined" } });
    expect(h.ledger.getBalance("alice", ROOM)).toBe(1000);
    expect(await h.challenges.decline("bob", ROOM)).toMatchObject({ reason: "no_pending_challenge" });
    expect(await h.challenges.accept("bob", ROOM)).toMatchObject({ reason: "no_pending_challenge" });
  });

  it("should settle only once when the target accepts twice at the same time", async () => {
    await h.challenges.create("alice", "bob", ROOM, 200);
    h.rng.queue(0.3);

    const results = await Promise.all([h.challenges.accept("bob", ROOM), h.challenges.accept("bob", ROOM)]);

    expect(results.map((r) => r.status).sort()).toEqual(["rejected", "settled"]);
    expect(h.ledger.getBalance("alice", ROOM)).toBe(1180);
    expect(h.ledger.getBalance("bob", ROOM)).toBe(800);
    expect(h.ledger.reconcile("bob", ROOM).balanced).toBe(true);
  });

  it("should report a settlement it could not save instead of a winner", async () => {
    jest.spyOn(logger, "error").mockImplementation(() => undefined);
    await h.challenges.create("alice", "bob", ROOM, 200);
    h.rng.queue(0.3);
    jest.spyOn(h.ledger, "settle").mockResolvedValueOnce({ ok: false, reason: "storage_error" });

    const res = await h.challenges.accept("bob", ROOM);

    expect(res).toMatchObject({
      status: "settlement_failed",
      room: ROOM,
      challenge: { challenger: "alice", target: "bob", status: "accepted" },
      unsettled: [{ user: "alice", escrow: 200, payout: 380, reason: "storage_error" }],
      message: SETTLEMENT_FAILED_MESSAGE,
    });
    expect(h.ledger.getBalance("alice", ROOM)).toBe(800);
    expect(h.ledger.getBalance("bob", ROOM)).toBe(800);
    expect(h.stats.get("alice", ROOM)).toBeUndefined();
  });

  it("should let the expiry sweep win over an accept still debiting", async () => {
    const created = await h.challenges.create("alice", "bob", ROOM, 200);

    const accepting = h.challenges.accept("bob", ROOM);
    h.clock.advance({ minutes: 3 });
    const swept = await h.challenges.expireOverdue();

    expect(await accepting).toMatchObject({ status: "rejected", reason: "no_pending_challenge" });
    expect(swept.map((c) => [c.id, c.status])).toEqual([[created.status === "created" && created.challenge.id, "expired"]]);
    expect(h.kinds("alice")).toEqual(["admin", "escrow", "refund"]);
    expect(h.kinds("bob")).toEqual(["admin", "escrow", "refund"]);
    expect(h.ledger.getBalance("bob", ROOM)).toBe(1000);
    expect(h.rng.remaining).toBe(0);
  });

  it("should sweep overdue challenges exactly once", async () => {
    await h.fund("carol", 1000);
    await h.challenges.create("alice", "bob", ROOM, 100);
    await h.challenges.create("carol", "bob", ROOM, 50);
    h.clock.advance({ seconds: 60 });
    await h.challenges.create("bob", "alice", ROOM, 70);
    h.clock.advance({ seconds: 61 });

    const first = await h.challenges.expireOverdue();
    const second = await h.challenges.expireOverdue();

    expect(first.map((c) => c.challenger).sort()).toEqual(["alice", "carol"]);
    expect(second).toEqual([]);
    expect(h.ledger.getBalance("alice", ROOM)).toBe(1000);
    expect(h.ledger.getBalance("carol", ROOM)).toBe(1000);
    expect(h.ledger.getBalance("bob", ROOM)).toBe(930);
    expect(h.kinds("alice")).toEqual(["admin", "escrow", "refund"]);
    expect(h.challenges.pendingFor("alice", ROOM)?.challenger).toBe("bob");
  });
});
