import { EconomyConfig } from "../src/config";
import { describeHeist, registerEconomyJobs } from "../src/jobs";
import { PresenceProvider } from "../src/messaging";
import { Scheduler } from "../src/scheduler";
import { Harness, ManualSleeper, ROOM, RecordingSender, createHarness, removeDir } from "./common/harness";

class FixedPresence implements PresenceProvider {
  constructor(private readonly users: Record<string, string[]>) {}

  async connectedUsers(room: string): Promise<string[]> {
    return this.users[room] ?? [];
  }
}

describe("registerEconomyJobs", () => {
  let h: Harness;
  let sleeper: ManualSleeper;
  let scheduler: Scheduler;
  let messages: RecordingSender;

  async function setup(configure: (config: EconomyConfig) => void, presence: Record<string, string[]> = {}) {
    h = await createHarness(configure);
    sleeper = new ManualSleeper();
    messages = new RecordingSender();
    scheduler = new Scheduler({ clock: h.clock.read, rng: () => 0.5, sleep: sleeper.sleep });
    registerEconomyJobs(scheduler, {
      rooms: [ROOM],
      config: h.config,
      economy: h.economy,
      challenges: h.challenges,
      heists: h.heists,
      presence: new FixedPresence(presence),
      messages,
    });
  }

  function only(task: "rain" | "maintenance" | "challenges" | "heists") {
    return (config: EconomyConfig) => {
      config.rain.enabled = task === "rain";
      config.maintenance.mode = task === "maintenance" ? "interest" : "none";
      config.gambling.challenge.enabled = task === "challenges";
      config.gambling.heist.enabled = task === "heists";
    };
  }

  afterEach(async () => {
    expect(await scheduler.stop()).toEqual([]);
    await removeDir(h.dir);
  });

  it("should register one task per enabled feature", async () => {
    await setup(() => undefined);

    expect(scheduler.taskNames()).toEqual(["rain", "balance-maintenance", "challenge-expiry", "heist-check"]);
  });

  it("should skip features that are switched off", async () => {
    await setup((config) => {
      config.rain.enabled = false;
      config.maintenance.mode = "none";
      config.gambling.heist.enabled = false;
    });

    expect(scheduler.taskNames()).toEqual(["challenge-expiry"]);
  });

  it("should rain on connected users and tell each of them", async () => {
    await setup(only("rain"), { [ROOM]: ["U1", "U2"] });
    h.rng.queue(0);
    scheduler.start();

    await sleeper.tick();

    expect(h.ledger.getBalance("U1", ROOM)).toBe(5);
    expect(h.ledger.getBalance("U2", ROOM)).toBe(5);
    expect(messages.sent).toEqual([
      { room: ROOM, user: "U1", text: "☔ Rain drop! You received 5 Z just for being here." },
      { room: ROOM, user: "U2", text: "☔ Rain drop! You received 5 Z just for being here." },
    ]);
  });

  it("should skip rooms nobody is in", async () => {
    await setup(only("rain"));
    scheduler.start();

    await sleeper.tick();

    expect(messages.sent).toEqual([]);
    expect(h.rng.remaining).toBe(0);
  });

  it("should apply balance maintenance once per day however often it fires", async () => {
    await setup(only("maintenance"));
    await h.fund("rich", 20000);
    scheduler.start();

    await sleeper.tick();
    await sleeper.tick();

    expect(h.ledger.getBalance("rich", ROOM)).toBe(20010);
    expect(sleeper.delays[0]).toBe(54_000_000);
  });

  it("should expire overdue challenges and notify both sides", async () => {
    await setup(only("challenges"));
    await h.fund("alice", 1000);
    await h.fund("bob", 1000);
    await h.challenges.create("alice", "bob", ROOM, 200);
    h.clock.advance({ minutes: 3 });
    scheduler.start();

    await sleeper.tick();

    expect(h.ledger.getBalance("alice", ROOM)).toBe(1000);
    expect(messages.sent).toEqual([
      { room: ROOM, user: "alice", text: "⚔️ Your challenge to bob expired. 200 Z refunded." },
      { room: ROOM, user: "bob", text: "⚔️ Challenge from alice expired." },
    ]);
  });

  it("should keep refunding pending challenges after challenges are switched off", async () => {
    await setup((config) => {
      only("challenges")(config);
      config.gambling.challenge.enabled = false;
    });
    await h.fund("alice", 1000);
    await h.fund("bob", 1000);
    h.config.gambling.challenge.enabled = true;
    await h.challenges.create("alice", "bob", ROOM, 200);
    h.config.gambling.challenge.enabled = false;
    h.clock.advance({ minutes: 3 });
    scheduler.start();

    await sleeper.tick();

    expect(scheduler.taskNames()).toEqual(["challenge-expiry"]);
    expect(h.ledger.getBalance("alice", ROOM)).toBe(1000);
    expect(h.kinds("alice")).toEqual(["admin", "escrow", "refund"]);
  });

  it("should register no sweeps while gambling is off", async () => {
    await setup((config) => {
      config.gambling.enabled = false;
    });

    expect(scheduler.taskNames()).toEqual(["rain", "balance-maintenance"]);
  });

  it("should resolve closed heists and announce the outcome", async () => {
    await setup(only("heists"));
    for (const user of ["ann", "ben"]) await h.fund(user, 1000);
    await h.heists.start("ann", ROOM, 50);
    await h.heists.join("ben", ROOM, 50);
    h.clock.advance({ minutes: 3 });
    scheduler.start();

    await sleeper.tick();

    const text = "🏦 Heist cancelled: only 2 participant(s) (need 3). Everyone was refunded.";
    expect(messages.broadcasts).toEqual([{ room: ROOM, text }]);
    expect(messages.sent.map((m) => m.user)).toEqual(["ann", "ben"]);
    expect(h.ledger.getBalance("ben", ROOM)).toBe(1000);
  });
});

describe("describeHeist", () => {
  it("should summarise each outcome in one line", () => {
    const base = { room: ROOM, participants: ["ann", "ben", "cat"], draw: 0.1, totalWagered: 150 };

    expect(describeHeist({ ...base, status: "succeeded", multiplier: 1.5, payouts: { ann: 75, ben: 75, cat: 75 } }, "Z")).toBe(
      "💰 The crew of 3 got away with 225 Z (1.50x)!"
    );
    expect(describeHeist({ ...base, status: "failed", multiplier: 0, payouts: { ann: 0, ben: 0, cat: 0 } }, "Z")).toBe(
      "🚨 Busted! The crew of 3 lost 150 Z."
    );
    expect(describeHeist({ ...base, status: "pushed", multiplier: 0.95, payouts: { ann: 47, ben: 47, cat: 47 } }, "Z")).toBe(
      "😰 The crew escaped but dropped some loot. Wagers refunded minus a fee."
    );
    expect(
      describeHeist(
        { ...base, status: "settlement_failed", outcome: "failed", unsettled: [], message: "The result could not be saved." },
        "Z"
      )
    ).toBe("⚠️ The result could not be saved.");
  });
});
