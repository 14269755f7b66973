import { EconomyConfig } from "./config";
import { Economy } from "./economy";
import { ChallengeService } from "./challenge";
import { HeistCoordinator, HeistResolution } from "./heist";
import { MessageSender, PresenceProvider } from "./messaging";
import { Scheduler } from "./scheduler";

export const CHALLENGE_SWEEP_MS = 60_000;
export const HEIST_SWEEP_MS = 10_000;
export const MIN_RAIN_INTERVAL_MS = 60_000;

export type EconomyJobDeps = {
    rooms: readonly string[];
    config: EconomyConfig;
    economy: Economy;
    challenges: ChallengeService;
    heists: HeistCoordinator;
    presence: PresenceProvider;
    messages: MessageSender;
};

export function describeHeist(res: HeistResolution, symbol: string): string {
    const crew = res.participants.length;
    switch (res.status) {
        case "cancelled":
            return `🏦 Heist cancelled: only ${crew} participant(s) (need ${res.required}). Everyone was refunded.`;
        case "succeeded": {
            const paid = Object.values(res.payouts).reduce((a, b) => a + b, 0);
            return `💰 The crew of ${crew} got away with ${paid} ${symbol} (${res.multiplier.toFixed(2)}x)!`;
        }
        case "pushed":
            return `😰 The crew escaped but dropped some loot. Wagers refunded minus a fee.`;
        case "failed":
            return `🚨 Busted! The crew of ${crew} lost ${res.totalWagered} ${symbol}.`;
        case "settlement_failed":
            return `⚠️ ${res.message}`;
    }
}

/** Wires the periodic economy tasks onto `scheduler`. Challenge expiry covers every room. */
export function registerEconomyJobs(scheduler: Scheduler, deps: EconomyJobDeps) {
    const { config, rooms, economy, challenges, heists, presence, messages } = deps;
    const symbol = config.currencySymbol;

    if (config.rain.enabled) {
        scheduler.register({
            name: "rain",
            schedule: {
                kind: "jittered",
                intervalMs: config.rain.intervalMinutes * 60_000,
                jitter: config.rain.jitter,
                minMs: MIN_RAIN_INTERVAL_MS,
            },
            run: async (signal) => {
                for (const room of rooms) {
                    if (signal.aborted) return;
                    const users = await presence.connectedUsers(room);
                    if (users.length === 0) continue;
                    const drop = await economy.distributeRain(room, users);
                    if (!config.rain.notify) continue;
                    for (const user of drop.recipients) {
                        messages.send(room, user, `☔ Rain drop! You received ${drop.amount} ${symbol} just for being here.`);
                    }
                }
            },
        });
    }

    if (config.maintenance.mode !== "none") {
        scheduler.register({
            name: "balance-maintenance",
            schedule: { kind: "daily", hourUtc: config.maintenance.hourUtc },
            run: async () => {
                for (const room of rooms) await economy.runMaintenance(room);
            },
        });
    }

    // runs even with challenges switched off so escrow of challenges already pending is refunded
    if (config.gambling.enabled) {
        scheduler.register({
            name: "challenge-expiry",
            schedule: { kind: "interval", intervalMs: CHALLENGE_SWEEP_MS },
            run: async () => {
                for (const c of await challenges.expireOverdue()) {
                    messages.send(c.room, c.challenger, `⚔️ Your challenge to ${c.target} expired. ${c.wager} ${symbol} refunded.`);
                    messages.send(c.room, c.target, `⚔️ Challenge from ${c.challenger} expired.`);
                }
            },
        });
    }

    if (config.gambling.enabled && config.gambling.heist.enabled) {
        scheduler.register({
            name: "heist-check",
            schedule: { kind: "interval", intervalMs: HEIST_SWEEP_MS },
            run: async () => {
                for (const res of await heists.resolveDue()) {
                    const text = describeHeist(res, symbol);
                    if (config.gambling.heist.announcePublic) messages.broadcast(res.room, text);
                    for (const user of res.participants) messages.send(res.room, user, text);
                }
            },
        });
    }
}
