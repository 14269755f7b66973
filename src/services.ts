import { EconomyConfig } from "./config";
import { FileStore } from "./storage/fileStore";
import { Ledger } from "./ledger";
import { CooldownTracker } from "./cooldowns";
import { GamblingStatsRecorder } from "./stats";
import { WagerValidator } from "./games/rules";
import { GamblingEngine } from "./gambling";
import { ChallengeService } from "./challenge";
import { HeistCoordinator, HeistStateStore } from "./heist";
import { Economy } from "./economy";
import { Clock, Rng } from "./time";

export type EconomyServices = {
    store: FileStore;
    ledger: Ledger;
    cooldowns: CooldownTracker;
    stats: GamblingStatsRecorder;
    validator: WagerValidator;
    gambling: GamblingEngine;
    challenges: ChallengeService;
    heists: HeistCoordinator;
    economy: Economy;
};

export function buildServices(params: {
    store: FileStore;
    config: EconomyConfig;
    clock?: Clock;
    rng?: Rng;
    heistState?: HeistStateStore;
}): EconomyServices {
    const { store, config, clock, rng } = params;
    const ledger = new Ledger(store, { clock });
    const cooldowns = new CooldownTracker(store, { clock });
    const stats = new GamblingStatsRecorder(store);
    const validator = new WagerValidator(ledger, cooldowns, config.gambling, {
        clock,
        ignoredUsers: config.ignoredUsers,
        symbol: config.currencySymbol,
    });
    return {
        store,
        ledger,
        cooldowns,
        stats,
        validator,
        gambling: new GamblingEngine({ ledger, cooldowns, stats, validator, config: config.gambling, rng }),
        challenges: new ChallengeService({ store, ledger, validator, stats, config: config.gambling.challenge, clock, rng }),
        heists: new HeistCoordinator({ ledger, validator, stats, config: config.gambling.heist, state: params.heistState, clock, rng }),
        economy: new Economy(ledger, config, { clock, rng }),
    };
}
