import "dotenv/config";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type PayoutConfig = {
    label: string;
    multiplier: number;
    probability: number;
};

export type SpinConfig = {
    enabled: boolean;
    minWager: number;
    maxWager: number;
    cooldownSeconds: number;
    dailyLimit: number;
    payouts: PayoutConfig[];
    announceJackpots: boolean;
    jackpotAnnounceThreshold: number;
};

export type FlipConfig = {
    enabled: boolean;
    minWager: number;
    maxWager: number;
    winChance: number;
    cooldownSeconds: number;
    dailyLimit: number;
};

export type FreeSpinConfig = {
    enabled: boolean;
    equivalentWager: number;
};

export type ChallengeConfig = {
    enabled: boolean;
    minWager: number;
    maxWager: number;
    acceptTimeoutSeconds: number;
    rakePercent: number;
    announcePublic: boolean;
};

export type HeistConfig = {
    enabled: boolean;
    minParticipants: number;
    joinWindowSeconds: number;
    successChance: number;
    pushChance: number;
    pushFeePercent: number;
    payoutMultiplier: number;
    crewBonusPerPlayer: number;
    cooldownSeconds: number;
    minWager: number;
    maxWager: number;
    announcePublic: boolean;
};

export type GamblingConfig = {
    enabled: boolean;
    minAccountAgeMinutes: number;
    spin: SpinConfig;
    flip: FlipConfig;
    freeSpin: FreeSpinConfig;
    challenge: ChallengeConfig;
    heist: HeistConfig;
};

export type RainConfig = {
    enabled: boolean;
    intervalMinutes: number;
    jitter: number;
    minAmount: number;
    maxAmount: number;
    notify: boolean;
};

export type MaintenanceConfig = {
    mode: "interest" | "decay" | "none";
    hourUtc: number;
    interest: { dailyRate: number; maxDailyInterest: number; minBalanceToEarn: number };
    decay: { dailyRate: number; exemptBelow: number };
};

export type EconomyConfig = {
    currencySymbol: string;
    welcomeWallet: number;
    ignoredUsers: string[];
    gambling: GamblingConfig;
    rain: RainConfig;
    maintenance: MaintenanceConfig;
};

function num(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === "") return fallback;
    const n = Number(raw);
    return Number.isFinite(n) ? n : fallback;
}

function bool(name: string, fallback: boolean): boolean {
    const raw = process.env[name];
    if (raw === undefined) return fallback;
    return raw === "1" || raw.toLowerCase() === "true";
}

function list(name: string): string[] {
    return (process.env[name] || "")
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0);
}

function logLevel(raw: string | undefined): LogLevel {
    switch (raw) {
        case "debug":
        case "info":
        case "warn":
        case "error":
            return raw;
        default:
            return "info";
    }
}

function maintenanceMode(raw: string | undefined): MaintenanceConfig["mode"] {
    return raw === "decay" || raw === "none" ? raw : "interest";
}

export const DEFAULT_PAYOUTS: PayoutConfig[] = [
    { label: "🍒🍒🍒", multiplier: 3, probability: 0.1 },
    { label: "🍋🍋🍋", multiplier: 5, probability: 0.05 },
    { label: "💎💎💎", multiplier: 10, probability: 0.02 },
    { label: "7️⃣7️⃣7️⃣", multiplier: 50, probability: 0.002 },
    { label: "partial", multiplier: 2, probability: 0.15 },
    { label: "loss", multiplier: 0, probability: 0.678 },
];

export function defaultEconomyConfig(): EconomyConfig {
    return {
        currencySymbol: process.env.CURRENCY_SYMBOL || "Z",
        welcomeWallet: num("WELCOME_WALLET", 100),
        ignoredUsers: list("IGNORED_USERS"),
        gambling: {
            enabled: bool("GAMBLING_ENABLED", true),
            minAccountAgeMinutes: num("GAMBLING_MIN_ACCOUNT_AGE_MINUTES", 60),
            spin: {
                enabled: true,
                minWager: 10,
                maxWager: 500,
                cooldownSeconds: 30,
                dailyLimit: 50,
                payouts: DEFAULT_PAYOUTS.map((p) => ({ ...p })),
                announceJackpots: true,
                jackpotAnnounceThreshold: 500,
            },
            flip: {
                enabled: true,
                minWager: 10,
                maxWager: 1000,
                winChance: 0.45,
                cooldownSeconds: 15,
                dailyLimit: 100,
            },
            freeSpin: { enabled: true, equivalentWager: 50 },
            challenge: {
                enabled: true,
                minWager: 50,
                maxWager: 5000,
                acceptTimeoutSeconds: num("CHALLENGE_ACCEPT_TIMEOUT_SECONDS", 120),
                rakePercent: num("CHALLENGE_RAKE_PERCENT", 5),
                announcePublic: true,
            },
            heist: {
                enabled: bool("HEIST_ENABLED", true),
                minParticipants: num("HEIST_MIN_PARTICIPANTS", 3),
                joinWindowSeconds: num("HEIST_JOIN_WINDOW_SECONDS", 120),
                successChance: num("HEIST_SUCCESS_CHANCE", 0.4),
                pushChance: num("HEIST_PUSH_CHANCE", 0.15),
                pushFeePercent: 5,
                payoutMultiplier: num("HEIST_PAYOUT_MULTIPLIER", 1.5),
                crewBonusPerPlayer: num("HEIST_CREW_BONUS", 0.25),
                cooldownSeconds: num("HEIST_COOLDOWN_SECONDS", 180),
                minWager: 20,
                maxWager: 5000,
                announcePublic: true,
            },
        },
        rain: {
            enabled: bool("RAIN_ENABLED", true),
            intervalMinutes: num("RAIN_INTERVAL_MINUTES", 45),
            jitter: 0.3,
            minAmount: num("RAIN_MIN_AMOUNT", 5),
            maxAmount: num("RAIN_MAX_AMOUNT", 25),
            notify: bool("RAIN_NOTIFY", true),
        },
        maintenance: {
            mode: maintenanceMode(process.env.MAINTENANCE_MODE),
            hourUtc: num("MAINTENANCE_HOUR_UTC", 3),
            interest: { dailyRate: 0.001, maxDailyInterest: 10, minBalanceToEarn: 100 },
            decay: { dailyRate: 0.005, exemptBelow: 50000 },
        },
    };
}

export const CONFIG = {
    dataDir: process.env.DATA_DIR || "./data",
    stateFile: process.env.STATE_FILE || "state.json",
    logLevel: logLevel(process.env.LOG_LEVEL),
    rooms: list("ECONOMY_ROOMS"),
    slack: {
        botToken: process.env.SLACK_BOT_TOKEN,
        appToken: process.env.SLACK_APP_TOKEN,
        signingSecret: process.env.SLACK_SIGNING_SECRET,
        port: num("PORT", 3000),
    },
    economy: defaultEconomyConfig(),
};
