export type TransactionKind =
| "earn"
| "spend"
| "escrow"
| "escrow-release"
| "refund"
| "gamble-win"
| "gamble-loss"
| "interest"
| "decay"
| "rain"
| "welcome"
| "admin";

export type Transaction = {
    id: string;
    user: string;
    room: string;
    amount: number;
    kind: TransactionKind;
    trigger: string;
    balanceAfter: number;
    reason?: string;
    relatedUser?: string;
    metadata?: Record<string, unknown>;
    createdAt: string;
};

export type Account = {
    user: string;
    room: string;
    balance: number;
    lifetimeEarned: number;
    lifetimeSpent: number;
    lifetimeWagered: number;
    lifetimePaidOut: number;
    /** claim flag name -> ISO time it was claimed */
    claims: Record<string, string>;
    restricted: boolean;
    firstSeen: string;
    lastSeen: string;
};

export type ChallengeStatus = "pending" | "accepted" | "declined" | "expired";

export type PendingChallenge = {
    id: string;
    challenger: string;
    target: string;
    room: string;
    wager: number;
    createdAt: string;
    expiresAt: string;
    status: ChallengeStatus;
    resolvedAt?: string;
};

export type GameKind = "spin" | "flip" | "free_spin" | "challenge" | "heist";

export type GamblingStats = {
    user: string;
    room: string;
    plays: Record<GameKind, number>;
    biggestWin: number;
    biggestLoss: number;
    net: number;
};

export type CooldownCounter = {
    user: string;
    room: string;
    activity: string;
    count: number;
    windowStart: string;
};

export type IdempotencyEntry = {
    key: string;
    createdAt: string;
    ttlMs?: number;
    meta?: Record<string, unknown>;
};

export type State = {
    version: number;
    accounts: Record<string, Account>;
    transactions: Transaction[];
    challenges: Record<string, PendingChallenge>;
    gamblingStats: Record<string, GamblingStats>;
    cooldownCounters: Record<string, CooldownCounter>;
    idempotency: Record<string, IdempotencyEntry>;
    createdAt: string;
    updatedAt: string;
};

export function accountKey(room: string, user: string): string {
    return `${room}/${user}`;
}

export function counterKey(room: string, user: string, activity: string): string {
    return `${room}/${user}/${activity}`;
}
