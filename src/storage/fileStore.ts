import { promises as fs } from "fs";
import * as path from "path";
import { State } from "../types";
import { logger, errorMessage } from "../logger";
import { KeyedLock } from "../locking";

const STATE_VERSION = 2;

export const DEFAULT_STATE = (): State => ({
    version: STATE_VERSION,
    accounts: {},
    transactions: [],
    challenges: {},
    gamblingStats: {},
    cooldownCounters: {},
    idempotency: {},
    createdAt: new Date().toISOString(),
    updatedAt: new Date().toISOString(),
});

export class StoreWriteError extends Error {
    constructor(readonly filePath: string, cause: unknown) {
        super(`Failed to persist state to ${filePath}: ${errorMessage(cause)}`);
        this.name = "StoreWriteError";
    }
}

export type FileStoreOptions = {
    dataDir: string;
    stateFile: string;
};

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section<T>(raw: Record<string, unknown>, key: string, fallback: T): T {
    const v = raw[key];
    if (Array.isArray(fallback)) return Array.isArray(v) ? (v as T) : fallback;
    return isRecord(v) ? (v as T) : fallback;
}

/** Fills sections a file written by an older version lacks. */
export function reviveState(raw: unknown): State {
    if (!isRecord(raw)) throw new Error("State file does not contain an object");
    const base = DEFAULT_STATE();
    return {
        version: STATE_VERSION,
        accounts: section(raw, "accounts", base.accounts),
        transactions: section(raw, "transactions", base.transactions),
        challenges: section(raw, "challenges", base.challenges),
        gamblingStats: section(raw, "gamblingStats", base.gamblingStats),
        cooldownCounters: section(raw, "cooldownCounters", base.cooldownCounters),
        idempotency: section(raw, "idempotency", base.idempotency),
        createdAt: typeof raw.createdAt === "string" ? raw.createdAt : base.createdAt,
        updatedAt: typeof raw.updatedAt === "string" ? raw.updatedAt : base.updatedAt,
    };
}

/**
 * JSON-file backed state. Every `update` is one critical section: the mutator's
 * checks, its in-memory changes and the atomic file write finish before the next
 * mutator starts. A failed write rolls memory back to the last persisted snapshot.
 */
export class FileStore {
   private state: State = DEFAULT_STATE();
   private persisted = "";
   private readonly filePath: string;
   private readonly lock = new KeyedLock();

   constructor(private readonly opts: FileStoreOptions) {
    this.filePath = path.join(opts.dataDir, opts.stateFile);
   }

   get file(): string {
    return this.filePath;
   }

   async init() {
    await fs.mkdir(this.opts.dataDir, { recursive: true });
    let raw: string;
    try {
        raw = await fs.readFile(this.filePath, "utf8");
    } catch (e) {
        if (isRecord(e) && e.code === "ENOENT") {
            logger.warn("No existing state; creating new", { file: this.filePath });
            this.state = DEFAULT_STATE();
            await this.lock.withLock("state", () => this.save());
            return;
        }
        throw e;
    }
    this.state = reviveState(JSON.parse(raw));
    this.persisted = JSON.stringify(this.state, null, 2);
    logger.info("State loaded", {
        file: this.filePath,
        accounts: Object.keys(this.state.accounts).length,
        transactions: this.state.transactions.length,
    });
   }

   /** Live view; treat as read-only outside `update`. */
   get(): State {
    return this.state;
   }

   async update<T>(mutator: (s: State) => T): Promise<T> {
    return this.lock.withLock("state", async () => {
        let result: T;
        try {
            result = mutator(this.state);
        } catch (e) {
            this.rollback();
            throw e;
        }
        await this.save();
        return result;
    });
   }

   private rollback() {
    this.state = this.persisted ? reviveState(JSON.parse(this.persisted)) : DEFAULT_STATE();
   }

   private async save() {
    this.state.updatedAt = new Date().toISOString();
    const body = JSON.stringify(this.state, null, 2);
    const tmp = this.filePath + ".tmp";
    try {
        await fs.writeFile(tmp, body, "utf8");
        await fs.rename(tmp, this.filePath);
    } catch (e) {
        logger.error("State save failed", { file: this.filePath, error: errorMessage(e) });
        this.rollback();
        throw new StoreWriteError(this.filePath, e);
    }
    this.persisted = body;
    logger.debug("State saved", { file: this.filePath });
   }
}
