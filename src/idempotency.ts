import { State } from "./types";
import { logger } from "./logger";

export type OnceKey = {
  key: string;
  ttlMs?: number;
  meta?: Record<string, unknown>;
};

/**
 * Records `once.key` in `s` unless an unexpired entry already holds it. Call it
 * inside the same `FileStore.update` as the work it guards, so the key and the
 * work are persisted together or not at all.
 */
export function claimKey(s: State, once: OnceKey, now: number): boolean {
  const existing = s.idempotency[once.key];
  if (existing) {
    const created = new Date(existing.createdAt).getTime();
    const expired = typeof existing.ttlMs === "number" && now > created + existing.ttlMs;
    if (!expired) {
      logger.debug("Idempotent skip", { key: once.key });
      return false;
    }
  }

  s.idempotency[once.key] = {
    key: once.key,
    createdAt: new Date(now).toISOString(),
    ttlMs: once.ttlMs,
    meta: once.meta,
  };
  return true;
}
