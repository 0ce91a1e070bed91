import { randomUUID } from "crypto";
import { hostname } from "os";

import { PollerLease } from "./models/PollerLease";
import { sleep } from "./utils/timeout";

type PollerLockOptions = {
  key: string;
  instanceId: string;
  leaseMs: number;
  renewEveryMs: number;
  retryEveryMs?: number;
};

export function makeInstanceId() {
  return `${hostname()}-${process.pid}-${randomUUID().slice(0, 8)}`;
}

function isDuplicateKeyError(e: unknown) {
  return typeof e === "object" && e !== null && "code" in e && e.code === 11000;
}

/**
 * Lease in MongoDB so only one process long-polls Telegram at a time
 * (two pollers on one token get 409 Conflict from getUpdates).
 */
export class PollerLock {
  private renewTimer: NodeJS.Timeout | null = null;

  constructor(private readonly opts: PollerLockOptions) {}

  private leaseEnd() {
    return new Date(Date.now() + this.opts.leaseMs);
  }

  /** Claims the lease when it is free, expired or already ours. */
  async tryAcquire(): Promise<boolean> {
    const { key, instanceId } = this.opts;
    try {
      const lease = await PollerLease.findOneAndUpdate(
        { key, $or: [{ expiresAt: { $lte: new Date() } }, { holder: instanceId }] },
        { $set: { holder: instanceId, expiresAt: this.leaseEnd() } },
        { upsert: true, new: true }
      ).lean();
      return lease?.holder === instanceId;
    } catch (e) {
      // upsert collided with a live lease held elsewhere
      if (isDuplicateKeyError(e)) return false;
      throw e;
    }
  }

  async acquire() {
    const retryEveryMs = this.opts.retryEveryMs ?? 2000;
    for (;;) {
      try {
        if (await this.tryAcquire()) break;
        console.log(`[LOCK] "${this.opts.key}" held by another instance, waiting`);
      } catch (e) {
        console.error(`[LOCK] Acquire failed, retrying in ${retryEveryMs}ms:`, e);
      }
      await sleep(retryEveryMs);
    }

    console.log(`[LOCK] "${this.opts.key}" acquired by ${this.opts.instanceId}`);
    if (this.renewTimer) return;
    this.renewTimer = setInterval(() => {
      this.renew().catch((e) => console.error("[LOCK] Renew failed:", e));
    }, this.opts.renewEveryMs);
  }

  private async renew() {
    const { key, instanceId } = this.opts;
    const res = await PollerLease.updateOne({ key, holder: instanceId }, { $set: { expiresAt: this.leaseEnd() } });
    if (res.matchedCount === 0) console.error(`[LOCK] "${key}" lease was lost`);
  }

  async release() {
    if (this.renewTimer) clearInterval(this.renewTimer);
    this.renewTimer = null;

    const { key, instanceId } = this.opts;
    try {
      await PollerLease.updateOne({ key, holder: instanceId }, { $set: { expiresAt: new Date() } });
      console.log(`[LOCK] "${key}" released by ${instanceId}`);
    } catch (e) {
      console.error("[LOCK] Release failed:", e);
    }
  }
}
