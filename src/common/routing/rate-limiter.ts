import type { RateLimitZoneConfig } from '../config/stack-config';
import { UnknownZoneError } from '../errors/routing-errors';

export type Admission = 'allow' | 'reject';

interface Bucket {
  tokens: number;
  updated_at: number;
}

interface Zone {
  config: RateLimitZoneConfig;
  buckets: Map<string, Bucket>;
}

export interface RateLimiterOptions {
  /** Clock in milliseconds */
  now?: () => number;
}

/**
 * Token buckets per zone and key. A bucket starts full at `burst`, refills continuously at `rate` tokens per second
 * and each admitted request takes one token. `admit` never waits.
 */
export class RateLimiter {
  private readonly zones = new Map<string, Zone>();
  private readonly now: () => number;
  private sweeper?: NodeJS.Timeout;

  constructor(zones: readonly RateLimitZoneConfig[], options: RateLimiterOptions = {}) {
    for (const config of zones) {
      this.zones.set(config.name, { config, buckets: new Map() });
    }
    this.now = options.now || Date.now;
  }

  private getZone(name: string): Zone {
    const zone = this.zones.get(name);
    if (!zone) {
      throw new UnknownZoneError(name);
    }
    return zone;
  }

  private refill(zone: Zone, bucket: Bucket, now: number): void {
    const elapsed = Math.max(now - bucket.updated_at, 0) / 1000;
    bucket.tokens = Math.min(zone.config.burst, bucket.tokens + elapsed * zone.config.rate);
    bucket.updated_at = now;
  }

  admit(zone_name: string, key: string): Admission {
    const zone = this.getZone(zone_name);
    const now = this.now();

    let bucket = zone.buckets.get(key);
    if (!bucket) {
      bucket = { tokens: zone.config.burst, updated_at: now };
      zone.buckets.set(key, bucket);
    } else {
      this.refill(zone, bucket, now);
    }

    if (bucket.tokens < 1) {
      return 'reject';
    }
    bucket.tokens -= 1;
    return 'allow';
  }

  /**
   * Tokens currently available to a key, without consuming any.
   */
  tokens(zone_name: string, key: string): number {
    const zone = this.getZone(zone_name);
    const bucket = zone.buckets.get(key);
    if (!bucket) {
      return zone.config.burst;
    }
    const elapsed = Math.max(this.now() - bucket.updated_at, 0) / 1000;
    return Math.min(zone.config.burst, bucket.tokens + elapsed * zone.config.rate);
  }

  size(zone_name: string): number {
    return this.getZone(zone_name).buckets.size;
  }

  /**
   * Drops buckets idle for longer than their zone's `idle_timeout`. Only full buckets go, so a key that returns
   * gets the same budget a retained bucket would have given it.
   */
  sweep(): number {
    const now = this.now();
    let evicted = 0;
    for (const zone of this.zones.values()) {
      for (const [key, bucket] of zone.buckets) {
        if (now - bucket.updated_at < zone.config.idle_timeout) {
          continue;
        }
        this.refill(zone, bucket, now);
        if (bucket.tokens >= zone.config.burst) {
          zone.buckets.delete(key);
          evicted++;
        }
      }
    }
    return evicted;
  }

  startSweeper(interval_ms: number): void {
    this.stopSweeper();
    this.sweeper = setInterval(() => this.sweep(), interval_ms);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = undefined;
    }
  }
}
