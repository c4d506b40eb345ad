/**
 * In-Memory Link Store
 *
 * Map-based LinkStore for tests and single-process development mode.
 */

import type { Link, NewLink } from "@shortly/shared";
import type { InsertResult, LinkStore } from "./types.js";

export interface MemoryLinkStoreOptions {
  /** Clock for `createdAt` (default: current time) */
  now?: () => Date;
}

export class MemoryLinkStore implements LinkStore {
  private links: Map<string, Link> = new Map();
  private nextId = 1;
  private readonly now: () => Date;

  constructor(options: MemoryLinkStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async insert(link: NewLink): Promise<InsertResult> {
    if (this.links.has(link.shortCode)) {
      return { ok: false, reason: "duplicate_short_code" };
    }

    const stored: Link = {
      id: String(this.nextId++),
      originalUrl: link.originalUrl,
      shortCode: link.shortCode,
      createdAt: this.now(),
    };
    this.links.set(stored.shortCode, stored);
    return { ok: true, link: { ...stored } };
  }

  async findByShortCode(shortCode: string): Promise<Link | null> {
    const link = this.links.get(shortCode);
    return link ? { ...link } : null;
  }

  /** Number of stored links */
  get size(): number {
    return this.links.size;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}
