import type { AuthorId } from "../types/brands";

/** Read side of the ban set, all the resolver needs. */
export interface BanLookup {
  has(authorId: AuthorId): boolean;
}

export class BanSet implements BanLookup, Iterable<AuthorId> {
  private readonly banned = new Set<AuthorId>();
  private ver = 0;

  /** @returns whether membership changed */
  dismiss(authorId: AuthorId): boolean {
    if (this.banned.has(authorId)) return false;
    this.banned.add(authorId);
    this.ver++;
    return true;
  }

  /** @returns whether membership changed */
  allow(authorId: AuthorId): boolean {
    if (!this.banned.delete(authorId)) return false;
    this.ver++;
    return true;
  }

  has(authorId: AuthorId): boolean {
    return this.banned.has(authorId);
  }

  get size(): number {
    return this.banned.size;
  }

  get version(): number {
    return this.ver;
  }

  [Symbol.iterator](): Iterator<AuthorId> {
    return this.banned.values();
  }
}
