/**
 * Addresses already claimed by a job during this crawl.
 *
 * `claim` never awaits, so the membership test and the insert run as one step
 * on the event loop; no other worker can interleave between them.
 */
export class VisitedSet {
  private readonly domains = new Set<string>();

  /** True when the caller won the claim and should crawl `domain`. */
  claim(domain: string): boolean {
    if (this.domains.has(domain)) return false;
    this.domains.add(domain);
    return true;
  }

  has(domain: string): boolean {
    return this.domains.has(domain);
  }

  get size(): number {
    return this.domains.size;
  }
}
