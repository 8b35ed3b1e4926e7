/**
 * Deduplicated collection of discovered hostnames
 */
export class ResultSet {
  private hosts = new Set<string>();

  /**
   * @returns false when the hostname was already present
   */
  add(hostname: string): boolean {
    const key = hostname.toLowerCase();
    if (this.hosts.has(key)) {
      return false;
    }
    this.hosts.add(key);
    return true;
  }

  /**
   * @returns number of hostnames that were new
   */
  addAll(hostnames: Iterable<string>): number {
    let added = 0;
    for (const hostname of hostnames) {
      if (this.add(hostname)) {
        added++;
      }
    }
    return added;
  }

  has(hostname: string): boolean {
    return this.hosts.has(hostname.toLowerCase());
  }

  get size(): number {
    return this.hosts.size;
  }

  toSortedArray(): string[] {
    return [...this.hosts].sort();
  }
}
