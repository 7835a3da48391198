import type { RawListing } from '../types';

/** Identifiers are compared in string form, so `123` and `'123'` are one listing. */
export function listingFingerprint(listing: Pick<RawListing, 'list_id'>): string {
  return String(listing.list_id);
}

/**
 * Identifiers already emitted during one run. A store is created at run start
 * and dropped with the run; nothing is carried over between runs.
 */
export class FingerprintStore {
  private readonly fingerprints = new Set<string>();

  seen(id: string | number): boolean {
    return this.fingerprints.has(String(id));
  }

  record(id: string | number): void {
    this.fingerprints.add(String(id));
  }

  get size(): number {
    return this.fingerprints.size;
  }
}
