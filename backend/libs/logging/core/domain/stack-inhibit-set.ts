import { ErrorIdentity, IdentityTable } from './error-identity';

/**
 * StackInhibitSet - Error identities for which `trace` skips stack capture.
 *
 * Meant for frequent, low-value errors such as not-found sentinels, so call
 * sites can keep tracing defensively without paying for a stack each time.
 */
export class StackInhibitSet {
  private readonly identities = new IdentityTable<true>();

  inhibit(...identities: (ErrorIdentity | null | undefined)[]): void {
    for (const identity of identities) {
      this.identities.set(identity, true);
    }
  }

  isInhibited(err: unknown): boolean {
    return this.identities.has(err);
  }

  clear(): void {
    this.identities.clear();
  }
}

export const stackInhibitSet = new StackInhibitSet();

export function inhibitStackTrace(
  ...identities: (ErrorIdentity | null | undefined)[]
): void {
  stackInhibitSet.inhibit(...identities);
}
