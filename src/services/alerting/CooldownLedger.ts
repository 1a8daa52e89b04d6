/**
 * Composite key for tracking dispatches per (rule, target) pair.
 */
function ledgerKey(ruleName: string, targetName: string): string {
  return JSON.stringify([ruleName, targetName]);
}

/**
 * Last dispatch time per (rule, target).
 *
 * tryClaim() checks and records in one synchronous step, so two checks for
 * the same pair can never both pass within one cooldown window.
 */
export class CooldownLedger {
  private readonly entries: Map<string, number> = new Map();

  /**
   * Record a dispatch at `now` unless the pair is still cooling down.
   * Returns whether the caller may dispatch.
   */
  tryClaim(ruleName: string, targetName: string, cooldownMs: number, now: number): boolean {
    const key = ledgerKey(ruleName, targetName);
    const last = this.entries.get(key);

    if (last !== undefined && now - last < cooldownMs) {
      return false;
    }

    this.entries.set(key, now);
    return true;
  }

  /**
   * Timestamp of the last dispatch for the pair, if any
   */
  lastDispatch(ruleName: string, targetName: string): number | undefined {
    return this.entries.get(ledgerKey(ruleName, targetName));
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Forget every dispatch
   */
  clear(): void {
    this.entries.clear();
  }
}
