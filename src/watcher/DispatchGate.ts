/**
 * At most one in-flight job per file path. `admit` checks and claims a path
 * in a single synchronous step, so two events for the same file can never
 * both be admitted. A path is released only when its job has finished.
 */
export class DispatchGate {
  private readonly inFlight = new Set<string>();
  private idleResolvers: Array<() => void> = [];

  admit(path: string): boolean {
    if (this.inFlight.has(path)) return false;
    this.inFlight.add(path);
    return true;
  }

  release(path: string): void {
    this.inFlight.delete(path);
    if (this.inFlight.size === 0) {
      this.idleResolvers.splice(0).forEach(r => r());
    }
  }

  isInFlight(path: string): boolean {
    return this.inFlight.has(path);
  }

  size(): number {
    return this.inFlight.size;
  }

  /**
   * Resolves once no job is in flight.
   */
  onIdle(): Promise<void> {
    if (this.inFlight.size === 0) return Promise.resolve();
    return new Promise<void>(resolve => this.idleResolvers.push(resolve));
  }
}
