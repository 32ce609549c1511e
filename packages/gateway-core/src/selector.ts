// packages/gateway-core/src/selector.ts

import { NoHealthyBackendError } from "./errors";

/**
 * Strict round-robin per service. The cursor advances synchronously, so
 * concurrent requests each get the next instance in order.
 */
export class BackendSelector {
  private readonly cursors = new Map<string, number>();

  select(service: string, instances: readonly string[]): string {
    if (instances.length === 0) {
      throw new NoHealthyBackendError(service);
    }
    const cursor = this.cursors.get(service) ?? 0;
    this.cursors.set(service, cursor + 1);
    return instances[cursor % instances.length];
  }

  reset(service?: string): void {
    if (service === undefined) this.cursors.clear();
    else this.cursors.delete(service);
  }
}
