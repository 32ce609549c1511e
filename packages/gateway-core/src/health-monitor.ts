// packages/gateway-core/src/health-monitor.ts

import { describeError, silentLogger, type Logger } from "@gatehouse/audit";

import type { ServiceConfig } from "./config";
import type { FetchLike } from "./forwarder";

export interface InstanceHealthMonitorOptions {
  services: readonly ServiceConfig[];
  intervalMs: number;
  /** Per-probe timeout. Defaults to 2s. */
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export interface InstanceStatus {
  service: string;
  instance: string;
  healthy: boolean;
  checkedAt?: string;
}

/**
 * Periodically probes `<instance><healthPath>` and keeps the set of
 * instances that failed their last probe. Instances start healthy.
 */
export class InstanceHealthMonitor {
  private readonly services: Map<string, ServiceConfig>;
  private readonly down = new Set<string>();
  private readonly checkedAt = new Map<string, string>();
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | undefined;

  constructor(private readonly options: InstanceHealthMonitorOptions) {
    this.services = new Map(options.services.map((s) => [s.name, s]));
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 2_000;
    this.logger = options.logger ?? silentLogger;
  }

  /** Configured instances minus those that failed their last probe. */
  healthyInstances(service: string): string[] {
    const svc = this.services.get(service);
    if (!svc) return [];
    return svc.instances.filter((url) => !this.down.has(url));
  }

  status(): InstanceStatus[] {
    return [...this.services.values()].flatMap((svc) =>
      svc.instances.map((instance) => ({
        service: svc.name,
        instance,
        healthy: !this.down.has(instance),
        checkedAt: this.checkedAt.get(instance),
      }))
    );
  }

  async probe(): Promise<void> {
    const checks = [...this.services.values()].flatMap((svc) =>
      svc.instances.map((instance) => this.check(svc, instance))
    );
    await Promise.all(checks);
  }

  start(): void {
    if (this.timer || !(this.options.intervalMs > 0)) return;
    const run = () => {
      this.probe().catch((err: unknown) => {
        this.logger.error("health probe round failed", { error: describeError(err) });
      });
    };
    run();
    this.timer = setInterval(run, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  private async check(svc: ServiceConfig, instance: string): Promise<void> {
    let healthy: boolean;
    try {
      const res = await this.fetchImpl(`${instance}${svc.healthPath}`, {
        method: "GET",
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      // Drain so the connection can be reused.
      await res.arrayBuffer();
      healthy = res.ok;
    } catch (err: unknown) {
      this.logger.debug("health probe failed", { instance, error: describeError(err) });
      healthy = false;
    }

    this.checkedAt.set(instance, new Date().toISOString());
    const wasDown = this.down.has(instance);
    if (healthy && wasDown) {
      this.down.delete(instance);
      this.logger.info("instance back up", { service: svc.name, instance });
    } else if (!healthy && !wasDown) {
      this.down.add(instance);
      this.logger.warn("instance marked down", { service: svc.name, instance });
    }
  }
}
