import { errorMessage } from "../core/errors";
import { createModuleLogger } from "../core/logger";

const log = createModuleLogger("health");

export interface HealthProbe {
  name: string;
  probe: () => Promise<void> | void;
}

export interface HealthCheckResult {
  name: string;
  ok: boolean;
  message: string;
  latency_ms: number;
}

export interface HealthEscalation {
  at: string;
  streak: number;
  failing: HealthCheckResult[];
}

/**
 * Probes the external dependencies on an interval. A dependency failing
 * `escalationThreshold` runs in a row is escalated once per outage.
 */
export class HealthScheduler {
  private timer: NodeJS.Timeout | undefined;
  private readonly streaks = new Map<string, number>();
  private lastResults: HealthCheckResult[] = [];
  private escalation: HealthEscalation | undefined;

  constructor(
    private readonly intervalMs: number,
    private readonly probes: readonly HealthProbe[],
    private readonly onEscalation?: (escalation: HealthEscalation) => void,
    private readonly escalationThreshold = 3,
  ) {}

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.runOnce().catch((error: unknown) => {
        log.error("health run failed", { error: errorMessage(error) });
      });
    }, this.intervalMs);
    this.timer.unref();
  }

  async runOnce(): Promise<HealthCheckResult[]> {
    const results: HealthCheckResult[] = [];
    for (const { name, probe } of this.probes) {
      const started = Date.now();
      try {
        await probe();
        results.push({ name, ok: true, message: "ok", latency_ms: Date.now() - started });
      } catch (error) {
        results.push({
          name,
          ok: false,
          message: errorMessage(error),
          latency_ms: Date.now() - started,
        });
      }
    }

    for (const result of results) {
      this.streaks.set(result.name, result.ok ? 0 : (this.streaks.get(result.name) ?? 0) + 1);
    }

    const escalated = results.filter(
      (result) =>
        !result.ok && (this.streaks.get(result.name) ?? 0) >= this.escalationThreshold,
    );
    if (escalated.length === 0) {
      this.escalation = undefined;
    } else if (!this.escalation) {
      const escalation: HealthEscalation = {
        at: new Date().toISOString(),
        streak: Math.max(...escalated.map((result) => this.streaks.get(result.name) ?? 0)),
        failing: escalated,
      };
      this.escalation = escalation;
      log.warn("dependency unhealthy", {
        failing: escalated.map((result) => `${result.name}: ${result.message}`),
        streak: escalation.streak,
      });
      this.onEscalation?.(escalation);
    }

    this.lastResults = results;
    return results;
  }

  getState(): {
    results: HealthCheckResult[];
    streaks: Record<string, number>;
    escalationThreshold: number;
    escalation?: HealthEscalation;
  } {
    return {
      results: this.lastResults,
      streaks: Object.fromEntries(this.streaks),
      escalationThreshold: this.escalationThreshold,
      ...(this.escalation ? { escalation: this.escalation } : {}),
    };
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = undefined;
  }
}
