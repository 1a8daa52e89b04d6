import { describe, it, expect, vi } from 'vitest';
import type { Target } from '../../src/config/index.js';
import { HealthAggregate, PollLoop, type HealthSnapshot } from '../../src/services/healthMonitor/index.js';
import type { HealthCheck } from '../../src/services/prober/index.js';
import { createCheck, createTarget, failedCheck } from '../fixtures/targets.js';

describe('PollLoop', () => {
  it('should update the aggregate, evaluate alerts and emit in order', async () => {
    const target = createTarget();
    const aggregate = new HealthAggregate(target);
    const calls: string[] = [];

    const loop = new PollLoop({
      target,
      aggregate,
      prober: {
        probe: vi.fn(async () => {
          calls.push('probe');
          return createCheck();
        }),
      },
      alerts: {
        evaluate: vi.fn((_target: Target, _check: HealthCheck, snapshot: HealthSnapshot) => {
          calls.push(`alerts:${snapshot.totalChecks}`);
          return [];
        }),
      },
      onCheck: (_check, snapshot) => {
        calls.push(`emit:${snapshot.totalChecks}`);
      },
    });

    await loop.runOnce();

    expect(calls).toEqual(['probe', 'alerts:1', 'emit:1']);
    expect(loop.completedIterations).toBe(1);
  });

  it('should report status transitions', async () => {
    const target = createTarget();
    const transitions: string[] = [];
    const checks = [createCheck(), failedCheck(), failedCheck(), failedCheck()];

    const loop = new PollLoop({
      target,
      aggregate: new HealthAggregate(target),
      prober: { probe: async () => checks.shift() ?? createCheck() },
      onStatusChange: (from, to) => transitions.push(`${from}->${to}`),
    });

    for (let i = 0; i < 4; i++) {
      await loop.runOnce();
    }

    expect(transitions).toEqual(['unknown->healthy', 'healthy->degraded', 'degraded->unhealthy']);
  });

  it('should not probe when already cancelled', async () => {
    const target = createTarget();
    const probe = vi.fn(async () => createCheck());
    const loop = new PollLoop({ target, aggregate: new HealthAggregate(target), prober: { probe } });
    const controller = new AbortController();
    controller.abort();

    await loop.run(controller.signal);

    expect(probe).not.toHaveBeenCalled();
    expect(loop.currentState).toBe('stopped');
  });

  it('should stop after the in-flight probe when cancelled mid-request', async () => {
    const target = createTarget({ intervalMs: 60000 });
    const controller = new AbortController();
    const probe = vi.fn(async (): Promise<HealthCheck> => {
      controller.abort();
      return createCheck();
    });
    const aggregate = new HealthAggregate(target);
    const loop = new PollLoop({ target, aggregate, prober: { probe } });

    await loop.run(controller.signal);

    expect(probe).toHaveBeenCalledTimes(1);
    expect(aggregate.snapshot().totalChecks).toBe(1);
  });

  it('should wake from its sleep when cancelled', async () => {
    const target = createTarget({ intervalMs: 60000 });
    const controller = new AbortController();
    const probe = vi.fn(async () => createCheck());
    const loop = new PollLoop({
      target,
      aggregate: new HealthAggregate(target),
      prober: { probe },
      onCheck: () => {
        setTimeout(() => controller.abort(), 10);
      },
    });

    const startedAt = Date.now();
    await loop.run(controller.signal);

    expect(probe).toHaveBeenCalledTimes(1);
    expect(Date.now() - startedAt).toBeLessThan(5000);
  });

  it('should probe again once the interval has passed', async () => {
    const target = createTarget({ intervalMs: 20 });
    const controller = new AbortController();
    const probe = vi.fn(async () => createCheck());
    const loop = new PollLoop({
      target,
      aggregate: new HealthAggregate(target),
      prober: { probe },
      onCheck: (_check, snapshot) => {
        if (snapshot.totalChecks === 3) controller.abort();
      },
    });

    await loop.run(controller.signal);

    expect(probe).toHaveBeenCalledTimes(3);
  });

  it('should propagate unexpected errors to its supervisor', async () => {
    const target = createTarget();
    const loop = new PollLoop({
      target,
      aggregate: new HealthAggregate(target),
      prober: {
        probe: async () => {
          throw new Error('probe exploded');
        },
      },
    });

    await expect(loop.run(new AbortController().signal)).rejects.toThrow('probe exploded');
    expect(loop.currentState).toBe('stopped');
  });
});
