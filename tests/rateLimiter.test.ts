import assert from 'node:assert/strict';
import test from 'node:test';

import { RateLimiter } from '../src/services/rateLimiter.service';
import { ManualClock } from './helpers/fakes';

const budgets = (telemetry: { capacity: number; refillPerMinute: number; minIntervalMs: number }) => ({
  telemetry,
  wake: { capacity: 2, refillPerMinute: 0.2, minIntervalMs: 60_000 },
});

test('acquire grants a full burst and then reports when the next grant is possible', () => {
  const clock = new ManualClock(0);
  const limiter = new RateLimiter(
    budgets({ capacity: 3, refillPerMinute: 60, minIntervalMs: 0 }),
    clock.now,
  );

  assert.deepEqual(limiter.acquire('telemetry'), { granted: true });
  assert.deepEqual(limiter.acquire('telemetry'), { granted: true });
  assert.deepEqual(limiter.acquire('telemetry'), { granted: true });

  // One token is back after a second, but three grants already sit in the 3 s window.
  assert.deepEqual(limiter.acquire('telemetry'), { granted: false, retryAt: 3000 });

  clock.advance(3000);
  assert.deepEqual(limiter.acquire('telemetry'), { granted: true });
});

test('never grants more than capacity within a capacity/refill window', () => {
  const clock = new ManualClock(0);
  const capacity = 3;
  const windowMs = 3000;
  const limiter = new RateLimiter(
    budgets({ capacity, refillPerMinute: 60, minIntervalMs: 0 }),
    clock.now,
  );

  const grants: number[] = [];
  for (let step = 0; step < 600; step += 1) {
    if (limiter.acquire('telemetry').granted) {
      grants.push(clock.now());
    }
    clock.advance(100);
  }

  assert.ok(grants.length > capacity);
  for (const grantedAt of grants) {
    const inWindow = grants.filter((other) => other > grantedAt - windowMs && other <= grantedAt);
    assert.ok(inWindow.length <= capacity, `window ending at ${grantedAt} holds ${inWindow.length}`);
  }
});

test('enforces the minimum interval between grants', () => {
  const clock = new ManualClock(0);
  const limiter = new RateLimiter(
    budgets({ capacity: 5, refillPerMinute: 60, minIntervalMs: 500 }),
    clock.now,
  );

  assert.deepEqual(limiter.acquire('telemetry'), { granted: true });
  assert.deepEqual(limiter.acquire('telemetry'), { granted: false, retryAt: 500 });

  clock.advance(499);
  assert.equal(limiter.acquire('telemetry').granted, false);

  clock.advance(1);
  assert.deepEqual(limiter.acquire('telemetry'), { granted: true });
});

test('endpoint classes have independent budgets and deferral counts', () => {
  const clock = new ManualClock(0);
  const limiter = new RateLimiter(
    budgets({ capacity: 1, refillPerMinute: 60, minIntervalMs: 0 }),
    clock.now,
  );

  assert.equal(limiter.acquire('telemetry').granted, true);
  assert.equal(limiter.acquire('telemetry').granted, false);
  assert.equal(limiter.acquire('telemetry').granted, false);
  assert.equal(limiter.acquire('wake').granted, true);

  const snapshot = limiter.snapshot();
  assert.equal(snapshot.telemetry.deferrals, 2);
  assert.equal(snapshot.telemetry.capacity, 1);
  assert.equal(snapshot.wake.deferrals, 0);
  assert.equal(snapshot.wake.tokens, 1);
});

test('the wake class refuses a second wake inside its minimum interval', () => {
  const clock = new ManualClock(0);
  const limiter = new RateLimiter(
    budgets({ capacity: 30, refillPerMinute: 6, minIntervalMs: 0 }),
    clock.now,
  );

  assert.equal(limiter.acquire('wake').granted, true);
  const second = limiter.acquire('wake');
  assert.equal(second.granted, false);
  assert.ok(!second.granted && second.retryAt >= 60_000);
});
