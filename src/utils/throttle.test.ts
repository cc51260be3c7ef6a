import { describe, expect, it } from 'vitest';
import { FakeClock } from '../testing/fakes';
import { Throttle } from './throttle';

describe('Throttle', () => {
  it('lets the first call through immediately', async () => {
    const clock = new FakeClock();
    const throttle = new Throttle(1000, () => clock.time, clock.sleep);

    await throttle.wait();

    expect(clock.sleeps).toEqual([]);
  });

  it('waits only for the remainder of the interval', async () => {
    const clock = new FakeClock();
    const throttle = new Throttle(1000, () => clock.time, clock.sleep);

    await throttle.wait();
    clock.advance(300);
    await throttle.wait();

    expect(clock.sleeps).toEqual([700]);
  });

  it('does not wait after a long pause', async () => {
    const clock = new FakeClock();
    const throttle = new Throttle(1000, () => clock.time, clock.sleep);

    await throttle.wait();
    clock.advance(5000);
    await throttle.wait();

    expect(clock.sleeps).toEqual([]);
  });
});
