import { assert } from 'chai';
import type { ShotDisplay } from '../types/camera';
import { ShotNotifier, type Schedule } from './shot-notifier';

class FakeTimers {
  now = 0;
  private timers: { due: number; callback: () => void; active: boolean }[] = [];

  schedule: Schedule = (callback, ms) => {
    const timer = { due: this.now + ms, callback, active: true };
    this.timers.push(timer);
    return () => {
      timer.active = false;
    };
  };

  get pending(): number {
    return this.timers.filter((timer) => timer.active).length;
  }

  advance(ms: number): void {
    this.now += ms;
    const due = this.timers.filter((timer) => timer.active && timer.due <= this.now);
    this.timers = this.timers.filter((timer) => timer.active && timer.due > this.now);
    due.forEach((timer) => timer.callback());
  }
}

describe('ShotNotifier', () => {
  it('shows a shot and reverts to idle after 500 ms', () => {
    const timers = new FakeTimers();
    const shown: ShotDisplay[] = [];
    const notifier = new ShotNotifier((display) => shown.push(display), timers.schedule);

    notifier.notify('single');
    assert.equal(notifier.display, 'single');

    timers.advance(499);
    assert.equal(notifier.display, 'single');
    timers.advance(1);
    assert.equal(notifier.display, 'idle');
    assert.deepEqual(shown, ['single', 'idle']);
  });

  it('restarts the timer when a new shot arrives', () => {
    const timers = new FakeTimers();
    const shown: ShotDisplay[] = [];
    const notifier = new ShotNotifier((display) => shown.push(display), timers.schedule);

    notifier.notify('single');
    timers.advance(200);
    notifier.notify('burst');
    assert.equal(notifier.display, 'burst');
    assert.equal(timers.pending, 1);

    timers.advance(499);
    assert.equal(notifier.display, 'burst');
    timers.advance(1);
    assert.equal(notifier.display, 'idle');
    assert.deepEqual(shown, ['single', 'burst', 'idle']);
  });

  it('cancels the pending revert on dispose', () => {
    const timers = new FakeTimers();
    const shown: ShotDisplay[] = [];
    const notifier = new ShotNotifier((display) => shown.push(display), timers.schedule);

    notifier.notify('burst');
    notifier.dispose();
    timers.advance(1000);

    assert.equal(timers.pending, 0);
    assert.deepEqual(shown, ['burst']);
  });
});
