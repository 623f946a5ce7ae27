import { CooldownTracker } from '../src/application/services/CooldownTracker.js';

describe('CooldownTracker', () => {
  let now: number;
  let tracker: CooldownTracker;

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    now = 1_700_000_000_000;
    tracker = new CooldownTracker(() => now);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should admit everything when no rate limit was seen', () => {
    expect(tracker.admit()).toBe(true);
    expect(tracker.getState()).toEqual({ isActive: false, expiresAt: null, backlogCount: 0 });
    expect(tracker.secondsRemaining()).toBe(0);
  });

  test('should hold admissions until the window expires', () => {
    tracker.recordRateLimit(30);

    expect(tracker.getState()).toEqual({ isActive: true, expiresAt: now + 30000, backlogCount: 0 });
    expect(tracker.admit()).toBe(false);

    now += 29_999;
    expect(tracker.admit()).toBe(false);

    now += 1;
    expect(tracker.admit()).toBe(true);
    expect(tracker.isActive()).toBe(false);
  });

  test('should reset the backlog once the window is over', () => {
    tracker.recordRateLimit(10);
    tracker.recordDeferred();
    tracker.recordDeferred();

    expect(tracker.getState().backlogCount).toBe(2);

    now += 10_000;
    expect(tracker.admit()).toBe(true);
    expect(tracker.getState()).toEqual({ isActive: false, expiresAt: null, backlogCount: 0 });
    expect(tracker.admit()).toBe(true);
  });

  test('should round remaining seconds up', () => {
    tracker.recordRateLimit(30);
    now += 100;

    expect(tracker.secondsRemaining()).toBe(30);

    now += 29_000;
    expect(tracker.secondsRemaining()).toBe(1);
  });

  test('should restart the window on a later rate limit', () => {
    tracker.recordRateLimit(30);
    now += 20_000;
    tracker.recordRateLimit(60);

    expect(tracker.getState().expiresAt).toBe(now + 60_000);
    expect(tracker.secondsRemaining()).toBe(60);
  });

  test('should not open a window for a non-positive Retry-After', () => {
    tracker.recordRateLimit(0);
    tracker.recordRateLimit(-5);

    expect(tracker.getState()).toEqual({ isActive: false, expiresAt: null, backlogCount: 0 });
    expect(tracker.admit()).toBe(true);
  });

  test('should only count deferrals while a window is open', () => {
    tracker.recordDeferred();
    expect(tracker.getState().backlogCount).toBe(0);

    tracker.recordRateLimit(10);
    tracker.recordDeferred();
    expect(tracker.getState().backlogCount).toBe(1);
  });
});
