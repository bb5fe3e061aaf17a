/**
 * @fileoverview Unit tests for entitlement state polling
 * @module tests/unit/client/convergence.test
 */

import {
  awaitEntitlementState,
  CallOptions,
  describeMismatch,
  EntitlementError,
  EntitlementStateSnapshot,
  RetryCancelledError,
  RetryExhaustedError,
  TESTING_BACKOFF_POLICY,
} from '../../../src/client';

jest.mock('firebase-functions/logger', () => ({
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
}));

const EXPIRY = new Date('2026-10-19T09:59:30.000Z');

function createTimeline() {
  let time = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => time,
    sleep: async (ms: number): Promise<void> => {
      sleeps.push(ms);
      time += ms;
    },
  };
}

describe('describeMismatch', () => {
  it('should accept a matching snapshot', () => {
    expect(
      describeMismatch(
        { state: 'EXPIRED', activationCode: 'code-1', expiresAt: EXPIRY },
        { state: 'EXPIRED', activationCode: 'code-1', expiresAt: EXPIRY }
      )
    ).toBeNull();
  });

  it('should report a state mismatch first', () => {
    expect(describeMismatch({ state: 'NONE' }, { state: 'ACTIVE', activationCode: 'code-1' })).toBe(
      'expected entitlement state to be ACTIVE but was NONE'
    );
  });

  it('should report a different activation code', () => {
    expect(
      describeMismatch({ state: 'ACTIVE', activationCode: 'code-1' }, { state: 'ACTIVE', activationCode: 'code-2' })
    ).toBe('incorrect activation code');
  });

  it('should compare expiries at whole-second precision', () => {
    const observed = new Date('2026-10-19T09:59:30.999Z');

    expect(
      describeMismatch({ state: 'EXPIRED', expiresAt: observed }, { state: 'EXPIRED', expiresAt: EXPIRY })
    ).toBeNull();
  });

  it('should report a different expiry', () => {
    expect(
      describeMismatch(
        { state: 'EXPIRED', expiresAt: new Date('2026-10-19T09:59:31.000Z') },
        { state: 'EXPIRED', expiresAt: EXPIRY }
      )
    ).toBe('expected expiry 2026-10-19T09:59:30.000Z but was 2026-10-19T09:59:31.000Z');
  });

  it('should report a missing expiry', () => {
    expect(describeMismatch({ state: 'ACTIVE' }, { state: 'ACTIVE', expiresAt: EXPIRY })).toBe(
      'expected expiry 2026-10-19T09:59:30.000Z but was none'
    );
  });

  it('should report an unexpected expiry', () => {
    expect(describeMismatch({ state: 'ACTIVE', expiresAt: EXPIRY }, { state: 'ACTIVE', expiresAt: null })).toBe(
      'expected no expiry but found 2026-10-19T09:59:30.000Z'
    );
  });

  it('should apply the extra check last', () => {
    const check = jest.fn(() => 'expiry too soon');

    expect(describeMismatch({ state: 'ACTIVE' }, { state: 'ACTIVE', check })).toBe('expiry too soon');
    expect(check).toHaveBeenCalledWith({ state: 'ACTIVE' });
  });
});

describe('awaitEntitlementState', () => {
  let getState: jest.Mock<Promise<EntitlementStateSnapshot>, [options?: CallOptions]>;

  beforeEach(() => {
    getState = jest.fn<Promise<EntitlementStateSnapshot>, [options?: CallOptions]>();
  });

  it('should poll until the expected state is observed', async () => {
    const timeline = createTimeline();
    getState
      .mockResolvedValueOnce({ state: 'NONE' })
      .mockResolvedValueOnce({ state: 'NONE' })
      .mockResolvedValueOnce({ state: 'ACTIVE', activationCode: 'code-1' });

    const snapshot = await awaitEntitlementState(
      { getState },
      { state: 'ACTIVE', activationCode: 'code-1' },
      { policy: TESTING_BACKOFF_POLICY, ...timeline }
    );

    expect(snapshot).toEqual({ state: 'ACTIVE', activationCode: 'code-1' });
    expect(getState).toHaveBeenCalledTimes(3);
    expect(timeline.sleeps).toEqual([100, 200]);
  });

  it('should retry through transient failures', async () => {
    const timeline = createTimeline();
    getState
      .mockRejectedValueOnce(new EntitlementError('Entitlement service returned 503', 'TRANSIENT_UNAVAILABLE'))
      .mockRejectedValueOnce(new TypeError('socket hang up'))
      .mockResolvedValueOnce({ state: 'NONE' });

    await expect(
      awaitEntitlementState({ getState }, { state: 'NONE' }, { policy: TESTING_BACKOFF_POLICY, ...timeline })
    ).resolves.toEqual({ state: 'NONE' });
    expect(getState).toHaveBeenCalledTimes(3);
  });

  it('should stop immediately on a non-retryable service error', async () => {
    const timeline = createTimeline();
    const failure = new EntitlementError('Entitlement record is inconsistent', 'STATE_INCONSISTENT');
    getState.mockRejectedValue(failure);

    await expect(
      awaitEntitlementState({ getState }, { state: 'NONE' }, { policy: TESTING_BACKOFF_POLICY, ...timeline })
    ).rejects.toBe(failure);
    expect(getState).toHaveBeenCalledTimes(1);
  });

  it('should give up with the last mismatch when the state never converges', async () => {
    const timeline = createTimeline();
    getState.mockResolvedValue({ state: 'NONE' });

    const promise = awaitEntitlementState(
      { getState },
      { state: 'ACTIVE' },
      { policy: { ...TESTING_BACKOFF_POLICY, maxAttempts: 3 }, ...timeline }
    );

    await expect(promise).rejects.toBeInstanceOf(RetryExhaustedError);
    await expect(promise).rejects.toMatchObject({
      attempts: 3,
      lastError: expect.objectContaining({
        code: 'STATE_NOT_CONVERGED',
        message: 'expected entitlement state to be ACTIVE but was NONE',
      }),
    });
  });

  it('should pass the signal to each read and stop when it fires', async () => {
    const controller = new AbortController();
    getState.mockResolvedValue({ state: 'NONE' });

    const promise = awaitEntitlementState(
      { getState },
      { state: 'ACTIVE' },
      {
        policy: TESTING_BACKOFF_POLICY,
        signal: controller.signal,
        onRetry: () => controller.abort(new Error('test finished')),
      }
    );

    await expect(promise).rejects.toBeInstanceOf(RetryCancelledError);
    expect(getState).toHaveBeenCalledTimes(1);
    expect(getState).toHaveBeenCalledWith({ signal: controller.signal });
  });
});
