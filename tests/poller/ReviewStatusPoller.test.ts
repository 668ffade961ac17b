/**
 * Tests for ReviewStatusPoller
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { ReviewStatusPoller } from '../../src/poller/ReviewStatusPoller.js';
import { fail, ok, type PollError, type Result } from '../../src/review/types.js';

const APPROVED_MESSAGE =
  'Changed review status of "proj1". Работа проверена: ревьюеру всё понравилось. Ура!';

const connectionRefused: PollError = {
  kind: 'APIRequestError',
  message: 'Connection error: connect ECONNREFUSED 127.0.0.1:443',
  endpoint: 'https://review.test/api/homework_statuses/',
};

describe('ReviewStatusPoller', () => {
  let fetchStatus: Mock<[number], Promise<Result<unknown>>>;
  let notify: Mock<[string], Promise<boolean>>;
  let poller: ReviewStatusPoller;

  beforeEach(() => {
    fetchStatus = vi.fn<[number], Promise<Result<unknown>>>();
    notify = vi.fn<[string], Promise<boolean>>().mockResolvedValue(true);
    poller = new ReviewStatusPoller(
      { retryPeriodMs: 600_000, initialTimestamp: 500 },
      { fetchStatus },
      { notify }
    );
  });

  afterEach(() => {
    poller.stop();
    vi.useRealTimers();
  });

  describe('runOnce', () => {
    it('should report an approved homework and advance the cursor', async () => {
      fetchStatus.mockResolvedValueOnce(
        ok({ homeworks: [{ homework_name: 'proj1', status: 'approved' }], current_date: 1000 })
      );

      const outcome = await poller.runOnce();

      expect(fetchStatus).toHaveBeenCalledWith(500);
      expect(notify).toHaveBeenCalledTimes(1);
      expect(notify).toHaveBeenCalledWith(APPROVED_MESSAGE);
      expect(outcome).toEqual({
        type: 'reported',
        message: APPROVED_MESSAGE,
        delivered: true,
        skipped: 0,
      });
      expect(poller.getState().timestamp).toBe(1000);
    });

    it('should stay quiet on an empty list and advance the cursor', async () => {
      fetchStatus.mockResolvedValueOnce(ok({ homeworks: [], current_date: 2000 }));

      const outcome = await poller.runOnce();

      expect(outcome).toEqual({ type: 'idle' });
      expect(notify).not.toHaveBeenCalled();
      expect(poller.getState().timestamp).toBe(2000);
    });

    it('should send the advanced cursor on the next poll', async () => {
      fetchStatus
        .mockResolvedValueOnce(ok({ homeworks: [], current_date: 2000 }))
        .mockResolvedValueOnce(ok({ homeworks: [], current_date: 2600 }));

      await poller.runOnce();
      await poller.runOnce();

      expect(fetchStatus.mock.calls).toEqual([[500], [2000]]);
    });

    it('should report only the first of several homeworks', async () => {
      fetchStatus.mockResolvedValueOnce(
        ok({
          homeworks: [
            { homework_name: 'proj1', status: 'approved' },
            { homework_name: 'proj2', status: 'rejected' },
          ],
          current_date: 1000,
        })
      );

      const outcome = await poller.runOnce();

      expect(notify).toHaveBeenCalledTimes(1);
      expect(notify).toHaveBeenCalledWith(APPROVED_MESSAGE);
      expect(outcome).toMatchObject({ type: 'reported', skipped: 1 });
    });

    it('should advance the cursor even when the status message is not delivered', async () => {
      notify.mockResolvedValueOnce(false);
      fetchStatus.mockResolvedValueOnce(
        ok({ homeworks: [{ homework_name: 'proj1', status: 'approved' }], current_date: 1000 })
      );

      const outcome = await poller.runOnce();

      expect(outcome).toMatchObject({ type: 'reported', delivered: false });
      expect(poller.getState().timestamp).toBe(1000);
    });

    it('should leave the cursor unchanged when current_date is not an integer', async () => {
      fetchStatus.mockResolvedValueOnce(ok({ homeworks: [], current_date: '2000' }));

      const outcome = await poller.runOnce();

      expect(outcome).toEqual({ type: 'idle' });
      expect(poller.getState().timestamp).toBe(500);
    });

    it('should fail and keep the cursor when current_date is missing', async () => {
      fetchStatus.mockResolvedValueOnce(ok({ homeworks: [] }));

      const outcome = await poller.runOnce();

      expect(outcome).toMatchObject({ type: 'failed', notified: true });
      expect(notify).toHaveBeenCalledWith(
        'Program malfunction: API response is missing keys: current_date'
      );
      expect(poller.getState().timestamp).toBe(500);
    });

    it('should fail and keep the cursor on an unknown status', async () => {
      fetchStatus.mockResolvedValueOnce(
        ok({ homeworks: [{ homework_name: 'proj1', status: 'pending' }], current_date: 1000 })
      );

      const outcome = await poller.runOnce();

      expect(outcome).toMatchObject({ type: 'failed', error: { kind: 'UnknownStatus' } });
      expect(notify).toHaveBeenCalledWith('Program malfunction: Unknown homework status: pending');
      expect(poller.getState().timestamp).toBe(500);
    });

    it('should turn a thrown error into a failure', async () => {
      fetchStatus.mockRejectedValueOnce(new Error('boom'));

      const outcome = await poller.runOnce();

      expect(outcome).toEqual({
        type: 'failed',
        error: { kind: 'Unexpected', message: 'boom' },
        notified: true,
      });
      expect(notify).toHaveBeenCalledWith('Program malfunction: boom');
    });
  });

  describe('error deduplication', () => {
    it('should notify once for the same error twice in a row', async () => {
      fetchStatus
        .mockResolvedValueOnce(fail(connectionRefused))
        .mockResolvedValueOnce(fail(connectionRefused));

      const first = await poller.runOnce();
      const second = await poller.runOnce();

      expect(notify).toHaveBeenCalledTimes(1);
      expect(notify).toHaveBeenCalledWith(
        'Program malfunction: Connection error: connect ECONNREFUSED 127.0.0.1:443'
      );
      expect(first).toMatchObject({ type: 'failed', notified: true });
      expect(second).toMatchObject({ type: 'failed', notified: false });
      expect(poller.getState().lastReportedError).toBe(
        'Program malfunction: Connection error: connect ECONNREFUSED 127.0.0.1:443'
      );
    });

    it('should notify again when the error text changes', async () => {
      fetchStatus
        .mockResolvedValueOnce(fail(connectionRefused))
        .mockResolvedValueOnce(
          fail({ kind: 'ParseError', message: 'JSON parse error: Unexpected end of JSON input' })
        )
        .mockResolvedValueOnce(fail(connectionRefused));

      await poller.runOnce();
      await poller.runOnce();
      await poller.runOnce();

      expect(notify).toHaveBeenCalledTimes(3);
    });

    it('should retry the notification when delivery failed', async () => {
      notify.mockResolvedValueOnce(false);
      fetchStatus
        .mockResolvedValueOnce(fail(connectionRefused))
        .mockResolvedValueOnce(fail(connectionRefused));

      await poller.runOnce();
      expect(poller.getState().lastReportedError).toBeNull();

      await poller.runOnce();

      expect(notify).toHaveBeenCalledTimes(2);
      expect(poller.getState().lastReportedError).toBe(
        'Program malfunction: Connection error: connect ECONNREFUSED 127.0.0.1:443'
      );
    });

    it('should keep the last error after a successful poll', async () => {
      fetchStatus
        .mockResolvedValueOnce(fail(connectionRefused))
        .mockResolvedValueOnce(ok({ homeworks: [], current_date: 2000 }))
        .mockResolvedValueOnce(fail(connectionRefused));

      await poller.runOnce();
      await poller.runOnce();
      await poller.runOnce();

      expect(notify).toHaveBeenCalledTimes(1);
    });
  });

  describe('events', () => {
    it('should emit pollFailed with the notification result', async () => {
      const handler = vi.fn();
      poller.on('pollFailed', handler);
      fetchStatus.mockResolvedValueOnce(fail(connectionRefused));

      await poller.runOnce();

      expect(handler).toHaveBeenCalledWith(connectionRefused, true);
    });

    it('should settle state before a throwing listener runs', async () => {
      poller.on('idle', () => {
        throw new Error('listener failed');
      });
      fetchStatus.mockResolvedValueOnce(ok({ homeworks: [], current_date: 2000 }));

      await expect(poller.runOnce()).rejects.toThrow('listener failed');

      expect(poller.getState()).toEqual({ timestamp: 2000, lastReportedError: null });
      expect(notify).not.toHaveBeenCalled();
    });

    it('should emit statusReported and idle', async () => {
      const reported = vi.fn();
      const idle = vi.fn();
      poller.on('statusReported', reported);
      poller.on('idle', idle);
      fetchStatus
        .mockResolvedValueOnce(
          ok({ homeworks: [{ homework_name: 'proj1', status: 'approved' }], current_date: 1000 })
        )
        .mockResolvedValueOnce(ok({ homeworks: [], current_date: 1000 }));

      await poller.runOnce();
      await poller.runOnce();

      expect(reported).toHaveBeenCalledWith(APPROVED_MESSAGE, true);
      expect(idle).toHaveBeenCalledTimes(1);
    });
  });

  describe('start / stop', () => {
    it('should sleep between iterations, including after a failure', async () => {
      vi.useFakeTimers();
      fetchStatus
        .mockResolvedValueOnce(fail(connectionRefused))
        .mockResolvedValue(ok({ homeworks: [], current_date: 2000 }));

      const running = poller.start();
      expect(fetchStatus).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(599_999);
      expect(fetchStatus).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(fetchStatus).toHaveBeenCalledTimes(2);
      expect(fetchStatus).toHaveBeenLastCalledWith(500);

      poller.stop();
      await running;

      expect(poller.getRunningStatus()).toBe(false);
      expect(poller.getState().timestamp).toBe(2000);
    });

    it('should keep polling when an event listener throws', async () => {
      vi.useFakeTimers();
      fetchStatus.mockResolvedValue(fail(connectionRefused));
      poller.on('pollFailed', () => {
        throw new Error('listener failed');
      });

      const running = poller.start();
      await vi.advanceTimersByTimeAsync(600_000);

      expect(fetchStatus).toHaveBeenCalledTimes(2);
      expect(notify).toHaveBeenCalledTimes(1);
      expect(poller.getRunningStatus()).toBe(true);

      poller.stop();
      await expect(running).resolves.toBeUndefined();
    });

    it('should not start twice', async () => {
      vi.useFakeTimers();
      fetchStatus.mockResolvedValue(ok({ homeworks: [], current_date: 2000 }));

      const running = poller.start();
      await poller.start();

      expect(fetchStatus).toHaveBeenCalledTimes(1);

      poller.stop();
      await running;
    });
  });
});
