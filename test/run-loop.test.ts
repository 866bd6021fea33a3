/**
 * Run Loop Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { RunLoop } from '../src/runner/run-loop.js';
import { RunExhaustedError, RunInProgressError, TransientBackendError } from '../src/runner/errors.js';
import { ProcessCleanupError } from '../src/process/errors.js';
import { createRunContext, RunPhase } from '../src/types/index.js';
import { FakeRemoteExecutor, recordingSleep } from './mocks/fake-remote-executor.js';
import { readFixture } from './fixtures.js';

const CAT_LOG = 'cat /var/log/rhsm/rhsm.log';
const CAT_PRINT = 'cat /root/print.json';
const REMAINING = 'ps -ef | grep virt-who -i | grep -v grep | sort';
const THROTTLED = '2026-03-02 10:00:00,000 [rhsm.connection DEBUG] Response: status=429, request="POST /rhsm/hypervisors/ORG_A"';
const SERVER_ERROR =
  '2026-03-02 10:00:00,000 [virtwho.destination_-1 ERROR] RemoteServerException: Server error attempting a GET to /rhsm/status/ returned status 500';

describe('RunLoop', () => {
  let executor: FakeRemoteExecutor;
  let clock: ReturnType<typeof recordingSleep>;
  let loop: RunLoop;

  beforeEach(() => {
    executor = new FakeRemoteExecutor();
    clock = recordingSleep();
    loop = new RunLoop({
      context: createRunContext('esx', 'satellite', { selfGuestId: 'guest-0001' }),
      executor,
      sleep: clock.sleep,
    });
  });

  describe('runCommandLine', () => {
    it('should stop, clean, launch, poll and analyze', async () => {
      executor.on(CAT_LOG, readFixture('esx-satellite.log'));

      const result = await loop.runCommandLine();

      expect(executor.commands).toEqual([
        'systemctl stop virt-who',
        "ps -ef | grep virt-who -i | grep -v grep | awk '{print $2}' | xargs -I {} kill -9 {}",
        'rm -f /var/run/virt-who.pid',
        REMAINING,
        'rm -rf /var/log/rhsm/*',
        'rm -rf /root/print.json',
        'virt-who -d -o -c /etc/virt-who.d/esx.conf',
        CAT_LOG,
        'ps -ef | grep virt-who -i | grep -v grep | wc -l',
        'ps -ef | grep virt-who -i | grep -v grep | wc -l',
        CAT_PRINT,
      ]);
      expect(clock.delays).toEqual([10000, 15000]);
      expect(result.sendCount).toBe(1);
      expect(result.hypervisorId).toBe('host-a1');
      expect(loop.getPhase()).toBe(RunPhase.SUCCEEDED);
    });

    it('should bound the launch with the launch timeout', async () => {
      await loop.runCommandLine({ oneshot: false, interval: 60 });

      const launch = executor.executed.find((entry) => entry.command.startsWith('virt-who'));
      expect(launch?.command).toBe('virt-who -d -i 60 -c /etc/virt-who.d/esx.conf');
      expect(launch?.options?.timeoutMs).toBe(900000);
    });

    it('should cancel the launch once polling has finished', async () => {
      executor.on(CAT_LOG, readFixture('esx-satellite.log'));

      await loop.runCommandLine({ oneshot: false, interval: 60 });

      const launch = executor.executed.find((entry) => entry.command.startsWith('virt-who'));
      expect(launch?.options?.signal?.aborted).toBe(true);
    });

    it('should cancel every launch of a retried run', async () => {
      executor.onSequence(CAT_LOG, [THROTTLED, readFixture('esx-satellite.log')]);

      await loop.runCommandLine();

      const launches = executor.executed.filter((entry) => entry.command.startsWith('virt-who'));
      expect(launches.map((entry) => entry.options?.signal?.aborted)).toEqual([true, true]);
    });

    it('should report the print output', async () => {
      executor.on(CAT_PRINT, '{"hypervisors": []}');

      const result = await loop.runCommandLine({ print: true });

      expect(executor.commands).toContain('virt-who -d -o -p -c /etc/virt-who.d/esx.conf > /root/print.json');
      expect(result.printJson).toBe('{"hypervisors": []}');
    });

    it('should report no print output when the file is missing', async () => {
      executor.on(CAT_PRINT, { exitCode: 1, output: 'cat: /root/print.json: No such file or directory' });

      expect((await loop.runCommandLine()).printJson).toBeNull();
    });
  });

  describe('runService', () => {
    it('should restart the service and wait before polling', async () => {
      await loop.runService({ wait: 5 });

      expect(executor.commands).toContain('systemctl restart virt-who');
      // stop settle, pre-poll wait, restart settle and one poll interval
      expect([...clock.delays].sort((a, b) => a - b)).toEqual([5000, 10000, 10000, 15000]);
    });
  });

  describe('retries', () => {
    it('should back off 180 seconds after the first throttled attempt', async () => {
      executor.onSequence(CAT_LOG, [THROTTLED, readFixture('esx-satellite.log')]);

      const result = await loop.runCommandLine();

      expect(clock.delays).toEqual([10000, 15000, 180000, 10000, 15000]);
      expect(result.sendCount).toBe(1);
      expect(executor.commands.filter((command) => command === 'systemctl stop virt-who')).toHaveLength(2);
    });

    it('should back off the base delay after a server error', async () => {
      executor.onSequence(CAT_LOG, [SERVER_ERROR, 'clean']);

      await loop.runCommandLine();

      expect(clock.delays).toEqual([10000, 15000, 60000, 10000, 15000]);
    });

    it('should give up after four throttled attempts', async () => {
      executor.on(CAT_LOG, THROTTLED);

      const error = await loop.runCommandLine().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RunExhaustedError);
      expect(error).toMatchObject({
        message: 'Failed to run virt-who after 4 attempts',
        attempts: 4,
        lastReason: 'rate_limited',
      });
      expect(error instanceof Error ? error.cause : undefined).toBeInstanceOf(TransientBackendError);
      expect(clock.delays.filter((ms) => ms > 15000)).toEqual([180000, 240000, 300000]);
      expect(executor.commands.filter((command) => command === CAT_LOG)).toHaveLength(4);
      expect(loop.getPhase()).toBe(RunPhase.FAILED);
    });

    it('should honour a smaller attempt budget', async () => {
      const short = new RunLoop({
        context: createRunContext('esx', 'rhsm'),
        executor,
        timings: { maxAttempts: 2, backoffBaseMs: 1000 },
        sleep: clock.sleep,
      });
      executor.on(CAT_LOG, SERVER_ERROR);

      await expect(short.runCommandLine()).rejects.toThrow('Failed to run virt-who after 2 attempts');
      expect(clock.delays.filter((ms) => ms === 1000)).toHaveLength(1);
    });
  });

  describe('failures', () => {
    it('should surface a process that cannot be stopped', async () => {
      executor.on(REMAINING, 'root 4242 1 0 10:00 ? 00:00:01 virt-who -d');

      await expect(loop.runCommandLine()).rejects.toBeInstanceOf(ProcessCleanupError);
      expect(loop.getPhase()).toBe(RunPhase.FAILED);
      expect(executor.commands).not.toContain(CAT_LOG);
    });

    it('should reject a second run while one is active', async () => {
      const first = loop.runService();

      await expect(loop.runService()).rejects.toBeInstanceOf(RunInProgressError);
      await first;
      expect(loop.getPhase()).toBe(RunPhase.SUCCEEDED);
    });

    it('should accept a new run after the previous one finished', async () => {
      await loop.runService();
      await expect(loop.runService()).resolves.toMatchObject({ sendCount: 0 });
    });
  });
});
