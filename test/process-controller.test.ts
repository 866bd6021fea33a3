/**
 * Process Controller Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ProcessController } from '../src/process/process-controller.js';
import { ProcessCleanupError } from '../src/process/errors.js';
import { FakeRemoteExecutor, recordingSleep } from './mocks/fake-remote-executor.js';

const COUNT = 'ps -ef | grep virt-who -i | grep -v grep | wc -l';
const REMAINING = 'ps -ef | grep virt-who -i | grep -v grep | sort';

describe('ProcessController', () => {
  let executor: FakeRemoteExecutor;
  let clock: ReturnType<typeof recordingSleep>;
  let controller: ProcessController;

  beforeEach(() => {
    executor = new FakeRemoteExecutor();
    clock = recordingSleep();
    controller = new ProcessController(executor, {
      settleMs: 10000,
      launchTimeoutMs: 5000,
      sleep: clock.sleep,
    });
  });

  describe('stop', () => {
    it('should stop the service and kill leftovers', async () => {
      await controller.stop();

      expect(executor.commands).toEqual([
        'systemctl stop virt-who',
        "ps -ef | grep virt-who -i | grep -v grep | awk '{print $2}' | xargs -I {} kill -9 {}",
        'rm -f /var/run/virt-who.pid',
        REMAINING,
      ]);
      expect(clock.delays).toEqual([10000]);
    });

    it('should throw when a process survives the kill', async () => {
      executor.on(REMAINING, 'root  4242  1  0 10:00 ?  00:00:01 /usr/bin/python3 /usr/bin/virt-who -d\n');

      const error = await controller.stop().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProcessCleanupError);
      expect(error).toMatchObject({
        message: 'Failed to stop and clean virt-who process',
        processName: 'virt-who',
        remaining: 'root  4242  1  0 10:00 ?  00:00:01 /usr/bin/python3 /usr/bin/virt-who -d',
      });
    });
  });

  describe('startCommandLine', () => {
    it('should run the command with the launch timeout', async () => {
      await controller.startCommandLine('virt-who -d -o');

      expect(executor.executed).toEqual([{ command: 'virt-who -d -o', options: { timeoutMs: 5000 } }]);
    });

    it('should pass the cancellation signal to the executor', async () => {
      const launch = new AbortController();

      await controller.startCommandLine('virt-who -d -i 60', launch.signal);

      expect(executor.executed).toEqual([
        { command: 'virt-who -d -i 60', options: { timeoutMs: 5000, signal: launch.signal } },
      ]);
    });
  });

  describe('startService', () => {
    it('should restart the unit and settle', async () => {
      executor.on('systemctl restart virt-who', { exitCode: 0, output: 'restarted' });

      const result = await controller.startService();

      expect(result.output).toBe('restarted');
      expect(clock.delays).toEqual([10000]);
    });
  });

  describe('countRunning', () => {
    it('should parse the process count', async () => {
      executor.on(COUNT, '2\n');
      expect(await controller.countRunning()).toBe(2);
    });

    it('should count unreadable output as zero', async () => {
      executor.on(COUNT, 'ssh: connect to host agent.test port 22: Connection refused');
      expect(await controller.countRunning()).toBe(0);
    });
  });

  describe('killByName', () => {
    it('should return an empty string when nothing remains', async () => {
      expect(await controller.killByName('rhsmcertd')).toBe('');
      expect(executor.commands).toContain('rm -f /var/run/rhsmcertd.pid');
    });
  });
});
