/**
 * CLI Unit Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import { createProgram, runCli } from '../src/control-plane/cli.js';
import { toCommandLineOptions } from '../src/control-plane/commands/run.js';
import { formatAnalysis, formatMappings } from '../src/control-plane/formatter.js';
import {
  analyzeCommandOptionsSchema,
  configureCommandOptionsSchema,
  runCommandOptionsSchema,
  validate,
  validateOrThrow,
} from '../src/control-plane/validators.js';
import { analyze } from '../src/analyzer/analyzer.js';
import { readFixture } from './fixtures.js';

const ESX_LOG = fileURLToPath(new URL('./fixtures/esx-satellite.log', import.meta.url));

describe('validators', () => {
  it('should apply run defaults', () => {
    expect(validateOrThrow(runCommandOptionsSchema, { mode: 'esx', debug: true, oneshot: true })).toEqual({
      mode: 'esx',
      register: 'rhsm',
      service: false,
      debug: true,
      oneshot: true,
      print: false,
      json: false,
    });
  });

  it('should coerce numeric flags', () => {
    const options = validateOrThrow(runCommandOptionsSchema, { mode: 'xen', interval: '60', wait: '5' });

    expect(options.interval).toBe(60);
    expect(options.wait).toBe(5);
  });

  it('should reject an unknown mode', () => {
    const result = validate(runCommandOptionsSchema, { mode: 'vmware' });

    expect(result.success).toBe(false);
    expect(result.success ? [] : result.errors.map((e) => e.path)).toEqual(['mode']);
  });

  it('should split key=value assignments', () => {
    const options = validateOrThrow(configureCommandOptionsSchema, {
      mode: 'esx',
      set: ['filter_hosts=host-a1', 'rhsm_proxy=http://proxy.test:3128/a=b'],
    });

    expect(options.set).toEqual([
      { key: 'filter_hosts', value: 'host-a1' },
      { key: 'rhsm_proxy', value: 'http://proxy.test:3128/a=b' },
    ]);
    expect(options.unset).toEqual([]);
  });

  it('should reject an assignment without a value separator', () => {
    expect(() => validateOrThrow(configureCommandOptionsSchema, { mode: 'esx', set: ['owner'] })).toThrow(
      'Validation failed: set.0: Expected key=value'
    );
  });

  it('should default the self guest to empty', () => {
    expect(validateOrThrow(analyzeCommandOptionsSchema, { mode: 'local' }).selfGuest).toBe('');
  });
});

describe('toCommandLineOptions', () => {
  const base = validateOrThrow(runCommandOptionsSchema, { mode: 'esx' });

  it('should use the mode config by default', () => {
    expect(toCommandLineOptions(base)).toEqual({
      debug: true,
      oneshot: true,
      interval: null,
      print: false,
      config: 'default',
      wait: null,
    });
  });

  it('should drop the config when disabled', () => {
    expect(toCommandLineOptions({ ...base, config: false }).config).toBeNull();
  });

  it('should pass an explicit config path', () => {
    expect(toCommandLineOptions({ ...base, config: '/tmp/custom.conf' }).config).toBe('/tmp/custom.conf');
  });
});

describe('formatter', () => {
  beforeEach(() => {
    vi.stubEnv('NO_COLOR', '1');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should summarize an analysis', () => {
    const text = formatAnalysis(
      analyze(readFixture('esx-satellite.log'), { mode: 'esx', registerBackend: 'satellite', selfGuestId: '' })
    );
    const lines = text.split('\n');

    expect(lines).toContain(`${'Sends'.padEnd(14)} 1`);
    expect(lines).toContain(`${'Reporter ID'.padEnd(14)} virtwho-host.example.com-5d1f`);
    expect(lines).toContain(`${'Loop interval'.padEnd(14)} -`);
    expect(lines).toContain('  ORG_A hypervisors=1 guests=2');
  });

  it('should list local guests', () => {
    expect(
      formatMappings({ kind: 'local', guests: { 'vm-1': { state: 1, active: 1, type: 'libvirt' } } })
    ).toEqual(['  vm-1 state=1 active=1 type=libvirt']);
  });
});

describe('CLI', () => {
  let output: string[];
  let errors: string[];

  beforeEach(() => {
    output = [];
    errors = [];
    vi.spyOn(console, 'log').mockImplementation((message: string) => {
      output.push(message);
    });
    vi.spyOn(console, 'error').mockImplementation((message: string) => {
      errors.push(message);
    });
    vi.stubEnv('NO_COLOR', '1');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    process.exitCode = undefined;
  });

  it('should register the commands', () => {
    expect(createProgram().commands.map((command) => command.name())).toEqual(['run', 'analyze', 'configure']);
  });

  it('should analyze a saved log as JSON', async () => {
    await runCli([
      'node',
      'virtwho-harness',
      'analyze',
      ESX_LOG,
      '--mode',
      'esx',
      '--register',
      'satellite',
      '--self-guest',
      'guest-0002',
      '--json',
    ]);

    expect(output).toHaveLength(1);
    const result: unknown = JSON.parse(output[0] ?? '');
    expect(result).toMatchObject({ sendCount: 1, hypervisorId: 'host-a1', warningCount: 1 });
    expect(process.exitCode).toBeUndefined();
  });

  it('should report an invalid mode', async () => {
    await runCli(['node', 'virtwho-harness', 'analyze', ESX_LOG, '--mode', 'vmware']);

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^✗ Validation failed: mode: /);
    expect(process.exitCode).toBe(1);
  });

  it('should report a missing log file', async () => {
    await runCli(['node', 'virtwho-harness', 'analyze', '/nonexistent/rhsm.log', '--mode', 'esx']);

    expect(errors[0]).toContain('ENOENT');
    expect(process.exitCode).toBe(1);
  });
});
