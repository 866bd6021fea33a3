/**
 * Hypervisor Config Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, access } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { HypervisorConfig } from '../src/configure/hypervisor-config.js';
import { parseSettings, SettingsResolver, MissingSettingsError } from '../src/settings/index.js';
import type { ExecutorFactory } from '../src/remote/executor.js';
import type { HypervisorMode, RegisterBackend } from '../src/types/index.js';
import { FakeRemoteExecutor } from './mocks/fake-remote-executor.js';

const SETTINGS = `
virtwho:
  server: agent.test
  password: test-secret
register:
  satellite:
    server: satellite.test
    username: admin
    password: test-secret
    defaultOrg: ORG_A
  rhsm:
    server: subscription.test
    username: tester
    password: test-secret
    prefix: /subscription
    defaultOrg: ORG_B
hypervisors:
  esx:
    server: esx.test
    username: administrator
    password: test-secret
    guestUuid: guest-0001
  rhevm:
    server: 10.0.0.5
    username: admin@internal
    password: test-secret
    sshPassword: test-secret
  kubevirt:
    configFile: /root/kube.conf
  local:
    guestUuid: local-guest-01
`;

describe('HypervisorConfig', () => {
  let tempDir: string;
  let executor: FakeRemoteExecutor;
  let engine: FakeRemoteExecutor;
  let opened: Array<Parameters<ExecutorFactory>[0]>;
  const settings = new SettingsResolver(parseSettings(SETTINGS));

  const connect: ExecutorFactory = (host) => {
    opened.push(host);
    return engine;
  };

  function build(mode: HypervisorMode, registerBackend: RegisterBackend = 'satellite'): HypervisorConfig {
    return new HypervisorConfig({ mode, registerBackend, settings, executor, connect, tempDir });
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'hypervisor-config-test-'));
    executor = new FakeRemoteExecutor();
    engine = new FakeRemoteExecutor('engine.test');
    opened = [];
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should write a server-backed mode config', async () => {
    await build('esx').create();

    expect(executor.files.get('/etc/virt-who.d/esx.conf')).toBe(
      [
        '[virtwho-esx]',
        'type=esx',
        'hypervisor_id=hostname',
        'server=esx.test',
        'username=administrator',
        'password=test-secret',
        'rhsm_hostname=satellite.test',
        'rhsm_username=admin',
        'rhsm_password=test-secret',
        'rhsm_prefix=/rhsm',
        'rhsm_port=443',
        'owner=ORG_A',
        '',
      ].join('\n')
    );
  });

  it('should write a local mode config as libvirt without a server', async () => {
    const config = build('local', 'rhsm');
    await config.create();

    expect(config.file.toJSON()).toEqual({
      'virtwho-local': {
        type: 'libvirt',
        rhsm_hostname: 'subscription.test',
        rhsm_username: 'tester',
        rhsm_password: 'test-secret',
        rhsm_prefix: '/subscription',
        rhsm_port: '443',
        owner: 'ORG_B',
      },
    });
  });

  it('should point kubevirt at its kubeconfig', async () => {
    const config = build('kubevirt');
    await config.create();

    expect(config.file.get('virtwho-kubevirt', 'kubeconfig')).toBe('/root/kube.conf');
    expect(config.file.get('virtwho-kubevirt', 'server')).toBeUndefined();
  });

  it('should reuse the esx section in fake mode', async () => {
    const config = build('fake');
    await config.create();

    expect(config.file.remotePath).toBe('/etc/virt-who.d/fake.conf');
    expect(config.file.get('virtwho-fake', 'type')).toBe('fake');
    expect(config.file.get('virtwho-fake', 'owner')).toBe('ORG_A');
  });

  it('should address rhevm by the engine hostname', async () => {
    engine.on('hostname', 'engine.lab.test\n');
    const config = build('rhevm');
    await config.create();

    expect(config.file.get('virtwho-rhevm', 'server')).toBe('https://engine.lab.test:443/ovirt-engine');
    expect(opened).toEqual([{ server: '10.0.0.5', username: 'root', password: 'test-secret', port: 22 }]);
  });

  it('should fall back to the rhevm address when the lookup fails', async () => {
    engine.on('hostname', { exitCode: 255, output: 'ssh: connect to host 10.0.0.5 port 22: No route to host' });
    const config = build('rhevm');
    await config.create();

    expect(config.file.get('virtwho-rhevm', 'server')).toBe('https://10.0.0.5:443/ovirt-engine');
  });

  it('should apply updates and deletes to its section', async () => {
    const config = build('esx');
    await config.create();
    await config.update('filter_hosts', 'host-a1');
    await config.delete('hypervisor_id');

    expect(config.file.get('virtwho-esx', 'filter_hosts')).toBe('host-a1');
    expect(config.file.get('virtwho-esx', 'hypervisor_id')).toBeUndefined();
  });

  it('should remove both copies on destroy', async () => {
    const config = build('esx');
    await config.create();
    await config.destroy();

    expect(executor.files.has('/etc/virt-who.d/esx.conf')).toBe(false);
    await expect(access(config.file.localPath)).rejects.toThrow();
  });

  it('should fail for a mode without settings', async () => {
    await expect(build('xen').create()).rejects.toBeInstanceOf(MissingSettingsError);
  });
});
