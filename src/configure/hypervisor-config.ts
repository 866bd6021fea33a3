/**
 * Builds `/etc/virt-who.d/<mode>.conf` from the settings file.
 */

import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigFile, type ConfigValue } from '../config-store/config-file.js';
import type { ExecutorFactory, RemoteExecutor } from '../remote/executor.js';
import type { SettingsResolver } from '../settings/resolver.js';
import {
  HypervisorMode,
  SERVER_BACKED_MODES,
  hypervisorConfigPath,
  type RegisterBackend,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('hypervisor-config');

export interface HypervisorConfigOptions {
  mode: HypervisorMode;
  registerBackend: RegisterBackend;
  settings: SettingsResolver;
  /** Executor for the agent host */
  executor: RemoteExecutor;
  /** Opens sessions to other hosts (rhevm engine lookup) */
  connect: ExecutorFactory;
  /** Directory holding local copies of rendered files */
  tempDir: string;
}

export class HypervisorConfig {
  readonly mode: HypervisorMode;
  readonly section: string;
  readonly file: ConfigFile;
  private readonly options: HypervisorConfigOptions;

  constructor(options: HypervisorConfigOptions) {
    this.options = options;
    this.mode = options.mode;
    this.section = `virtwho-${options.mode}`;
    this.file = new ConfigFile(
      join(options.tempDir, `${options.mode}.conf`),
      hypervisorConfigPath(options.mode),
      options.executor
    );
  }

  /**
   * Write a fresh configuration with every option the mode needs.
   */
  async create(): Promise<void> {
    const { settings, registerBackend } = this.options;
    const hypervisor = settings.getHypervisor(this.mode);
    const register = settings.getRegister(registerBackend);

    await this.file.clear();

    if (this.mode === HypervisorMode.LOCAL) {
      await this.update('type', 'libvirt');
    } else {
      await this.update('type', this.mode);
      await this.update('hypervisor_id', 'hostname');
    }

    if (this.mode === HypervisorMode.KUBEVIRT) {
      await this.update('kubeconfig', hypervisor.configFile);
    }

    if (SERVER_BACKED_MODES.includes(this.mode)) {
      const server =
        this.mode === HypervisorMode.RHEVM ? await this.rhevmEngineUrl() : hypervisor.server;
      await this.update('server', server);
      await this.update('username', hypervisor.username);
      await this.update('password', hypervisor.password);
    }

    await this.update('rhsm_hostname', register.server);
    await this.update('rhsm_username', register.username);
    await this.update('rhsm_password', register.password);
    await this.update('rhsm_prefix', register.prefix);
    await this.update('rhsm_port', register.port);
    await this.update('owner', register.defaultOrg);

    log.info(
      { mode: this.mode, registerBackend, remotePath: this.file.remotePath },
      'Hypervisor configuration created'
    );
  }

  async update(option: string, value: ConfigValue): Promise<void> {
    await this.file.update(this.section, option, value);
  }

  async delete(option: string): Promise<void> {
    await this.file.delete(this.section, option);
  }

  /**
   * Remove both the local copy and the remote file.
   */
  async destroy(): Promise<void> {
    await rm(this.file.localPath, { force: true });
    await this.options.executor.removeFile(this.file.remotePath);
    log.info({ mode: this.mode, remotePath: this.file.remotePath }, 'Hypervisor configuration removed');
  }

  /**
   * The engine URL must carry the engine's own hostname rather than its address.
   */
  private async rhevmEngineUrl(): Promise<string> {
    const hypervisor = this.options.settings.getHypervisor(HypervisorMode.RHEVM);
    const engine = this.options.connect({
      server: hypervisor.server,
      username: hypervisor.sshUsername,
      password: hypervisor.sshPassword,
      port: 22,
    });
    const { exitCode, output } = await engine.execute('hostname');
    const hostname = output.trim();
    if (exitCode !== 0 || hostname === '') {
      log.warn({ server: hypervisor.server, exitCode }, 'Engine hostname lookup failed, using address');
      return `https://${hypervisor.server}:443/ovirt-engine`;
    }
    return `https://${hostname}:443/ovirt-engine`;
  }
}
