/**
 * Manages `/etc/virt-who.conf` on the agent host.
 */

import { access } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigFile, type ConfigValue } from '../config-store/config-file.js';
import type { RemoteExecutor } from '../remote/executor.js';
import { GLOBAL_CONFIG_FILE } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('global-config');

export class GlobalConfig {
  readonly file: ConfigFile;
  /** Pristine copy of the remote file taken the first time it is opened */
  readonly backupPath: string;
  private readonly executor: RemoteExecutor;

  private constructor(executor: RemoteExecutor, tempDir: string) {
    this.executor = executor;
    this.backupPath = join(tempDir, 'virt-who.conf.save');
    this.file = new ConfigFile(join(tempDir, 'virt-who.conf'), GLOBAL_CONFIG_FILE, executor);
  }

  static async open(executor: RemoteExecutor, tempDir: string): Promise<GlobalConfig> {
    const config = new GlobalConfig(executor, tempDir);
    await config.file.load({ fromRemote: true });
    if (!(await exists(config.backupPath))) {
      await executor.getFile(GLOBAL_CONFIG_FILE, config.backupPath);
      log.debug({ backupPath: config.backupPath }, 'Saved original global configuration');
    }
    return config;
  }

  /**
   * Add or update an option; the section is created when missing.
   */
  async update(section: string, option: string, value: ConfigValue): Promise<void> {
    await this.file.update(section, option, value);
  }

  /**
   * Remove an option, or the whole section when no option is given.
   */
  async delete(section: string, option?: string): Promise<void> {
    await this.file.delete(section, option);
  }

  /**
   * Empty the file on the agent host.
   */
  async clean(): Promise<void> {
    await this.file.clear();
    log.info({ host: this.executor.host }, 'Global configuration cleaned');
  }

  /**
   * Put the saved original back on the agent host.
   */
  async restore(): Promise<void> {
    await this.executor.putFile(this.backupPath, GLOBAL_CONFIG_FILE);
    await this.file.load({ fromRemote: true });
    log.info({ host: this.executor.host }, 'Global configuration restored');
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
