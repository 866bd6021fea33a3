/**
 * INI configuration file mirrored between a local working copy and the
 * agent host. Every mutation rewrites the local copy and pushes it.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { RemoteExecutor } from '../remote/executor.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-file');

export type ConfigValue = string | number | boolean;

export type ConfigSections = Record<string, Record<string, string>>;

export interface LoadOptions {
  /** Pull the remote file over the local copy first */
  fromRemote?: boolean;
}

export class ConfigFile {
  private sections: ConfigSections = {};

  constructor(
    readonly localPath: string,
    readonly remotePath: string,
    private readonly executor: RemoteExecutor
  ) {}

  /**
   * Read the local copy, optionally refreshing it from the remote host.
   * A missing file loads as an empty configuration.
   */
  async load(options: LoadOptions = {}): Promise<void> {
    await mkdir(dirname(this.localPath), { recursive: true });

    if (options.fromRemote) {
      try {
        await this.executor.getFile(this.remotePath, this.localPath);
      } catch (error) {
        log.warn(
          { remotePath: this.remotePath, host: this.executor.host, err: error },
          'Remote config file not fetched, starting empty'
        );
        this.sections = {};
        return;
      }
    }

    let content: string;
    try {
      content = await readFile(this.localPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        this.sections = {};
        return;
      }
      throw error;
    }
    this.sections = parseConfig(content);
  }

  /**
   * Add or update an option; the section is created when missing.
   */
  async update(section: string, key: string, value: ConfigValue): Promise<void> {
    const options = this.sections[section] ?? {};
    options[key] = String(value);
    this.sections[section] = options;
    log.debug({ file: this.remotePath, section, key }, 'Option updated');
    await this.save();
  }

  /**
   * Remove an option, or the whole section when no key is given.
   */
  async delete(section: string, key?: string): Promise<void> {
    const options = this.sections[section];
    if (!options) {
      log.debug({ file: this.remotePath, section }, 'Section not present, nothing to delete');
      return;
    }

    if (key === undefined) {
      delete this.sections[section];
    } else {
      delete options[key];
    }
    log.debug({ file: this.remotePath, section, key }, 'Option deleted');
    await this.save();
  }

  /**
   * Drop every section and push the empty file.
   */
  async clear(): Promise<void> {
    this.sections = {};
    await this.save();
  }

  async save(): Promise<void> {
    await mkdir(dirname(this.localPath), { recursive: true });
    await writeFile(this.localPath, this.render(), 'utf-8');
    await this.executor.putFile(this.localPath, this.remotePath);
  }

  get(section: string, key: string): string | undefined {
    return this.sections[section]?.[key];
  }

  sectionNames(): string[] {
    return Object.keys(this.sections);
  }

  toJSON(): ConfigSections {
    return structuredClone(this.sections);
  }

  render(): string {
    return renderConfig(this.sections);
  }
}

const SECTION_HEADER = /^\[([^\]]+)\]$/;
const OPTION_DELIMITER = /[=:]/;

/**
 * Render sections the way the agent's configparser reads them back:
 * `key=value` with the value written verbatim.
 */
export function renderConfig(sections: ConfigSections): string {
  return Object.entries(sections)
    .map(([name, options]) => {
      const lines = Object.entries(options).map(([key, value]) => `${key}=${value}`);
      return [`[${name}]`, ...lines].join('\n') + '\n';
    })
    .join('\n');
}

/**
 * Parse configparser-style text into sections. Only whole-line `#` and `;`
 * comments are skipped; values keep every character after the first
 * delimiter. Indented lines continue the previous value.
 */
export function parseConfig(content: string): ConfigSections {
  const sections: ConfigSections = {};
  let current: Record<string, string> | undefined;
  let lastKey: string | undefined;

  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (line === '' || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }

    if (current && lastKey !== undefined && /^\s/.test(raw)) {
      current[lastKey] = `${current[lastKey] ?? ''}\n${line}`;
      continue;
    }

    const header = SECTION_HEADER.exec(line);
    if (header?.[1] !== undefined) {
      const name = header[1].trim();
      current = sections[name] ?? {};
      sections[name] = current;
      lastKey = undefined;
      continue;
    }

    const delimiter = OPTION_DELIMITER.exec(line);
    if (!delimiter) {
      log.warn({ line }, 'Line without a delimiter ignored');
      continue;
    }
    const key = line.slice(0, delimiter.index).trim();
    const value = line.slice(delimiter.index + 1).trim();

    if (!current) {
      log.warn({ key }, 'Option outside any section ignored');
      continue;
    }
    current[key] = value;
    lastKey = key;
  }

  return sections;
}
