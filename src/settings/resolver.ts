/**
 * Navigates the settings tree by hypervisor mode and register backend.
 */

import { HypervisorMode, type RegisterBackend } from '../types/index.js';
import { HarnessError } from '../utils/errors.js';
import type { HostSettings, HypervisorSettings, RegisterSettings, Settings } from './schema.js';

/**
 * Error thrown when a run needs a settings section the file does not define
 */
export class MissingSettingsError extends HarnessError {
  constructor(public readonly section: string) {
    super(`Settings section is not defined: ${section}`);
    this.name = 'MissingSettingsError';
  }
}

export class SettingsResolver {
  constructor(private readonly settings: Settings) {}

  /**
   * SSH endpoint of the host running the agent. Local mode may use its own host.
   */
  getAgentHost(mode: HypervisorMode): HostSettings {
    if (mode === HypervisorMode.LOCAL && this.settings.local) {
      return this.settings.local;
    }
    return this.settings.virtwho;
  }

  getRegister(backend: RegisterBackend): RegisterSettings {
    const register = this.settings.register[backend];
    if (!register) {
      throw new MissingSettingsError(`register.${backend}`);
    }
    return register;
  }

  /**
   * Hypervisor section for a mode; the fake mode reuses esx data when it has none.
   */
  getHypervisor(mode: HypervisorMode): HypervisorSettings {
    const hypervisors = this.settings.hypervisors;
    const section =
      hypervisors[mode] ?? (mode === HypervisorMode.FAKE ? hypervisors.esx : undefined);
    if (!section) {
      throw new MissingSettingsError(`hypervisors.${mode}`);
    }
    return section;
  }

  /**
   * Guest uuid configured for a mode, or an empty string.
   */
  getSelfGuestId(mode: HypervisorMode): string {
    try {
      return this.getHypervisor(mode).guestUuid;
    } catch (err) {
      if (err instanceof MissingSettingsError) {
        return '';
      }
      throw err;
    }
  }
}
