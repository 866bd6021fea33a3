// Hypervisor modes virt-who can report from
export const HypervisorMode = {
  ESX: 'esx',
  XEN: 'xen',
  HYPERV: 'hyperv',
  RHEVM: 'rhevm',
  LIBVIRT: 'libvirt',
  KUBEVIRT: 'kubevirt',
  AHV: 'ahv',
  LOCAL: 'local',
  FAKE: 'fake',
} as const;

export type HypervisorMode = (typeof HypervisorMode)[keyof typeof HypervisorMode];

export const HYPERVISOR_MODES = Object.values(HypervisorMode);

// Subscription servers the agent registers against
export const RegisterBackend = {
  RHSM: 'rhsm',
  SATELLITE: 'satellite',
} as const;

export type RegisterBackend = (typeof RegisterBackend)[keyof typeof RegisterBackend];

export const REGISTER_BACKENDS = Object.values(RegisterBackend);

/**
 * Modes whose configuration carries server/username/password options.
 */
export const SERVER_BACKED_MODES: readonly HypervisorMode[] = [
  HypervisorMode.ESX,
  HypervisorMode.XEN,
  HypervisorMode.HYPERV,
  HypervisorMode.RHEVM,
  HypervisorMode.LIBVIRT,
  HypervisorMode.AHV,
];

export function isLocalMode(mode: HypervisorMode): boolean {
  return mode === HypervisorMode.LOCAL;
}
