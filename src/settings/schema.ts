import { z } from 'zod';

// SSH endpoint of a host the harness logs in to
export const hostSettingsSchema = z.object({
  server: z.string().min(1),
  username: z.string().min(1).default('root'),
  password: z.string().default(''),
  port: z.coerce.number().int().min(1).max(65535).default(22),
});

export type HostSettings = z.infer<typeof hostSettingsSchema>;

// Subscription server the agent reports to
export const registerSettingsSchema = z.object({
  server: z.string().min(1),
  username: z.string().min(1),
  password: z.string().default(''),
  port: z.coerce.number().int().min(1).max(65535).default(443),
  prefix: z.string().default('/rhsm'),
  defaultOrg: z.string().min(1),
});

export type RegisterSettings = z.infer<typeof registerSettingsSchema>;

// Hypervisor (or local libvirt host) the agent reads guests from
export const hypervisorSettingsSchema = z.object({
  server: z.string().default(''),
  username: z.string().default(''),
  password: z.string().default(''),
  /** SSH login of the hypervisor itself, needed to resolve the rhevm engine hostname */
  sshUsername: z.string().default('root'),
  sshPassword: z.string().default(''),
  /** Guest whose owning hypervisor a run reports as hypervisorId */
  guestUuid: z.string().default(''),
  /** kubevirt kubeconfig path on the agent host */
  configFile: z.string().default(''),
});

export type HypervisorSettings = z.infer<typeof hypervisorSettingsSchema>;

export const settingsSchema = z.object({
  /** Host running the agent for every remote mode */
  virtwho: hostSettingsSchema,
  /** Host running the agent in local mode */
  local: hostSettingsSchema.optional(),
  register: z.object({
    rhsm: registerSettingsSchema.optional(),
    satellite: registerSettingsSchema.optional(),
  }),
  hypervisors: z
    .object({
      esx: hypervisorSettingsSchema.optional(),
      xen: hypervisorSettingsSchema.optional(),
      hyperv: hypervisorSettingsSchema.optional(),
      rhevm: hypervisorSettingsSchema.optional(),
      libvirt: hypervisorSettingsSchema.optional(),
      kubevirt: hypervisorSettingsSchema.optional(),
      ahv: hypervisorSettingsSchema.optional(),
      local: hypervisorSettingsSchema.optional(),
      fake: hypervisorSettingsSchema.optional(),
    })
    .default({}),
});

export type Settings = z.infer<typeof settingsSchema>;
