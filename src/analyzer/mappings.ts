/**
 * Host-to-guest mapping extraction.
 *
 * Local mode logs its guests as a `Domain info: [...]` array. Remote modes
 * log one pretty-printed JSON object per organization after
 * `Host-to-guest mapping being sent to '<org>':`. Payloads are validated
 * entry by entry; invalid entries are skipped so a garbled log still
 * yields a partial mapping.
 */

import { z } from 'zod';
import {
  isLocalMode,
  type HypervisorFacts,
  type HypervisorMode,
  type LocalGuest,
  type LocalMappings,
  type Mappings,
  type OrgMapping,
  type RemoteGuest,
  type RemoteMappings,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { parseJsonBlock } from './json-block.js';
import { CAPTURES, PHRASES, RECORD_START } from './patterns.js';

const log = createLogger('mappings');

// ============================================================================
// Payload schemas
// ============================================================================

const guestSchema = z
  .object({
    guestId: z.string(),
    state: z.union([z.number(), z.string()]),
    attributes: z
      .object({
        active: z.union([z.number(), z.boolean()]),
        virtWhoType: z.string(),
      })
      .passthrough(),
  })
  .passthrough();

type GuestEntry = z.infer<typeof guestSchema>;

const hypervisorSchema = z
  .object({
    hypervisorId: z.object({ hypervisorId: z.string() }).passthrough(),
    name: z.string().optional(),
    facts: z.record(z.unknown()).default({}),
    guestIds: z.array(z.unknown()).default([]),
  })
  .passthrough();

const payloadSchema = z
  .object({
    hypervisors: z.array(z.unknown()),
  })
  .passthrough();

// ============================================================================
// Public API
// ============================================================================

export function extractMappings(text: string, mode: HypervisorMode): Mappings {
  return isLocalMode(mode) ? extractLocalMappings(text) : extractRemoteMappings(text);
}

/**
 * Guests from the first `Domain info:` record.
 */
export function extractLocalMappings(text: string): LocalMappings {
  const mappings: LocalMappings = { kind: 'local', guests: {} };
  const start = text.indexOf(PHRASES.DOMAIN_INFO);
  if (start === -1) {
    log.info('No domain info found in log');
    return mappings;
  }

  const parsed = parseJsonBlock(recordBody(text, start + PHRASES.DOMAIN_INFO.length));
  if (!parsed.ok) {
    log.warn({ error: parsed.error }, 'Failed to parse domain info');
    return mappings;
  }
  if (!Array.isArray(parsed.value)) {
    log.warn('Domain info is not a JSON array');
    return mappings;
  }

  for (const item of parsed.value) {
    const guest = guestSchema.safeParse(item);
    if (!guest.success) {
      log.warn({ issues: guest.error.issues }, 'Skipping malformed domain info entry');
      continue;
    }
    mappings.guests[guest.data.guestId] = toLocalGuest(guest.data);
  }
  return mappings;
}

/**
 * Per-organization hypervisors and guests from the last mapping sent to each.
 */
export function extractRemoteMappings(text: string): RemoteMappings {
  const orgs = [...new Set(Array.from(text.matchAll(CAPTURES.ORG), (m) => m[1] ?? ''))];
  const mappings: RemoteMappings = { kind: 'remote', orgs, organizations: {} };
  if (orgs.length === 0) {
    log.info('No host-to-guest mapping found in log');
    return mappings;
  }

  for (const org of orgs) {
    mappings.organizations[org] = extractOrgMapping(text, org);
  }
  return mappings;
}

/**
 * Hypervisor owning the given guest across all organizations, or ''.
 */
export function findHypervisorId(mappings: Mappings, guestId: string): string {
  if (mappings.kind !== 'remote' || guestId === '') {
    return '';
  }
  for (const org of mappings.orgs) {
    const guest = mappings.organizations[org]?.guests[guestId];
    if (guest) {
      return guest.hypervisorId;
    }
  }
  return '';
}

// ============================================================================
// Helpers
// ============================================================================

function extractOrgMapping(text: string, org: string): OrgMapping {
  const mapping: OrgMapping = { hypervisorCount: 0, hypervisors: {}, guests: {} };
  const marker = `${PHRASES.MAPPING_SENT_TO} '${org}'`;
  const start = text.lastIndexOf(marker);

  const parsed = parseJsonBlock(recordBody(text, start + marker.length));
  if (!parsed.ok) {
    log.warn({ org, error: parsed.error }, 'Failed to parse host-to-guest mapping');
    return mapping;
  }

  const payload = payloadSchema.safeParse(parsed.value);
  if (!payload.success) {
    log.warn({ org, issues: payload.error.issues }, 'Host-to-guest mapping has no hypervisors list');
    return mapping;
  }

  mapping.hypervisorCount = payload.data.hypervisors.length;
  for (const item of payload.data.hypervisors) {
    const hypervisor = hypervisorSchema.safeParse(item);
    if (!hypervisor.success) {
      log.warn({ org, issues: hypervisor.error.issues }, 'Skipping malformed hypervisor entry');
      continue;
    }

    const hypervisorId = hypervisor.data.hypervisorId.hypervisorId;
    const facts = hypervisor.data.facts;
    const guests: string[] = [];

    for (const entry of hypervisor.data.guestIds) {
      const guest = guestSchema.safeParse(entry);
      if (!guest.success) {
        log.warn({ org, hypervisorId }, 'Skipping malformed guest entry');
        continue;
      }
      guests.push(guest.data.guestId);
      mapping.guests[guest.data.guestId] = toRemoteGuest(guest.data, hypervisorId);
    }

    const summary: HypervisorFacts = {
      name: hypervisor.data.name ?? '',
      type: factString(facts, 'hypervisor.type'),
      version: factString(facts, 'hypervisor.version'),
      socketCount: factString(facts, 'cpu.cpu_socket(s)'),
      systemUuid: factString(facts, 'dmi.system.uuid'),
      cluster: factString(facts, 'hypervisor.cluster'),
      guests,
    };
    mapping.hypervisors[hypervisorId] = summary;
  }

  return mapping;
}

/**
 * The record starting at `start`: its first line plus continuation lines up
 * to the next line opening a new log record.
 */
function recordBody(text: string, start: number): string {
  const [first = '', ...rest] = text.slice(start).split('\n');
  const body = [first];
  for (const line of rest) {
    if (RECORD_START.test(line)) {
      break;
    }
    body.push(line);
  }
  return body.join('\n');
}

function toLocalGuest(entry: GuestEntry): LocalGuest {
  return {
    state: entry.state,
    active: entry.attributes.active,
    type: entry.attributes.virtWhoType,
  };
}

function toRemoteGuest(entry: GuestEntry, hypervisorId: string): RemoteGuest {
  return { hypervisorId, ...toLocalGuest(entry) };
}

// Facts not used in the summary may hold anything; only the read ones are stringified
function factString(facts: Record<string, unknown>, key: string): string {
  const value = facts[key];
  if (value === undefined || value === null) {
    return '';
  }
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}
