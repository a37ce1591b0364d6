/**
 * Inventory loading and target resolution.
 *
 * The inventory is validated once, frozen, and shared by reference for the
 * rest of the run. Every host is implicitly a member of the "all" group.
 */

import { DeckhandError, ValidationIssue, invalidInventoryError } from '../domain/errors';
import { Host, Inventory } from '../domain/inventory';
import { IDENTIFIER_PATTERN, REQUIRED_HOST_FIELDS } from '../dsl/schema';
import { isRecord } from '../dsl/validator';
import { readDocument } from '../dsl/loader';
import { isCredentialRef } from './credentials';

export const ALL_HOSTS_GROUP = 'all';

export interface InventoryValidationResult {
  valid: boolean;
  issues: ValidationIssue[];
  hosts: Host[];
}

export function validateInventory(document: unknown): InventoryValidationResult {
  const issues: ValidationIssue[] = [];
  const hosts: Host[] = [];

  if (!isRecord(document) || !isRecord(document.hosts)) {
    return { valid: false, issues: [{ path: 'hosts', message: 'must be a mapping of host ids to host entries' }], hosts };
  }
  const entries = Object.entries(document.hosts);
  if (entries.length === 0) {
    issues.push({ path: 'hosts', message: 'must declare at least one host' });
  }

  for (const [id, raw] of entries) {
    const path = `hosts.${id}`;
    if (!IDENTIFIER_PATTERN.test(id)) {
      issues.push({ path, message: `host id "${id}" contains invalid characters` });
    }
    if (id === ALL_HOSTS_GROUP) {
      issues.push({ path, message: `"${ALL_HOSTS_GROUP}" is reserved for the implicit group of every host` });
    }
    if (!isRecord(raw)) {
      issues.push({ path, message: 'must be an object' });
      continue;
    }
    const missing = REQUIRED_HOST_FIELDS.filter((f) => raw[f] === undefined || raw[f] === null);
    for (const field of missing) {
      issues.push({ path: `${path}.${field}`, message: 'is required' });
    }
    if (missing.length > 0) continue;

    const { address, credential, groups, port, user } = raw;
    const before = issues.length;
    if (typeof address !== 'string' || address.trim() === '') {
      issues.push({ path: `${path}.address`, message: 'must be a non-empty string' });
    }
    if (typeof credential !== 'string' || !isCredentialRef(credential)) {
      issues.push({ path: `${path}.credential`, message: 'must be "agent", "env:NAME" or "file:/absolute/path"' });
    }
    if (groups !== undefined && (!Array.isArray(groups) || !groups.every((g) => typeof g === 'string' && IDENTIFIER_PATTERN.test(g)))) {
      issues.push({ path: `${path}.groups`, message: 'must be an array of group names' });
    }
    if (port !== undefined && (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535)) {
      issues.push({ path: `${path}.port`, message: 'must be an integer between 1 and 65535' });
    }
    if (user !== undefined && (typeof user !== 'string' || user.trim() === '')) {
      issues.push({ path: `${path}.user`, message: 'must be a non-empty string' });
    }
    if (issues.length > before || typeof address !== 'string' || typeof credential !== 'string') continue;

    hosts.push({
      id,
      address,
      credentialRef: credential,
      groups: Array.isArray(groups) ? groups.filter((g): g is string => typeof g === 'string') : [],
      port: typeof port === 'number' ? port : undefined,
      user: typeof user === 'string' ? user : undefined,
    });
  }

  const hostIds = new Set(hosts.map((h) => h.id));
  for (const host of hosts) {
    for (const group of host.groups) {
      if (hostIds.has(group)) {
        issues.push({ path: `hosts.${host.id}.groups`, message: `group "${group}" collides with a host id` });
      }
    }
  }

  return { valid: issues.length === 0, issues, hosts };
}

/** Build the immutable per-run snapshot. Throws INVENTORY.INVALID. */
export function createInventory(document: unknown, source = 'inline'): Inventory {
  const result = validateInventory(document);
  if (!result.valid) {
    throw new DeckhandError(invalidInventoryError(result.issues));
  }
  const hosts = result.hosts.map((h) => Object.freeze({ ...h, groups: Object.freeze([...h.groups]) }));
  return Object.freeze({
    hosts: Object.freeze(hosts),
    loadedAt: new Date().toISOString(),
    source,
  });
}

export async function loadInventory(path: string): Promise<Inventory> {
  return createInventory(await readDocument(path), path);
}

export function getHost(inventory: Inventory, hostId: string): Host | undefined {
  return inventory.hosts.find((h) => h.id === hostId);
}

/**
 * Hosts addressed by a target: a host id wins over a group name. Returns
 * an empty list when nothing matches.
 */
export function resolveTargets(inventory: Inventory, target: string): Host[] {
  const direct = getHost(inventory, target);
  if (direct) return [direct];
  if (target === ALL_HOSTS_GROUP) return [...inventory.hosts];
  return inventory.hosts.filter((h) => h.groups.includes(target));
}
