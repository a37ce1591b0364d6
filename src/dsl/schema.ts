/**
 * Manifest and inventory schema constants.
 */

import { ActionKind } from '../domain/operation';

/** Manifest format versions this build understands. */
export const SUPPORTED_MANIFEST_VERSIONS = ['1'] as const;

export const REQUIRED_MANIFEST_FIELDS = ['name', 'roles'] as const;

export const REQUIRED_ROLE_FIELDS = ['name', 'operations'] as const;

export const REQUIRED_OPERATION_FIELDS = ['id', 'action', 'hosts', 'idempotencyKey'] as const;

export const REQUIRED_HOST_FIELDS = ['address', 'credential'] as const;

/** Parameter fields each action kind requires. */
export const REQUIRED_PARAMS: Record<ActionKind, readonly string[]> = {
  [ActionKind.Install]: ['packages'],
  [ActionKind.Configure]: ['path', 'content'],
  [ActionKind.Deploy]: ['release', 'directory'],
  [ActionKind.Restart]: ['service'],
  [ActionKind.Stop]: ['service'],
  [ActionKind.Teardown]: [],
};

/** Identifiers for operations, roles and hosts. `@` is reserved for expansion. */
export const IDENTIFIER_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const SCHEMA_CONSTRAINTS = {
  maxOperations: 500,
  maxIdentifierLength: 128,
  minTimeoutMs: 1000,
  /** One hour. */
  maxTimeoutMs: 3_600_000,
  minAttempts: 1,
  maxAttempts: 10,
} as const;
