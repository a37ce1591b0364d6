/**
 * Deployment manifest model.
 *
 * A manifest enumerates roles, each an ordered list of operations. The
 * validator turns an untrusted document into a Manifest; the graph builder
 * expands it against an inventory.
 */

import { DesiredState, OperationAction } from './operation';

export type ManifestOperation = OperationAction & {
  id: string;
  /** Host id or inventory group name. */
  hosts: string;
  idempotencyKey: string;
  /**
   * Manifest-level operation ids this operation waits for. When omitted the
   * operation depends on the previous operation of its role.
   */
  dependsOn?: string[];
  desiredState?: DesiredState;
  timeoutMs?: number;
  maxAttempts?: number;
};

export interface ManifestRole {
  name: string;
  operations: ManifestOperation[];
}

export interface Manifest {
  name: string;
  version: string;
  roles: ManifestRole[];
}
