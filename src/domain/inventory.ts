/**
 * Inventory domain model.
 *
 * An Inventory is a frozen snapshot loaded once per run and passed by
 * reference to every component. Observed remote state never lives on the
 * snapshot; it is tracked per run in HostState records.
 */

/** A target host and how to reach it. */
export interface Host {
  readonly id: string;
  readonly address: string;
  /** Reference understood by a CredentialResolver (e.g. "env:DEPLOY_KEY"). */
  readonly credentialRef: string;
  readonly groups: readonly string[];
  readonly port?: number;
  readonly user?: string;
}

export interface Inventory {
  /** Hosts in declaration order. */
  readonly hosts: readonly Host[];
  readonly loadedAt: string;
  /** Where the snapshot came from (file path or "inline"). */
  readonly source: string;
}

/** Inventory document as written by operators (before validation). */
export interface InventoryDocument {
  hosts: Record<
    string,
    {
      address: string;
      credential: string;
      groups?: string[];
      port?: number;
      user?: string;
    }
  >;
}

/** Last-known state of a host, as captured by the reconciler's probe. */
export interface HostState {
  hostId: string;
  /** Resource key -> observed value. */
  observed: Record<string, string>;
  probedAt?: string;
  /** Set when the probe failed; state is then unknown. */
  probeError?: string;
}
