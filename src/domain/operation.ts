/**
 * Operation domain model.
 *
 * Each action kind carries its own typed parameters; transports switch on
 * `action` instead of composing shell text from untyped fields.
 */

export enum ActionKind {
  Install = 'install',
  Configure = 'configure',
  Deploy = 'deploy',
  Restart = 'restart',
  Stop = 'stop',
  Teardown = 'teardown',
}

export const ACTION_KINDS: readonly ActionKind[] = Object.values(ActionKind);

export interface InstallParams {
  packages: string[];
}

export interface ConfigureParams {
  path: string;
  content: string;
  /** Octal file mode, e.g. "0644". */
  mode?: string;
}

export interface DeployParams {
  release: string;
  /** Directory holding the release on the host. */
  directory: string;
  /** Command run inside `directory` to activate the release. */
  activate?: string;
}

export interface ServiceParams {
  service: string;
}

export interface TeardownParams {
  services: string[];
  paths: string[];
}

export type OperationAction =
  | { action: ActionKind.Install; params: InstallParams }
  | { action: ActionKind.Configure; params: ConfigureParams }
  | { action: ActionKind.Deploy; params: DeployParams }
  | { action: ActionKind.Restart; params: ServiceParams }
  | { action: ActionKind.Stop; params: ServiceParams }
  | { action: ActionKind.Teardown; params: TeardownParams };

/** Resource key -> expected value. Empty means "no assertion". */
export type DesiredState = Record<string, string>;

/** A single unit of work bound to one host. */
export type Operation = OperationAction & {
  /** Graph-unique id: `<manifestOperationId>@<hostId>`. */
  id: string;
  /** The manifest-level operation this instance was expanded from. */
  manifestOperationId: string;
  role: string;
  hostId: string;
  idempotencyKey: string;
  dependencies: string[];
  desiredState: DesiredState;
  timeoutMs: number;
  maxAttempts: number;
  /** Position in the expanded declaration order; topological tie-breaker. */
  declarationIndex: number;
};
