/**
 * Credential references.
 *
 * Inventories name credentials by reference only. The resolver turns a
 * reference into an opaque handle that transports use to authenticate;
 * reports and logs only ever carry the reference string.
 */

import { DeckhandError, createTypedError } from '../domain/errors';

export type CredentialKind = 'agent' | 'identity-file';

export interface CredentialHandle {
  readonly ref: string;
  readonly kind: CredentialKind;
  /** Path to a private key, for identity-file credentials. */
  readonly identityFile?: string;
}

export interface CredentialResolver {
  resolve(ref: string): CredentialHandle;
}

const ENV_REF = /^env:([A-Z_][A-Z0-9_]*)$/;
const FILE_REF = /^file:(\/.+)$/;

export function isCredentialRef(ref: string): boolean {
  return ref === 'agent' || ENV_REF.test(ref) || FILE_REF.test(ref);
}

function credentialError(ref: string, message: string): DeckhandError {
  return new DeckhandError(
    createTypedError({
      code: 'INVENTORY.CREDENTIAL_UNRESOLVED',
      message: `Cannot resolve credential "${ref}": ${message}`,
      details: { ref },
    }),
  );
}

/**
 * Resolves "agent", "file:/path/to/key" and "env:NAME" (where the variable
 * holds a key path) against the given environment.
 */
export class EnvironmentCredentialResolver implements CredentialResolver {
  constructor(private env: NodeJS.ProcessEnv = process.env) {}

  resolve(ref: string): CredentialHandle {
    if (ref === 'agent') return Object.freeze({ ref, kind: 'agent' });

    const file = FILE_REF.exec(ref);
    if (file) return Object.freeze({ ref, kind: 'identity-file', identityFile: file[1] });

    const env = ENV_REF.exec(ref);
    if (env) {
      const value = this.env[env[1]];
      if (!value) throw credentialError(ref, `environment variable ${env[1]} is not set`);
      return Object.freeze({ ref, kind: 'identity-file', identityFile: value });
    }

    throw credentialError(ref, 'unsupported reference format');
  }
}
