/**
 * Manifest validator.
 *
 * Turns an untrusted, already-parsed document (JSON or YAML) into a typed
 * Manifest, collecting every problem rather than stopping at the first.
 * Dependency resolution and cycle checks belong to the graph builder.
 */

import { DeckhandError, ValidationIssue, invalidManifestError } from '../domain/errors';
import { Manifest, ManifestOperation, ManifestRole } from '../domain/manifest';
import { ACTION_KINDS, ActionKind, DesiredState, OperationAction } from '../domain/operation';
import {
  IDENTIFIER_PATTERN,
  REQUIRED_MANIFEST_FIELDS,
  REQUIRED_OPERATION_FIELDS,
  REQUIRED_PARAMS,
  REQUIRED_ROLE_FIELDS,
  SCHEMA_CONSTRAINTS,
  SUPPORTED_MANIFEST_VERSIONS,
} from './schema';

export interface ManifestValidationResult {
  valid: boolean;
  issues: ValidationIssue[];
  warnings: string[];
  manifest?: Manifest;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function checkIdentifier(value: string, path: string, issues: ValidationIssue[]): void {
  if (value.length > SCHEMA_CONSTRAINTS.maxIdentifierLength) {
    issues.push({ path, message: `must be at most ${SCHEMA_CONSTRAINTS.maxIdentifierLength} characters` });
  } else if (!IDENTIFIER_PATTERN.test(value)) {
    issues.push({ path, message: `"${value}" must start with a letter or digit and contain only letters, digits, ".", "_" or "-"` });
  }
}

export function validateManifest(document: unknown): ManifestValidationResult {
  const issues: ValidationIssue[] = [];
  const warnings: string[] = [];

  if (!isRecord(document)) {
    return { valid: false, issues: [{ path: '$', message: 'manifest must be an object' }], warnings };
  }

  for (const field of REQUIRED_MANIFEST_FIELDS) {
    if (document[field] === undefined || document[field] === null) {
      issues.push({ path: field, message: 'is required' });
    }
  }
  if (issues.length > 0) return { valid: false, issues, warnings };

  const name = document.name;
  if (typeof name !== 'string' || name.trim() === '') {
    issues.push({ path: 'name', message: 'must be a non-empty string' });
  }

  let version: string = SUPPORTED_MANIFEST_VERSIONS[0];
  if (document.version !== undefined) {
    const raw = String(document.version);
    if (!SUPPORTED_MANIFEST_VERSIONS.some((v) => v === raw)) {
      issues.push({ path: 'version', message: `unsupported manifest version "${raw}"` });
    }
    version = raw;
  }

  const roles: ManifestRole[] = [];
  const rawRoles = document.roles;
  if (!Array.isArray(rawRoles) || rawRoles.length === 0) {
    issues.push({ path: 'roles', message: 'must be a non-empty array' });
  } else {
    const roleNames = new Set<string>();
    const operationIds = new Set<string>();
    let operationCount = 0;

    rawRoles.forEach((rawRole: unknown, roleIndex) => {
      const rolePath = `roles[${roleIndex}]`;
      const role = validateRole(rawRole, rolePath, issues);
      if (!role) return;

      if (roleNames.has(role.name)) {
        issues.push({ path: `${rolePath}.name`, message: `duplicate role name "${role.name}"` });
      }
      roleNames.add(role.name);

      role.operations.forEach((op, opIndex) => {
        if (operationIds.has(op.id)) {
          issues.push({ path: `${rolePath}.operations[${opIndex}].id`, message: `duplicate operation id "${op.id}"` });
        }
        operationIds.add(op.id);
      });
      if (role.operations.length === 0) {
        warnings.push(`Role "${role.name}" declares no operations`);
      }
      operationCount += role.operations.length;
      roles.push(role);
    });

    if (operationCount > SCHEMA_CONSTRAINTS.maxOperations) {
      issues.push({ path: 'roles', message: `declares ${operationCount} operations; the limit is ${SCHEMA_CONSTRAINTS.maxOperations}` });
    }
  }

  if (issues.length > 0 || typeof name !== 'string') {
    return { valid: false, issues, warnings };
  }

  return { valid: true, issues, warnings, manifest: { name, version, roles } };
}

function validateRole(raw: unknown, path: string, issues: ValidationIssue[]): ManifestRole | undefined {
  if (!isRecord(raw)) {
    issues.push({ path, message: 'must be an object' });
    return undefined;
  }
  const missing = REQUIRED_ROLE_FIELDS.filter((f) => raw[f] === undefined || raw[f] === null);
  for (const field of missing) {
    issues.push({ path: `${path}.${field}`, message: 'is required' });
  }
  if (missing.length > 0) return undefined;

  const name = raw.name;
  if (typeof name !== 'string') {
    issues.push({ path: `${path}.name`, message: 'must be a string' });
    return undefined;
  }
  checkIdentifier(name, `${path}.name`, issues);

  if (!Array.isArray(raw.operations)) {
    issues.push({ path: `${path}.operations`, message: 'must be an array' });
    return undefined;
  }

  const operations: ManifestOperation[] = [];
  raw.operations.forEach((rawOp: unknown, index) => {
    const op = validateOperation(rawOp, `${path}.operations[${index}]`, issues);
    if (op) operations.push(op);
  });
  return { name, operations };
}

function validateOperation(raw: unknown, path: string, issues: ValidationIssue[]): ManifestOperation | undefined {
  if (!isRecord(raw)) {
    issues.push({ path, message: 'must be an object' });
    return undefined;
  }
  const missing = REQUIRED_OPERATION_FIELDS.filter((f) => raw[f] === undefined || raw[f] === null);
  for (const field of missing) {
    issues.push({ path: `${path}.${field}`, message: 'is required' });
  }
  if (missing.length > 0) return undefined;

  const before = issues.length;
  const { id, hosts, idempotencyKey, action } = raw;

  if (typeof id !== 'string') issues.push({ path: `${path}.id`, message: 'must be a string' });
  else checkIdentifier(id, `${path}.id`, issues);

  if (typeof hosts !== 'string' || hosts.trim() === '') {
    issues.push({ path: `${path}.hosts`, message: 'must name a host or group' });
  }
  if (typeof idempotencyKey !== 'string' || idempotencyKey.trim() === '') {
    issues.push({ path: `${path}.idempotencyKey`, message: 'must be a non-empty string' });
  }

  let dependsOn: string[] | undefined;
  if (raw.dependsOn !== undefined) {
    if (isStringArray(raw.dependsOn)) dependsOn = raw.dependsOn;
    else issues.push({ path: `${path}.dependsOn`, message: 'must be an array of operation ids' });
  }

  const desiredState = validateDesiredState(raw.desiredState, `${path}.desiredState`, issues);
  const timeoutMs = validateRange(raw.timeoutMs, `${path}.timeoutMs`, SCHEMA_CONSTRAINTS.minTimeoutMs, SCHEMA_CONSTRAINTS.maxTimeoutMs, issues);
  const maxAttempts = validateRange(raw.maxAttempts, `${path}.maxAttempts`, SCHEMA_CONSTRAINTS.minAttempts, SCHEMA_CONSTRAINTS.maxAttempts, issues);

  const typed = validateAction(action, raw.params, path, issues);

  if (
    issues.length > before ||
    !typed ||
    typeof id !== 'string' ||
    typeof hosts !== 'string' ||
    typeof idempotencyKey !== 'string'
  ) {
    return undefined;
  }

  return {
    ...typed,
    id,
    hosts,
    idempotencyKey,
    dependsOn,
    desiredState,
    timeoutMs,
    maxAttempts,
  };
}

function validateRange(
  value: unknown,
  path: string,
  min: number,
  max: number,
  issues: ValidationIssue[],
): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    issues.push({ path, message: `must be an integer between ${min} and ${max}` });
    return undefined;
  }
  return value;
}

function validateDesiredState(value: unknown, path: string, issues: ValidationIssue[]): DesiredState | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    issues.push({ path, message: 'must be a mapping of resource keys to expected values' });
    return undefined;
  }
  const entries: Array<[string, string]> = [];
  for (const [key, expected] of Object.entries(value)) {
    if (key.trim() === '') {
      issues.push({ path, message: 'resource keys must be non-empty' });
    } else if (typeof expected === 'string' || typeof expected === 'number' || typeof expected === 'boolean') {
      entries.push([key, String(expected)]);
    } else {
      issues.push({ path: `${path}.${key}`, message: 'expected value must be a string, number or boolean' });
    }
  }
  // fromEntries defines own properties, so a key such as "__proto__" survives.
  return Object.fromEntries(entries);
}

function isActionKind(value: unknown): value is ActionKind {
  return ACTION_KINDS.some((kind) => kind === value);
}

const SERVICE_NAME = /^[A-Za-z0-9@._-]+$/;
const FILE_MODE = /^0?[0-7]{3}$/;

function validateAction(
  action: unknown,
  rawParams: unknown,
  path: string,
  issues: ValidationIssue[],
): OperationAction | undefined {
  if (!isActionKind(action)) {
    issues.push({ path: `${path}.action`, message: `must be one of: ${ACTION_KINDS.join(', ')}` });
    return undefined;
  }
  const params = rawParams === undefined ? {} : rawParams;
  if (!isRecord(params)) {
    issues.push({ path: `${path}.params`, message: 'must be an object' });
    return undefined;
  }
  const missing = REQUIRED_PARAMS[action].filter((f) => params[f] === undefined);
  for (const field of missing) {
    issues.push({ path: `${path}.params.${field}`, message: `is required for ${action}` });
  }
  if (missing.length > 0) return undefined;

  const issue = (field: string, message: string) => issues.push({ path: `${path}.params.${field}`, message });
  const absolute = (value: unknown): value is string => typeof value === 'string' && value.startsWith('/');

  switch (action) {
    case ActionKind.Install: {
      const packages = params.packages;
      if (!isStringArray(packages) || packages.length === 0) {
        issue('packages', 'must be a non-empty array of package names');
        return undefined;
      }
      return { action, params: { packages } };
    }
    case ActionKind.Configure: {
      const { path: filePath, content, mode } = params;
      let ok = true;
      if (!absolute(filePath)) { issue('path', 'must be an absolute path'); ok = false; }
      if (typeof content !== 'string') { issue('content', 'must be a string'); ok = false; }
      if (mode !== undefined && (typeof mode !== 'string' || !FILE_MODE.test(mode))) { issue('mode', 'must be an octal mode such as "0644"'); ok = false; }
      if (!ok || !absolute(filePath) || typeof content !== 'string') return undefined;
      return { action, params: { path: filePath, content, mode: typeof mode === 'string' ? mode : undefined } };
    }
    case ActionKind.Deploy: {
      const { release, directory, activate } = params;
      let ok = true;
      if (typeof release !== 'string' || release.trim() === '') { issue('release', 'must be a non-empty string'); ok = false; }
      if (!absolute(directory)) { issue('directory', 'must be an absolute path'); ok = false; }
      if (activate !== undefined && typeof activate !== 'string') { issue('activate', 'must be a string'); ok = false; }
      if (!ok || typeof release !== 'string' || !absolute(directory)) return undefined;
      return { action, params: { release, directory, activate: typeof activate === 'string' ? activate : undefined } };
    }
    case ActionKind.Restart:
    case ActionKind.Stop: {
      const service = params.service;
      if (typeof service !== 'string' || !SERVICE_NAME.test(service)) {
        issue('service', 'must be a service name');
        return undefined;
      }
      return { action, params: { service } };
    }
    case ActionKind.Teardown: {
      const services = params.services ?? [];
      const paths = params.paths ?? [];
      let ok = true;
      if (!isStringArray(services) || !services.every((s) => SERVICE_NAME.test(s))) { issue('services', 'must be an array of service names'); ok = false; }
      if (!isStringArray(paths) || !paths.every((p) => p.startsWith('/'))) { issue('paths', 'must be an array of absolute paths'); ok = false; }
      if (!ok || !isStringArray(services) || !isStringArray(paths)) return undefined;
      if (services.length === 0 && paths.length === 0) {
        issue('services', 'teardown needs at least one service or path');
        return undefined;
      }
      return { action, params: { services, paths } };
    }
  }
}

/** Validate and return the manifest, or throw InvalidManifest. */
export function parseManifest(document: unknown): Manifest {
  const result = validateManifest(document);
  if (!result.valid || !result.manifest) {
    throw new DeckhandError(invalidManifestError(result.issues));
  }
  return result.manifest;
}
