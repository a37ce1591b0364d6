/**
 * Document loader for manifests and inventories.
 *
 * Files ending in .yaml/.yml are parsed as YAML; everything else as JSON.
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import { parse as parseYaml } from 'yaml';
import { DeckhandError, unreadableDocumentError } from '../domain/errors';
import { Manifest } from '../domain/manifest';
import { parseManifest } from './validator';

export function parseDocument(text: string, format: 'json' | 'yaml'): unknown {
  return format === 'yaml' ? parseYaml(text) : JSON.parse(text);
}

export function formatForPath(path: string): 'json' | 'yaml' {
  const ext = extname(path).toLowerCase();
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json';
}

/** Read and parse a JSON or YAML file. Throws DeckhandError(MANIFEST.UNREADABLE). */
export async function readDocument(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new DeckhandError(unreadableDocumentError(path, err instanceof Error ? err.message : String(err)));
  }
  try {
    return parseDocument(text, formatForPath(path));
  } catch (err) {
    throw new DeckhandError(unreadableDocumentError(path, err instanceof Error ? err.message : String(err)));
  }
}

export async function loadManifest(path: string): Promise<Manifest> {
  return parseManifest(await readDocument(path));
}
