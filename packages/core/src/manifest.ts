/**
 * Manifest loading
 *
 * The manifest declares the axis definitions and the state table. Anything
 * that fails to read, parse or validate raises ManifestError; no partial
 * manifest is ever returned.
 */

import { readFile } from 'node:fs/promises';
import type { ZodIssue } from 'zod';
import { ManifestSchema, type AxisDefinition, type Manifest } from './types.js';
import { ManifestError } from './errors.js';

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
  return `${path}: ${issue.message}`;
}

export function parseManifest(raw: unknown, source = '<inline>'): Manifest {
  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(formatIssue);
    throw new ManifestError(
      'MANIFEST_INVALID',
      `Invalid manifest ${source}: ${issues.join('; ')}`,
      issues,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

export async function loadManifest(path: string | URL): Promise<Manifest> {
  const source = String(path);

  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ManifestError('MANIFEST_UNREADABLE', `Cannot read manifest ${source}`, [], {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ManifestError('MANIFEST_INVALID', `Manifest ${source} is not valid JSON: ${reason}`, [reason], {
      cause: error,
    });
  }

  return parseManifest(raw, source);
}

/**
 * `pos_def`, falling back to `vector_def`. Blank text counts as absent.
 */
export function resolvePositiveText(definition: AxisDefinition | undefined): string | undefined {
  if (!definition) return undefined;
  for (const candidate of [definition.pos_def, definition.vector_def]) {
    if (candidate !== undefined && candidate.trim().length > 0) {
      return candidate;
    }
  }
  return undefined;
}

/** Length shared by every state key, or undefined for an empty table. */
export function stateKeyLength(manifest: Manifest): number | undefined {
  const [first] = Object.keys(manifest.states);
  return first?.length;
}
