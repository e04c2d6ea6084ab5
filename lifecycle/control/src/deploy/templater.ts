// deploy/templater.ts - Manifest Templater
//
// Templates carry PLACEHOLDER_<NAME> tokens, where NAME is the longest run of
// [A-Z0-9_] after the prefix. Value tokens are replaced by their exact key;
// fragment tokens occupy a line of their own and are replaced by a
// multi-line block or removed with their line.

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import { UnresolvedPlaceholderError, ValidationError, type StorageBackend } from "@pagestack/contracts";

export const PLACEHOLDER_PATTERN = /PLACEHOLDER_[A-Z0-9_]+/g;

export type Substitutions = Record<string, string>;

/** Resolved fragments: text to insert, or null to elide the token's line */
export type ConditionalFragments = Record<string, string | null>;

/** Fragment text per storage backend; a backend without an entry elides the line */
export type FragmentSet = Record<string, Partial<Record<StorageBackend, string>>>;

const TOKEN_PREFIX = "PLACEHOLDER_";

function token(name: string): string {
  return `${TOKEN_PREFIX}${name}`;
}

export function selectFragments(set: FragmentSet, backend: StorageBackend): ConditionalFragments {
  const resolved: ConditionalFragments = {};
  for (const [name, variants] of Object.entries(set)) {
    resolved[name] = variants[backend] ?? null;
  }
  return resolved;
}

/**
 * Render a template. Pure: the same inputs always give the same document.
 * Throws UnresolvedPlaceholderError if any PLACEHOLDER_ token survives.
 */
export function render(
  template: string,
  substitutions: Substitutions,
  conditionalFragments: ConditionalFragments = {},
  source?: string
): string {
  const fragmentTokens = new Map<string, string | null>();
  for (const [name, fragment] of Object.entries(conditionalFragments)) {
    fragmentTokens.set(token(name), fragment);
  }

  const lines: string[] = [];
  for (const line of template.split("\n")) {
    const trimmed = line.trim();
    if (!fragmentTokens.has(trimmed)) {
      lines.push(line);
      continue;
    }
    const fragment = fragmentTokens.get(trimmed);
    if (fragment === null || fragment === undefined) continue;
    const indent = line.slice(0, line.length - line.trimStart().length);
    for (const fragmentLine of fragment.replace(/\n+$/, "").split("\n")) {
      lines.push(fragmentLine.length > 0 ? indent + fragmentLine : fragmentLine);
    }
  }

  // One pass over whole tokens: inserted values are never scanned again
  const unresolved = new Set<string>();
  const document = lines.join("\n").replace(PLACEHOLDER_PATTERN, (found) => {
    const name = found.slice(TOKEN_PREFIX.length);
    const value = Object.prototype.hasOwnProperty.call(substitutions, name) ? substitutions[name] : undefined;
    if (value === undefined) {
      unresolved.add(found);
      return found;
    }
    return value;
  });

  if (unresolved.size > 0) throw new UnresolvedPlaceholderError([...unresolved].sort(), source);
  return document;
}

// =============================================================================
// Template Files
// =============================================================================

export const DEFAULT_MANIFEST_DIR = fileURLToPath(new URL("../../../manifests", import.meta.url));

export function loadTemplate(relativePath: string, manifestDir: string = DEFAULT_MANIFEST_DIR): string {
  const path = join(manifestDir, relativePath);
  if (!existsSync(path)) {
    throw new ValidationError(`Manifest template not found: ${path}`, {
      code: "TEMPLATE_MISSING",
      details: { path },
    });
  }
  return readFileSync(path, "utf-8");
}

export function renderFile(
  relativePath: string,
  substitutions: Substitutions,
  conditionalFragments: ConditionalFragments = {},
  manifestDir?: string
): string {
  return render(loadTemplate(relativePath, manifestDir), substitutions, conditionalFragments, relativePath);
}
