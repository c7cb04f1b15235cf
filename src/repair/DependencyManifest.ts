/**
 * DependencyManifest - Adds missing packages to package.json or a
 * line-per-package text manifest (requirements.txt and the like)
 */

import { appendFileSync, existsSync, readFileSync, writeFileSync } from 'fs';
import { basename } from 'path';

const MISSING_MODULE = /(?:No module named|Cannot find (?:module|package))\s+['"]([^'"]+)['"]/;

const DEPENDENCY_SECTIONS = ['dependencies', 'devDependencies', 'peerDependencies', 'optionalDependencies'];

export type ManifestUpdate =
  | { status: 'added'; name: string }
  | { status: 'present'; name: string };

/**
 * Module name quoted in a missing-module message
 */
export function extractModuleName(line: string): string | null {
  const match = MISSING_MODULE.exec(line);
  return match ? match[1] : null;
}

/**
 * Installable package for an import specifier; null for relative paths and builtins
 */
export function packageNameFromSpecifier(specifier: string): string | null {
  if (!specifier || specifier.startsWith('.') || specifier.startsWith('/') || specifier.startsWith('node:')) {
    return null;
  }

  const parts = specifier.split('/');
  if (specifier.startsWith('@')) {
    return parts.length >= 2 && parts[1] ? `${parts[0]}/${parts[1]}` : null;
  }
  return parts[0];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export class DependencyManifest {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  get name(): string {
    return basename(this.path);
  }

  exists(): boolean {
    return existsSync(this.path);
  }

  read(): string {
    return readFileSync(this.path, 'utf-8');
  }

  /**
   * Add a package unless it is already listed (compared case-insensitively).
   * Throws when the manifest is missing or cannot be updated.
   */
  addDependency(name: string): ManifestUpdate {
    if (!this.exists()) {
      throw new Error(`Dependency manifest not found: ${this.path}`);
    }

    return this.name === 'package.json'
      ? this.addToPackageJson(name)
      : this.addToTextManifest(name);
  }

  private addToPackageJson(name: string): ManifestUpdate {
    const raw = readFileSync(this.path, 'utf-8');
    const pkg: unknown = JSON.parse(raw);
    if (!isRecord(pkg)) {
      throw new Error(`${this.path} does not contain a JSON object`);
    }

    const wanted = name.toLowerCase();
    for (const section of DEPENDENCY_SECTIONS) {
      const deps = pkg[section];
      if (isRecord(deps) && Object.keys(deps).some(key => key.toLowerCase() === wanted)) {
        return { status: 'present', name };
      }
    }

    const existing = pkg.dependencies;
    pkg.dependencies = { ...(isRecord(existing) ? existing : {}), [name]: '*' };
    writeFileSync(this.path, `${JSON.stringify(pkg, null, 2)}\n`);
    return { status: 'added', name };
  }

  private addToTextManifest(name: string): ManifestUpdate {
    const content = readFileSync(this.path, 'utf-8');
    if (content.toLowerCase().includes(name.toLowerCase())) {
      return { status: 'present', name };
    }

    appendFileSync(this.path, `\n${name}\n`);
    return { status: 'added', name };
  }
}
