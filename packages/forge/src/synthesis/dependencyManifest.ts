import fs from 'fs-extra';
import { builtinModules } from 'module';
import path from 'path';
import { log, logError, logWarn } from '@toolsmith/common';
import type { DependencyManifest, FileToolStore } from '../store/toolStore';
import { extractErrorMessage, isRecord } from '../utils';

const REQUIRE_PATTERN = /\brequire\(\s*['"]([^'"]+)['"]\s*\)/g;
const IMPORT_PATTERN = /\bimport\s+(?:[\w$*{}\s,]+?\s+from\s+)?['"]([^'"]+)['"]/g;

const BUILTINS = new Set(builtinModules);
const INTERNAL_MODULES = new Set(['@toolsmith/common', '@toolsmith/forge', '@toolsmith/library']);

/** `lodash/fp` -> `lodash`, `@scope/pkg/sub` -> `@scope/pkg`. */
export function toPackageName(specifier: string): string {
  const segments = specifier.split('/');
  return specifier.startsWith('@') ? segments.slice(0, 2).join('/') : segments[0];
}

const isRelative = (specifier: string) => specifier.startsWith('.') || specifier.startsWith('/');

/**
 * Package names of every non-relative module a source loads, `require` calls before `import`
 * statements. Built-ins are included without their `node:` prefix.
 */
export function scanSpecifiers(source: string): string[] {
  const packages = new Set<string>();
  for (const pattern of [REQUIRE_PATTERN, IMPORT_PATTERN]) {
    for (const match of source.matchAll(pattern)) {
      const specifier = match[1];
      if (isRelative(specifier)) continue;
      packages.add(toPackageName(specifier.replace(/^node:/, '')));
    }
  }
  return Array.from(packages);
}

/** Third-party packages only. */
export function scanDependencies(source: string): string[] {
  return scanSpecifiers(source).filter((name) => !BUILTINS.has(name) && !INTERNAL_MODULES.has(name));
}

/** node_modules directories from `start` up to the filesystem root. */
export function nodeModulesChain(start: string = process.cwd()): string[] {
  const dirs: string[] = [];
  let current = path.resolve(start);
  for (;;) {
    dirs.push(path.join(current, 'node_modules'));
    const parent = path.dirname(current);
    if (parent === current) return dirs;
    current = parent;
  }
}

/**
 * `^<installed version>` from the first node_modules that has the package, `*` otherwise.
 */
export async function resolveVersion(packageName: string, searchDirs: string[]): Promise<string> {
  for (const dir of searchDirs) {
    const manifestPath = path.join(dir, packageName, 'package.json');
    try {
      if (!(await fs.pathExists(manifestPath))) continue;
      const manifest: unknown = await fs.readJson(manifestPath);
      if (isRecord(manifest) && typeof manifest.version === 'string') {
        return `^${manifest.version}`;
      }
    } catch (error) {
      logWarn(`[DependencyManifest] Skipping ${manifestPath}: ${extractErrorMessage(error)}`);
    }
  }
  return '*';
}

/**
 * Writes package.json beside tool.js. Never throws; returns the manifest written, or null.
 */
export async function writeDependencyManifest(
  toolName: string,
  source: string,
  store: FileToolStore,
  searchDirs: string[] = nodeModulesChain()
): Promise<DependencyManifest | null> {
  try {
    const dependencies: Record<string, string> = {};
    for (const name of scanDependencies(source)) {
      dependencies[name] = await resolveVersion(name, searchDirs);
    }
    const manifest: DependencyManifest = {
      name: path.basename(store.namespacePath(toolName)),
      version: '1.0.0',
      private: true,
      dependencies,
    };
    await store.writeManifest(toolName, manifest);
    log(
      `[DependencyManifest] ${toolName}: ${Object.keys(dependencies).length} dependencies recorded`
    );
    return manifest;
  } catch (error) {
    logError(`[DependencyManifest] Could not write manifest for ${toolName}: ${extractErrorMessage(error)}`);
    return null;
  }
}
