import fs from 'fs';
import path from 'path';
import { describe, expect, it } from 'vitest';

const ROOT = path.resolve(__dirname, '..', '..', '..');

type PackageManifest = {
  name: string;
  main: string;
  dependencies?: Record<string, string>;
};

type BuildConfig = {
  compilerOptions: { composite: boolean; rootDir: string; outDir: string };
  references?: { path: string }[];
};

const WORKSPACES = ['packages/shared', 'packages/rules', 'packages/documents', 'packages/assessment', 'apps/api'];

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

function readManifest(workspace: string): PackageManifest {
  const manifest = readJson(path.join(ROOT, workspace, 'package.json'));
  if (typeof manifest !== 'object' || manifest === null || !('name' in manifest) || !('main' in manifest)) {
    throw new Error(`${workspace}/package.json has no name or main`);
  }
  const { name, main } = manifest;
  if (typeof name !== 'string' || typeof main !== 'string') {
    throw new Error(`${workspace}/package.json has a malformed name or main`);
  }
  const dependencies =
    'dependencies' in manifest && typeof manifest.dependencies === 'object' && manifest.dependencies !== null
      ? Object.fromEntries(Object.entries(manifest.dependencies).map(([key, value]) => [key, String(value)]))
      : undefined;
  return { name, main, dependencies };
}

function readBuildConfig(workspace: string): BuildConfig {
  const config = readJson(path.join(ROOT, workspace, 'tsconfig.build.json'));
  if (typeof config !== 'object' || config === null || !('compilerOptions' in config)) {
    throw new Error(`${workspace}/tsconfig.build.json has no compilerOptions`);
  }
  const options = config.compilerOptions;
  if (typeof options !== 'object' || options === null) {
    throw new Error(`${workspace}/tsconfig.build.json has malformed compilerOptions`);
  }
  const composite = 'composite' in options && options.composite === true;
  const rootDir = 'rootDir' in options && typeof options.rootDir === 'string' ? options.rootDir : '';
  const outDir = 'outDir' in options && typeof options.outDir === 'string' ? options.outDir : '';
  const references =
    'references' in config && Array.isArray(config.references)
      ? config.references.flatMap((entry: unknown) =>
          typeof entry === 'object' && entry !== null && 'path' in entry && typeof entry.path === 'string'
            ? [{ path: entry.path }]
            : []
        )
      : undefined;
  return { compilerOptions: { composite, rootDir, outDir }, references };
}

describe('workspace build layout', () => {
  const manifests = new Map(WORKSPACES.map((workspace) => [readManifest(workspace).name, workspace]));

  it.each(WORKSPACES)('%s loads compiled JavaScript at run time', (workspace) => {
    const manifest = readManifest(workspace);
    const build = readBuildConfig(workspace);

    expect(build.compilerOptions).toEqual({ composite: true, rootDir: 'src', outDir: 'dist' });
    expect(manifest.main.startsWith('dist/')).toBe(true);
    expect(manifest.main.endsWith('.js')).toBe(true);

    const source = manifest.main.replace(/^dist\//, 'src/').replace(/\.js$/, '.ts');
    expect(fs.existsSync(path.join(ROOT, workspace, source))).toBe(true);
  });

  it.each(WORKSPACES)('%s references the build of every workspace it depends on', (workspace) => {
    const dependencies = Object.keys(readManifest(workspace).dependencies ?? {}).flatMap((name) => {
      const dependency = manifests.get(name);
      return dependency ? [dependency] : [];
    });
    const referenced = (readBuildConfig(workspace).references ?? []).map((reference) =>
      path.relative(ROOT, path.dirname(path.resolve(ROOT, workspace, reference.path)))
    );

    dependencies.forEach((dependency) => {
      expect(referenced).toContain(dependency);
    });
  });
});
