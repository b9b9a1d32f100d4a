import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const repoRoot = fileURLToPath(new URL('../../..', import.meta.url));

const manifestSchema = z.object({
  bin: z.record(z.string()).optional(),
  workspaces: z.array(z.string()).optional(),
  exports: z.record(z.record(z.string())).optional(),
});

const buildConfigSchema = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
});

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(path.join(repoRoot, file), 'utf8'));
}

/** Source file that `tsc -p <pkg>/tsconfig.build.json` compiles into `built` */
function sourceOf(pkgDir: string, built: string): string {
  const { compilerOptions } = buildConfigSchema.parse(readJson(path.join(pkgDir, 'tsconfig.build.json')));
  const relative = path.relative(path.join(pkgDir, compilerOptions.outDir), path.join(pkgDir, built));
  return path.join(pkgDir, compilerOptions.rootDir, relative.replace(/\.d\.ts$|\.js$/, '.ts'));
}

const root = manifestSchema.parse(readJson('package.json'));
const workspaces = root.workspaces ?? [];

describe('package layout', () => {
  it('points every bin at the build output of an entry point with a shebang', () => {
    const bins = Object.entries(root.bin ?? {});
    expect(bins.map(([name]) => name).sort()).toEqual(['treeport', 'treeport-mcp', 'treeport-server']);

    for (const [, target] of bins) {
      const pkgDir = workspaces.find((dir) => path.normalize(target).startsWith(`${dir}/`));
      expect(pkgDir).toBeDefined();
      if (pkgDir === undefined) continue;

      const source = sourceOf(pkgDir, path.relative(pkgDir, target));
      expect(fs.readFileSync(path.join(repoRoot, source), 'utf8').startsWith('#!/usr/bin/env node')).toBe(true);
    }
  });

  it('resolves workspace imports to built JavaScript unless the source condition is set', () => {
    for (const dir of workspaces) {
      const manifest = manifestSchema.parse(readJson(path.join(dir, 'package.json')));
      for (const conditions of Object.values(manifest.exports ?? {})) {
        expect(Object.keys(conditions)).toEqual(['treeport-source', 'types', 'import']);

        const source = conditions['treeport-source'] ?? '';
        expect(source.endsWith('.ts')).toBe(true);
        expect(path.join(dir, source)).toBe(sourceOf(dir, conditions['import'] ?? ''));
        expect(path.join(dir, source)).toBe(sourceOf(dir, conditions['types'] ?? ''));
      }
    }
  });
});
