/**
 * Tests for the resolver facade and project loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CrossReferenceResolver, openProject } from '../src/resolver.js';
import { DEFAULT_CONFIG, mergeConfig } from '../src/config.js';
import { MemoryCodebase } from '../src/sources/memory-codebase.js';
import { StateCache } from '../src/xref/index.js';
import { captureLogger, member } from './helpers.js';

function fixture(): MemoryCodebase {
  return new MemoryCodebase([
    {
      name: 'Player',
      annotations: { implements: 'Player' },
      members: [
        { name: 'health', kind: 'field', annotations: { export: 'health' } },
        { name: 'name', kind: 'field', annotations: { export: 'name' } },
      ],
    },
    {
      name: 'RSPlayer',
      members: [
        { name: 'getHealth', annotations: { import: 'health' } },
        { name: 'getLevel', annotations: { import: 'level' } },
      ],
    },
    {
      name: 'PlayerMixin',
      annotations: { mixin: 'RSPlayer' },
      members: [{ name: 'onTick', annotations: { replace: 'tick' } }],
    },
  ]);
}

describe('CrossReferenceResolver', () => {
  let codebase: MemoryCodebase;
  let resolver: CrossReferenceResolver;

  beforeEach(() => {
    codebase = fixture();
    resolver = new CrossReferenceResolver({ codebase, logger: captureLogger().logger });
  });

  it('should reuse the state while the codebase is unchanged', () => {
    const state = resolver.state();
    expect(resolver.state()).toBe(state);

    codebase.getType('RSPlayer')?.addMember({ name: 'getName', annotations: { import: 'name' } });
    expect(resolver.state()).not.toBe(state);
  });

  it('should see changes made after the first query', () => {
    const health = member(codebase, 'Player', 'health');
    expect(resolver.exportsReferencing(health)).toEqual([member(codebase, 'RSPlayer', 'getHealth')]);

    member(codebase, 'RSPlayer', 'getHealth').setAnnotation('import', undefined);
    expect(resolver.exportsReferencing(health)).toEqual([]);
  });

  it('should build a fresh state on every call when caching is disabled', () => {
    const uncached = new CrossReferenceResolver({
      codebase,
      config: mergeConfig({ cache: { enabled: false } }),
      logger: captureLogger().logger,
    });

    expect(uncached.state()).not.toBe(uncached.state());
  });

  it('should share a cache between resolvers', () => {
    const cache = new StateCache();
    const { logger } = captureLogger();
    const first = new CrossReferenceResolver({ codebase, cache, logger });
    const second = new CrossReferenceResolver({ codebase, cache, logger });

    expect(second.state()).toBe(first.state());
    expect(cache.getStats(codebase)).toMatchObject({ builds: 1, hits: 1 });
  });

  it('should not leak state between codebases sharing a cache', () => {
    const cache = new StateCache();
    const { logger } = captureLogger();
    const npcs = new MemoryCodebase([
      {
        name: 'Npc',
        annotations: { implements: 'Npc' },
        members: [{ name: 'id', kind: 'field', annotations: { export: 'id' } }],
      },
      { name: 'RSNpc', members: [{ name: 'getId', annotations: { import: 'id' } }] },
    ]);
    const players = new CrossReferenceResolver({ codebase, cache, logger });
    const others = new CrossReferenceResolver({ codebase: npcs, cache, logger });

    players.state();

    expect(others.referencesOf(member(npcs, 'RSNpc', 'getId'))).toEqual([member(npcs, 'Npc', 'id')]);
    expect(others.summarize()).toMatchObject({ exports: 1, references: 1, unresolved: 0 });
  });

  it('should not leak state between mirror prefixes sharing a cache', () => {
    const cache = new StateCache();
    const { logger } = captureLogger();
    codebase.addType({ name: 'ApiPlayer', members: [{ name: 'hp', annotations: { import: 'health' } }] });
    const standard = new CrossReferenceResolver({ codebase, cache, logger });
    const custom = new CrossReferenceResolver({
      codebase,
      cache,
      config: { ...DEFAULT_CONFIG, mirrorPrefix: 'Api' },
      logger,
    });

    expect(standard.referencesOf(member(codebase, 'ApiPlayer', 'hp'))).toEqual([]);
    expect(custom.referencesOf(member(codebase, 'ApiPlayer', 'hp'))).toEqual([
      member(codebase, 'Player', 'health'),
    ]);
  });

  it('should resolve asynchronously to the cached state', async () => {
    const state = await resolver.ready();
    expect(resolver.state()).toBe(state);
  });

  it('should answer both navigation directions', () => {
    const getHealth = member(codebase, 'RSPlayer', 'getHealth');
    const health = member(codebase, 'Player', 'health');

    expect(resolver.referencesOf(getHealth)).toEqual([health]);
    expect(resolver.markersFor(health).map((marker) => marker.tooltip)).toEqual(['Navigate to reference']);
    expect(resolver.markersFor(member(codebase, 'RSPlayer', 'getLevel'))).toEqual([]);
  });

  it('should summarize the state', () => {
    expect(resolver.summarize()).toEqual({
      exports: 2,
      declarations: 3,
      references: 1,
      implementers: 1,
      unresolved: 2,
      modificationCount: 0,
    });
  });

  it('should apply the configured mirror prefix', () => {
    const api = new MemoryCodebase([
      {
        name: 'Player',
        annotations: { implements: 'Player' },
        members: [{ name: 'health', kind: 'field', annotations: { export: 'health' } }],
      },
      { name: 'ApiPlayer', members: [{ name: 'hp', annotations: { import: 'health' } }] },
    ]);
    const custom = new CrossReferenceResolver({
      codebase: api,
      config: { ...DEFAULT_CONFIG, mirrorPrefix: 'Api' },
      logger: captureLogger().logger,
    });

    expect(custom.referencesOf(member(api, 'ApiPlayer', 'hp'))).toEqual([member(api, 'Player', 'health')]);
  });
});

describe('openProject', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'xref-project-'));
    fs.writeFileSync(path.join(root, '.xrefrc.json'), JSON.stringify({ logLevel: 'error' }));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('should load configuration and manifests into a resolver', async () => {
    fs.writeFileSync(
      path.join(root, 'api.xref.json'),
      JSON.stringify({
        types: [
          { name: 'Client', members: [{ name: 'tick', static: true, annotations: { export: 'tick' } }] },
          { name: 'RSClient', members: [{ name: 'getTick', annotations: { import: 'tick' } }] },
        ],
      })
    );
    fs.writeFileSync(path.join(root, 'broken.xref.json'), '{');

    const project = await openProject(root);

    expect(project.config.logLevel).toBe('error');
    expect(project.files).toEqual(['api.xref.json']);
    expect(project.errors.map((error) => error.message)).toEqual(['broken.xref.json: invalid JSON']);

    const [getTick] = project.codebase.findDeclarations('RSClient', 'getTick');
    expect(getTick && project.resolver.referencesOf(getTick)).toEqual(
      project.codebase.findDeclarations('Client', 'tick')
    );
    expect(project.resolver.summarize()).toMatchObject({ exports: 1, references: 1, unresolved: 0 });
  });

  it('should fail when no manifest matches', async () => {
    await expect(openProject(root)).rejects.toMatchObject({ code: 'MANIFEST_NOT_FOUND' });
  });
});
