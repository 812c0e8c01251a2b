import { describe, expect, test } from 'vitest';

import { ExitCode, runLint, type CliIO } from '../src/cli/lint.js';

interface FakeIO extends CliIO {
  stdout: string[];
  stderr: string[];
}

function fakeIO(files: Record<string, string>): FakeIO {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: line => stdout.push(line),
    err: line => stderr.push(line),
    readFile: async path => {
      const content = files[path];
      if (content === undefined) {
        throw Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), { code: 'ENOENT' });
      }
      return content;
    },
  };
}

function snapshot(edges: Array<[string, string]>): string {
  return JSON.stringify({
    graph: { layers: { api: 'web', db: 'data' }, allowedEdges: [['web', 'data']] },
    edges,
  });
}

describe('contract-lint', () => {
  test('clean snapshot exits 0', async () => {
    const io = fakeIO({ 'deps.json': snapshot([['api', 'db']]) });

    expect(await runLint(['deps.json'], io)).toBe(ExitCode.SUCCESS);
    expect(io.stdout).toEqual(['1 edges checked, 0 violations, 0 cycles']);
  });

  test('violations are printed with hints and exit 2', async () => {
    const io = fakeIO({
      'deps.json': snapshot([
        ['db', 'api'],
        ['api', 'db'],
        ['cache', 'db'],
      ]),
    });

    expect(await runLint(['deps.json'], io)).toBe(ExitCode.VIOLATIONS);
    expect(io.stdout).toEqual([
      '[BLOCK] layers FORBIDDEN_LAYER_EDGE: Module db (layer data) may not depend on module api (layer web): edge data → web is not allowed',
      '[BLOCK] layers UNKNOWN_MODULE: Undeclared module "cache" in dependency cache → db',
      'cycle: db, api',
      '  hint: Remove dependency db → api: layer data may not depend on any other layer',
      '  hint: Declare cache and db with a layer before depending between them',
      '3 edges checked, 2 violations, 1 cycles',
    ]);
  });

  test('--warn reports but exits 0', async () => {
    const io = fakeIO({ 'deps.json': snapshot([['db', 'api']]) });

    expect(await runLint(['deps.json', '--warn'], io)).toBe(ExitCode.SUCCESS);
    expect(io.stdout[0]).toMatch(/^\[WARN\] layers FORBIDDEN_LAYER_EDGE: /);
  });

  test('missing argument is a usage error', async () => {
    const io = fakeIO({});

    expect(await runLint([], io)).toBe(ExitCode.USAGE);
    expect(io.stderr[0]).toMatch(/^Usage:/);
  });

  test('a cycle between allowed edges fails the check', async () => {
    const io = fakeIO({
      'deps.json': JSON.stringify({
        graph: { layers: { api: 'web', views: 'web' }, allowedEdges: [['web', 'web']] },
        edges: [
          ['api', 'views'],
          ['views', 'api'],
        ],
      }),
    });

    expect(await runLint(['deps.json'], io)).toBe(ExitCode.VIOLATIONS);
    expect(io.stdout).toEqual(['cycle: api, views', '2 edges checked, 0 violations, 1 cycles']);
  });

  test('unknown options are a usage error', async () => {
    const io = fakeIO({ 'deps.json': snapshot([['api', 'db']]) });

    expect(await runLint(['deps.json', '--wran'], io)).toBe(ExitCode.USAGE);
    expect(io.stderr[0]).toBe('Unknown option: --wran');
    expect(io.stderr[1]).toMatch(/^Usage:/);
    expect(io.stdout).toEqual([]);
  });

  test('--help prints usage and succeeds', async () => {
    const io = fakeIO({});

    expect(await runLint(['--help'], io)).toBe(ExitCode.SUCCESS);
    expect(io.stdout[0]).toMatch(/^Usage:/);
  });

  test('missing file exits 66', async () => {
    const io = fakeIO({});

    expect(await runLint(['nope.json'], io)).toBe(ExitCode.NO_INPUT);
    expect(io.stderr).toEqual(['File not found: nope.json']);
  });

  test('malformed JSON exits 65', async () => {
    const io = fakeIO({ 'deps.json': '{' });

    expect(await runLint(['deps.json'], io)).toBe(ExitCode.DATA_ERROR);
    expect(io.stderr).toHaveLength(1);
  });

  test('snapshot not matching the schema exits 65', async () => {
    const io = fakeIO({ 'deps.json': JSON.stringify({ graph: { layers: {}, allowedEdges: [] } }) });

    expect(await runLint(['deps.json'], io)).toBe(ExitCode.DATA_ERROR);
    expect(io.stderr).toEqual(['deps.json: edges: Required']);
  });

  test('structurally broken graph exits 65', async () => {
    const io = fakeIO({
      'deps.json': JSON.stringify({
        graph: { layers: { api: 'web' }, allowedEdges: [['web', 'queue']] },
        edges: [],
      }),
    });

    expect(await runLint(['deps.json'], io)).toBe(ExitCode.DATA_ERROR);
    expect(io.stderr).toEqual([
      'deps.json: DANGLING_LAYER_EDGE: Allowed edge web → queue names layer(s) no module belongs to: queue',
    ]);
  });
});
