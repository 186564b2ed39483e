import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { DEFAULT_OUT_DIR, loadConfig, parseCliArgs } from '../../../scripts/cli-helpers';
import { ConfigError } from '../../../src/utils/errors';

describe('CLI helpers', () => {
  describe('parseCliArgs', () => {
    it('defaults to the 4-bay preset and the local output directory', () => {
      expect(parseCliArgs([])).toEqual({
        preset: 'nas-4bay',
        configPath: undefined,
        outDir: resolve(DEFAULT_OUT_DIR),
      });
    });

    it('reads every option', () => {
      expect(parseCliArgs(['--preset', 'nas-2bay', '--config', 'o.json', '--out', '/tmp/panels'])).toEqual({
        preset: 'nas-2bay',
        configPath: 'o.json',
        outDir: '/tmp/panels',
      });
    });

    it('rejects a missing value', () => {
      expect(() => parseCliArgs(['--preset'])).toThrow(ConfigError);
      expect(() => parseCliArgs(['--out'])).toThrow('--out needs a value');
    });

    it('rejects unknown arguments', () => {
      expect(() => parseCliArgs(['--bays', '4'])).toThrow('Unknown argument: --bays');
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), 'cli-'));
      writeFileSync(join(dir, 'three.json'), JSON.stringify({ layout: { numDrives: 3 } }));
      writeFileSync(join(dir, 'broken.json'), '{ "layout": ');
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('derives the named preset', () => {
      const cfg = loadConfig({ preset: 'nas-2bay', outDir: dir });
      expect(cfg.name).toBe('nas-2bay');
      expect(cfg.layout.numDrives).toBe(2);
    });

    it('applies an override file', () => {
      const cfg = loadConfig({ preset: 'nas-4bay', configPath: join(dir, 'three.json'), outDir: dir });
      expect(cfg.name).toBe('nas-4bay+overrides');
      expect(cfg.layout.numDrives).toBe(3);
    });

    it('reports an unreadable override file as a config error', () => {
      const configPath = join(dir, 'broken.json');
      expect(() => loadConfig({ preset: 'nas-4bay', configPath, outDir: dir })).toThrow(ConfigError);
      expect(() => loadConfig({ preset: 'nas-4bay', configPath, outDir: dir })).toThrow(`Cannot read ${configPath}`);
    });

    it('rejects an unknown preset', () => {
      expect(() => loadConfig({ preset: 'nas-9bay', outDir: dir })).toThrow(ConfigError);
    });
  });
});
