/**
 * Shared argument handling for the panel and sheet scripts.
 *
 *   --preset <name>    enclosure preset (default nas-4bay)
 *   --config <file>    JSON file of parameter overrides
 *   --out <dir>        output directory (default ./svg_output)
 *
 * PANELCUT_DEBUG=outline,nest enables debug tags; their lines go to stderr
 * when the script finishes.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { deriveEnclosure, type EnclosureConfig } from '../src/config/enclosure';
import { DEFAULT_PRESET, getPreset, presetNames } from '../src/config/presets';
import { applyOverrides } from '../src/config/overrides';
import { ConfigError } from '../src/utils/errors';
import { enableDebugTagsFromEnv, flushDebug } from '../src/utils/debug';

export interface CliArgs {
  preset: string;
  configPath?: string;
  outDir: string;
}

export const DEFAULT_OUT_DIR = 'svg_output';

export function parseCliArgs(args: string[]): CliArgs {
  let preset = DEFAULT_PRESET;
  let configPath: string | undefined;
  let outDir = DEFAULT_OUT_DIR;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];
    if ((arg === '--preset' || arg === '--config' || arg === '--out') && value === undefined) {
      throw new ConfigError(`${arg} needs a value`);
    }
    if (arg === '--preset') {
      preset = value;
      i++;
    } else if (arg === '--config') {
      configPath = value;
      i++;
    } else if (arg === '--out') {
      outDir = value;
      i++;
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return { preset, configPath, outDir: resolve(outDir) };
}

export function loadConfig(args: CliArgs): EnclosureConfig {
  let params = getPreset(args.preset);
  if (args.configPath) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(args.configPath, 'utf8'));
    } catch (e) {
      throw new ConfigError(`Cannot read ${args.configPath}: ${e instanceof Error ? e.message : String(e)}`);
    }
    params = applyOverrides(params, raw);
  }
  return deriveEnclosure(args.configPath ? `${args.preset}+overrides` : args.preset, params);
}

/**
 * Run a script body with debug tags from the environment. Errors are
 * printed and turn into exit code 1.
 */
export function runCli(usage: string, main: (args: CliArgs) => void): void {
  enableDebugTagsFromEnv(process.env.PANELCUT_DEBUG);
  try {
    main(parseCliArgs(process.argv.slice(2)));
  } catch (e) {
    const err = e instanceof Error ? e : new Error(String(e));
    console.error(`${err.name}: ${err.message}`);
    if (err instanceof ConfigError) {
      console.error(`Usage: ${usage}`);
      console.error(`Presets: ${presetNames().join(', ')}`);
    }
    process.exitCode = 1;
  } finally {
    flushDebug(text => process.stderr.write(text));
  }
}
