/**
 * Configuration loader for the Spire command-line tool.
 *
 * Loads spire.config.json (or .spirerc.json) from the source file's
 * directory or the working directory.
 */

import * as fs from 'fs';
import * as path from 'path';

export type AstFormat = 'tree' | 'json';

export interface SpireConfig {
  /** How `--parse` prints the tree. Defaults to "tree". */
  astFormat?: AstFormat;
  /** Keep spaces, comments and newlines in `--lex` output. */
  showNoise?: boolean;
}

const CONFIG_FILENAMES = ['spire.config.json', '.spirerc.json'];
const AST_FORMATS: readonly AstFormat[] = ['tree', 'json'];

function isAstFormat(value: unknown): value is AstFormat {
  return AST_FORMATS.some(format => format === value);
}

/**
 * Load configuration from an explicit path, or from the first config file
 * found in cwd. A missing file is not an error and yields `{}`.
 */
export function loadConfig(explicitPath?: string): SpireConfig {
  if (explicitPath) {
    return readConfigFile(explicitPath);
  }
  return findConfig(process.cwd()) ?? {};
}

/**
 * Like `loadConfig`, but looks beside the source file before falling back
 * to cwd.
 */
export function loadConfigForSource(sourcePath: string): SpireConfig {
  const sourceDir = path.dirname(path.resolve(sourcePath));
  return findConfig(sourceDir) ?? loadConfig();
}

function findConfig(dir: string): SpireConfig | undefined {
  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(dir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }
  return undefined;
}

function readConfigFile(filePath: string): SpireConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return validateConfig(parsed, filePath);
}

function validateConfig(value: unknown, filePath: string): SpireConfig {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Invalid config in ${filePath}: must be an object`);
  }

  const config: SpireConfig = {};

  if ('astFormat' in value && value.astFormat !== undefined) {
    const format = value.astFormat;
    if (!isAstFormat(format)) {
      throw new Error(
        `Invalid "astFormat" in ${filePath}: must be one of ${AST_FORMATS.join(', ')}`,
      );
    }
    config.astFormat = format;
  }

  if ('showNoise' in value && value.showNoise !== undefined) {
    if (typeof value.showNoise !== 'boolean') {
      throw new Error(`Invalid "showNoise" in ${filePath}: must be a boolean`);
    }
    config.showNoise = value.showNoise;
  }

  return config;
}
