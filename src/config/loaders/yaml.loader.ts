import { existsSync, readFileSync } from 'fs';

import { Value } from '@sinclair/typebox/value';
import { load } from 'js-yaml';

import { yamlValidationSchema } from '../schema';
import { Config } from '../types';
import { handleValidationError } from '../utils/validation-error.util';

export function parseConfig(rawConfig: unknown): Config {
  try {
    return Value.Parse(yamlValidationSchema, rawConfig ?? {});
  } catch (error) {
    handleValidationError(error, 'Failed to load YAML configuration');
  }
}

/**
 * Reads and validates the YAML configuration file.
 *
 * @param optional - when set, a missing file means "use the defaults"
 *   instead of a failure
 */
export function yamlLoader(configPath: string, optional = false): Config {
  if (optional && !existsSync(configPath)) {
    return parseConfig({});
  }

  let yamlContent: string;
  try {
    yamlContent = readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new Error(
      `Failed to read YAML config file at ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let parsedYaml: unknown;
  try {
    parsedYaml = load(yamlContent);
  } catch (error) {
    throw new Error(
      `Failed to parse YAML config file: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  // An empty document parses to undefined, which means "all defaults"
  if (parsedYaml !== undefined && parsedYaml !== null) {
    if (typeof parsedYaml !== 'object' || Array.isArray(parsedYaml)) {
      throw new Error('YAML config file must contain a mapping at the top level');
    }
  }

  // Handle empty sections (YAML parses `finder:` as null)
  if (parsedYaml && typeof parsedYaml === 'object') {
    for (const section of ['logger', 'finder', 'checker'] as const) {
      if (section in parsedYaml && Reflect.get(parsedYaml, section) === null) {
        Reflect.set(parsedYaml, section, {});
      }
    }
    if ('proxy' in parsedYaml && parsedYaml.proxy === null) {
      Reflect.deleteProperty(parsedYaml, 'proxy');
    }
  }

  return parseConfig(parsedYaml);
}
