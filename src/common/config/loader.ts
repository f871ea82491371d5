import { plainToInstance } from 'class-transformer';
import { ValidationError as ClassValidationError, validate } from 'class-validator';
import fs from 'fs-extra';
import yaml from 'js-yaml';
import { Dictionary } from '../utils/dictionary';
import { ValidationError, ValidationErrors } from '../utils/errors';
import { StackConfig, buildStackConfig } from './stack-config';
import { StackSpec } from './stack-spec';

const isDictionary = (value: unknown): value is Dictionary<unknown> => {
  return value instanceof Object && !Array.isArray(value);
};

/**
 * `services`, `proxy.zones` and `proxy.upstreams` are keyed by name in the stack file. The spec classes take lists,
 * so the key is moved into a `name` field.
 */
const dictionaryToList = (value: unknown): unknown => {
  if (!isDictionary(value)) {
    return value;
  }
  return Object.entries(value).map(([name, item]) => isDictionary(item) ? { ...item, name } : { name });
};

export const normalizeStackYaml = (parsed: unknown): unknown => {
  if (!isDictionary(parsed)) {
    return parsed;
  }
  const normalized: Dictionary<unknown> = { ...parsed, services: dictionaryToList(parsed.services ?? {}) };
  if (isDictionary(parsed.proxy)) {
    normalized.proxy = {
      ...parsed.proxy,
      zones: dictionaryToList(parsed.proxy.zones ?? {}),
      upstreams: dictionaryToList(parsed.proxy.upstreams ?? {}),
      routes: parsed.proxy.routes ?? [],
    };
  }
  return normalized;
};

const flattenErrors = (errors: ClassValidationError[], parent_path = ''): ValidationError[] => {
  const flattened: ValidationError[] = [];
  for (const error of errors) {
    let key = error.property;
    // List entries that came from a keyed dictionary are reported under their name
    if (/^\d+$/.test(key) && isDictionary(error.value) && typeof error.value.name === 'string') {
      key = error.value.name;
    }
    const path = parent_path ? `${parent_path}.${key}` : key;
    for (const message of Object.values(error.constraints || {})) {
      flattened.push(new ValidationError({ path, message, value: error.value }));
    }
    flattened.push(...flattenErrors(error.children || [], path));
  }
  return flattened;
};

export const parseStackConfig = async (contents: string, file?: string): Promise<StackConfig> => {
  let parsed: unknown;
  try {
    parsed = yaml.load(contents);
  } catch (err) {
    const message = err instanceof Error ? err.message : `${err}`;
    throw new ValidationErrors([new ValidationError({ path: '<root>', message: `Invalid YAML: ${message}` })], file);
  }

  if (!isDictionary(parsed)) {
    throw new ValidationErrors([new ValidationError({ path: '<root>', message: 'The stack file must be a YAML object', value: parsed })], file);
  }

  const spec = plainToInstance(StackSpec, normalizeStackYaml(parsed));
  const errors = await validate(spec, { whitelist: true, forbidNonWhitelisted: true });
  if (errors.length > 0) {
    throw new ValidationErrors(flattenErrors(errors), file);
  }

  return buildStackConfig(spec, file);
};

export const loadStackConfig = async (file_path: string): Promise<StackConfig> => {
  if (!await fs.pathExists(file_path)) {
    throw new ValidationErrors([new ValidationError({ path: '<root>', message: `No stack file found at ${file_path}` })], file_path);
  }
  const contents = await fs.readFile(file_path, 'utf-8');
  return parseStackConfig(contents, file_path);
};
