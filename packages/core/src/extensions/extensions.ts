/* eslint-disable complexity */
import { InvalidExtensionError } from '../types/errors.js';
import { isRecord, type ExtensionKey } from '../types/document.js';

/**
 * Vendor extensions the compiler understands, parsed once per schema node.
 * Unknown `x-` keys never show up here.
 */

export type SensitiveDataKind = 'full' | 'regex' | 'hash' | 'partial';

export interface SensitiveDataConfig {
  type: SensitiveDataKind;
  pattern?: string;
  algorithm?: string;
  keepPrefix?: number;
  keepSuffix?: number;
  replacement?: string;
}

export interface SchemaExtensions {
  typeOverride?: string;
  typeName?: string;
  fieldName?: string;
  omitEmpty?: boolean;
  jsonIgnore?: boolean;
  deprecatedReason?: string;
  sensitiveData?: SensitiveDataConfig;
  extraTags?: Record<string, string>;
  enumNames?: string[];
}

export const EXTENSION_KEYS = {
  typeOverride: 'x-type',
  typeName: 'x-type-name',
  fieldName: 'x-field-name',
  omitEmpty: 'x-omitempty',
  jsonIgnore: 'x-json-ignore',
  deprecatedReason: 'x-deprecated-reason',
  sensitiveData: 'x-sensitive-data',
  extraTags: 'x-extra-tags',
  enumNames: 'x-enum-names',
} as const satisfies Record<keyof SchemaExtensions, ExtensionKey>;

export const RECOGNIZED_EXTENSIONS: ReadonlySet<string> = new Set(
  Object.values(EXTENSION_KEYS)
);

const SENSITIVE_KINDS: ReadonlySet<string> = new Set([
  'full',
  'regex',
  'hash',
  'partial',
]);

const cache = new WeakMap<object, SchemaExtensions>();

function readString(
  value: unknown,
  key: string,
  schemaPath: string | undefined
): string {
  if (typeof value !== 'string') {
    throw new InvalidExtensionError({ key, expected: 'a string', schemaPath });
  }
  return value;
}

function readBoolean(
  value: unknown,
  key: string,
  schemaPath: string | undefined
): boolean {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new InvalidExtensionError({ key, expected: 'a boolean', schemaPath });
}

function readCount(
  value: unknown,
  key: string,
  schemaPath: string | undefined
): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new InvalidExtensionError({
      key,
      expected: 'a non-negative integer',
      schemaPath,
    });
  }
  return value;
}

function readSensitiveData(
  value: unknown,
  schemaPath: string | undefined
): SensitiveDataConfig {
  const key = EXTENSION_KEYS.sensitiveData;
  if (value === true) return { type: 'full' };
  if (!isRecord(value)) {
    throw new InvalidExtensionError({
      key,
      expected: 'true or an object with a "type" field',
      schemaPath,
    });
  }

  const kind = value.type ?? 'full';
  if (typeof kind !== 'string' || !SENSITIVE_KINDS.has(kind)) {
    throw new InvalidExtensionError({
      key: `${key}.type`,
      expected: 'one of full, regex, hash, partial',
      schemaPath,
    });
  }

  const config: SensitiveDataConfig = { type: toSensitiveKind(kind) };
  if (value.pattern !== undefined) {
    config.pattern = readString(value.pattern, `${key}.pattern`, schemaPath);
  }
  if (value.algorithm !== undefined) {
    config.algorithm = readString(
      value.algorithm,
      `${key}.algorithm`,
      schemaPath
    );
  }
  if (value.keepPrefix !== undefined) {
    config.keepPrefix = readCount(
      value.keepPrefix,
      `${key}.keepPrefix`,
      schemaPath
    );
  }
  if (value.keepSuffix !== undefined) {
    config.keepSuffix = readCount(
      value.keepSuffix,
      `${key}.keepSuffix`,
      schemaPath
    );
  }
  if (value.replacement !== undefined) {
    config.replacement = readString(
      value.replacement,
      `${key}.replacement`,
      schemaPath
    );
  }

  if (config.type === 'regex' && config.pattern === undefined) {
    throw new InvalidExtensionError({
      key: `${key}.pattern`,
      expected: 'a pattern when type is regex',
      schemaPath,
    });
  }
  return config;
}

function toSensitiveKind(kind: string): SensitiveDataKind {
  switch (kind) {
    case 'regex':
    case 'hash':
    case 'partial':
      return kind;
    default:
      return 'full';
  }
}

function readExtraTags(
  value: unknown,
  schemaPath: string | undefined
): Record<string, string> {
  const key = EXTENSION_KEYS.extraTags;
  if (!isRecord(value)) {
    throw new InvalidExtensionError({
      key,
      expected: 'a map of strings',
      schemaPath,
    });
  }
  const tags: Record<string, string> = {};
  for (const name of Object.keys(value).sort()) {
    tags[name] = readString(value[name], `${key}.${name}`, schemaPath);
  }
  return tags;
}

function readStringArray(
  value: unknown,
  key: string,
  schemaPath: string | undefined
): string[] {
  if (!Array.isArray(value)) {
    throw new InvalidExtensionError({
      key,
      expected: 'an array of strings',
      schemaPath,
    });
  }
  return value.map((entry) => readString(entry, key, schemaPath));
}

/**
 * Parse the recognized extensions of a node. Results are cached per node
 * object; a malformed value throws InvalidExtensionError.
 */
export function parseExtensions(
  node: object,
  schemaPath?: string
): SchemaExtensions {
  const cached = cache.get(node);
  if (cached) return cached;

  const raw = new Map<string, unknown>(Object.entries(node));
  const parsed: SchemaExtensions = {};

  const typeOverride = raw.get(EXTENSION_KEYS.typeOverride);
  if (typeOverride !== undefined) {
    parsed.typeOverride = readString(
      typeOverride,
      EXTENSION_KEYS.typeOverride,
      schemaPath
    );
  }
  const typeName = raw.get(EXTENSION_KEYS.typeName);
  if (typeName !== undefined) {
    parsed.typeName = readString(typeName, EXTENSION_KEYS.typeName, schemaPath);
  }
  const fieldName = raw.get(EXTENSION_KEYS.fieldName);
  if (fieldName !== undefined) {
    parsed.fieldName = readString(
      fieldName,
      EXTENSION_KEYS.fieldName,
      schemaPath
    );
  }
  const omitEmpty = raw.get(EXTENSION_KEYS.omitEmpty);
  if (omitEmpty !== undefined) {
    parsed.omitEmpty = readBoolean(
      omitEmpty,
      EXTENSION_KEYS.omitEmpty,
      schemaPath
    );
  }
  const jsonIgnore = raw.get(EXTENSION_KEYS.jsonIgnore);
  if (jsonIgnore !== undefined) {
    parsed.jsonIgnore = readBoolean(
      jsonIgnore,
      EXTENSION_KEYS.jsonIgnore,
      schemaPath
    );
  }
  const deprecatedReason = raw.get(EXTENSION_KEYS.deprecatedReason);
  if (deprecatedReason !== undefined) {
    parsed.deprecatedReason = readString(
      deprecatedReason,
      EXTENSION_KEYS.deprecatedReason,
      schemaPath
    );
  }
  const sensitiveData = raw.get(EXTENSION_KEYS.sensitiveData);
  if (sensitiveData !== undefined && sensitiveData !== false) {
    parsed.sensitiveData = readSensitiveData(sensitiveData, schemaPath);
  }
  const extraTags = raw.get(EXTENSION_KEYS.extraTags);
  if (extraTags !== undefined) {
    parsed.extraTags = readExtraTags(extraTags, schemaPath);
  }
  const enumNames = raw.get(EXTENSION_KEYS.enumNames);
  if (enumNames !== undefined) {
    parsed.enumNames = readStringArray(
      enumNames,
      EXTENSION_KEYS.enumNames,
      schemaPath
    );
  }

  cache.set(node, parsed);
  return parsed;
}

export function isRecognizedExtension(key: string): boolean {
  return RECOGNIZED_EXTENSIONS.has(key);
}
