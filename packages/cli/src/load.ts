import {
  JSONParserErrorGroup,
  MissingPointerError,
  bundle,
} from '@apidevtools/json-schema-ref-parser';
import fs from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import {
  CONFIG_FILE_NAME,
  ConfigError,
  ParseError,
  assertOpenApiDocument,
  isCompilerError,
  parseCompilerConfig,
  type CompilerOptions,
  type OpenApiDocument,
} from '@openapi-ir/core';

/**
 * Bundle a second time past the missing pointers; the `$ref`s stay as
 * written and the compiler reports them as unresolvable.
 */
async function bundleKeepingDanglingRefs(abs: string): Promise<unknown> {
  try {
    return await bundle(abs, { continueOnError: true });
  } catch (error) {
    if (
      error instanceof JSONParserErrorGroup &&
      error.errors.every((entry) => entry instanceof MissingPointerError)
    ) {
      return error.files.schema;
    }
    throw error;
  }
}

async function bundleDocument(abs: string): Promise<unknown> {
  try {
    return await bundle(abs);
  } catch (error) {
    if (error instanceof MissingPointerError) {
      return bundleKeepingDanglingRefs(abs);
    }
    throw error;
  }
}

/**
 * Read an OpenAPI document (JSON or YAML) and inline every external file
 * it references, so that only local `#/...` references remain. References
 * that point nowhere are kept for the compiler to report.
 *
 * @throws {ParseError} When the file cannot be read or is not OpenAPI 3.x
 */
export async function loadDocument(
  file: string,
  cwd: string = process.cwd()
): Promise<OpenApiDocument> {
  const abs = path.resolve(cwd, file);
  if (!fs.existsSync(abs)) {
    throw new ParseError({
      message: `OpenAPI document not found: ${abs}`,
      context: { input: file },
    });
  }

  let bundled: unknown;
  try {
    bundled = await bundleDocument(abs);
  } catch (error) {
    if (isCompilerError(error)) throw error;
    throw new ParseError({
      message: `Could not load ${file}: ${error instanceof Error ? error.message : String(error)}`,
      context: { input: file },
      cause: error instanceof Error ? error : undefined,
    });
  }
  return assertOpenApiDocument(bundled, file);
}

/**
 * Load compiler options from `--config`, or from openapi-ir.config.json in
 * `cwd` when present. No file means no options.
 *
 * @throws {ConfigError} When the file is missing, not JSON or invalid
 */
export async function loadConfig(
  file: string | undefined,
  cwd: string = process.cwd()
): Promise<CompilerOptions> {
  const abs = path.resolve(cwd, file ?? CONFIG_FILE_NAME);
  if (!fs.existsSync(abs)) {
    if (file === undefined) return {};
    throw new ConfigError({
      message: `Configuration file not found: ${abs}`,
      context: { setting: file },
    });
  }

  const raw = await readFile(abs, 'utf8');
  let contents: unknown;
  try {
    contents = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError({
      message: `Configuration file ${path.basename(abs)} is not valid JSON`,
      context: { setting: path.basename(abs) },
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseCompilerConfig(contents, path.basename(abs));
}
