import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigError, ParseError } from '@openapi-ir/core';

import { loadConfig, loadDocument } from './load.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'openapi-ir-load-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('loadDocument', () => {
  it('inlines schemas from other files', async () => {
    await writeFile(
      path.join(dir, 'openapi.yaml'),
      [
        'openapi: 3.0.3',
        'paths: {}',
        'components:',
        '  schemas:',
        '    Pet:',
        "      $ref: './pet.yaml'",
        '',
      ].join('\n'),
      'utf8'
    );
    await writeFile(
      path.join(dir, 'pet.yaml'),
      ['type: object', 'properties:', '  name:', '    type: string', ''].join('\n'),
      'utf8'
    );

    const document = await loadDocument('openapi.yaml', dir);

    expect(document.components?.schemas?.Pet).toEqual({
      type: 'object',
      properties: { name: { type: 'string' } },
    });
  });

  it('keeps references that point nowhere for the compiler', async () => {
    const dangling = {
      type: 'object',
      properties: { x: { $ref: '#/components/schemas/Missing' } },
    };
    await writeFile(
      path.join(dir, 'dangling.json'),
      JSON.stringify({ openapi: '3.0.3', paths: {}, components: { schemas: { A: dangling } } }),
      'utf8'
    );

    const document = await loadDocument('dangling.json', dir);

    expect(document.components?.schemas?.A).toEqual(dangling);
  });

  it('reports a missing file', async () => {
    await expect(loadDocument('absent.json', dir)).rejects.toThrow(
      `OpenAPI document not found: ${path.join(dir, 'absent.json')}`
    );
  });

  it('rejects Swagger 2.0 documents', async () => {
    await writeFile(path.join(dir, 'swagger.json'), '{"swagger":"2.0","paths":{}}', 'utf8');

    await expect(loadDocument('swagger.json', dir)).rejects.toThrow(
      "Invalid OpenAPI document: / must have required property 'openapi'"
    );
  });

  it('wraps parser failures', async () => {
    await writeFile(path.join(dir, 'broken.json'), '{"openapi": ', 'utf8');

    const failure = loadDocument('broken.json', dir);
    await expect(failure).rejects.toBeInstanceOf(ParseError);
    await expect(failure).rejects.toThrow(/^Could not load broken\.json: /);
  });
});

describe('loadConfig', () => {
  it('returns no options without a file', async () => {
    expect(await loadConfig(undefined, dir)).toEqual({});
  });

  it('reads the default file from the working directory', async () => {
    await writeFile(
      path.join(dir, 'openapi-ir.config.json'),
      JSON.stringify({ naming: { suffixes: ['Dto'] } }),
      'utf8'
    );

    expect(await loadConfig(undefined, dir)).toEqual({ naming: { suffixes: ['Dto'] } });
  });

  it('insists on an explicitly named file', async () => {
    await expect(loadConfig('custom.json', dir)).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects malformed files', async () => {
    await writeFile(path.join(dir, 'bad.json'), '{', 'utf8');
    await writeFile(path.join(dir, 'odd.json'), '{"colour":true}', 'utf8');

    await expect(loadConfig('bad.json', dir)).rejects.toThrow(
      'Configuration file bad.json is not valid JSON'
    );
    await expect(loadConfig('odd.json', dir)).rejects.toThrow(
      'Invalid configuration in odd.json: / must NOT have additional properties'
    );
  });
});
