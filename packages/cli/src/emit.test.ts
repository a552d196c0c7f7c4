import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi } from 'vitest';
import { compileDocument, type OpenApiDocument } from '@openapi-ir/core';

import { emitType, renderTypes, writeOutput } from './emit.js';

const document: OpenApiDocument = {
  openapi: '3.0.3',
  paths: {},
  components: {
    schemas: {
      Owner: {
        type: 'object',
        properties: {
          address: {
            type: 'object',
            properties: {
              city: { type: 'string', 'x-extra-tags': { source: 'geo' } },
            },
          },
        },
      },
      Stream: {
        oneOf: [
          { $ref: '#/components/schemas/Source' },
          { $ref: '#/components/schemas/Sink' },
        ],
        discriminator: {
          propertyName: 'kind',
          mapping: {
            source: '#/components/schemas/Source',
            sink: '#/components/schemas/Sink',
          },
        },
      },
      Source: { type: 'object', properties: { kind: { type: 'string' } } },
      Sink: { type: 'object', properties: { kind: { type: 'string' } } },
    },
  },
};

function compiledTypes() {
  return compileDocument(document, { prune: { enabled: false } }).types;
}

describe('emitType', () => {
  it('leaves the input schema and hoisted types out of the IR', () => {
    const emitted = compiledTypes().map(emitType);
    const owner = emitted.find((type) => type.name === 'Owner');

    expect(owner?.schema.typeDecl).toBe('record{address?:Owner_Address}');
    for (const type of emitted) {
      expect(Object.keys(type.schema)).not.toContain('source');
      expect(Object.keys(type.schema)).not.toContain('additionalTypes');
    }
  });
});

describe('renderTypes', () => {
  it('keeps user data that happens to use the omitted key names', () => {
    const parsed: unknown = JSON.parse(renderTypes(compiledTypes()));

    expect(parsed).toMatchObject({
      types: expect.arrayContaining([
        expect.objectContaining({
          name: 'Owner_Address',
          schema: expect.objectContaining({
            properties: [
              expect.objectContaining({
                jsonName: 'city',
                extraTags: { source: 'geo' },
              }),
            ],
          }),
        }),
        expect.objectContaining({
          name: 'Stream_OneOf',
          schema: expect.objectContaining({
            discriminator: {
              propertyName: 'kind',
              mapping: { source: 'Source', sink: 'Sink' },
            },
          }),
        }),
      ]),
    });
  });
});

describe('writeOutput', () => {
  it('prints to stdout without a target file', async () => {
    const chunks: string[] = [];
    const spy = vi
      .spyOn(process.stdout, 'write')
      .mockImplementation((chunk: string | Uint8Array) => {
        chunks.push(String(chunk));
        return true;
      });

    try {
      await writeOutput('{}', undefined);
    } finally {
      spy.mockRestore();
    }

    expect(chunks).toEqual(['{}\n']);
  });

  it('writes the file relative to the working directory', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'openapi-ir-emit-'));
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    try {
      await writeOutput('{"types":[]}', 'out.json', dir);
      expect(await readFile(path.join(dir, 'out.json'), 'utf8')).toBe('{"types":[]}\n');
    } finally {
      spy.mockRestore();
      await rm(dir, { recursive: true, force: true });
    }
  });
});
