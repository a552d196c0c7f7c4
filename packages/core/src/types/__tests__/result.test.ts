import { describe, it, expect } from 'vitest';

import { err, isErr, isOk, ok, type Result } from '../result.js';

function parsePort(text: string): Result<number, string> {
  const port = Number(text);
  return Number.isInteger(port) ? ok(port) : err(`not a port: ${text}`);
}

describe('Result', () => {
  it('tags each variant', () => {
    expect(ok(80)._tag).toBe('Ok');
    expect(err('not a port: x')._tag).toBe('Err');
  });

  it('narrows through the guards', () => {
    const good = parsePort('443');
    const bad = parsePort('http');

    expect(isOk(good)).toBe(true);
    expect(isErr(bad)).toBe(true);
    if (isErr(bad)) expect(bad.error).toBe('not a port: http');
  });
});
