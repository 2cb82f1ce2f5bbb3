import { describe, expect, it } from 'vitest';

import { canonicalJson, sha256Hex } from '../src/hash.js';

describe('canonicalJson', () => {
  it('sorts keys at every depth and drops undefined members', () => {
    const value = {
      b: 1,
      a: { y: [3, { d: true, c: null }], x: 'text' },
      skipped: undefined,
    };
    expect(canonicalJson(value)).toBe('{"a":{"x":"text","y":[3,{"c":null,"d":true}]},"b":1}');
  });

  it('is insensitive to insertion order', () => {
    const first = { version: 'v1', language: 'en', endpoint: 'http://sep.local' };
    const second = { endpoint: 'http://sep.local', language: 'en', version: 'v1' };
    expect(canonicalJson(first)).toBe(canonicalJson(second));
  });
});

describe('sha256Hex', () => {
  it('hashes strings and bytes identically', () => {
    expect(sha256Hex('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
    expect(sha256Hex(Buffer.from('abc'))).toBe(sha256Hex('abc'));
  });
});
