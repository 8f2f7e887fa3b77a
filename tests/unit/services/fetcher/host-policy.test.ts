import { describe, expect, test } from 'vitest';

import {
  evaluateHost,
  evaluateHostStatically,
  isLocalhostName,
  normalizeHost,
} from '../../../../src/services/fetcher/host-policy.js';
import { FakeResolver, PUBLIC_IP } from '../../../helpers/fakes.js';

const closed = { allowPrivate: false };

describe('normalizeHost', () => {
  test('lower-cases, strips brackets and one trailing dot', () => {
    expect(normalizeHost('Example.COM.')).toBe('example.com');
    expect(normalizeHost('[::1]')).toBe('::1');
    expect(normalizeHost('a.example..')).toBe('a.example.');
  });
});

describe('isLocalhostName', () => {
  test('matches localhost and its subdomains only', () => {
    expect(isLocalhostName('localhost')).toBe(true);
    expect(isLocalhostName('app.localhost')).toBe(true);
    expect(isLocalhostName('localhost.example')).toBe(false);
    expect(isLocalhostName('notlocalhost')).toBe(false);
  });
});

describe('evaluateHostStatically', () => {
  test('the allowlist decides alone when present', () => {
    const policy = { ...closed, allowedHosts: new Set(['127.0.0.1']) };
    expect(evaluateHostStatically('127.0.0.1', policy)).toEqual({
      kind: 'allow',
    });
    expect(evaluateHostStatically('8.8.8.8', policy)).toEqual({
      kind: 'deny',
      reason: 'not_in_allowlist',
    });
  });

  test('the allowlist wins over allowPrivate', () => {
    const policy = { allowPrivate: true, allowedHosts: new Set(['a.example']) };
    expect(evaluateHostStatically('10.0.0.1', policy)).toEqual({
      kind: 'deny',
      reason: 'not_in_allowlist',
    });
  });

  test('allowPrivate admits localhost', () => {
    expect(
      evaluateHostStatically('localhost', { allowPrivate: true })
    ).toEqual({ kind: 'allow' });
  });

  test('classifies IP literals', () => {
    expect(evaluateHostStatically('192.168.0.10', closed)).toEqual({
      kind: 'deny',
      reason: 'private_ip',
    });
    expect(evaluateHostStatically(PUBLIC_IP, closed)).toEqual({
      kind: 'allow',
    });
  });

  test('leaves names to DNS', () => {
    expect(evaluateHostStatically('a.example', closed)).toBeUndefined();
  });
});

describe('evaluateHost', () => {
  test('allows a name whose every address is public', async () => {
    const resolver = new FakeResolver({ 'a.example': [PUBLIC_IP, '8.8.8.8'] });
    await expect(evaluateHost('A.example.', closed, resolver)).resolves.toEqual(
      { kind: 'allow' }
    );
    expect(resolver.lookups).toEqual(['a.example']);
  });

  test('denies a name with any private address', async () => {
    const resolver = new FakeResolver({ 'a.example': [PUBLIC_IP, 'fd00::5'] });
    await expect(evaluateHost('a.example', closed, resolver)).resolves.toEqual({
      kind: 'deny',
      reason: 'resolves_to_private_ip',
    });
  });

  test('a resolver error or an empty answer is a resolution failure', async () => {
    const resolver = new FakeResolver({
      'empty.example': [],
      'broken.example': new Error('SERVFAIL'),
    });
    await expect(
      evaluateHost('empty.example', closed, resolver)
    ).resolves.toEqual({ kind: 'deny', reason: 'resolution_failed' });
    await expect(
      evaluateHost('broken.example', closed, resolver)
    ).resolves.toEqual({ kind: 'deny', reason: 'resolution_failed' });
  });

  test('re-resolves on every call', async () => {
    const resolver = new FakeResolver({ 'a.example': [PUBLIC_IP] });
    await evaluateHost('a.example', closed, resolver);
    await evaluateHost('a.example', closed, resolver);
    expect(resolver.lookups).toEqual(['a.example', 'a.example']);
  });

  test('never resolves localhost or literals', async () => {
    const resolver = new FakeResolver({});
    await evaluateHost('localhost', closed, resolver);
    await evaluateHost('[::1]', closed, resolver);
    expect(resolver.lookups).toEqual([]);
  });
});
