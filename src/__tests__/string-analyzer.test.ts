import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  analyze, isPalindrome, countWords, characterFrequency, sha256Hex, codePointLength, computeProperties,
} from '../string-analyzer.js';
import type { Clock } from '../types.js';

const fixedClock: Clock = {
  now: () => new Date('2026-01-02T03:04:05.000Z'),
  isoNow: () => '2026-01-02T03:04:05.000Z',
};

describe('analyze', () => {
  it('analyzes "racecar"', () => {
    const result = analyze('racecar', fixedClock);
    assert.ok(result.ok);
    if (!result.ok) return; // narrow for TS
    assert.strictEqual(result.value.value, 'racecar');
    assert.strictEqual(result.value.properties.length, 7);
    assert.strictEqual(result.value.properties.is_palindrome, true);
    assert.strictEqual(result.value.properties.word_count, 1);
    assert.strictEqual(result.value.properties.unique_characters, 4);
    assert.deepStrictEqual(result.value.properties.character_frequency_map, { r: 2, a: 2, c: 2, e: 1 });
    assert.strictEqual(result.value.created_at, '2026-01-02T03:04:05.000Z');
  });

  it('uses the SHA-256 digest as id', () => {
    const result = analyze('hello', fixedClock);
    assert.ok(result.ok);
    if (!result.ok) return;
    assert.strictEqual(result.value.id, '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
    assert.strictEqual(result.value.properties.sha256_hash, result.value.id);
  });

  it('rejects the empty string as a validation error', () => {
    const result = analyze('', fixedClock);
    assert.deepStrictEqual(result, {
      ok: false,
      error: { kind: 'validation', message: 'Value must be a non-empty string' },
    });
  });

  it('accepts whitespace-only input', () => {
    const result = analyze('   ', fixedClock);
    assert.ok(result.ok);
    if (!result.ok) return;
    assert.strictEqual(result.value.properties.word_count, 0);
    assert.strictEqual(result.value.properties.length, 3);
    assert.strictEqual(result.value.properties.is_palindrome, true);
  });

  it('keeps value and length consistent for a range of inputs', () => {
    for (const v of ['a', 'ab', 'hello world', 'Madam', 'x y z', 'tab\tseparated']) {
      const result = analyze(v, fixedClock);
      assert.ok(result.ok);
      if (!result.ok) continue;
      assert.strictEqual(result.value.value, v);
      assert.strictEqual(result.value.properties.length, v.length);
    }
  });
});

describe('isPalindrome', () => {
  it('matches a string equal to its reverse', () => {
    assert.strictEqual(isPalindrome('level'), true);
    assert.strictEqual(isPalindrome('a'), true);
    assert.strictEqual(isPalindrome('hello'), false);
  });

  it('ignores case', () => {
    assert.strictEqual(isPalindrome('Racecar'), true);
    assert.strictEqual(isPalindrome('MadAm'), true);
  });

  it('treats whitespace and punctuation as significant', () => {
    assert.strictEqual(isPalindrome('race car'), false);
    assert.strictEqual(isPalindrome('never odd or even'), false);
    assert.strictEqual(isPalindrome('ab,a'), false);
    assert.strictEqual(isPalindrome('a b a'), true);
  });

  it('compares code points, not UTF-16 units', () => {
    assert.strictEqual(isPalindrome('😀a😀'), true);
    assert.strictEqual(isPalindrome('😀😁'), false);
  });
});

describe('countWords', () => {
  it('counts whitespace-delimited tokens', () => {
    assert.strictEqual(countWords('hello'), 1);
    assert.strictEqual(countWords('hello world'), 2);
    assert.strictEqual(countWords('  leading and   trailing  '), 3);
    assert.strictEqual(countWords('line\nbreak\ttab'), 3);
  });

  it('returns 0 for whitespace only', () => {
    assert.strictEqual(countWords(' \n\t '), 0);
  });
});

describe('characterFrequency', () => {
  it('counts each character, case-sensitive', () => {
    assert.deepStrictEqual(characterFrequency('Aab a'), { A: 1, a: 2, b: 1, ' ': 1 });
  });

  it('keeps first-appearance order', () => {
    assert.deepStrictEqual(Object.keys(characterFrequency('banana')), ['b', 'a', 'n']);
  });

  it('lists digit keys first, then the rest in first-appearance order', () => {
    assert.deepStrictEqual(Object.keys(characterFrequency('b1a2')), ['1', '2', 'b', 'a']);
    assert.strictEqual(JSON.stringify(characterFrequency('b1a2b')), '{"1":1,"2":1,"b":2,"a":1}');
  });

  it('counts astral characters once each', () => {
    assert.deepStrictEqual(characterFrequency('😀😀'), { '😀': 2 });
  });
});

describe('sha256Hex / codePointLength / computeProperties', () => {
  it('produces a 64-char lowercase hex digest', () => {
    assert.match(sha256Hex('anything'), /^[0-9a-f]{64}$/);
  });

  it('hashes the UTF-8 bytes', () => {
    assert.strictEqual(sha256Hex('abc'), 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('counts code points', () => {
    assert.strictEqual(codePointLength('😀'), 1);
    assert.strictEqual(codePointLength('héllo'), 5);
  });

  it('reports unique characters', () => {
    assert.strictEqual(computeProperties('hello').unique_characters, 4);
  });
});
