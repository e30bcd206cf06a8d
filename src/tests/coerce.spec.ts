import { describe, it, expect } from 'vitest';
import { balanceJson, coerceResponse, resultToJson, resultToString } from '../prompt/coerce.js';

describe('coerceResponse', () => {
  it('extracts JSON from a fenced block surrounded by prose', () => {
    const raw = 'Here you go:\n```json\n{"a": 1, "b": [1, 2], "nested": {"inner": "content"}}\n```\nAnything else?';
    expect(coerceResponse(raw)).toEqual({
      kind: 'structured',
      value: { a: 1, b: [1, 2], nested: { inner: 'content' } },
    });
  });

  it('accepts an untagged fence holding an array', () => {
    expect(coerceResponse('```\n[1, 2]\n```')).toEqual({ kind: 'structured', value: [1, 2] });
  });

  it('slices JSON out of unfenced prose', () => {
    expect(coerceResponse('Result: {"ok": true} done')).toEqual({ kind: 'structured', value: { ok: true } });
  });

  it('repairs JSON truncated three levels deep', () => {
    expect(coerceResponse('{"a": {"b": [1, 2')).toEqual({ kind: 'structured', value: { a: { b: [1, 2] } } });
  });

  it('repairs truncation after an earlier closed element', () => {
    expect(coerceResponse('[{"x": 1}, {"y": 2')).toEqual({ kind: 'structured', value: [{ x: 1 }, { y: 2 }] });
  });

  it('closes a string cut off mid-value', () => {
    expect(coerceResponse('{"note": "unfinished')).toEqual({ kind: 'structured', value: { note: 'unfinished' } });
  });

  it('repairs an opened fence that never closed', () => {
    expect(coerceResponse('```json\n{"k": [1')).toEqual({ kind: 'structured', value: { k: [1] } });
  });

  it('returns plain text unchanged', () => {
    expect(coerceResponse('just words')).toEqual({ kind: 'text', text: 'just words' });
  });

  it('returns the raw text when braces are not JSON', () => {
    expect(coerceResponse('use {curly} braces')).toEqual({ kind: 'text', text: 'use {curly} braces' });
  });
});

describe('balanceJson', () => {
  it('ignores braces inside strings', () => {
    expect(balanceJson('{"a": "x}')).toBe('{"a": "x}"}');
  });

  it('appends closers innermost first', () => {
    expect(balanceJson('[{"a": [')).toBe('[{"a": []}]');
  });
});

describe('result helpers', () => {
  it('keeps text as a string and structured values as JSON', () => {
    expect(resultToJson({ kind: 'text', text: 'hi' })).toBe('hi');
    expect(resultToJson({ kind: 'structured', value: { a: 1 } })).toEqual({ a: 1 });
    expect(resultToString({ kind: 'structured', value: { a: 1 } })).toBe('{"a":1}');
    expect(resultToString({ kind: 'text', text: 'hi' })).toBe('hi');
  });
});
