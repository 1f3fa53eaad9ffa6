import { describe, it, expect } from 'vitest';
import { extractJson } from './json-extraction.js';

describe('extractJson', () => {
  it('should parse bare JSON', () => {
    expect(extractJson('{"queries": ["a", "b"]}')).toEqual({ queries: ['a', 'b'] });
  });

  it('should ignore surrounding whitespace', () => {
    expect(extractJson('\n  {"queries": []}  \n')).toEqual({ queries: [] });
  });

  it('should read a fenced json block', () => {
    const input = '```json\n{"queries": ["tide pools"]}\n```';
    expect(extractJson(input)).toEqual({ queries: ['tide pools'] });
  });

  it('should read a fenced block without a language tag', () => {
    expect(extractJson('```\n{"ok": true}\n```')).toEqual({ ok: true });
  });

  it('should find an object embedded in prose', () => {
    const input = 'Here are the queries:\n{"queries": ["q1"]}\nLet me know if you need more.';
    expect(extractJson(input)).toEqual({ queries: ['q1'] });
  });

  it('should keep braces that appear inside strings', () => {
    const input = 'Result: {"note": "use {curly} braces", "n": 1} trailing';
    expect(extractJson(input)).toEqual({ note: 'use {curly} braces', n: 1 });
  });

  it('should handle escaped quotes inside strings', () => {
    const input = 'Output {"quote": "he said \\"hi\\"", "n": 2}';
    expect(extractJson(input)).toEqual({ quote: 'he said "hi"', n: 2 });
  });

  it('should fall back to an embedded array', () => {
    expect(extractJson('The list is ["a", "b"] as requested')).toEqual(['a', 'b']);
  });

  it('should throw SyntaxError when no JSON is present', () => {
    expect(() => extractJson('no json here')).toThrow(SyntaxError);
  });

  it('should throw SyntaxError for an unbalanced object', () => {
    expect(() => extractJson('{"open": true')).toThrow('Failed to extract JSON from content');
  });
});
