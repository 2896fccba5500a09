import { describe, expect, it } from 'vitest';
import * as api from '../src/index';

describe('public API surface', () => {
  it('exports the three stages and the end-to-end entry point', () => {
    expect(typeof api.sanitizeText).toBe('function');
    expect(typeof api.lex).toBe('function');
    expect(typeof api.sanitize).toBe('function');
    expect(typeof api.step).toBe('function');
    expect(typeof api.render).toBe('function');
    expect(typeof api.renderToken).toBe('function');
    expect(typeof api.bufferContent).toBe('function');
    expect(typeof api.isSensitive).toBe('function');
  });

  it('composes lex, sanitize and render the same way sanitizeText does', () => {
    const sql = "SELECT * FROM users WHERE email = 'person@example.com' AND id IN (4, 5)";
    expect(api.render(api.sanitize(api.lex(sql)))).toBe(api.sanitizeText(sql));
    expect(api.sanitizeText(sql)).toBe('SELECT * FROM users WHERE email = ? AND id IN (?)');
  });

  it('classifies sensitive tokens', () => {
    const types = api.lex("a 'b' \"c\" `d` 1 NULL TRUE FALSE ?").tokens.filter(api.isSensitive).map(t => t.type);
    expect(types).toEqual(['single_quoted', 'double_quoted', 'numeric', 'null', 'true', 'false']);
  });

  it('exposes a TokenizedSql class with byte slices', () => {
    const sql = new api.TokenizedSql('héllo');
    expect(sql.buffer.length).toBe(6);
    expect(sql.content(api.bufferSlice(1, 3))).toBe('é');
  });

  it('exports version as a non-empty string', () => {
    expect(typeof api.version).toBe('string');
    expect(api.version.length).toBeGreaterThan(0);
  });
});
