import { describe, it, expect } from 'vitest';
import { AliasRegistry } from '../AliasRegistry';
import { TypeConversionError } from '../../types';

describe('AliasRegistry', () => {
  it('should resolve registered aliases', () => {
    const aliases = new AliasRegistry();
    aliases.register('intro', '/music/intro.ogg');

    expect(aliases.getAlias('intro')).toEqual({ kind: 'path', path: '/music/intro.ogg' });
    expect(aliases.hasAlias('intro')).toBe(true);
  });

  it('should return null or the default for unknown aliases', () => {
    const aliases = new AliasRegistry();

    expect(aliases.getAlias('missing')).toBeNull();
    expect(aliases.getAlias('missing', 'fallback')).toBe('fallback');
  });

  it('should accept numeric and symbol keys', () => {
    const aliases = new AliasRegistry();
    const key = Symbol('theme');
    aliases.register(1, 99);
    aliases.register(key, '/music/theme.ogg');

    expect(aliases.getAlias(1)).toEqual({ kind: 'id', id: 99 });
    expect(aliases.getAlias(key)).toEqual({ kind: 'path', path: '/music/theme.ogg' });
  });

  it('should let the last registration win', () => {
    const aliases = new AliasRegistry();
    aliases.register('intro', 'a.ogg');
    aliases.register('intro', 'b.ogg');

    expect(aliases.getAlias('intro')).toEqual({ kind: 'path', path: 'b.ogg' });
    expect(aliases.size).toBe(1);
  });

  it('should reject values that are not tracks', () => {
    const aliases = new AliasRegistry();

    expect(() => aliases.register('bad', { title: 'x' })).toThrow(TypeConversionError);
    expect(aliases.hasAlias('bad')).toBe(false);
  });

  it('should hand out a copy of the table', () => {
    const aliases = new AliasRegistry();
    aliases.register('intro', 'a.ogg');

    const table = aliases.allAliases();
    table.delete('intro');

    expect(aliases.hasAlias('intro')).toBe(true);
  });
});
