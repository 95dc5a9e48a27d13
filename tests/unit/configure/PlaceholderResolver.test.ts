import { describe, it, expect } from '@jest/globals';
import { PlaceholderResolver } from '../../../src/configure/PlaceholderResolver.js';

describe('PlaceholderResolver', () => {
  const resolver = new PlaceholderResolver({ HOST: 'orders.test', PORT: '8443', EMPTY: '' });

  it('should leave plain values untouched', () => {
    expect(resolver.resolve('https://orders.test')).toEqual({ resolved: 'https://orders.test', unresolvedVars: [] });
  });

  it('should substitute variables', () => {
    expect(resolver.resolve('https://${HOST}:${PORT}/api').resolved).toBe('https://orders.test:8443/api');
  });

  it('should use the default only when the variable is unset', () => {
    expect(resolver.resolve('${TIMEOUT:30}').resolved).toBe('30');
    expect(resolver.resolve('${PORT:80}').resolved).toBe('8443');
    expect(resolver.resolve('[${EMPTY:x}]').resolved).toBe('[]');
  });

  it('should accept an empty default', () => {
    expect(resolver.resolve('[${TIMEOUT:}]').resolved).toBe('[]');
  });

  it('should keep escaped placeholders literal', () => {
    expect(resolver.resolve('$${HOST}')).toEqual({ resolved: '${HOST}', unresolvedVars: [] });
  });

  it('should report each unresolved variable once', () => {
    const result = resolver.resolve('${USER}:${USER}@${HOST}');
    expect(result.resolved).toBe('${USER}:${USER}@orders.test');
    expect(result.unresolvedVars).toEqual(['USER']);
  });
});
