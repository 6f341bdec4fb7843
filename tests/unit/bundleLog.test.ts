import { describe, expect, it } from 'vitest';
import { BundleLog } from '../../src/log/BundleLog';

describe('BundleLog', () => {
  it('stays quiet under tests', () => {
    expect(new BundleLog({ level: 'verbose' }).level).toBe('disabled');
  });

  it('substitutes variables and colour tags', () => {
    const log = new BundleLog();
    expect(log.getString('built $count modules', { count: 3 })).toBe('built 3 modules');
    expect(log.getString('<bold>hi</bold> $missing')).toBe('\x1b[1mhi\x1b[22m $missing');
    expect(log.getString('<nope>x</nope>')).toBe('<nope>x</nope>');
  });

  it('collects warnings and errors at every level', () => {
    const log = new BundleLog();
    log.warn('careful with $name', { name: 'a.js' });
    log.error('broken');

    expect(log.warnings).toEqual(['  \x1b[33m⚠ careful with a.js\x1b[39m']);
    expect(log.errors).toEqual(['  \x1b[31m✗ broken\x1b[39m']);
  });

  it('reports elapsed time', () => {
    expect(new BundleLog().getTime()).toMatch(/ms$/);
  });
});
