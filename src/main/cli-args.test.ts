import { describe, it, expect } from 'vitest';
import { parseCliArgs } from './cli-args';

describe('parseCliArgs', () => {
  it('returns nothing for no arguments', () => {
    expect(parseCliArgs([])).toEqual({});
  });

  it('takes the first bare argument as the plugins directory', () => {
    expect(parseCliArgs(['./plugins', 'extra'])).toEqual({ pluginsDir: './plugins' });
  });

  it('reads --run and --menu', () => {
    expect(parseCliArgs(['--run', 'Test: Add Sample Layer', '--menu', 'Plugins', '/opt/p'])).toEqual({
      run: 'Test: Add Sample Layer',
      menu: 'Plugins',
      pluginsDir: '/opt/p',
    });
  });

  it('ignores a trailing flag without a value', () => {
    expect(parseCliArgs(['dir', '--run'])).toEqual({ pluginsDir: 'dir' });
  });
});
