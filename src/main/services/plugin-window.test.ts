import { describe, it, expect, vi } from 'vitest';

vi.mock('./log-service', () => ({
  appLog: vi.fn(),
}));

import { createTestHost } from '../testing';

describe('HostWindow', () => {
  it('defaults the title', () => {
    const { window } = createTestHost();
    expect(window.title).toBe('HYPRIL');
  });

  it('returns a fresh façade on every call', () => {
    const { window } = createTestHost('Viewer');
    expect(window.title).toBe('Viewer');
    expect(window.hostApi()).not.toBe(window.hostApi());
  });

  it('façades share the same underlying state', () => {
    const { window } = createTestHost();
    window.hostApi().addLayer({ shape: [1, 1], values: [3] }, 'shared');
    expect(window.hostApi().findLayerByName('shared')?.shape).toEqual([1, 1, 1]);
  });

  it('credits actions to the plugin being registered', async () => {
    const { window, actions } = createTestHost();
    await window.withRegisteringPlugin('alpha', () => {
      window.hostApi().addAction('From alpha', () => {});
    });
    window.hostApi().addAction('Afterwards', () => {});

    expect(actions.getState().getAllActions().map((a) => [a.text, a.source])).toEqual([
      ['From alpha', 'alpha'],
      ['Afterwards', null],
    ]);
  });

  it('restores attribution when registration throws', async () => {
    const { window, actions } = createTestHost();
    await expect(window.withRegisteringPlugin('bad', () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    window.hostApi().addAction('Later', () => {});
    expect(actions.getState().getAllActions()[0].source).toBeNull();
  });

  it('awaits async registration before restoring attribution', async () => {
    const { window, actions } = createTestHost();
    await window.withRegisteringPlugin('slow', async () => {
      await Promise.resolve();
      window.hostApi().addAction('Late', () => {});
    });
    expect(actions.getState().getAllActions()[0].source).toBe('slow');
  });
});
