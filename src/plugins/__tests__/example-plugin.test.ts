import { describe, it, expect, vi } from 'vitest';

vi.mock('../../main/services/log-service', () => ({
  appLog: vi.fn(),
}));

import * as examplePlugin from '../example-plugin';
import * as templatePlugin from '../plugin-template';
import { createTestHost } from '../../main/testing';

describe('example-plugin', () => {
  it('adds one action that shows a message', () => {
    const host = createTestHost();
    examplePlugin.register(host.window);

    const [action] = host.actions.getState().listActions('Plugins');
    expect(action.text).toBe('Example Plugin Action');
    expect(action.tooltip).toBe('Demo plugin that adds a simple action to the UI.');

    action.callback();
    expect(host.ui.getMessages()).toEqual([
      { title: 'Example Plugin', text: 'Example plugin executed successfully.' },
    ]);
  });
});

describe('plugin-template', () => {
  it('registers an action named after the plugin', () => {
    const host = createTestHost();
    templatePlugin.register(host.window);

    expect(host.ui.trigger('My Plugin')).toBe('ok');
    expect(host.ui.getMenuEntries()[0].tooltip).toBe('Describe what your plugin does here.');
    expect(host.ui.getMessages()).toEqual([{ title: 'My Plugin', text: 'My Plugin v0.1 executed.' }]);
  });
});
