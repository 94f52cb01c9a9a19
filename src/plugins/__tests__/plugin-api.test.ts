import { describe, it, expect, vi } from 'vitest';

vi.mock('../../main/services/log-service', () => ({
  appLog: vi.fn(),
}));

import { hostApi, uniqueLayerName } from '../plugin-api';
import { createTestHost } from '../../main/testing';

describe('plugin-api', () => {
  it('hostApi asks the window for a façade', () => {
    const { window } = createTestHost();
    const spy = vi.spyOn(window, 'hostApi');
    hostApi(window);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  describe('uniqueLayerName', () => {
    it('returns the base name when it is free', () => {
      const host = hostApi(createTestHost().window);
      expect(uniqueLayerName(host, 'Result')).toBe('Result');
    });

    it('appends the first free number', () => {
      const host = hostApi(createTestHost().window);
      host.addLayer({ shape: [1, 1], values: [0] }, 'Result');
      host.addLayer({ shape: [1, 1], values: [0] }, 'Result 2');
      host.addLayer({ shape: [1, 1], values: [0] }, 'Result 4');
      expect(uniqueLayerName(host, 'Result')).toBe('Result 3');
    });
  });
});
