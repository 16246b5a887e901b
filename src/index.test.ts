import { describe, expect, it, vi } from 'vitest';

import register from './index';
import { ProviderFactory, ProviderHost } from './host';

describe('plugin entry point', () => {
  it('registers the netbox provider with the host', () => {
    const registrations: [string, ProviderFactory][] = [];
    const host: ProviderHost = {
      registerProvider: (typeName, factory) => {
        registrations.push([typeName, factory]);
      },
    };

    register(host);

    expect(registrations).toHaveLength(1);
    const [typeName, factory] = registrations[0];
    expect(typeName).toBe('netbox');

    const provider = factory({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });
    expect(provider.metadata()).toEqual({ typeName: 'netbox', version: 'dev' });
  });
});
