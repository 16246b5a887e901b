import { describe, expect, it } from 'vitest';

import { Diagnostics, known, nullValue, unknown } from './host';
import { providerSchema, readProviderModel } from './schema';

describe('providerSchema', () => {
  it('declares server_url as the only required attribute', () => {
    const required = Object.entries(providerSchema.attributes)
      .filter(([, attribute]) => attribute.required)
      .map(([name]) => name);

    expect(required).toEqual(['server_url']);
  });

  it('marks the API token as sensitive', () => {
    expect(providerSchema.attributes.api_token.sensitive).toBe(true);
  });

  it('names the environment variable in each description', () => {
    expect(providerSchema.attributes.server_url.description).toContain('`NETBOX_SERVER_URL`');
    expect(providerSchema.attributes.api_token.description).toContain('`NETBOX_API_TOKEN`');
    expect(providerSchema.attributes.strip_trailing_slashes_from_url.description)
      .toContain('`NETBOX_STRIP_TRAILING_SLASHES_FROM_URL`');
  });
});

describe('readProviderModel', () => {
  it('keeps the tri-state of each attribute', () => {
    const diagnostics = new Diagnostics();

    const model = readProviderModel({
      server_url: known('https://nb.example.com'),
      api_token: unknown(),
      strip_trailing_slashes_from_url: nullValue(),
    }, diagnostics);

    expect(model).toEqual({
      serverUrl: { state: 'known', value: 'https://nb.example.com' },
      apiToken: { state: 'unknown' },
      stripTrailingSlashesFromUrl: { state: 'null' },
    });
    expect(diagnostics.all()).toEqual([]);
  });

  it('treats absent attributes as null', () => {
    const model = readProviderModel({}, new Diagnostics());

    expect(model).toEqual({
      serverUrl: { state: 'null' },
      apiToken: { state: 'null' },
      stripTrailingSlashesFromUrl: { state: 'null' },
    });
  });

  it('rejects a value of the wrong type', () => {
    const diagnostics = new Diagnostics();

    const model = readProviderModel({ server_url: known(42) }, diagnostics);

    expect(model).toBeUndefined();
    expect(diagnostics.errors()).toEqual([{
      severity: 'error',
      attribute: 'server_url',
      summary: 'Invalid value for server_url',
      detail: 'Expected string, received number',
    }]);
  });

  it('reports every attribute with a wrong type', () => {
    const diagnostics = new Diagnostics();

    readProviderModel({
      api_token: known(true),
      strip_trailing_slashes_from_url: known('false'),
    }, diagnostics);

    expect(diagnostics.errors().map(d => d.attribute)).toEqual(['api_token', 'strip_trailing_slashes_from_url']);
  });
});
