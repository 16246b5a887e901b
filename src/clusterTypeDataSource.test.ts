import { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { beforeEach, describe, expect, it } from 'vitest';

import { NetboxClient } from './client';
import { ClusterTypeDataSource } from './clusterTypeDataSource';
import { known, nullValue } from './host';

function page(results: unknown[]) {
  return { count: results.length, next: null, previous: null, results };
}

describe('ClusterTypeDataSource', () => {
  let reply: { status: number; data: unknown };
  let seen: InternalAxiosRequestConfig[];
  let dataSource: ClusterTypeDataSource;

  function respondWith(status: number, data: unknown) {
    reply = { status, data };
  }

  beforeEach(() => {
    reply = { status: 200, data: page([]) };
    seen = [];
    const adapter: AxiosAdapter = async config => {
      seen.push(config);
      return { data: reply.data, status: reply.status, statusText: String(reply.status), headers: {}, config };
    };
    dataSource = new ClusterTypeDataSource();
    dataSource.configure(new NetboxClient('https://nb.example.com', 'test-token', { adapter }));
  });

  it('is named after the provider', () => {
    expect(dataSource.metadata('netbox')).toEqual({ typeName: 'netbox_cluster_type' });
  });

  it('requires only the name attribute', () => {
    const { attributes } = dataSource.schema();

    expect(attributes.name.required).toBe(true);
    expect(attributes.id.computed).toBe(true);
    expect(attributes.slug.computed).toBe(true);
  });

  it('reads the single matching cluster type', async () => {
    respondWith(200, page([{ id: 3, name: 'VMware', slug: 'vmware', display: 'VMware' }]));

    const response = await dataSource.read({ config: { name: known('VMware') } });

    expect(response.diagnostics.all()).toEqual([]);
    expect(response.state).toEqual({ id: 3, name: 'VMware', slug: 'vmware' });
    expect(seen[0].url).toBe('virtualization/cluster-types/');
    expect(seen[0].params).toEqual({ name: 'VMware' });
  });

  it('reports no result', async () => {
    respondWith(200, page([]));

    const response = await dataSource.read({ config: { name: known('Missing') } });

    expect(response.state).toBeUndefined();
    expect(response.diagnostics.errors().map(d => d.detail)).toEqual(['no result']);
  });

  it('reports more than one result', async () => {
    respondWith(200, page([
      { id: 3, name: 'VMware', slug: 'vmware' },
      { id: 4, name: 'VMware', slug: 'vmware-2' },
    ]));

    const response = await dataSource.read({ config: { name: known('VMware') } });

    expect(response.diagnostics.errors().map(d => d.detail)).toEqual(['more than one result']);
  });

  it('reports API errors as diagnostics', async () => {
    respondWith(403, { detail: 'Invalid token.' });

    const response = await dataSource.read({ config: { name: known('VMware') } });

    expect(response.diagnostics.errors()).toEqual([{
      severity: 'error',
      summary: 'Unable to Read NetBox Cluster Type',
      detail: 'NetBox API returned status 403 for virtualization/cluster-types/: Invalid token.',
    }]);
  });

  it('requires a name', async () => {
    const response = await dataSource.read({ config: { name: nullValue() } });

    expect(response.diagnostics.errors().map(d => d.attribute)).toEqual(['name']);
  });

  it('refuses to read before it is configured', async () => {
    const unconfigured = new ClusterTypeDataSource();

    const response = await unconfigured.read({ config: { name: known('VMware') } });

    expect(response.diagnostics.errors().map(d => d.summary)).toEqual(['Unconfigured NetBox Client']);
  });

  it('accepts undefined provider data before the provider is configured', () => {
    expect(new ClusterTypeDataSource().configure(undefined).all()).toEqual([]);
  });

  it('rejects provider data that is not a client', () => {
    const diagnostics = new ClusterTypeDataSource().configure('not-a-client');

    expect(diagnostics.errors()).toEqual([{
      severity: 'error',
      summary: 'Unexpected Data Source Configure Type',
      detail: 'Expected a NetboxClient, got: string. Please report this issue to the provider developers.',
    }]);
  });
});
