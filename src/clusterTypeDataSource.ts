import { z } from 'zod';

import { NetboxClient } from './client';
import { NetboxApiError } from './errors';
import { DataSource, Diagnostics, ReadRequest, ReadResponse, Schema } from './host';

export type ClusterTypeState = {
  readonly id: number;
  readonly name: string;
  readonly slug: string;
};

const CLUSTER_TYPES_PATH = 'virtualization/cluster-types/';

const clusterTypeSchema = z.object({
  id: z.number(),
  name: z.string(),
  slug: z.string(),
});

/**
 * ClusterTypeDataSource
 *
 * Looks up a single virtualization cluster type by its exact name.
 *
 * CONFIGURATION EXAMPLE:
 * data "netbox_cluster_type" "vmware" {
 *   name = "VMware"
 * }
 *
 * HOW IT WORKS:
 * 1. The host calls configure() with the client the provider published
 * 2. The host calls read() with the data source's configuration block
 * 3. The cluster type list is queried with ?name=<name>
 * 4. Exactly one match becomes the state; zero or several are errors
 */
export class ClusterTypeDataSource implements DataSource<ClusterTypeState> {
  private client?: NetboxClient;

  metadata(providerTypeName: string) {
    return { typeName: `${providerTypeName}_cluster_type` };
  }

  schema(): Schema {
    return {
      description: 'Looks up a NetBox virtualization cluster type by name.',
      attributes: {
        name: { type: 'string', required: true, description: 'Name of the cluster type to look up.' },
        id: { type: 'number', computed: true, description: 'NetBox ID of the cluster type.' },
        slug: { type: 'string', computed: true, description: 'Slug of the cluster type.' },
      },
    };
  }

  /**
   * Receive the provider's shared client.
   *
   * The host may call this before the provider is configured, in which case
   * providerData is undefined and there is nothing to store yet.
   */
  configure(providerData: unknown): Diagnostics {
    const diagnostics = new Diagnostics();
    if (providerData === undefined) {
      return diagnostics;
    }

    if (!(providerData instanceof NetboxClient)) {
      diagnostics.addError(
        'Unexpected Data Source Configure Type',
        `Expected a NetboxClient, got: ${typeof providerData}. Please report this issue to the provider developers.`,
      );
      return diagnostics;
    }

    this.client = providerData;
    return diagnostics;
  }

  async read(request: ReadRequest): Promise<ReadResponse<ClusterTypeState>> {
    const diagnostics = new Diagnostics();

    if (!this.client) {
      diagnostics.addError(
        'Unconfigured NetBox Client',
        'The data source was read before the provider was configured.',
      );
      return { diagnostics };
    }

    const name = request.config.name;
    if (name?.state !== 'known' || typeof name.value !== 'string' || name.value === '') {
      diagnostics.addAttributeError('name', 'Missing Cluster Type Name', 'The `name` attribute must be set to a non-empty string.');
      return { diagnostics };
    }

    let results: ClusterTypeState[];
    try {
      const page = await this.client.list(CLUSTER_TYPES_PATH, clusterTypeSchema, { name: name.value });
      results = page.results;
    } catch (error) {
      if (error instanceof NetboxApiError) {
        diagnostics.addError('Unable to Read NetBox Cluster Type', error.message);
        return { diagnostics };
      }
      throw error;
    }

    if (results.length === 0) {
      diagnostics.addError('Unable to Read NetBox Cluster Type', 'no result');
      return { diagnostics };
    }
    if (results.length > 1) {
      diagnostics.addError('Unable to Read NetBox Cluster Type', 'more than one result');
      return { diagnostics };
    }

    const [clusterType] = results;
    return { diagnostics, state: { id: clusterType.id, name: clusterType.name, slug: clusterType.slug } };
  }
}

export function newClusterTypeDataSource(): ClusterTypeDataSource {
  return new ClusterTypeDataSource();
}
