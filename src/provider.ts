import { bootstrapClient } from './client';
import { newClusterTypeDataSource } from './clusterTypeDataSource';
import { EnvironmentLookup, processEnvironment, resolveConfiguration } from './config';
import {
  ConfigureRequest,
  ConfigureResponse,
  DataSourceFactory,
  Diagnostics,
  Logger,
  Provider,
  ProviderFactory,
  ProviderMetadata,
  ResourceFactory,
  Schema,
} from './host';
import { providerSchema, readProviderModel } from './schema';
import { PROVIDER_TYPE_NAME } from './settings';

/**
 * NetboxProvider - Main Provider Class
 *
 * Created by the host once per session. Key responsibilities:
 * 1. Describe the provider configuration block
 * 2. Turn that block (plus environment fallbacks) into a NetBox client
 * 3. Publish the client to every data source and resource
 * 4. List the data sources and resources the plugin implements
 */
export class NetboxProvider implements Provider {
  /**
   * @param log - Host logger
   * @param version - "dev" for local builds, the release version otherwise
   * @param env - Where environment fallbacks are read from
   */
  constructor(
    public readonly log: Logger,
    public readonly version: string,
    private readonly env: EnvironmentLookup = processEnvironment,
  ) {
    this.log.debug('Finished initializing provider:', PROVIDER_TYPE_NAME, this.version);
  }

  metadata(): ProviderMetadata {
    return { typeName: PROVIDER_TYPE_NAME, version: this.version };
  }

  schema(): Schema {
    return providerSchema;
  }

  /**
   * Configure the provider
   *
   * CONFIGURE FLOW:
   * 1. Type-check the raw configuration block
   * 2. Merge it with the environment and validate it
   * 3. Surface failures as attribute errors and advisories as warnings
   * 4. Build the client and publish it to data sources and resources
   *
   * Stops after the first stage that reports an error.
   */
  configure(request: ConfigureRequest): ConfigureResponse {
    const diagnostics = new Diagnostics();

    const modelDiagnostics = new Diagnostics();
    const model = readProviderModel(request.config, modelDiagnostics);
    diagnostics.append(modelDiagnostics);
    if (!model) {
      this.log.error('Provider configuration contains values of the wrong type');
      return { diagnostics };
    }

    const resolved = resolveConfiguration(model, this.env);
    if (!resolved.ok) {
      for (const failure of resolved.failures) {
        this.log.error(`${failure.summary} (${failure.attribute})`);
        diagnostics.addAttributeError(failure.attribute, failure.summary, failure.detail);
      }
      return { diagnostics };
    }

    for (const advisory of resolved.advisories) {
      this.log.warn(advisory.summary);
      diagnostics.addAttributeWarning(advisory.attribute, advisory.summary, advisory.detail);
    }

    // Never log the token itself
    this.log.debug('Creating NetBox client for:', resolved.config.serverUrl);

    const bootstrapped = bootstrapClient(resolved.config);
    if (!bootstrapped.ok) {
      this.log.error('Unable to create NetBox API client:', bootstrapped.error.message);
      diagnostics.addError(
        'Unable to Create NetBox API Client',
        'An unexpected error occurred when creating the NetBox API client. ' +
          'If the error is not clear, please contact the provider developers.\n\n' +
          `NetBox Client Error: ${bootstrapped.error.message}`,
      );
      return { diagnostics };
    }

    this.log.info('Configured NetBox client for', resolved.config.serverUrl);
    return {
      diagnostics,
      dataSourceData: bootstrapped.client,
      resourceData: bootstrapped.client,
    };
  }

  dataSources(): DataSourceFactory[] {
    return [newClusterTypeDataSource];
  }

  resources(): ResourceFactory[] {
    return [];
  }
}

/**
 * Build the factory the host calls to instantiate the provider.
 */
export function newProvider(version: string, env: EnvironmentLookup = processEnvironment): ProviderFactory {
  return (log: Logger) => new NetboxProvider(log, version, env);
}
