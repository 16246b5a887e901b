import type { ProviderHost } from './host';
import { newProvider } from './provider';
import { PROVIDER_TYPE_NAME, PROVIDER_VERSION } from './settings';

/**
 * Main entry point for the NetBox provider plugin
 *
 * The host loads this module and calls the default export with its API.
 * Registration tells the host:
 * 1. What users call the provider (PROVIDER_TYPE_NAME from settings)
 * 2. How to create it (the factory returned by newProvider)
 *
 * The host then creates the provider, hands it the user's configuration and
 * asks it for its data sources and resources.
 */
export default (host: ProviderHost) => {
  host.registerProvider(PROVIDER_TYPE_NAME, newProvider(PROVIDER_VERSION));
};

export { bootstrapClient, NetboxClient } from './client';
export type { BootstrapResult, NetboxPage } from './client';
export { ClusterTypeDataSource } from './clusterTypeDataSource';
export type { ClusterTypeState } from './clusterTypeDataSource';
export { processEnvironment, resolveConfiguration } from './config';
export type { Advisory, EnvironmentLookup, ResolveResult, ResolvedConfiguration, ValidationFailure } from './config';
export { ClientConstructionError, NetboxApiError } from './errors';
export { Diagnostics, known, nullValue, unknown } from './host';
export type {
  ConfigValue,
  ConfigureRequest,
  ConfigureResponse,
  DataSource,
  DataSourceFactory,
  Diagnostic,
  Logger,
  Provider,
  ProviderFactory,
  ProviderHost,
  RawConfig,
  ReadRequest,
  ReadResponse,
  Resource,
  ResourceFactory,
  Schema,
} from './host';
export { NetboxProvider, newProvider } from './provider';
export { providerSchema, readProviderModel } from './schema';
export type { ProviderModel } from './schema';
