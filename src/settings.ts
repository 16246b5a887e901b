/**
 * Global settings and constants for the NetBox provider plugin
 *
 * This file contains the identifiers that connect the plugin to its host:
 * - How users reference the provider in their configuration
 * - How the package is published on npm
 * - Which environment variables stand in for provider attributes
 */

/**
 * PROVIDER_TYPE_NAME - The identifier users put in their configuration
 *
 * Every data source and resource type name is prefixed with it, for example
 * `netbox_cluster_type`.
 *
 * Important: Once published, changing this will break existing configurations!
 */
export const PROVIDER_TYPE_NAME = 'netbox';

/**
 * PLUGIN_NAME - The npm package name
 *
 * This MUST exactly match the "name" field in package.json. Sent as the
 * User-Agent of every NetBox API request.
 */
export const PLUGIN_NAME = 'iac-provider-netbox';

/**
 * PROVIDER_VERSION - Reported through the provider metadata
 *
 * "dev" for local builds; the release pipeline rewrites it.
 */
export const PROVIDER_VERSION = 'dev';

/**
 * Environment variable fallbacks for the provider attributes.
 */
export const ENV_SERVER_URL = 'NETBOX_SERVER_URL';
export const ENV_API_TOKEN = 'NETBOX_API_TOKEN';
export const ENV_STRIP_TRAILING_SLASHES_FROM_URL = 'NETBOX_STRIP_TRAILING_SLASHES_FROM_URL';

export const DEFAULT_STRIP_TRAILING_SLASHES_FROM_URL = true;

/**
 * Network timeout for every NetBox API request, in milliseconds.
 */
export const REQUEST_TIMEOUT_MS = 10000;
