import { z } from 'zod';

import { ConfigValue, Diagnostics, RawConfig, Schema, known, nullValue } from './host';
import { ENV_API_TOKEN, ENV_SERVER_URL, ENV_STRIP_TRAILING_SLASHES_FROM_URL } from './settings';

export const ATTR_SERVER_URL = 'server_url';
export const ATTR_API_TOKEN = 'api_token';
export const ATTR_STRIP_TRAILING_SLASHES_FROM_URL = 'strip_trailing_slashes_from_url';

/**
 * ProviderModel
 *
 * The provider configuration block after type checking. Each attribute keeps
 * its tri-state form; merging with the environment happens in the resolver.
 *
 * CONFIGURATION EXAMPLE:
 * provider "netbox" {
 *   server_url                      = "https://netbox.example.com"
 *   api_token                       = var.netbox_token
 *   strip_trailing_slashes_from_url = true
 * }
 */
export interface ProviderModel {
  readonly serverUrl: ConfigValue<string>;
  readonly apiToken: ConfigValue<string>;
  readonly stripTrailingSlashesFromUrl: ConfigValue<boolean>;
}

export const providerSchema: Schema = {
  description: 'Manage objects of a NetBox instance through its REST API.',
  attributes: {
    [ATTR_SERVER_URL]: {
      type: 'string',
      required: true,
      description: 'Location of NetBox server including scheme (http or https) and optional port. ' +
        `Can be set via the \`${ENV_SERVER_URL}\` environment variable.`,
    },
    [ATTR_API_TOKEN]: {
      type: 'string',
      optional: true,
      sensitive: true,
      description: `NetBox API authentication token. Can be set via the \`${ENV_API_TOKEN}\` environment variable.`,
    },
    [ATTR_STRIP_TRAILING_SLASHES_FROM_URL]: {
      type: 'bool',
      optional: true,
      description: 'If true, strip trailing slashes from the `server_url` parameter and print a warning when doing so. ' +
        'Note that using trailing slashes in the `server_url` parameter will usually lead to errors. ' +
        `Can be set via the \`${ENV_STRIP_TRAILING_SLASHES_FROM_URL}\` environment variable. Defaults to \`true\`.`,
    },
  },
};

function readAttribute<T>(
  raw: RawConfig,
  attribute: string,
  validator: z.ZodType<T>,
  diagnostics: Diagnostics,
): ConfigValue<T> | undefined {
  // Attributes left out of the block entirely behave like explicit nulls
  const value = raw[attribute] ?? nullValue<unknown>();
  if (value.state !== 'known') {
    return value;
  }

  const parsed = validator.safeParse(value.value);
  if (!parsed.success) {
    diagnostics.addAttributeError(
      attribute,
      `Invalid value for ${attribute}`,
      parsed.error.issues.map(issue => issue.message).join('; '),
    );
    return undefined;
  }
  return known(parsed.data);
}

/**
 * Decode the raw provider block into a ProviderModel.
 *
 * Every attribute is checked, so one bad value does not hide another. Returns
 * undefined when any attribute carried a value of the wrong type; the reasons
 * are in diagnostics.
 */
export function readProviderModel(raw: RawConfig, diagnostics: Diagnostics): ProviderModel | undefined {
  const serverUrl = readAttribute(raw, ATTR_SERVER_URL, z.string(), diagnostics);
  const apiToken = readAttribute(raw, ATTR_API_TOKEN, z.string(), diagnostics);
  const stripTrailingSlashesFromUrl = readAttribute(raw, ATTR_STRIP_TRAILING_SLASHES_FROM_URL, z.boolean(), diagnostics);

  if (!serverUrl || !apiToken || !stripTrailingSlashesFromUrl) {
    return undefined;
  }
  return { serverUrl, apiToken, stripTrailingSlashesFromUrl };
}
