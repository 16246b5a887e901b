import { ConfigValue } from './host';
import { ATTR_API_TOKEN, ATTR_SERVER_URL, ATTR_STRIP_TRAILING_SLASHES_FROM_URL, ProviderModel } from './schema';
import {
  DEFAULT_STRIP_TRAILING_SLASHES_FROM_URL,
  ENV_API_TOKEN,
  ENV_SERVER_URL,
  ENV_STRIP_TRAILING_SLASHES_FROM_URL,
} from './settings';

/**
 * unknown: the value is not computed yet, so no fallback may be applied
 * missing: neither the configuration nor the environment supplied a value
 */
export type FailureKind = 'unknown' | 'missing';

export interface ValidationFailure {
  readonly attribute: string;
  readonly kind: FailureKind;
  readonly summary: string;
  readonly detail: string;
}

/**
 * Non-fatal note attached to a successful resolution.
 */
export interface Advisory {
  readonly attribute: string;
  readonly summary: string;
  readonly detail: string;
}

export interface ResolvedConfiguration {
  readonly serverUrl: string;
  readonly apiToken: string;
  readonly stripTrailingSlashesFromUrl: boolean;
}

export type ResolveResult =
  | { readonly ok: true; readonly config: ResolvedConfiguration; readonly advisories: readonly Advisory[] }
  | { readonly ok: false; readonly failures: readonly ValidationFailure[] };

export type EnvironmentLookup = (name: string) => string | undefined;

export const processEnvironment: EnvironmentLookup = name => process.env[name];

function unknownFailure(attribute: string, label: string, envName: string): ValidationFailure {
  return {
    attribute,
    kind: 'unknown',
    summary: `Unknown ${label}`,
    detail: `The provider cannot create the NetBox API client as there is an unknown configuration value for the ${label}. ` +
      'Either target apply the source of the value first, set the value statically in the configuration, ' +
      `or use the ${envName} environment variable.`,
  };
}

function missingFailure(attribute: string, label: string, envName: string): ValidationFailure {
  return {
    attribute,
    kind: 'missing',
    summary: `Missing ${label}`,
    detail: `The provider cannot create the NetBox API client as there is a missing configuration value for the ${label}. ` +
      `Set the ${attribute} value in the configuration or use the ${envName} environment variable. ` +
      'If either is already set, ensure the value is not empty.',
  };
}

// Explicit values win; null falls back. Callers have already ruled out unknown.
function withFallback<T>(value: ConfigValue<T>, fallback: T): T {
  return value.state === 'known' ? value.value : fallback;
}

/**
 * Resolve the provider configuration
 *
 * RESOLUTION ORDER (per attribute):
 * 1. Unknown values are reported and nothing else is evaluated
 * 2. The environment variable provides the starting value
 * 3. An explicit value in the configuration overrides it
 *
 * All failures of one stage are reported together. On success, server_url
 * has its trailing slashes removed unless stripping was switched off; doing
 * so produces an advisory rather than a failure.
 */
export function resolveConfiguration(model: ProviderModel, env: EnvironmentLookup = processEnvironment): ResolveResult {
  const unknowns: ValidationFailure[] = [];

  if (model.serverUrl.state === 'unknown') {
    unknowns.push(unknownFailure(ATTR_SERVER_URL, 'NetBox Server URL', ENV_SERVER_URL));
  }
  if (model.apiToken.state === 'unknown') {
    unknowns.push(unknownFailure(ATTR_API_TOKEN, 'NetBox API Token', ENV_API_TOKEN));
  }
  if (model.stripTrailingSlashesFromUrl.state === 'unknown') {
    unknowns.push(unknownFailure(
      ATTR_STRIP_TRAILING_SLASHES_FROM_URL,
      'NetBox Strip Trailing Slashes setting',
      ENV_STRIP_TRAILING_SLASHES_FROM_URL,
    ));
  }

  if (unknowns.length > 0) {
    return { ok: false, failures: unknowns };
  }

  const missing: ValidationFailure[] = [];

  let serverUrl = withFallback(model.serverUrl, env(ENV_SERVER_URL) ?? '');
  if (serverUrl === '') {
    missing.push(missingFailure(ATTR_SERVER_URL, 'NetBox Server URL', ENV_SERVER_URL));
  }

  const apiToken = withFallback(model.apiToken, env(ENV_API_TOKEN) ?? '');
  if (apiToken === '') {
    missing.push(missingFailure(ATTR_API_TOKEN, 'NetBox API Token', ENV_API_TOKEN));
  }

  // Only the literal "false" switches stripping off from the environment
  const stripFromEnv = env(ENV_STRIP_TRAILING_SLASHES_FROM_URL) === 'false'
    ? false
    : DEFAULT_STRIP_TRAILING_SLASHES_FROM_URL;
  const stripTrailingSlashesFromUrl = withFallback(model.stripTrailingSlashesFromUrl, stripFromEnv);

  if (missing.length > 0) {
    return { ok: false, failures: missing };
  }

  const advisories: Advisory[] = [];

  // Trailing slashes break request paths against most NetBox setups.
  // A URL made only of slashes ends up empty here and is not re-checked.
  if (stripTrailingSlashesFromUrl) {
    let end = serverUrl.length;
    while (end > 0 && serverUrl[end - 1] === '/') {
      end--;
    }
    if (end < serverUrl.length) {
      serverUrl = serverUrl.slice(0, end);
      advisories.push({
        attribute: ATTR_STRIP_TRAILING_SLASHES_FROM_URL,
        summary: 'Stripped trailing slashes from the `server_url` parameter',
        detail: 'Trailing slashes in the `server_url` parameter lead to problems in most setups, so all trailing slashes were stripped. ' +
          'Use the `strip_trailing_slashes_from_url` parameter to disable this feature or remove all trailing slashes in the `server_url` to disable this warning.',
      });
    }
  }

  const config: ResolvedConfiguration = Object.freeze({ serverUrl, apiToken, stripTrailingSlashesFromUrl });
  return { ok: true, config, advisories };
}
