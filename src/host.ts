/**
 * Host Framework Contract
 *
 * The infrastructure-as-code host loads this plugin, hands it configuration
 * values and collects the diagnostics it reports. Nothing here talks to the
 * host directly; these are the shapes the plugin expects the host to speak.
 */

/**
 * ConfigValue - Tri-state configuration value
 *
 * Every attribute the host passes in is in exactly one of three states:
 * - known: the user (or an upstream expression) supplied a value
 * - null: the attribute was left out of the configuration
 * - unknown: the value depends on something the host has not computed yet
 *
 * "unknown" and "null" must never be confused: a null value may fall back to
 * an environment variable, an unknown one may not.
 */
export type ConfigValue<T> =
  | { readonly state: 'known'; readonly value: T }
  | { readonly state: 'null' }
  | { readonly state: 'unknown' };

export function known<T>(value: T): ConfigValue<T> {
  return { state: 'known', value };
}

export function nullValue<T>(): ConfigValue<T> {
  return { state: 'null' };
}

export function unknown<T>(): ConfigValue<T> {
  return { state: 'unknown' };
}

/**
 * Raw configuration block, keyed by attribute name, before any type checks.
 */
export type RawConfig = Readonly<Record<string, ConfigValue<unknown>>>;

export type DiagnosticSeverity = 'error' | 'warning';

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly summary: string;
  readonly detail: string;
  // Attribute the diagnostic points at; absent for provider-wide problems
  readonly attribute?: string;
}

/**
 * Diagnostics Sink
 *
 * Collects everything a provider or data source wants the host to show the
 * user. Errors stop the current operation on the host side; warnings are
 * displayed and the operation continues.
 */
export class Diagnostics {
  private readonly items: Diagnostic[] = [];

  /**
   * Report an error against one attribute of the configuration block.
   */
  addAttributeError(attribute: string, summary: string, detail: string) {
    this.items.push({ severity: 'error', summary, detail, attribute });
  }

  addAttributeWarning(attribute: string, summary: string, detail: string) {
    this.items.push({ severity: 'warning', summary, detail, attribute });
  }

  /**
   * Report an error that concerns the provider as a whole, such as a client
   * that could not be built.
   */
  addError(summary: string, detail: string) {
    this.items.push({ severity: 'error', summary, detail });
  }

  /**
   * Copy every diagnostic of another sink into this one, keeping their order.
   *
   * Used when a helper collects into its own sink and the caller decides
   * afterwards whether to carry on.
   */
  append(other: Diagnostics) {
    this.items.push(...other.all());
  }

  hasError(): boolean {
    return this.items.some(item => item.severity === 'error');
  }

  errors(): Diagnostic[] {
    return this.items.filter(item => item.severity === 'error');
  }

  warnings(): Diagnostic[] {
    return this.items.filter(item => item.severity === 'warning');
  }

  // Everything reported so far, in reporting order
  all(): readonly Diagnostic[] {
    return this.items;
  }
}

/**
 * Logger handed to the plugin by the host.
 *
 * Debug output only shows up when the host runs with debug logging enabled.
 */
export interface Logger {
  debug(message: string, ...parameters: unknown[]): void;
  info(message: string, ...parameters: unknown[]): void;
  warn(message: string, ...parameters: unknown[]): void;
  error(message: string, ...parameters: unknown[]): void;
}

export type AttributeType = 'string' | 'bool' | 'number';

export interface AttributeSchema {
  readonly type: AttributeType;
  readonly required?: boolean;
  readonly optional?: boolean;
  readonly computed?: boolean;
  // Sensitive values are redacted by the host in plans and logs
  readonly sensitive?: boolean;
  readonly description: string;
}

export interface Schema {
  readonly description?: string;
  readonly attributes: Readonly<Record<string, AttributeSchema>>;
}

export interface ProviderMetadata {
  readonly typeName: string;
  readonly version: string;
}

export interface ConfigureRequest {
  readonly config: RawConfig;
}

/**
 * Result of provider configuration.
 *
 * dataSourceData and resourceData are passed untouched to the configure()
 * call of every data source and resource the host instantiates afterwards.
 */
export interface ConfigureResponse {
  readonly diagnostics: Diagnostics;
  readonly dataSourceData?: unknown;
  readonly resourceData?: unknown;
}

export interface ReadRequest {
  readonly config: RawConfig;
}

export interface ReadResponse<TState> {
  readonly diagnostics: Diagnostics;
  readonly state?: TState;
}

/**
 * DataSource - Read-only lookup exposed to the host
 *
 * LIFECYCLE:
 * 1. The host creates the data source through its factory
 * 2. configure() receives whatever the provider published as dataSourceData
 * 3. read() runs once per data block in the user's configuration
 */
export interface DataSource<TState = unknown> {
  /**
   * @param providerTypeName - Prefix for the type name, e.g. "netbox"
   */
  metadata(providerTypeName: string): { readonly typeName: string };
  schema(): Schema;
  // Called before the provider is configured too, with undefined
  configure(providerData: unknown): Diagnostics;
  read(request: ReadRequest): Promise<ReadResponse<TState>>;
}

/**
 * Resources are driven through create/read/update/delete by the host; the
 * plugin currently registers none, so only the registration surface is
 * described here.
 */
export interface Resource {
  metadata(providerTypeName: string): { readonly typeName: string };
  schema(): Schema;
  configure(providerData: unknown): Diagnostics;
}

export type DataSourceFactory = () => DataSource;
export type ResourceFactory = () => Resource;

/**
 * Provider - What the host instantiates once per session
 *
 * The host asks for the schema, validates the user's provider block against
 * it, calls configure() once and then builds data sources and resources from
 * the factories the provider lists.
 */
export interface Provider {
  metadata(): ProviderMetadata;
  schema(): Schema;
  /**
   * Turn the provider block into shared data for data sources and resources.
   * Problems are reported through the returned diagnostics, never thrown.
   */
  configure(request: ConfigureRequest): ConfigureResponse;
  dataSources(): DataSourceFactory[];
  resources(): ResourceFactory[];
}

export type ProviderFactory = (log: Logger) => Provider;

/**
 * What the plugin entry point receives when the host loads it.
 */
export interface ProviderHost {
  registerProvider(typeName: string, factory: ProviderFactory): void;
}
