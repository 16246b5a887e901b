/**
 * Raised while building the NetBox API client. The message is the
 * underlying failure's message, unchanged.
 */
export class ClientConstructionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ClientConstructionError';
  }
}

/**
 * A NetBox API request failed, either in transport or with a non-2xx status.
 */
export class NetboxApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'NetboxApiError';
  }
}
