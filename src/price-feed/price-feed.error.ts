// Upstream fetch failed or returned something unusable.
export class PriceFeedError extends Error {
  constructor(
    message: string,
    readonly provider: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'PriceFeedError';
  }
}
