export type ProviderPage<TItem> = {
  records: TItem[];
  hasMore: boolean;
  totalCount?: number;  // collection size when the provider reports it
};

/**
 * Page-based pull against an external collection. Implementations throw
 * RetryableTransportError, TerminalClientError, RateLimitedError or CircuitOpenError.
 */
export interface PageSource<TItem> {
  fetchPage(page: number, pageSize: number, signal?: AbortSignal): Promise<ProviderPage<TItem>>;
}
