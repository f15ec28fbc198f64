export {
  GitHubApiClient,
  type ApiResult,
  type ApiRequestOptions,
  type FetchFn,
  type GitHubApiClientOptions,
  type HttpMethod,
} from "./api-client.js";
export { IssueFetcher, MAX_PAGE_SIZE, DEFAULT_FETCH_LIMIT } from "./issue-fetcher.js";
