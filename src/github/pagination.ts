/**
 * Page iteration for GitHub list endpoints
 *
 * GitHub paginates with a `Link` response header; the last page carries no
 * `rel="next"` entry. Pages are fetched lazily, so a consumer that stops
 * iterating early never triggers the next request.
 */

import { GitHubApiError } from './errors.js';

/**
 * Extract the `rel="next"` URL from a `Link` header
 *
 * @example
 * parseNextLink('<https://api.github.com/user/teams?page=2>; rel="next", <...>; rel="last"')
 * // => 'https://api.github.com/user/teams?page=2'
 */
export function parseNextLink(linkHeader: string | null | undefined): string | undefined {
  if (!linkHeader) {
    return undefined;
  }

  for (const part of linkHeader.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="?([^";]+)"?/.exec(part.trim());
    if (match && match[2].split(/\s+/).includes('next')) {
      return match[1];
    }
  }
  return undefined;
}

/**
 * Performs one authenticated GET and returns the raw response
 */
export type PageFetcher = (url: string) => Promise<Response>;

/**
 * Iterate over every page of a list endpoint.
 *
 * @param firstUrl - URL of the first page, including `per_page`
 * @param fetchPage - Authenticated GET
 * @param parseItem - Normalizes one raw array element
 * @throws GitHubApiError on a non-2xx status or a body that is not an array
 */
export async function* paginate<T>(
  firstUrl: string,
  fetchPage: PageFetcher,
  parseItem: (raw: unknown) => T
): AsyncGenerator<T[], void, undefined> {
  let url: string | undefined = firstUrl;

  while (url) {
    const response = await fetchPage(url);
    if (!response.ok) {
      throw new GitHubApiError(`GET ${url} failed: ${response.status} ${response.statusText}`, response.status, url);
    }

    const body: unknown = await response.json();
    if (!Array.isArray(body)) {
      throw new GitHubApiError(`GET ${url} did not return a list`, response.status, url);
    }

    yield body.map(parseItem);
    url = parseNextLink(response.headers.get('link'));
  }
}
