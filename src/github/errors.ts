/**
 * Raised for any failed call to the GitHub REST API (transport error,
 * non-2xx status, unexpected body).
 */
export class GitHubApiError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly url?: string
  ) {
    super(message);
    this.name = 'GitHubApiError';
  }
}
