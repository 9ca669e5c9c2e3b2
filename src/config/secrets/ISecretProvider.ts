/**
 * Secret Provider Interface
 *
 * A provider looks up a logical secret name (e.g. "GITHUB_WEBHOOK_SECRET")
 * in one source. SecretResolver asks its providers in order and stops at the
 * first one that returns a value.
 */

export interface ISecretProvider {
  /**
   * @returns the secret, or undefined when this source does not have it
   * @throws only for unexpected failures; "not found" is never an error
   */
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(value: unknown): value is ISecretProvider {
  return (
    typeof value === 'object' &&
    value !== null &&
    'resolve' in value &&
    typeof value.resolve === 'function'
  );
}
