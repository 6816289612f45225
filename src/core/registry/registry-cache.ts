/**
 * Per-invocation memo of registry lookups.
 *
 * Created by the caller and passed in explicitly; nothing is kept between
 * invocations. Unknown results (null) are cached too, so a failing package
 * is asked for only once.
 */

import type { RegistryClient, RegistryDependencies } from './types.js';

export class RegistryCache implements RegistryClient {
  private readonly entries = new Map<string, RegistryDependencies>();
  private requests = 0;

  constructor(private readonly client: RegistryClient) {}

  async dependenciesOf(packageName: string): Promise<RegistryDependencies> {
    if (this.entries.has(packageName)) {
      return this.entries.get(packageName) ?? null;
    }

    this.requests++;
    const result = await this.client.dependenciesOf(packageName);
    this.entries.set(packageName, result);
    return result;
  }

  /** Lookups that reached the underlying client. */
  get requestCount(): number {
    return this.requests;
  }
}
