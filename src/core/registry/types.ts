/**
 * Registry collaborator types.
 */

/**
 * Direct normal dependencies of a package, or null when the registry could
 * not tell (network failure, unknown package, unexpected payload). Callers
 * treat null exactly like "no dependencies".
 */
export type RegistryDependencies = string[] | null;

export interface RegistryClient {
  dependenciesOf(packageName: string): Promise<RegistryDependencies>;
}
