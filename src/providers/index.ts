/**
 * Providers Module
 *
 * Swappable implementations behind the provider registry.
 *
 * Usage:
 *
 * 1. Initialize providers (call once at startup):
 *    ```ts
 *    import { setupDefaultProviders } from './providers/setup.js';
 *    setupDefaultProviders();
 *    ```
 *
 * 2. Get a provider:
 *    ```ts
 *    import { providerRegistry } from './providers/index.js';
 *    const { provider } = providerRegistry.get('sopGeneration');
 *    const text = await provider.generate(request, { timeoutMs: 60_000 });
 *    ```
 */

// Export interfaces
export * from './interfaces/index.js';

// Export registry
export { providerRegistry, type ProviderType, type ProviderSelection } from './provider-registry.js';

// Export setup
export { setupDefaultProviders } from './setup.js';

// Export implementations for direct use
export * from './implementations/index.js';
