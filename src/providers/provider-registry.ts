import { createChildLogger } from '../utils/logger.js';
import type { SopGenerationProvider } from './interfaces/index.js';

const logger = createChildLogger({ service: 'provider-registry' });

/**
 * Provider map type
 */
type ProviderMap = {
  sopGeneration: SopGenerationProvider;
};

/**
 * Provider types supported by the registry
 */
export type ProviderType = keyof ProviderMap;

type ProviderStore = { [K in ProviderType]: Map<string, ProviderMap[K]> };

/**
 * Provider selection result
 */
export interface ProviderSelection<T> {
  provider: T;
  providerId: string;
}

/**
 * ProviderRegistry
 *
 * Central registry for provider implementations. The pipeline asks it for a
 * provider by type instead of importing an implementation.
 */
export class ProviderRegistry {
  private providers: ProviderStore = {
    sopGeneration: new Map(),
  };
  private defaults: Map<ProviderType, string> = new Map();

  private typeProviders<T extends ProviderType>(type: T): ProviderStore[T] {
    if (!Object.hasOwn(this.providers, type)) {
      throw new Error(`Unknown provider type: ${type}`);
    }
    return this.providers[type];
  }

  /**
   * Register a provider
   * @param setAsDefault - Whether to set as default for this type
   */
  register<T extends ProviderType>(type: T, provider: ProviderMap[T], setAsDefault = false): void {
    const typeProviders = this.typeProviders(type);

    const providerId = provider.providerId;
    typeProviders.set(providerId, provider);

    if (setAsDefault || !this.defaults.has(type)) {
      this.defaults.set(type, providerId);
    }

    logger.info({ type, providerId, isDefault: setAsDefault }, 'Provider registered');
  }

  /**
   * Set the default provider for a type
   */
  setDefault(type: ProviderType, providerId: string): void {
    if (!this.typeProviders(type).has(providerId)) {
      throw new Error(`Provider not found: ${type}/${providerId}`);
    }
    this.defaults.set(type, providerId);
    logger.info({ type, providerId }, 'Default provider set');
  }

  /**
   * Get a provider by type and optional ID
   */
  get<T extends ProviderType>(type: T, providerId?: string): ProviderSelection<ProviderMap[T]> {
    const typeProviders = this.typeProviders(type);
    if (typeProviders.size === 0) {
      throw new Error(`No providers registered for type: ${type}`);
    }

    const selectedId = providerId ?? this.defaults.get(type);
    if (!selectedId) {
      throw new Error(`No default provider for type: ${type}`);
    }

    const provider = typeProviders.get(selectedId);
    if (!provider) {
      throw new Error(`Provider not found: ${type}/${selectedId}`);
    }
    return { provider, providerId: selectedId };
  }

  /**
   * Check if a provider type has any registered providers
   */
  hasProviders(type: ProviderType): boolean {
    return this.typeProviders(type).size > 0;
  }

  /**
   * Get available (properly configured) providers for a type
   */
  getAvailable<T extends ProviderType>(type: T): ProviderMap[T][] {
    return [...this.typeProviders(type).values()].filter((p) => p.isAvailable());
  }
}

// Global singleton instance
export const providerRegistry = new ProviderRegistry();
