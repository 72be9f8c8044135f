/**
 * Provider Setup
 *
 * Registers the default provider implementations with the provider registry.
 * Call this during application initialization.
 */

import { providerRegistry } from './provider-registry.js';
import { geminiSopGenerationProvider } from './implementations/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'provider-setup' });

/**
 * Register all default providers. Safe to call more than once.
 */
export function setupDefaultProviders(): void {
  if (providerRegistry.hasProviders('sopGeneration')) {
    return;
  }

  logger.info('Registering default providers');

  providerRegistry.register('sopGeneration', geminiSopGenerationProvider, true);

  logger.info('Default providers registered');
}

export { providerRegistry } from './provider-registry.js';
