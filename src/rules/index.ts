import { ChainRegistry } from '../convert/ChainRegistry';
import { registerOdooChain } from './odoo';
import { registerOwndbChain } from './owndb';

/**
 * Every rule set shipped with the tool. Adding a rule set means adding
 * its registration function here.
 */
export const CHAIN_MANIFEST: ReadonlyArray<(registry: ChainRegistry) => unknown> = [
    registerOdooChain,
    registerOwndbChain,
];

export function registerDefaultChains(registry: ChainRegistry): ChainRegistry {
    for (const registerChain of CHAIN_MANIFEST) {
        registerChain(registry);
    }
    return registry;
}

export function createDefaultRegistry(): ChainRegistry {
    return registerDefaultChains(new ChainRegistry());
}
