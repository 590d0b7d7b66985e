import { ConversionChain } from './ConversionChain';
import { ChainConflictError, ChainNotFoundError } from './errors';

/**
 * Named lookup of conversion chains, owned by the run context
 */
export class ChainRegistry {
    private chains = new Map<string, ConversionChain>();

    /**
     * Create and register an empty chain
     */
    create(name: string): ConversionChain {
        if (this.has(name)) {
            throw new ChainConflictError(name);
        }
        const chain = new ConversionChain(name);
        this.chains.set(name, chain);
        return chain;
    }

    get(name: string): ConversionChain {
        const chain = this.chains.get(name);
        if (!chain) {
            throw new ChainNotFoundError(name, this.names());
        }
        return chain;
    }

    has(name: string): boolean {
        return this.chains.has(name);
    }

    names(): string[] {
        return Array.from(this.chains.keys()).sort();
    }
}
