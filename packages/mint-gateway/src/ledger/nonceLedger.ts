import { GatewayError } from '../errors/gatewayError';
import { GatewayEvents } from '../types/events';
import { TypedEventBus } from '../utils/eventBus';
import { toAddress } from '../utils/address';
import { toBytes32 } from '../utils/hash';
import { logAuthorizationEvent } from '../utils/logger';

/**
 * Storage for consumed (authorizer, nonce) pairs.
 * Entries are only ever added; there is no way to un-consume a nonce.
 */
export interface NonceStore {
    isUsed(authorizer: string, nonce: string): boolean;
    markUsed(authorizer: string, nonce: string): void;
}

export class InMemoryNonceStore implements NonceStore {
    private usedNonces: Map<string, Set<string>> = new Map();

    isUsed(authorizer: string, nonce: string): boolean {
        return this.usedNonces.get(authorizer)?.has(nonce) ?? false;
    }

    markUsed(authorizer: string, nonce: string): void {
        const nonces = this.usedNonces.get(authorizer) ?? new Set<string>();
        nonces.add(nonce);
        this.usedNonces.set(authorizer, nonces);
    }

    /**
     * Number of consumed nonces across all authorizers
     */
    get size(): number {
        let total = 0;
        for (const nonces of this.usedNonces.values()) {
            total += nonces.size;
        }
        return total;
    }
}

/**
 * Nonce Ledger
 *
 * Sole owner of the consumed-nonce records. Consumption is a single
 * check-and-mark step with no partial outcome.
 */
export class NonceLedger {
    constructor(
        private readonly events: TypedEventBus<GatewayEvents>,
        private readonly store: NonceStore = new InMemoryNonceStore()
    ) {}

    /**
     * Whether the nonce was already used or cancelled by the authorizer.
     * Clients can pre-check before requesting a signature, but a concurrent
     * submission can still consume the nonce first.
     */
    queryState(authorizer: string, nonce: string): boolean {
        return this.store.isUsed(toAddress(authorizer, 'authorizer'), toBytes32(nonce));
    }

    /**
     * Consume the nonce, emitting NonceCancelled or NonceUsed
     */
    useOrCancel(authorizer: string, nonce: string, isCancellation: boolean): void {
        const owner = toAddress(authorizer, 'authorizer');
        const value = toBytes32(nonce);

        if (this.store.isUsed(owner, value)) {
            logAuthorizationEvent(owner, 'nonce_rejected', 'warn', { nonce: value, isCancellation });
            throw new GatewayError('NONCE_ALREADY_USED', 'invalid nonce');
        }

        this.store.markUsed(owner, value);

        if (isCancellation) {
            logAuthorizationEvent(owner, 'nonce_cancelled', 'info', { nonce: value });
            this.events.emit('NonceCancelled', { authorizer: owner, nonce: value });
        } else {
            logAuthorizationEvent(owner, 'nonce_used', 'info', { nonce: value });
            this.events.emit('NonceUsed', { authorizer: owner, nonce: value });
        }
    }
}
