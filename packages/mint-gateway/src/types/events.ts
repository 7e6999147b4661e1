/**
 * Observable events emitted by the gateway for external indexers.
 * Payloads carry normalized (checksummed) addresses and lower-case nonces.
 */
export type GatewayEvents = {
    HardcapUpdated: {
        actor: string;
        oldValue: bigint;
        newValue: bigint;
    };
    Minted: {
        target: string;
        recipient: string;
        tokenId: bigint;
    };
    NonceUsed: {
        authorizer: string;
        nonce: string;
    };
    NonceCancelled: {
        authorizer: string;
        nonce: string;
    };
    RoleUpdated: {
        by: string;
        operator: string;
        requested: bigint;
        actual: bigint;
    };
};

export type GatewayEventName = keyof GatewayEvents;
