/**
 * Identity every signature is bound to: one gateway deployment on one chain.
 */
export interface AuthorizationDomain {
    /** EIP-712 domain name */
    name: string;

    /** Chain the gateway runs on, read fresh for every digest */
    chainId: bigint;

    /** Gateway address acting as the verifying contract */
    verifyingContract: string;
}

/**
 * Permission to mint one token, signed by a holder of the minter role
 */
export interface MintAuthorization {
    /** ERC-721 contract to mint on */
    target: string;

    /** Address receiving the token */
    recipient: string;

    /** Token ID to mint, must be nonzero */
    tokenId: bigint;

    /** Unix timestamp; the authorization is valid strictly after it */
    validAfter: bigint;

    /** Unix timestamp; the authorization is valid strictly before it */
    validBefore: bigint;

    /** bytes32 replay protection value, unique per authorizer */
    nonce: string;
}

/**
 * Request to burn an unused nonce, signed by the authorizer
 */
export interface CancelAuthorization {
    authorizer: string;
    nonce: string;
}

/**
 * Signature in its three-component form
 */
export interface SignatureParts {
    /** Recovery indicator, 27 or 28 */
    v: number;
    r: string;
    s: string;
}

/**
 * A 65-byte `r ‖ s ‖ v` hex string or its split form
 */
export type SignatureInput = string | SignatureParts;

export interface MintWithAuthorizationRequest extends MintAuthorization {
    signature: SignatureInput;
}

export interface CancelAuthorizationRequest extends CancelAuthorization {
    signature: SignatureInput;
}

/**
 * Source of the live chain identifier
 */
export type ChainIdSource = () => bigint | Promise<bigint>;
