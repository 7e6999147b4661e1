import { ethers } from 'ethers';
import {
    AuthorizationDomain,
    CancelAuthorization,
    MintAuthorization,
} from '../types/authorization';

/**
 * Canonical type descriptors.
 *
 * These strings are part of the wire format: changing any of them makes
 * every signature already handed out for that message kind unverifiable.
 */
export const DOMAIN_TYPE = 'EIP712Domain(string name,uint256 chainId,address verifyingContract)';

export const MINT_WITH_AUTHORIZATION_TYPE =
    'MintWithAuthorization(address contract,address to,uint256 id,uint256 validAfter,uint256 validBefore,bytes32 nonce)';

export const CANCEL_AUTHORIZATION_TYPE = 'CancelAuthorization(address authorizer,bytes32 nonce)';

export const DOMAIN_TYPEHASH = ethers.id(DOMAIN_TYPE);
export const MINT_WITH_AUTHORIZATION_TYPEHASH = ethers.id(MINT_WITH_AUTHORIZATION_TYPE);
export const CANCEL_AUTHORIZATION_TYPEHASH = ethers.id(CANCEL_AUTHORIZATION_TYPE);

export const DEFAULT_DOMAIN_NAME = 'NFTFactory';

/**
 * EIP-712 prefix for structured data (version byte 0x01)
 */
const TYPED_DATA_PREFIX = '0x1901';

/**
 * EIP-712 type definitions for off-chain signers (ethers `signTypedData`).
 * Kept one primary type per object, as ethers requires.
 */
export const MINT_WITH_AUTHORIZATION_TYPES = {
    MintWithAuthorization: [
        { name: 'contract', type: 'address' },
        { name: 'to', type: 'address' },
        { name: 'id', type: 'uint256' },
        { name: 'validAfter', type: 'uint256' },
        { name: 'validBefore', type: 'uint256' },
        { name: 'nonce', type: 'bytes32' },
    ],
};

export const CANCEL_AUTHORIZATION_TYPES = {
    CancelAuthorization: [
        { name: 'authorizer', type: 'address' },
        { name: 'nonce', type: 'bytes32' },
    ],
};

const abiCoder = ethers.AbiCoder.defaultAbiCoder();

/**
 * Hash the domain, producing the domain separator
 */
export function hashDomain(domain: AuthorizationDomain): string {
    return ethers.keccak256(
        abiCoder.encode(
            ['bytes32', 'bytes32', 'uint256', 'address'],
            [DOMAIN_TYPEHASH, ethers.id(domain.name), domain.chainId, domain.verifyingContract]
        )
    );
}

export function hashMintAuthorization(auth: MintAuthorization): string {
    return ethers.keccak256(
        abiCoder.encode(
            ['bytes32', 'address', 'address', 'uint256', 'uint256', 'uint256', 'bytes32'],
            [
                MINT_WITH_AUTHORIZATION_TYPEHASH,
                auth.target,
                auth.recipient,
                auth.tokenId,
                auth.validAfter,
                auth.validBefore,
                auth.nonce,
            ]
        )
    );
}

export function hashCancelAuthorization(auth: CancelAuthorization): string {
    return ethers.keccak256(
        abiCoder.encode(
            ['bytes32', 'address', 'bytes32'],
            [CANCEL_AUTHORIZATION_TYPEHASH, auth.authorizer, auth.nonce]
        )
    );
}

/**
 * Combine a domain separator and a struct hash into the final signing digest
 */
export function toTypedDataDigest(domainSeparator: string, structHash: string): string {
    return ethers.keccak256(ethers.concat([TYPED_DATA_PREFIX, domainSeparator, structHash]));
}

export function mintAuthorizationDigest(domain: AuthorizationDomain, auth: MintAuthorization): string {
    return toTypedDataDigest(hashDomain(domain), hashMintAuthorization(auth));
}

export function cancelAuthorizationDigest(domain: AuthorizationDomain, auth: CancelAuthorization): string {
    return toTypedDataDigest(hashDomain(domain), hashCancelAuthorization(auth));
}

/**
 * Domain in the shape ethers typed-data APIs take
 */
export function toTypedDataDomain(domain: AuthorizationDomain): ethers.TypedDataDomain {
    return {
        name: domain.name,
        chainId: domain.chainId,
        verifyingContract: domain.verifyingContract,
    };
}

/**
 * Mint authorization as the message value for `MINT_WITH_AUTHORIZATION_TYPES`
 */
export function toMintAuthorizationMessage(auth: MintAuthorization): Record<string, unknown> {
    return {
        contract: auth.target,
        to: auth.recipient,
        id: auth.tokenId,
        validAfter: auth.validAfter,
        validBefore: auth.validBefore,
        nonce: auth.nonce,
    };
}

export function toCancelAuthorizationMessage(auth: CancelAuthorization): Record<string, unknown> {
    return {
        authorizer: auth.authorizer,
        nonce: auth.nonce,
    };
}
