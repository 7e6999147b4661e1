import { ethers } from 'ethers';
import { GatewayError } from '../errors/gatewayError';

/**
 * Normalize a bytes32 value (nonce) to lower-case 0x-prefixed hex
 */
export function toBytes32(value: string): string {
    if (!ethers.isHexString(value, 32)) {
        throw new GatewayError('INVALID_INPUT', `nonce must be 32 bytes of hex: ${value}`);
    }
    return value.toLowerCase();
}

/**
 * Generate a fresh random bytes32 nonce
 */
export function randomNonce(): string {
    return ethers.hexlify(ethers.randomBytes(32));
}

/**
 * Get current Unix timestamp in seconds
 */
export function getCurrentTimestamp(): bigint {
    return BigInt(Math.floor(Date.now() / 1000));
}
