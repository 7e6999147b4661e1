import { ethers } from 'ethers';
import { GatewayError } from '../errors/gatewayError';
import { MAX_UINT256 } from '../config/roles';

/**
 * Checksum an address, failing with INVALID_INPUT when it is malformed
 */
export function toAddress(value: string, field: string): string {
    if (!ethers.isAddress(value)) {
        throw new GatewayError('INVALID_INPUT', `${field} is not a valid address: ${value}`);
    }
    return ethers.getAddress(value);
}

export function isZeroAddress(address: string): boolean {
    return address === ethers.ZeroAddress;
}

/**
 * Check a value fits uint256
 */
export function toUint256(value: bigint, field: string): bigint {
    if (value < 0n || value > MAX_UINT256) {
        throw new GatewayError('INVALID_INPUT', `${field} is out of uint256 range`);
    }
    return value;
}
