import { ethers } from 'ethers';
import { GatewayError } from '../errors/gatewayError';
import { SignatureInput, SignatureParts } from '../types/authorization';

/**
 * Upper bound for `s`: half the secp256k1 group order. Signatures above it
 * are the malleable twin of a valid signature and are rejected, not flipped.
 */
export const SECP256K1_HALF_ORDER =
    0x7fffffffffffffffffffffffffffffff5d576e7357a4501ddfe92f46681b20a0n;

/**
 * Split a 65-byte `r ‖ s ‖ v` signature without normalizing any component
 */
export function splitSignature(signature: string): SignatureParts {
    if (!ethers.isHexString(signature, 65)) {
        throw new GatewayError('INVALID_SIGNATURE', 'invalid signature length');
    }

    return {
        r: ethers.dataSlice(signature, 0, 32),
        s: ethers.dataSlice(signature, 32, 64),
        v: ethers.getBytes(signature)[64],
    };
}

/**
 * Recover the address that signed `digest`.
 *
 * Only the shape of the signature is checked here; whether the signer is
 * allowed to do anything is up to the caller.
 */
export function recoverSigner(digest: string, signature: SignatureInput): string {
    const { v, r, s } = typeof signature === 'string' ? splitSignature(signature) : signature;

    if (!ethers.isHexString(r, 32) || !ethers.isHexString(s, 32)) {
        throw new GatewayError('INVALID_SIGNATURE', 'invalid signature');
    }
    if (ethers.toBigInt(s) > SECP256K1_HALF_ORDER) {
        throw new GatewayError('INVALID_SIGNATURE', 'invalid S');
    }
    if (v !== 27 && v !== 28) {
        throw new GatewayError('INVALID_SIGNATURE', 'invalid V');
    }

    let signer: string;
    try {
        signer = ethers.recoverAddress(digest, ethers.Signature.from({ r, s, v }));
    } catch (error) {
        throw new GatewayError('INVALID_SIGNATURE', 'invalid signature', { cause: error });
    }

    if (signer === ethers.ZeroAddress) {
        throw new GatewayError('INVALID_SIGNATURE', 'invalid signature');
    }

    return signer;
}
