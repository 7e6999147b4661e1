import { ethers } from 'ethers';
import { z } from 'zod';
import { GatewayError } from '../errors/gatewayError';
import { MAX_UINT256 } from '../config/roles';
import { CancelAuthorizationRequest, MintWithAuthorizationRequest } from '../types/authorization';

/**
 * Address in any valid casing, output checksummed
 */
export const AddressSchema = z
    .string()
    .refine((value) => ethers.isAddress(value), { message: 'must be a valid address' })
    .transform((value) => ethers.getAddress(value));

/**
 * uint256 given as a decimal or 0x-hex string, a safe integer, or a bigint
 */
export const Uint256Schema = z
    .union([
        z.string().regex(/^(0x[0-9a-fA-F]+|[0-9]+)$/, { message: 'must be a decimal or hex integer' }),
        z.number().int().nonnegative().safe(),
        z.bigint().nonnegative(),
    ])
    .transform((value) => BigInt(value))
    .refine((value) => value <= MAX_UINT256, { message: 'exceeds uint256' });

export const Bytes32Schema = z
    .string()
    .refine((value) => ethers.isHexString(value, 32), { message: 'must be 32 bytes of hex' })
    .transform((value) => value.toLowerCase());

export const SignatureSchema = z.union([
    z.string().refine((value) => ethers.isHexString(value, 65), { message: 'must be 65 bytes of hex' }),
    z.object({
        v: z.number().int(),
        r: Bytes32Schema,
        s: Bytes32Schema,
    }),
]);

/**
 * Relayed mint-with-authorization payload
 */
export const MintWithAuthorizationRequestSchema = z.object({
    target: AddressSchema,
    recipient: AddressSchema,
    tokenId: Uint256Schema,
    validAfter: Uint256Schema,
    validBefore: Uint256Schema,
    nonce: Bytes32Schema,
    signature: SignatureSchema,
});

/**
 * Relayed signed cancellation payload
 */
export const CancelAuthorizationRequestSchema = z.object({
    authorizer: AddressSchema,
    nonce: Bytes32Schema,
    signature: SignatureSchema,
});

function toInvalidInput(error: z.ZodError): GatewayError {
    const details = error.issues
        .map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`)
        .join('; ');
    return new GatewayError('INVALID_INPUT', details);
}

export function parseMintWithAuthorizationRequest(input: unknown): MintWithAuthorizationRequest {
    const result = MintWithAuthorizationRequestSchema.safeParse(input);
    if (!result.success) {
        throw toInvalidInput(result.error);
    }
    return result.data;
}

export function parseCancelAuthorizationRequest(input: unknown): CancelAuthorizationRequest {
    const result = CancelAuthorizationRequestSchema.safeParse(input);
    if (!result.success) {
        throw toInvalidInput(result.error);
    }
    return result.data;
}
