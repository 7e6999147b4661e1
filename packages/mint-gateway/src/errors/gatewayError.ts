/**
 * Failure categories surfaced by gateway operations.
 *
 * Every code is terminal for the operation that raised it. Authorization
 * failures that happen after a nonce was consumed do not give the nonce back.
 */
export type GatewayErrorCode =
    | 'ACCESS_DENIED'
    | 'INVALID_INPUT'
    | 'HARDCAP_REACHED'
    | 'FEATURE_DISABLED'
    | 'SIGNATURE_WINDOW_INVALID'
    | 'INVALID_SIGNATURE'
    | 'AUTHORIZATION_MISMATCH'
    | 'NONCE_ALREADY_USED'
    | 'MINT_FAILED';

export class GatewayError extends Error {
    readonly code: GatewayErrorCode;

    constructor(code: GatewayErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'GatewayError';
        this.code = code;
    }
}

/**
 * Check whether an unknown thrown value is a GatewayError, optionally of a given code
 */
export function isGatewayError(error: unknown, code?: GatewayErrorCode): error is GatewayError {
    return error instanceof GatewayError && (code === undefined || error.code === code);
}
