import { GatewayError } from '../errors/gatewayError';
import { RoleStore } from '../access/accessControl';
import { ROLE_FACTORY_MINTER } from '../config/roles';
import { GatewayEvents } from '../types/events';
import { TypedEventBus } from '../utils/eventBus';
import { isZeroAddress, toAddress, toUint256 } from '../utils/address';
import { logger } from '../utils/logger';

/**
 * Token issuance primitive of a mintable ERC-721 deployment.
 * Resolves when the token exists, rejects otherwise.
 */
export interface MintCapability {
    mint(target: string, recipient: string, tokenId: bigint): Promise<void>;
}

export interface MintCounterState {
    totalMinted: bigint;
    totalMintHardcap: bigint;
}

/**
 * Mint Gate
 *
 * Checks mint preconditions, keeps the mint counter and calls the token.
 *
 * TRUST BOUNDARY: `executeMint` does not authenticate `executor`. It checks
 * the minter role against whatever address it is handed. Callers must pass
 * an identity they have already established: the direct caller, or the
 * signer recovered from a verified authorization. Passing the relayer or any
 * user-supplied address here is a privilege escalation.
 */
export class MintGate {
    private readonly state: MintCounterState;

    constructor(
        private readonly roles: RoleStore,
        private readonly token: MintCapability,
        private readonly events: TypedEventBus<GatewayEvents>,
        totalMintHardcap: bigint
    ) {
        this.state = {
            totalMinted: 0n,
            totalMintHardcap: toUint256(totalMintHardcap, 'totalMintHardcap'),
        };
    }

    get totalMinted(): bigint {
        return this.state.totalMinted;
    }

    get totalMintHardcap(): bigint {
        return this.state.totalMintHardcap;
    }

    /**
     * Replace the hardcap; no check against `totalMinted`
     *
     * @returns the previous hardcap
     */
    setHardcap(value: bigint): bigint {
        const previous = this.state.totalMintHardcap;
        this.state.totalMintHardcap = toUint256(value, 'totalMintHardcap');
        return previous;
    }

    /**
     * Mint `tokenId` on `target` to `recipient` on behalf of `executor`.
     * Preconditions are checked in a fixed order and the first failure wins.
     * The counter moves only once the token call has resolved, so callers
     * must not run two mints at once or the hardcap check can be passed twice.
     */
    async executeMint(executor: string, target: string, recipient: string, tokenId: bigint): Promise<void> {
        if (!this.roles.hasRole(executor, ROLE_FACTORY_MINTER)) {
            logger.warn('Mint denied: executor lacks minter role', { executor });
            throw new GatewayError('ACCESS_DENIED', 'access denied');
        }

        const erc721 = toAddress(target, 'target');
        if (isZeroAddress(erc721)) {
            throw new GatewayError('INVALID_INPUT', 'ERC721 instance addr is not set');
        }

        const to = toAddress(recipient, 'recipient');
        if (isZeroAddress(to)) {
            throw new GatewayError('INVALID_INPUT', 'receiver address is not set');
        }

        toUint256(tokenId, 'tokenId');
        if (tokenId === 0n) {
            throw new GatewayError('INVALID_INPUT', 'token ID is not set');
        }

        if (this.state.totalMinted >= this.state.totalMintHardcap) {
            logger.warn('Mint denied: hardcap reached', {
                totalMinted: this.state.totalMinted.toString(),
                totalMintHardcap: this.state.totalMintHardcap.toString(),
            });
            throw new GatewayError('HARDCAP_REACHED', 'hardcap reached');
        }

        try {
            await this.token.mint(erc721, to, tokenId);
        } catch (error) {
            logger.error('Mint call failed', {
                target: erc721,
                recipient: to,
                tokenId: tokenId.toString(),
                error: String(error),
            });
            throw new GatewayError('MINT_FAILED', `mint of token ${tokenId} on ${erc721} failed`, { cause: error });
        }

        this.state.totalMinted++;

        logger.info('Token minted', { executor, target: erc721, recipient: to, tokenId: tokenId.toString() });
        this.events.emit('Minted', { target: erc721, recipient: to, tokenId });
    }
}
