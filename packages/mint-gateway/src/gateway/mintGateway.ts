import { v4 as uuidv4 } from 'uuid';
import { FeatureFlagStore, RoleStore } from '../access/accessControl';
import {
    DEFAULT_DOMAIN_NAME,
    cancelAuthorizationDigest,
    hashDomain,
    mintAuthorizationDigest,
} from '../authorization/eip712';
import { recoverSigner } from '../authorization/recoverer';
import { FEATURE_MINTING_WITH_AUTH, ROLE_HARDCAP_MANAGER } from '../config/roles';
import { GatewayError, isGatewayError } from '../errors/gatewayError';
import { InMemoryNonceStore, NonceLedger, NonceStore } from '../ledger/nonceLedger';
import { MintCapability, MintGate } from '../mint/mintGate';
import {
    AuthorizationDomain,
    CancelAuthorization,
    CancelAuthorizationRequest,
    ChainIdSource,
    MintAuthorization,
    MintWithAuthorizationRequest,
} from '../types/authorization';
import { GatewayEventName, GatewayEvents } from '../types/events';
import { Listener, TypedEventBus } from '../utils/eventBus';
import { toAddress, toUint256 } from '../utils/address';
import { getCurrentTimestamp, toBytes32 } from '../utils/hash';
import { logAuthorizationEvent, logger } from '../utils/logger';
import { SerialQueue } from '../utils/serialQueue';

export interface MintGatewayOptions {
    /** Gateway address, the EIP-712 verifying contract */
    verifyingContract: string;

    /** EIP-712 domain name, defaults to "NFTFactory" */
    domainName?: string;

    /** Read on every digest computation; never cached */
    chainId: ChainIdSource;

    roles: RoleStore;
    features: FeatureFlagStore;
    token: MintCapability;

    totalMintHardcap: bigint;

    nonceStore?: NonceStore;
    events?: TypedEventBus<GatewayEvents>;

    /** Unix time in seconds */
    now?: () => bigint;
}

/**
 * Mint Gateway
 *
 * Lets holders of the minter role mint directly, or hand a signed
 * authorization to anyone who relays it. Mutating operations go through a
 * serial queue: each one settles before the next starts, so racing
 * submissions on one nonce resolve as exactly one success.
 */
export class MintGateway {
    readonly events: TypedEventBus<GatewayEvents>;

    private readonly verifyingContract: string;
    private readonly domainName: string;
    private readonly chainId: ChainIdSource;
    private readonly roles: RoleStore;
    private readonly features: FeatureFlagStore;
    private readonly now: () => bigint;
    private readonly nonces: NonceLedger;
    private readonly gate: MintGate;
    private readonly queue = new SerialQueue();

    constructor(options: MintGatewayOptions) {
        this.verifyingContract = toAddress(options.verifyingContract, 'verifyingContract');
        this.domainName = options.domainName ?? DEFAULT_DOMAIN_NAME;
        this.chainId = options.chainId;
        this.roles = options.roles;
        this.features = options.features;
        this.now = options.now ?? getCurrentTimestamp;
        this.events = options.events ?? new TypedEventBus<GatewayEvents>();
        this.nonces = new NonceLedger(this.events, options.nonceStore ?? new InMemoryNonceStore());
        this.gate = new MintGate(this.roles, options.token, this.events, options.totalMintHardcap);
    }

    on<K extends GatewayEventName>(name: K, listener: Listener<GatewayEvents[K]>): () => void {
        return this.events.on(name, listener);
    }

    get totalMinted(): bigint {
        return this.gate.totalMinted;
    }

    get totalMintHardcap(): bigint {
        return this.gate.totalMintHardcap;
    }

    /**
     * Whether the authorizer's nonce is already used or cancelled
     */
    authorizationState(authorizer: string, nonce: string): boolean {
        return this.nonces.queryState(authorizer, nonce);
    }

    /**
     * Current signing domain, with the chain id read live
     */
    async domain(): Promise<AuthorizationDomain> {
        return {
            name: this.domainName,
            chainId: await this.chainId(),
            verifyingContract: this.verifyingContract,
        };
    }

    async domainSeparator(): Promise<string> {
        return hashDomain(await this.domain());
    }

    /**
     * Mint directly; the caller must hold the minter role
     */
    mint(caller: string, target: string, recipient: string, tokenId: bigint): Promise<void> {
        return this.execute('mint', async (operationId) => {
            const executor = toAddress(caller, 'caller');

            logger.info('Direct mint requested', {
                operationId,
                caller: executor,
                target,
                recipient,
                tokenId: tokenId.toString(),
            });

            await this.gate.executeMint(executor, target, recipient, tokenId);
        });
    }

    /**
     * Mint on behalf of the authorization's signer.
     *
     * The nonce is consumed before the mint is attempted, so a mint that then
     * fails (missing role, zero address, hardcap) still burns the nonce.
     *
     * @returns the recovered signer
     */
    mintWithAuthorization(request: MintWithAuthorizationRequest): Promise<string> {
        return this.execute('mintWithAuthorization', async (operationId) => {
            if (!this.features.isEnabled(FEATURE_MINTING_WITH_AUTH)) {
                throw new GatewayError('FEATURE_DISABLED', 'minting with authorization is disabled');
            }

            const auth = this.toMintAuthorization(request);

            const now = this.now();
            if (auth.validAfter >= now) {
                throw new GatewayError('SIGNATURE_WINDOW_INVALID', 'signature not yet valid');
            }
            if (auth.validBefore <= now) {
                throw new GatewayError('SIGNATURE_WINDOW_INVALID', 'signature expired');
            }

            const digest = mintAuthorizationDigest(await this.domain(), auth);
            const signer = recoverSigner(digest, request.signature);

            logAuthorizationEvent(signer, 'mint_authorization_verified', 'info', {
                operationId,
                target: auth.target,
                recipient: auth.recipient,
                tokenId: auth.tokenId.toString(),
                nonce: auth.nonce,
            });

            this.nonces.useOrCancel(signer, auth.nonce, false);

            await this.gate.executeMint(signer, auth.target, auth.recipient, auth.tokenId);

            return signer;
        });
    }

    /**
     * Cancel an unused authorization with a cancellation signed by its authorizer
     */
    cancelAuthorization(request: CancelAuthorizationRequest): Promise<void> {
        return this.execute('cancelAuthorization', async (operationId) => {
            const auth: CancelAuthorization = {
                authorizer: toAddress(request.authorizer, 'authorizer'),
                nonce: toBytes32(request.nonce),
            };

            const digest = cancelAuthorizationDigest(await this.domain(), auth);
            const signer = recoverSigner(digest, request.signature);

            if (signer !== auth.authorizer) {
                logAuthorizationEvent(auth.authorizer, 'cancellation_rejected', 'warn', {
                    operationId,
                    signer,
                    nonce: auth.nonce,
                });
                throw new GatewayError('AUTHORIZATION_MISMATCH', 'invalid authorizer');
            }

            this.nonces.useOrCancel(auth.authorizer, auth.nonce, true);
        });
    }

    /**
     * Cancel one of the caller's own authorizations; no signature needed
     */
    cancelOwnAuthorization(caller: string, nonce: string): Promise<void> {
        return this.execute('cancelOwnAuthorization', () => {
            this.nonces.useOrCancel(toAddress(caller, 'caller'), nonce, true);
        });
    }

    /**
     * Replace the total mint hardcap. Setting it at or below `totalMinted`
     * stops further minting and leaves `totalMinted` untouched.
     */
    updateTotalMintHardcap(caller: string, newHardcap: bigint): Promise<void> {
        return this.execute('updateTotalMintHardcap', () => {
            const actor = toAddress(caller, 'caller');

            if (!this.roles.hasRole(actor, ROLE_HARDCAP_MANAGER)) {
                logger.warn('Hardcap update denied', { caller: actor });
                throw new GatewayError('ACCESS_DENIED', 'access denied');
            }

            const oldValue = this.gate.setHardcap(toUint256(newHardcap, 'newHardcap'));

            logger.info('Hardcap updated', {
                actor,
                oldValue: oldValue.toString(),
                newValue: newHardcap.toString(),
            });
            this.events.emit('HardcapUpdated', { actor, oldValue, newValue: newHardcap });
        });
    }

    /**
     * Run a mutating operation on the serial queue, logging its failure
     */
    private execute<T>(operation: string, task: (operationId: string) => T | Promise<T>): Promise<T> {
        const operationId = uuidv4();

        return this.queue.run(async () => {
            try {
                return await task(operationId);
            } catch (error) {
                if (isGatewayError(error) && error.code !== 'MINT_FAILED') {
                    logger.warn(`${operation} rejected`, { operationId, code: error.code, reason: error.message });
                } else {
                    logger.error(`${operation} failed`, { operationId, error: String(error) });
                }
                throw error;
            }
        });
    }

    private toMintAuthorization(request: MintWithAuthorizationRequest): MintAuthorization {
        return {
            target: toAddress(request.target, 'target'),
            recipient: toAddress(request.recipient, 'recipient'),
            tokenId: toUint256(request.tokenId, 'tokenId'),
            validAfter: toUint256(request.validAfter, 'validAfter'),
            validBefore: toUint256(request.validBefore, 'validBefore'),
            nonce: toBytes32(request.nonce),
        };
    }
}
