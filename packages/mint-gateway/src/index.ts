import { AccessControl } from './access/accessControl';
import {
    GatewayConfig,
    gatewayConfig,
    getGatewayAddress,
    getLiveChainId,
    getProvider,
    getRelayerWallet,
} from './config/chain';
import { MintGateway } from './gateway/mintGateway';
import { NonceStore } from './ledger/nonceLedger';
import { Erc721MintCapability } from './mint/erc721MintCapability';
import { MintCapability } from './mint/mintGate';
import { ChainIdSource } from './types/authorization';
import { GatewayEvents } from './types/events';
import { TypedEventBus } from './utils/eventBus';
import { logger } from './utils/logger';

export * from './access/accessControl';
export * from './authorization/eip712';
export * from './authorization/recoverer';
export * from './authorization/schema';
export * from './config/chain';
export * from './config/roles';
export * from './errors/gatewayError';
export * from './gateway/mintGateway';
export * from './ledger/nonceLedger';
export * from './mint/erc721MintCapability';
export * from './mint/mintGate';
export * from './types/authorization';
export * from './types/events';
export { TypedEventBus } from './utils/eventBus';
export type { Listener } from './utils/eventBus';
export { randomNonce } from './utils/hash';

export interface CreateMintGatewayOptions {
    /** Address granted full privileges on the access control */
    deployer: string;

    config?: GatewayConfig;

    /** Defaults to minting on-chain from the relayer wallet */
    token?: MintCapability;

    /** Defaults to querying the node's chain id */
    chainId?: ChainIdSource;

    nonceStore?: NonceStore;
    now?: () => bigint;
}

export interface MintGatewayDeployment {
    gateway: MintGateway;
    accessControl: AccessControl;
}

/**
 * Wire a gateway from configuration: access control owned by the deployer,
 * the on-chain ERC-721 mint adapter and a live chain id.
 */
export function createMintGateway(options: CreateMintGatewayOptions): MintGatewayDeployment {
    const config = options.config ?? gatewayConfig;
    const verifyingContract = getGatewayAddress(config);
    const events = new TypedEventBus<GatewayEvents>();

    const accessControl = new AccessControl(verifyingContract, options.deployer, events);
    const token = options.token ?? new Erc721MintCapability(getRelayerWallet(config), config.blockConfirmations);
    const chainId = options.chainId ?? getLiveChainId(getProvider(config));

    const gateway = new MintGateway({
        verifyingContract,
        domainName: config.domainName,
        chainId,
        roles: accessControl,
        features: accessControl,
        token,
        totalMintHardcap: config.totalMintHardcap,
        nonceStore: options.nonceStore,
        events,
        now: options.now,
    });

    logger.info('Mint gateway created', {
        verifyingContract,
        domainName: config.domainName,
        totalMintHardcap: config.totalMintHardcap.toString(),
    });

    return { gateway, accessControl };
}
