import { ethers } from 'ethers';
import { AccessControl } from '../src/access/accessControl';
import {
    CANCEL_AUTHORIZATION_TYPES,
    MINT_WITH_AUTHORIZATION_TYPES,
    toCancelAuthorizationMessage,
    toMintAuthorizationMessage,
    toTypedDataDomain,
} from '../src/authorization/eip712';
import { FEATURE_MINTING_WITH_AUTH, ROLE_FACTORY_MINTER } from '../src/config/roles';
import { MintGateway } from '../src/gateway/mintGateway';
import { MintCapability } from '../src/mint/mintGate';
import { AuthorizationDomain, CancelAuthorization, MintAuthorization } from '../src/types/authorization';
import { GatewayEvents } from '../src/types/events';
import { TypedEventBus } from '../src/utils/eventBus';

export const GATEWAY_ADDRESS = '0x5FbDB2315678afecb367f032d93F642f64180aa3';
export const TOKEN_ADDRESS = '0xe7f1725E7734CE288F8367e1Bb143E90bb3F0512';
export const RECIPIENT = '0x70997970C51812dc3A010C7d01b50e0d17dc79C8';
export const OTHER_ADDRESS = '0x3C44CdDdB6a900fa2b585dd299e03d12FA4293BC';
export const CHAIN_ID = 31337n;
export const NOW = 1_700_000_000n;

export const NONCE_A = '0x' + 'aa'.repeat(32);
export const NONCE_B = '0x' + 'bb'.repeat(32);

// Test-only keys
export const deployer = new ethers.Wallet('0x' + '01'.repeat(32));
export const minter = new ethers.Wallet('0x' + '02'.repeat(32));
export const outsider = new ethers.Wallet('0x' + '03'.repeat(32));

export const DOMAIN: AuthorizationDomain = {
    name: 'NFTFactory',
    chainId: CHAIN_ID,
    verifyingContract: GATEWAY_ADDRESS,
};

/**
 * In-process stand-in for a mintable ERC-721
 */
export class FakeErc721 implements MintCapability {
    readonly minted: Array<{ target: string; recipient: string; tokenId: bigint }> = [];
    failWith: Error | null = null;
    private held: Promise<void> | null = null;

    /**
     * Keep mints pending until the returned callback settles them
     */
    hold(): (error?: Error) => void {
        let settle: (error?: Error) => void = () => undefined;
        this.held = new Promise<void>((resolve, reject) => {
            settle = (error) => (error ? reject(error) : resolve());
        });
        return settle;
    }

    async mint(target: string, recipient: string, tokenId: bigint): Promise<void> {
        if (this.held) {
            await this.held;
        }
        if (this.failWith) {
            throw this.failWith;
        }
        this.minted.push({ target, recipient, tokenId });
    }
}

export interface GatewayFixture {
    gateway: MintGateway;
    accessControl: AccessControl;
    token: FakeErc721;
    events: TypedEventBus<GatewayEvents>;
    setChainId(value: bigint): void;
    setNow(value: bigint): void;
}

export function createFixture(options: { hardcap?: bigint; mintingWithAuth?: boolean } = {}): GatewayFixture {
    const events = new TypedEventBus<GatewayEvents>();
    const accessControl = new AccessControl(GATEWAY_ADDRESS, deployer.address, events);
    accessControl.updateRole(deployer.address, minter.address, ROLE_FACTORY_MINTER);
    if (options.mintingWithAuth ?? true) {
        accessControl.updateFeatures(deployer.address, FEATURE_MINTING_WITH_AUTH);
    }

    const token = new FakeErc721();
    let chainId = CHAIN_ID;
    let now = NOW;

    const gateway = new MintGateway({
        verifyingContract: GATEWAY_ADDRESS,
        chainId: () => chainId,
        roles: accessControl,
        features: accessControl,
        token,
        totalMintHardcap: options.hardcap ?? 10n,
        events,
        now: () => now,
    });

    return {
        gateway,
        accessControl,
        token,
        events,
        setChainId: (value) => {
            chainId = value;
        },
        setNow: (value) => {
            now = value;
        },
    };
}

export function mintAuthorization(overrides: Partial<MintAuthorization> = {}): MintAuthorization {
    return {
        target: TOKEN_ADDRESS,
        recipient: RECIPIENT,
        tokenId: 1n,
        validAfter: NOW - 60n,
        validBefore: NOW + 3600n,
        nonce: NONCE_A,
        ...overrides,
    };
}

export function signMintAuthorization(
    wallet: ethers.Wallet,
    auth: MintAuthorization,
    domain: AuthorizationDomain = DOMAIN
): Promise<string> {
    return wallet.signTypedData(
        toTypedDataDomain(domain),
        MINT_WITH_AUTHORIZATION_TYPES,
        toMintAuthorizationMessage(auth)
    );
}

export function signCancelAuthorization(
    wallet: ethers.Wallet,
    auth: CancelAuthorization,
    domain: AuthorizationDomain = DOMAIN
): Promise<string> {
    return wallet.signTypedData(
        toTypedDataDomain(domain),
        CANCEL_AUTHORIZATION_TYPES,
        toCancelAuthorizationMessage(auth)
    );
}

/**
 * Run `fn` and return what it threw
 */
export function thrownBy(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('expected function to throw');
}
