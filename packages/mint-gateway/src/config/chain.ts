import 'dotenv/config';
import { ethers } from 'ethers';
import { z } from 'zod';
import { AddressSchema } from '../authorization/schema';

const DecimalSchema = (pattern: RegExp, message: string, fallback: string) =>
    z
        .string()
        .regex(pattern, { message })
        .default(fallback)
        .transform((value) => BigInt(value));

/**
 * Environment variables read by the gateway
 */
const GatewayEnvSchema = z.object({
    GATEWAY_RPC_URL: z.string().url().default('http://127.0.0.1:8545'),
    GATEWAY_CHAIN_ID: DecimalSchema(/^[1-9][0-9]*$/, 'must be a positive decimal integer', '31337'),
    GATEWAY_ADDRESS: AddressSchema.optional(),
    GATEWAY_DOMAIN_NAME: z.string().min(1).default('NFTFactory'),
    GATEWAY_TOTAL_MINT_HARDCAP: DecimalSchema(/^[0-9]+$/, 'must be a decimal integer', '10000'),
    BLOCK_CONFIRMATIONS: z.coerce.number().int().min(0).default(1),
    RELAYER_PRIVATE_KEY: z.string().optional(),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    LOG_SILENT: z.enum(['true', 'false']).default('false'),
});

export interface GatewayConfig {
    rpcUrl: string;
    chainId: bigint;
    /** Gateway address used as the EIP-712 verifying contract */
    verifyingContract?: string;
    domainName: string;
    /** Hardcap the gateway starts with */
    totalMintHardcap: bigint;
    blockConfirmations: number;
    relayerPrivateKey?: string;
    logLevel: string;
    logSilent: boolean;
}

/**
 * Parse gateway configuration from an environment map
 */
export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
    const result = GatewayEnvSchema.safeParse(env);
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid gateway configuration: ${details}`);
    }

    const parsed = result.data;
    return {
        rpcUrl: parsed.GATEWAY_RPC_URL,
        chainId: parsed.GATEWAY_CHAIN_ID,
        verifyingContract: parsed.GATEWAY_ADDRESS,
        domainName: parsed.GATEWAY_DOMAIN_NAME,
        totalMintHardcap: parsed.GATEWAY_TOTAL_MINT_HARDCAP,
        blockConfirmations: parsed.BLOCK_CONFIRMATIONS,
        relayerPrivateKey: parsed.RELAYER_PRIVATE_KEY,
        logLevel: parsed.LOG_LEVEL,
        logSilent: parsed.LOG_SILENT === 'true',
    };
}

export const gatewayConfig = loadGatewayConfig();

/**
 * Create a JSON-RPC provider for the configured chain
 */
export function getProvider(config: GatewayConfig = gatewayConfig): ethers.JsonRpcProvider {
    const network = ethers.Network.from(config.chainId);
    return new ethers.JsonRpcProvider(config.rpcUrl, network, { staticNetwork: network });
}

/**
 * Create the wallet that relays mint transactions
 */
export function getRelayerWallet(config: GatewayConfig = gatewayConfig): ethers.Wallet {
    if (!config.relayerPrivateKey) {
        throw new Error('RELAYER_PRIVATE_KEY is not set in environment variables');
    }
    return new ethers.Wallet(config.relayerPrivateKey, getProvider(config));
}

/**
 * Get the gateway address, required for on-chain use
 */
export function getGatewayAddress(config: GatewayConfig = gatewayConfig): string {
    if (!config.verifyingContract) {
        throw new Error('GATEWAY_ADDRESS is not set in environment variables');
    }
    return config.verifyingContract;
}

/**
 * Read the live chain id from the node on every call
 */
export function getLiveChainId(provider: ethers.JsonRpcProvider): () => Promise<bigint> {
    return async () => BigInt(await provider.send('eth_chainId', []));
}
