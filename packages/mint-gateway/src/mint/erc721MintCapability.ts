import { ethers } from 'ethers';
import { MintCapability } from './mintGate';
import { logger, logContractCall } from '../utils/logger';

/**
 * Minimal ABI of a mintable ERC-721 the gateway holds the creator role on
 */
export const MINTABLE_ERC721_ABI = ['function mint(address to, uint256 tokenId)'];

/**
 * Mints through deployed ERC-721 contracts, sending one transaction per
 * token from the relayer wallet and waiting for confirmations.
 */
export class Erc721MintCapability implements MintCapability {
    constructor(
        private readonly signer: ethers.Signer,
        private readonly blockConfirmations: number = 1
    ) {}

    async mint(target: string, recipient: string, tokenId: bigint): Promise<void> {
        const contract = new ethers.Contract(target, MINTABLE_ERC721_ABI, this.signer);

        logContractCall('MintableERC721', 'mint', {
            target,
            recipient,
            tokenId: tokenId.toString(),
        });

        try {
            const tx = await contract.getFunction('mint').send(recipient, tokenId);
            logger.info('Mint transaction sent', { target, tokenId: tokenId.toString(), txHash: tx.hash });

            const receipt = await tx.wait(this.blockConfirmations);
            if (!receipt || receipt.status !== 1) {
                throw new Error(`Mint transaction ${tx.hash} did not succeed`);
            }

            logger.info('Mint transaction confirmed', {
                target,
                tokenId: tokenId.toString(),
                txHash: receipt.hash,
                blockNumber: receipt.blockNumber,
                gasUsed: receipt.gasUsed.toString(),
            });
        } catch (error) {
            logger.error('Mint transaction failed', {
                target,
                recipient,
                tokenId: tokenId.toString(),
                error: String(error),
            });
            throw error;
        }
    }
}
