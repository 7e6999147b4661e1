import winston from 'winston';
import { gatewayConfig } from '../config/chain';

export const logger = winston.createLogger({
    level: gatewayConfig.logLevel,
    silent: gatewayConfig.logSilent,
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
    ),
    defaultMeta: { service: 'mint-gateway' },
    transports: [new winston.transports.Console()],
});

type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Log an authorization lifecycle event keyed by the authorizer
 */
export function logAuthorizationEvent(
    authorizer: string,
    event: string,
    level: LogLevel,
    data: Record<string, unknown> = {}
): void {
    logger.log(level, `authorization ${event}`, { authorizer, event, ...data });
}

/**
 * Log an outgoing contract call
 */
export function logContractCall(
    contract: string,
    method: string,
    args: Record<string, unknown>
): void {
    logger.info(`contract call ${contract}.${method}`, { contract, method, args });
}
