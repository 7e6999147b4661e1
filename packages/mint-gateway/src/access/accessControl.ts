import { GatewayError } from '../errors/gatewayError';
import { FULL_PRIVILEGES_MASK, ROLE_ACCESS_MANAGER } from '../config/roles';
import { GatewayEvents } from '../types/events';
import { TypedEventBus } from '../utils/eventBus';
import { toAddress, toUint256 } from '../utils/address';
import { logger } from '../utils/logger';

/**
 * Capability check the gateway needs from a permission store
 */
export interface RoleStore {
    hasRole(operator: string, role: bigint): boolean;
}

export interface FeatureFlagStore {
    isEnabled(feature: bigint): boolean;
}

/**
 * Access Control
 *
 * In-memory permission store. Each address holds a 256-bit permission mask;
 * the gateway's own address holds the feature mask. Operators with
 * ROLE_ACCESS_MANAGER may change masks, but only for bits they hold themselves.
 */
export class AccessControl implements RoleStore, FeatureFlagStore {
    private userRoles: Map<string, bigint> = new Map();
    private readonly self: string;

    constructor(
        gatewayAddress: string,
        deployer: string,
        private readonly events: TypedEventBus<GatewayEvents>
    ) {
        this.self = toAddress(gatewayAddress, 'gateway');
        this.userRoles.set(toAddress(deployer, 'deployer'), FULL_PRIVILEGES_MASK);
    }

    getRole(operator: string): bigint {
        return this.userRoles.get(toAddress(operator, 'operator')) ?? 0n;
    }

    /**
     * Feature mask, i.e. the permissions of the gateway address itself
     */
    features(): bigint {
        return this.getRole(this.self);
    }

    hasRole(operator: string, role: bigint): boolean {
        return (this.getRole(operator) & role) === role;
    }

    isEnabled(feature: bigint): boolean {
        return this.hasRole(this.self, feature);
    }

    /**
     * Set the operator's permissions to `role`, limited by what the caller holds.
     *
     * @returns the permissions actually set
     */
    updateRole(caller: string, operator: string, role: bigint): bigint {
        const by = toAddress(caller, 'caller');
        const target = toAddress(operator, 'operator');
        toUint256(role, 'role');

        if (!this.hasRole(by, ROLE_ACCESS_MANAGER)) {
            logger.warn('Role update denied', { caller: by, operator: target });
            throw new GatewayError('ACCESS_DENIED', 'access denied');
        }

        const actual = this.evaluateBy(by, this.getRole(target), role);
        this.userRoles.set(target, actual);

        logger.info('Role updated', {
            by,
            operator: target,
            requested: role.toString(16),
            actual: actual.toString(16),
        });
        this.events.emit('RoleUpdated', { by, operator: target, requested: role, actual });

        return actual;
    }

    updateFeatures(caller: string, mask: bigint): bigint {
        return this.updateRole(caller, this.self, mask);
    }

    /**
     * Apply `desired` to `target`, touching only bits `operator` holds:
     * held bits set in `desired` are granted, held bits clear in it are revoked,
     * every other bit of `target` stays as it was.
     */
    evaluateBy(operator: string, target: bigint, desired: bigint): bigint {
        const permissions = this.getRole(operator);

        let result = target | (permissions & desired);
        result &= FULL_PRIVILEGES_MASK ^ (permissions & (FULL_PRIVILEGES_MASK ^ desired));

        return result;
    }
}
