/**
 * Permission bits understood by the gateway.
 *
 * Features are permission bits held by the gateway's own address and switch
 * public functionality on or off. Roles are permission bits held by operators.
 */

/** Enables `mintWithAuthorization` */
export const FEATURE_MINTING_WITH_AUTH = 0x0000_0001n;

/** Allows minting directly, and makes signatures valid for `mintWithAuthorization` */
export const ROLE_FACTORY_MINTER = 0x0001_0000n;

/** Allows changing the total mint hardcap */
export const ROLE_HARDCAP_MANAGER = 0x0002_0000n;

/** Allows changing other operators' permissions, including features */
export const ROLE_ACCESS_MANAGER = 1n << 255n;

export const FULL_PRIVILEGES_MASK = (1n << 256n) - 1n;

export const MAX_UINT256 = FULL_PRIVILEGES_MASK;
