/**
 * Wiring for a pool running on the simulated chain.
 */

import { POOL_CONFIG, type PoolConfig } from '../config/constants';
import { RoleRegistry } from '../core/access';
import { CircuitBreaker } from '../core/circuitBreaker';
import { MultiStrategyPool } from '../engine/MultiStrategyPool';
import type { Address, StrategyHandle } from '../types';
import { SimulatedChain } from './chain';
import { SimulatedDirectStrategy } from './directStrategy';
import { SimulatedToken } from './token';
import { SimulatedVaultStrategy, type SimulatedVaultOptions } from './vaultStrategy';

export { SimulatedChain, SIM_EPOCH, type ChainCheckpoint, type ChainParticipant } from './chain';
export { SimulatedToken } from './token';
export { SimulatedVaultStrategy, type VaultAction, type SimulatedVaultOptions } from './vaultStrategy';
export { SimulatedDirectStrategy } from './directStrategy';

export interface SimulatedPoolOptions {
    admin?: Address;
    poolAddress?: Address;
    assetAddress?: Address;
    symbol?: string;
    config?: Partial<PoolConfig>;
}

export interface SimulatedPool {
    chain: SimulatedChain;
    token: SimulatedToken;
    roles: RoleRegistry;
    breaker: CircuitBreaker;
    pool: MultiStrategyPool;
    admin: Address;
}

export function createSimulatedPool(options: SimulatedPoolOptions = {}): SimulatedPool {
    const admin = options.admin ?? 'admin';
    const poolAddress = options.poolAddress ?? 'pool';
    const config: PoolConfig = { ...POOL_CONFIG, ...options.config };

    const chain = new SimulatedChain();
    const token = chain.register(
        new SimulatedToken(options.assetAddress ?? 'asset', options.symbol ?? 'USDC', config.assetDecimals),
    );
    const roles = new RoleRegistry(admin);
    const breaker = new CircuitBreaker(roles, chain.clock);
    const pool = new MultiStrategyPool({
        address: poolAddress,
        asset: token.connect(poolAddress),
        access: roles,
        pauseGate: breaker,
        transactions: chain,
        clock: chain.clock,
        config,
    });

    return { chain, token, roles, breaker, pool, admin };
}

/** Mint `amount` to `user` and approve the pool for it */
export function fundAccount(setup: SimulatedPool, user: Address, amount: bigint): void {
    setup.token.mint(user, amount);
    const allowed = setup.token.allowance(user, setup.pool.address);
    setup.token.approveAs(user, setup.pool.address, allowed + amount);
}

export function createVault(
    setup: SimulatedPool,
    address: Address,
    options: Omit<SimulatedVaultOptions, 'clock'> = {},
): SimulatedVaultStrategy {
    return setup.chain.register(
        new SimulatedVaultStrategy(address, setup.token, { ...options, clock: setup.chain.clock }),
    );
}

export function vaultHandle(vault: SimulatedVaultStrategy, poolAddress: Address): StrategyHandle {
    return { kind: 'convertible', address: vault.address, vault: vault.connect(poolAddress) };
}

export function directHandle(setup: SimulatedPool, address: Address): StrategyHandle {
    const account = new SimulatedDirectStrategy(address, setup.token, setup.pool.address);
    return { kind: 'direct', address, account };
}
