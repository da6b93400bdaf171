/**
 * Simulated Chain Tests
 *
 * Checkpoint and revert across every registered participant; the clock only
 * moves forward.
 */

import { SIM_EPOCH, SimulatedChain, SimulatedToken, SimulatedVaultStrategy } from '../src/sim';

function createChain() {
    const chain = new SimulatedChain();
    const token = chain.register(new SimulatedToken('asset', 'USDC', 6));
    const vault = chain.register(new SimulatedVaultStrategy('vault-a', token, { clock: chain.clock }));
    token.mint('alice', 1_000n);
    token.approveAs('alice', 'vault-a', 1_000n);
    return { chain, token, vault };
}

describe('SimulatedChain', () => {
    test('revert restores token and strategy state but not time', () => {
        const { chain, token, vault } = createChain();
        const checkpoint = chain.snapshot();

        vault.depositAs('alice', 400n, 'alice');
        chain.advance(5_000);
        chain.revert(checkpoint);

        expect(token.balanceOf('alice')).toBe(1_000n);
        expect(token.allowance('alice', 'vault-a')).toBe(1_000n);
        expect(vault.totalSupply()).toBe(0n);
        expect(vault.balanceOf('alice')).toBe(0n);
        expect(chain.clock()).toBe(SIM_EPOCH + 5_000);
    });

    test('the clock refuses to run backwards', () => {
        const { chain } = createChain();
        expect(() => chain.advance(-1)).toThrow(RangeError);
    });
});

describe('SimulatedToken', () => {
    test('transferFrom spends allowance, frozen senders are refused', () => {
        const { token } = createChain();

        expect(token.transferFromAs('vault-a', 'alice', 'bob', 300n)).toBe(true);
        expect(token.allowance('alice', 'vault-a')).toBe(700n);
        expect(() => token.transferFromAs('vault-a', 'alice', 'bob', 701n)).toThrow('USDC: allowance 700 below 701');

        token.freeze('alice');
        expect(token.transferAs('alice', 'bob', 1n)).toBe(false);
        token.unfreeze('alice');
        expect(token.transferAs('alice', 'bob', 1n)).toBe(true);
        expect(token.balanceOf('bob')).toBe(301n);
        expect(token.totalSupply()).toBe(1_000n);
    });
});

describe('SimulatedVaultStrategy', () => {
    test('yield and loss move the exchange rate', () => {
        const { vault } = createChain();
        vault.depositAs('alice', 500n, 'alice');

        expect(vault.simulateYield(2_000)).toBe(100n);
        expect(vault.convertToAssets(500n)).toBe(600n);
        expect(vault.simulateLoss(5_000)).toBe(300n);
        expect(vault.convertToAssets(500n)).toBe(300n);
        expect(vault.convertToShares(30n)).toBe(50n);
    });

    test('lock, cap and injected failure', () => {
        const { chain, vault } = createChain();
        const capped = new SimulatedVaultStrategy('vault-b', chain.register(new SimulatedToken('x', 'X', 6)), { depositCap: 10n });
        vault.depositAs('alice', 100n, 'alice');

        vault.lockUntil(chain.clock() + 1_000);
        expect(() => vault.redeemAs('alice', 10n, 'alice', 'alice')).toThrow('redemptions locked until 2024-01-01T00:00:01.000Z');
        chain.advance(1_000);
        expect(vault.redeemAs('alice', 10n, 'alice', 'alice')).toBe(10n);
        expect(() => vault.redeemAs('bob', 10n, 'bob', 'alice')).toThrow('only the owner may redeem');

        expect(() => capped.depositAs('alice', 11n, 'alice')).toThrow('deposit cap 10 exceeded');

        vault.setFailure('node unreachable');
        expect(() => vault.balanceOf('alice')).toThrow('node unreachable');
        vault.setFailure(null);
        expect(vault.balanceOf('alice')).toBe(90n);
    });
});
